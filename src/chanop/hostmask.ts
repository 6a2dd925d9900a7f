export type HostmaskParts = {
  nick: string;
  user: string;
  host: string;
};

export const BAN_MASK_STRATEGIES = ["nick", "user", "host", "exact", "webchat"] as const;

export type BanMaskStrategy = (typeof BAN_MASK_STRATEGIES)[number];

const EMPTY_PARTS: HostmaskParts = { nick: "", user: "", host: "" };
const NICK_SPECIALS = "[\\]\\\\`_^{|}";
const NICK_PATTERN = new RegExp(`^[A-Za-z${NICK_SPECIALS}][-0-9A-Za-z${NICK_SPECIALS}]*$`);
const HOSTNAME_LABEL = /^[a-z\d-]+$/i;

export function isBanMaskStrategy(value: string): value is BanMaskStrategy {
  return BAN_MASK_STRATEGIES.some((strategy) => strategy === value);
}

export function isChannelName(name: string): boolean {
  return /^[#&+!][^\s,\u0007]+$/u.test(name);
}

export function isNick(value: string): boolean {
  return NICK_PATTERN.test(value);
}

/** True for strings shaped like `nick!user@host`, wildcards allowed. */
export function isHostmask(value: string): boolean {
  const bang = value.indexOf("!");
  const at = value.indexOf("@");
  return bang >= 1 && bang < at - 1 && at >= 3 && value.length > at + 1;
}

/** Splits `nick!user@host`; malformed input yields empty parts. */
export function parseHostmask(raw: string): HostmaskParts {
  const value = raw.startsWith(":") ? raw.slice(1) : raw;
  if (!isHostmask(value)) {
    return { ...EMPTY_PARTS };
  }
  const bang = value.indexOf("!");
  const at = value.indexOf("@");
  const rest = value.slice(at + 1);
  const space = rest.indexOf(" ");
  return {
    nick: value.slice(0, bang),
    user: value.slice(bang + 1, at),
    host: space > 0 ? rest.slice(0, space) : rest,
  };
}

/** Drops ident markers (`~user`, `i=user`, `n=user`). */
export function trimUser(user: string): string {
  if (user.startsWith("~")) {
    return user.slice(1);
  }
  if (user.startsWith("i=") || user.startsWith("n=")) {
    return user.slice(2);
  }
  return user;
}

export function isIpv4(value: string): boolean {
  const octets = value.split(".");
  if (octets.length !== 4) {
    return false;
  }
  return octets.every((octet) => /^\d{1,3}$/.test(octet) && Number(octet) <= 255);
}

export function isHostname(value: string): boolean {
  if (!value || value.length > 255) {
    return false;
  }
  const trimmed = value.endsWith(".") ? value.slice(0, -1) : value;
  return trimmed
    .split(".")
    .every(
      (label) =>
        label.length > 0 &&
        label.length <= 63 &&
        !label.startsWith("-") &&
        !label.endsWith("-") &&
        HOSTNAME_LABEL.test(label),
    );
}

/** `7f000001` → `127.0.0.1`; anything else → empty string. */
export function hexToIp(value: string): string {
  if (!/^[0-9a-f]{8}$/i.test(value)) {
    return "";
  }
  const octets: number[] = [];
  for (let index = 0; index < value.length; index += 2) {
    octets.push(Number.parseInt(value.slice(index, index + 2), 16));
  }
  return octets.join(".");
}

const patternCache = new Map<string, RegExp>();

export function compilePattern(pattern: string): RegExp {
  const cached = patternCache.get(pattern);
  if (cached) {
    return cached;
  }
  let source = "^";
  for (const char of pattern) {
    if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else {
      source += char.replace(/[.+^${}()|[\]\\/-]/g, "\\$&");
    }
  }
  const compiled = new RegExp(`${source}$`, "i");
  patternCache.set(pattern, compiled);
  return compiled;
}

export function patternCacheSize(): number {
  return patternCache.size;
}

export function patternMatch(pattern: string, candidates: Iterable<string>): string[] {
  const matcher = compilePattern(pattern);
  const matches: string[] = [];
  for (const candidate of candidates) {
    if (matcher.test(candidate)) {
      matches.push(candidate);
    }
  }
  return matches;
}

/** Like {@link patternMatch}, but only for patterns shaped like a hostmask. */
export function hostmaskPatternMatch(pattern: string, candidates: Iterable<string>): string[] {
  if (!isHostmask(pattern)) {
    return [];
  }
  return patternMatch(pattern, candidates);
}

/**
 * Builds a ban mask for a user's hostmask.
 *
 * `exact` returns the hostmask itself. `webchat` targets the username when the
 * host is not a real hostname and the username is a hex-encoded IPv4 address
 * the host does not already show (web gateways put the client address there);
 * otherwise it bans by host. The remaining keywords combine freely.
 */
export function buildBanMask(hostmask: string, strategy: readonly BanMaskStrategy[]): string {
  if (strategy.includes("exact")) {
    return hostmask;
  }
  const parts = parseHostmask(hostmask);
  if (strategy.includes("webchat")) {
    const decodedIp = hexToIp(trimUser(parts.user));
    if (!isHostname(parts.host) && isIpv4(decodedIp) && !parts.host.includes(decodedIp)) {
      return `*!${parts.user}@*`;
    }
    return `*!*@${parts.host}`;
  }
  const nick = strategy.includes("nick") && parts.nick ? parts.nick : "*";
  const user = strategy.includes("user") && parts.user ? parts.user : "*";
  const host = strategy.includes("host") && parts.host ? parts.host : "*";
  return `${nick}!${user}@${host}`;
}
