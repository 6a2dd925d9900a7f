import { parseHostmask } from "./hostmask.js";

const UNITS = [
  { suffix: "y", seconds: 31_536_000 },
  { suffix: "d", seconds: 86_400 },
  { suffix: "h", seconds: 3_600 },
  { suffix: "m", seconds: 60 },
  { suffix: "s", seconds: 1 },
] as const;

/** `7500` → `2h 5m`; at most `parts` units, largest first. */
export function formatElapsed(seconds: number, parts = 3): string {
  let remaining = Math.max(0, Math.floor(seconds));
  if (remaining === 0) {
    return "0s";
  }
  const out: string[] = [];
  for (const unit of UNITS) {
    if (out.length >= parts || remaining === 0) {
      break;
    }
    if (remaining >= unit.seconds) {
      out.push(`${Math.floor(remaining / unit.seconds)}${unit.suffix}`);
      remaining %= unit.seconds;
    }
  }
  return out.join(" ");
}

export const AFFECTED_DISPLAY_LIMIT = 8;

/** `Affects (2): alice(a@host) bob(b@host)` */
export function formatAffected(hostmasks: readonly string[]): string {
  const shown = hostmasks.slice(0, AFFECTED_DISPLAY_LIMIT).map((hostmask) => {
    const { nick, user, host } = parseHostmask(hostmask);
    return nick ? `${nick}(${user}@${host})` : hostmask;
  });
  const more = hostmasks.length > AFFECTED_DISPLAY_LIMIT ? " ..." : "";
  return `Affects (${hostmasks.length}): ${shown.join(" ")}${more}`;
}
