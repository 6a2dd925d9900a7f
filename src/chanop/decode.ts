import { isChannelName } from "./hostmask.js";
import type { ChanopEvent } from "./types.js";

export type IrcLine = {
  tags: Record<string, string>;
  /** Source without the leading `:`; empty when absent. */
  prefix: string;
  command: string;
  params: string[];
  /** Whether the last param was a `:trailing` param. */
  trailing: boolean;
};

function skipSpaces(line: string, pos: number): number {
  let next = pos;
  while (line[next] === " ") {
    next += 1;
  }
  return next;
}

/** Splits `[@tags] [:prefix] <command> [params...] [:trailing]`. */
export function parseIrcLine(raw: string): IrcLine | undefined {
  const line = raw.replace(/\r?\n$/, "");
  const tags: Record<string, string> = {};
  let pos = 0;
  if (line.startsWith("@")) {
    const end = line.indexOf(" ");
    if (end < 0) {
      return undefined;
    }
    for (const tag of line.slice(1, end).split(";")) {
      const eq = tag.indexOf("=");
      if (eq < 0) {
        tags[tag] = "";
      } else {
        tags[tag.slice(0, eq)] = tag.slice(eq + 1);
      }
    }
    pos = skipSpaces(line, end + 1);
  }
  let prefix = "";
  if (line[pos] === ":") {
    const end = line.indexOf(" ", pos);
    if (end < 0) {
      return undefined;
    }
    prefix = line.slice(pos + 1, end);
    pos = skipSpaces(line, end + 1);
  }
  const commandEnd = line.indexOf(" ", pos);
  const command = (commandEnd < 0 ? line.slice(pos) : line.slice(pos, commandEnd)).toUpperCase();
  if (!command) {
    return undefined;
  }
  const params: string[] = [];
  let trailing = false;
  pos = commandEnd < 0 ? line.length : skipSpaces(line, commandEnd + 1);
  while (pos < line.length) {
    if (line[pos] === ":") {
      params.push(line.slice(pos + 1));
      trailing = true;
      break;
    }
    const end = line.indexOf(" ", pos);
    if (end < 0) {
      params.push(line.slice(pos));
      break;
    }
    params.push(line.slice(pos, end));
    pos = skipSpaces(line, end + 1);
  }
  return { tags, prefix, command, params, trailing };
}

function parseDate(value: string | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value)) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

/** Decodes the lines the chanop core reacts to; anything else is `undefined`. */
export function decodeIrcLine(server: string, raw: string): ChanopEvent | undefined {
  const parsed = parseIrcLine(raw);
  if (!parsed) {
    return undefined;
  }
  const { prefix, command, params } = parsed;
  const [first = "", second = "", third = "", fourth = "", fifth = "", sixth = ""] = params;
  switch (command) {
    case "JOIN":
      return first ? { kind: "join", server, channel: first, hostmask: prefix } : undefined;
    case "PART":
      return first ? { kind: "part", server, channel: first, hostmask: prefix } : undefined;
    case "QUIT":
      return { kind: "quit", server, hostmask: prefix };
    case "NICK":
      return first ? { kind: "nick", server, hostmask: prefix, newNick: first } : undefined;
    case "MODE":
      if (!isChannelName(first) || !second) {
        return undefined;
      }
      return {
        kind: "mode",
        server,
        channel: first,
        actor: prefix,
        modes: second,
        args: params.slice(2),
      };
    case "367":
      if (!second || !third) {
        return undefined;
      }
      return {
        kind: "maskListEntry",
        server,
        channel: second,
        mask: third,
        operator: fourth || undefined,
        date: parseDate(fifth),
      };
    case "728":
      if (!second || third !== "q" || !fourth) {
        return undefined;
      }
      return {
        kind: "maskListEntry",
        server,
        channel: second,
        mask: fourth,
        operator: fifth || undefined,
        date: parseDate(sixth),
      };
    case "368":
    case "729":
      return second ? { kind: "maskListEnd", server, channel: second } : undefined;
    case "005": {
      const tokens = params.slice(1, parsed.trailing ? -1 : undefined);
      return { kind: "isupport", server, tokens };
    }
    case "001":
      return { kind: "connected", server };
    default:
      return undefined;
  }
}
