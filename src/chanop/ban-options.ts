import { Command, CommanderError } from "commander";
import { ChanopArgumentError } from "./errors.js";
import type { BanMaskStrategy } from "./hostmask.js";

export type BanArguments = {
  /** `undefined` when no mask option was given. */
  strategy?: BanMaskStrategy[];
  targets: string[];
};

type BanOptionValues = {
  host?: boolean;
  user?: boolean;
  nick?: boolean;
  exact?: boolean;
  webchat?: boolean;
};

function buildParser(name: string): Command {
  return new Command(name)
    .helpOption(false)
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined })
    .allowExcessArguments(true)
    .option("-h, --host", "match hostname (*!*@host)")
    .option("-u, --user", "match username (*!user@*)")
    .option("-n, --nick", "match nick (nick!*@*)")
    .option("-e, --exact", "use the exact hostmask")
    .option("-w, --webchat", "like --host, but match a hex-encoded IP username")
    .argument("[targets...]");
}

/** Splits `somebody --user --host` into targets and a mask strategy. */
export function parseBanArguments(args: string, command = "ban"): BanArguments {
  const parser = buildParser(command);
  try {
    parser.parse(args.split(/\s+/).filter(Boolean), { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      throw new ChanopArgumentError(`Argument error, ${err.message}`);
    }
    throw err;
  }
  const opts = parser.opts<BanOptionValues>();
  const targets = [...parser.args];
  if (opts.exact) {
    return { strategy: ["exact"], targets };
  }
  const strategy: BanMaskStrategy[] = [];
  if (opts.nick) {
    strategy.push("nick");
  }
  if (opts.user) {
    strategy.push("user");
  }
  if (opts.host) {
    strategy.push("host");
  }
  if (opts.webchat) {
    strategy.push("webchat");
  }
  return { strategy: strategy.length > 0 ? strategy : undefined, targets };
}
