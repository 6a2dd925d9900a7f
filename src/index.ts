export { createChanopService } from "./chanop/service.js";
export type { ChanopService, ChanopServiceOptions } from "./chanop/service.js";
export { CHANOP_COMMAND_NAMES, isChanopCommandName } from "./chanop/commands.js";
export type { ChanopCommandName, CommandInvocation } from "./chanop/commands.js";
export { createChanopEventBus } from "./chanop/event-bus.js";
export type { ChanopEventBus } from "./chanop/event-bus.js";
export { decodeIrcLine, parseIrcLine } from "./chanop/decode.js";
export type { IrcLine } from "./chanop/decode.js";
export { createTimerScheduler } from "./chanop/types.js";
export type * from "./chanop/types.js";
export {
  CaseInsensitiveMap,
  CaseInsensitiveSet,
  equalsIgnoreCase,
  foldCase,
  normalizeKey,
} from "./chanop/casefold.js";
export {
  BAN_MASK_STRATEGIES,
  buildBanMask,
  compilePattern,
  hostmaskPatternMatch,
  isHostmask,
  isNick,
  parseHostmask,
  patternMatch,
} from "./chanop/hostmask.js";
export type { BanMaskStrategy, HostmaskParts } from "./chanop/hostmask.js";
export { formatElapsed } from "./chanop/format.js";
export {
  ChanopArgumentError,
  ChanopConfigError,
  ChanopConfigFileError,
  ChanopError,
} from "./chanop/errors.js";
export { loadChanopConfigFile, parseConfigJson5, validateChanopConfig } from "./config/io.js";
export { ChanopConfigSchema } from "./config/schema.js";
export type { ChanopConfig } from "./config/schema.js";
export { createConfigLookup } from "./config/settings.js";
export type { ConfigLookup, ConfigScope } from "./config/settings.js";
export { CHANOP_SETTING_DEFAULTS } from "./config/defaults.js";
export type { ChanopSettingKey } from "./config/defaults.js";
export { configureLogging, getLogger } from "./logging/logger.js";
export { createSubsystemLogger } from "./logging/subsystem.js";
export type { SubsystemLogger } from "./logging/subsystem.js";
