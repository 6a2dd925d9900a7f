import { z } from "zod";

const SettingValueSchema = z.string();

const ChanopSettingsShape = {
  op_command: SettingValueSchema.optional(),
  deop_command: SettingValueSchema.optional(),
  autodeop: SettingValueSchema.optional(),
  autodeop_delay: SettingValueSchema.optional(),
  default_banmask: SettingValueSchema.optional(),
  enable_remove: SettingValueSchema.optional(),
  kick_reason: SettingValueSchema.optional(),
  display_affected: SettingValueSchema.optional(),
};

const ChanopServerOnlyShape = {
  chanmodes: SettingValueSchema.optional(),
  modes: SettingValueSchema.optional(),
  watchlist: SettingValueSchema.optional(),
  ignore_modes: SettingValueSchema.optional(),
};

export const ChanopChannelSettingsSchema = z.object(ChanopSettingsShape).strict();

export const ChanopServerSettingsSchema = z
  .object({
    ...ChanopSettingsShape,
    ...ChanopServerOnlyShape,
    channels: z.record(z.string(), ChanopChannelSettingsSchema).optional(),
  })
  .strict();

export const ChanopGlobalSettingsSchema = z
  .object({
    ...ChanopSettingsShape,
    ...ChanopServerOnlyShape,
    enable_multi_kick: SettingValueSchema.optional(),
  })
  .strict();

export const ChanopLoggingSchema = z
  .object({
    level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
    file: z.string().optional(),
    consoleStyle: z.enum(["pretty", "json", "hidden"]).optional(),
  })
  .strict();

export const ChanopConfigSchema = z
  .object({
    $schema: z.string().optional(),
    settings: ChanopGlobalSettingsSchema.optional(),
    servers: z.record(z.string(), ChanopServerSettingsSchema).optional(),
    logging: ChanopLoggingSchema.optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    for (const [server, serverSettings] of Object.entries(value.servers ?? {})) {
      for (const channel of Object.keys(serverSettings.channels ?? {})) {
        if (!/^[#&+!]/.test(channel)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["servers", server, "channels", channel],
            message: `servers.${server}.channels keys must be channel names (got "${channel}")`,
          });
        }
      }
    }
  });

export type ChanopConfig = z.infer<typeof ChanopConfigSchema>;
export type ChanopServerSettings = z.infer<typeof ChanopServerSettingsSchema>;
export type ChanopChannelSettings = z.infer<typeof ChanopChannelSettingsSchema>;
