import { config as loadEnv } from "dotenv";
import { z } from "zod";

import {
  resolveEnvelopeProfile,
  type EnvelopeProfile,
  type EnvelopeProfileName,
} from "./azure/envelope_profile";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

const flag = z
  .enum(["1", "0", "true", "false", "yes", "no", "on", "off"])
  .transform((value) => ["1", "true", "yes", "on"].includes(value));

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  HOST: z.string().min(1).default("127.0.0.1"),
  // Port the Functions host expects the custom handler to listen on.
  FUNCTIONS_CUSTOMHANDLER_PORT: z.coerce.number().int().min(0).max(65535).default(80),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  PINO_PRETTY: flag.optional(),
  AZURE_FN_ENVELOPE_PROFILE: z.enum(["http", "metadata", "return-value"]).default("http"),
  AZURE_FN_FORCE_OK: flag.optional(),
});

export type AppConfig = {
  isDev: boolean;
  host: string;
  port: number;
  logLevel: string;
  prettyLogs: boolean;
  envelopeProfile: EnvelopeProfile;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`invalid environment: ${issues}`);
  }

  const vars = parsed.data;
  const isDev = vars.NODE_ENV !== "production";
  const profileName: EnvelopeProfileName = vars.AZURE_FN_ENVELOPE_PROFILE;

  return {
    isDev,
    host: vars.HOST,
    port: vars.FUNCTIONS_CUSTOMHANDLER_PORT,
    logLevel: vars.LOG_LEVEL ?? (isDev ? "debug" : "info"),
    prettyLogs: isDev && vars.PINO_PRETTY === true,
    envelopeProfile: resolveEnvelopeProfile(profileName, {
      forceOkStatus: vars.AZURE_FN_FORCE_OK,
    }),
  };
}
