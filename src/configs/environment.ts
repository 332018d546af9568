import dotenv from "dotenv";
import { z } from "zod";
import { LogLevel } from "../common/common-enum";

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.string().optional(),

  LOG_LEVEL: z.nativeEnum(LogLevel).optional(),
  ENABLE_CONSOLE_LOG: z.enum(["true", "false"]).optional(),
});

type Env = Record<string, string | undefined>;

export type AppConfig = ReturnType<typeof buildConfig>;

const toLogLevel = (value: string | undefined): LogLevel => {
  const parsed = z.nativeEnum(LogLevel).safeParse(value);
  return parsed.success ? parsed.data : LogLevel.INFO;
};

export const buildConfig = (env: Env = process.env) => {
  return {
    nodeEnv: env.NODE_ENV || "development",
    logging: {
      level: toLogLevel(env.LOG_LEVEL),
      enableConsole: env.ENABLE_CONSOLE_LOG !== "false",
    },
  };
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = buildConfig();
  }
  return cachedConfig;
};

export const validateConfig = (env: Env = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return buildConfig(env);
};
