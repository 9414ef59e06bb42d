const requiredEnv = [
  "PORT",
  "DATABASE_URL",
  "SESSION_SECRET",
  "CANVAS_API_URL",
  "CANVAS_API_KEY",
  "LTI_KEY",
  "LTI_SECRET",
  "LTI_LAUNCH_URL"
] as const;

type RequiredEnvKey = (typeof requiredEnv)[number];
type EnvSource = Record<string, string | undefined>;

export interface AppConfig {
  PORT: number;
  HOST: string;
  DATABASE_URL: string;
  SESSION_SECRET: string;
  SESSION_TTL_HOURS: number;
  CANVAS_API_URL: string;
  CANVAS_API_KEY: string;
  MAX_PER_PAGE: number;
  DEFAULT_PER_PAGE: number;
  LTI_KEY: string;
  LTI_SECRET: string;
  LTI_LAUNCH_URL: string;
  LTI_TOOL_ID: string;
  LTI_TITLE: string;
  LTI_DOMAIN: string;
  LTI_MAX_AGE_SECONDS: number;
}

function getEnv(source: EnvSource, key: RequiredEnvKey): string {
  const value = source[key]?.trim();
  if (!value) {
    throw new Error(`missing env var: ${key}`);
  }

  return value;
}

function getOptional(source: EnvSource, key: string, fallback: string): string {
  const value = source[key]?.trim();
  return value ? value : fallback;
}

function toNumber(key: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`invalid numeric env var: ${key}`);
  }

  return parsed;
}

export function readEnv(source: EnvSource = process.env): AppConfig {
  const launchUrl = getEnv(source, "LTI_LAUNCH_URL");

  return {
    PORT: toNumber("PORT", getEnv(source, "PORT")),
    HOST: getOptional(source, "HOST", "0.0.0.0"),
    DATABASE_URL: getEnv(source, "DATABASE_URL"),
    SESSION_SECRET: getEnv(source, "SESSION_SECRET"),
    SESSION_TTL_HOURS: toNumber("SESSION_TTL_HOURS", getOptional(source, "SESSION_TTL_HOURS", "12")),
    CANVAS_API_URL: getEnv(source, "CANVAS_API_URL").replace(/\/$/, ""),
    CANVAS_API_KEY: getEnv(source, "CANVAS_API_KEY"),
    MAX_PER_PAGE: toNumber("MAX_PER_PAGE", getOptional(source, "MAX_PER_PAGE", "100")),
    DEFAULT_PER_PAGE: toNumber("DEFAULT_PER_PAGE", getOptional(source, "DEFAULT_PER_PAGE", "10")),
    LTI_KEY: getEnv(source, "LTI_KEY"),
    LTI_SECRET: getEnv(source, "LTI_SECRET"),
    LTI_LAUNCH_URL: launchUrl,
    LTI_TOOL_ID: getOptional(source, "LTI_TOOL_ID", "quiz_extensions"),
    LTI_TITLE: getOptional(source, "LTI_TITLE", "Quiz Extensions"),
    LTI_DOMAIN: getOptional(source, "LTI_DOMAIN", new URL(launchUrl).hostname),
    LTI_MAX_AGE_SECONDS: toNumber(
      "LTI_MAX_AGE_SECONDS",
      getOptional(source, "LTI_MAX_AGE_SECONDS", "3600")
    )
  };
}
