import type { TwitterCredentials } from "./twitter-publisher.js";
import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_WEATHER_BASE_URL } from "./weather-client.js";

const DEFAULT_CITY = "Gachibowli";
const DEFAULT_COUNTRY_CODE = "IN";
const DEFAULT_REGION = "Hyderabad";
const DEFAULT_TIMEZONE = "Asia/Kolkata";
const DEFAULT_OUTPUT_DIR = "./data";

const TWITTER_ENV_VARS = {
  apiKey: "TWITTER_API_KEY",
  apiSecret: "TWITTER_API_SECRET",
  accessToken: "TWITTER_ACCESS_TOKEN",
  accessTokenSecret: "TWITTER_ACCESS_TOKEN_SECRET",
} as const satisfies Record<keyof TwitterCredentials, string>;

export type Env = Record<string, string | undefined>;

export type RunMode = "run" | "preview";

export interface AppConfig {
  city: string;
  countryCode: string;
  region: string;
  timeZone: string;
  weatherApiKey: string | undefined;
  weatherBaseUrl: string;
  fetchTimeoutMs: number;
  publishEnabled: boolean;
  twitter: TwitterCredentials | null;
  outputDir: string;
}

export class ConfigMissingError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing required environment variables: ${missing.join(", ")}`);
    this.name = "ConfigMissingError";
  }
}

export function getEnvVar(env: Env, name: string, fallback: string): string;
export function getEnvVar(env: Env, name: string): string | undefined;
export function getEnvVar(env: Env, name: string, fallback?: string): string | undefined {
  const value = env[name];
  if (value && value.trim().length > 0) {
    return value.trim();
  }
  return fallback;
}

function getPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = getEnvVar(env, name);
  if (!raw) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readTwitterCredentials(env: Env): {
  credentials: TwitterCredentials | null;
  missing: string[];
} {
  const apiKey = getEnvVar(env, TWITTER_ENV_VARS.apiKey);
  const apiSecret = getEnvVar(env, TWITTER_ENV_VARS.apiSecret);
  const accessToken = getEnvVar(env, TWITTER_ENV_VARS.accessToken);
  const accessTokenSecret = getEnvVar(env, TWITTER_ENV_VARS.accessTokenSecret);

  const missing = Object.values(TWITTER_ENV_VARS).filter(
    (name) => getEnvVar(env, name) === undefined
  );
  if (!apiKey || !apiSecret || !accessToken || !accessTokenSecret) {
    return { credentials: null, missing };
  }
  return { credentials: { apiKey, apiSecret, accessToken, accessTokenSecret }, missing };
}

/**
 * Reads the process configuration once. Publishing needs every Twitter
 * credential and fails fast without them; previews only warn.
 */
export function loadConfig(env: Env, mode: RunMode = "run"): AppConfig {
  const publishEnabled = getEnvVar(env, "POST_TO_TWITTER_ENABLED", "true").toLowerCase() === "true";
  const { credentials, missing } = readTwitterCredentials(env);

  if (mode === "run" && publishEnabled && missing.length > 0) {
    throw new ConfigMissingError(missing);
  }

  return {
    city: getEnvVar(env, "CITY", DEFAULT_CITY),
    countryCode: getEnvVar(env, "COUNTRY_CODE", DEFAULT_COUNTRY_CODE),
    region: getEnvVar(env, "REGION", DEFAULT_REGION),
    timeZone: getEnvVar(env, "TIMEZONE", DEFAULT_TIMEZONE),
    weatherApiKey: getEnvVar(env, "WEATHER_API_KEY"),
    weatherBaseUrl: getEnvVar(env, "WEATHER_API_BASE_URL", DEFAULT_WEATHER_BASE_URL),
    fetchTimeoutMs: getPositiveInt(env, "FETCH_TIMEOUT_MS", DEFAULT_FETCH_TIMEOUT_MS),
    publishEnabled,
    twitter: credentials,
    outputDir: getEnvVar(env, "OUTPUT_DIR", DEFAULT_OUTPUT_DIR),
  };
}
