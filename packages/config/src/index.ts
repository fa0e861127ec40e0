import { z } from "zod";
import {
  AuthenticationError,
  DEFAULT_API_BASE_URL,
  DEFAULT_MIN_ASSERTION_PASS_RATE,
  DEFAULT_MIN_TEST_PASS_RATE,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_UI_BASE_URL,
  ValidationError,
} from "@callgate/shared";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CallgateConfig {
  apiKey?: string;
  apiBaseUrl: string;
  uiBaseUrl: string;
  agentId?: string;
  phoneNumbers?: string[];
  tagIds?: string[];
  testCaseIds?: string[];
  personaOverride?: string;
  scenarioOverride?: string;
  pollIntervalMs: number;
  timeoutMs: number;
  minTestPassRate: number;
  minAssertionPassRate: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

// Unset and blank variables are the same thing in CI.
const blankToUndefined = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());
const list = z.preprocess(blankToUndefined, z.string().optional()).transform(parseCommaSeparated);
const seconds = (fallbackMs: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce
      .number()
      .positive()
      .optional()
      .transform((s) => (s === undefined ? fallbackMs : Math.round(s * 1000)))
  );
const rate = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).default(fallback));

const EnvSchema = z.object({
  CALLGATE_API_KEY: optionalText,
  CALLGATE_API_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_API_BASE_URL)),
  CALLGATE_UI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_UI_BASE_URL)),
  AGENT_ID: optionalText,
  PHONE_NUMBERS: list,
  TAG_IDS: list,
  TEST_CASE_IDS: list,
  PERSONA_OVERRIDE: optionalText,
  SCENARIO_OVERRIDE: optionalText,
  POLL_INTERVAL_SECONDS: seconds(DEFAULT_POLL_INTERVAL_MS),
  TIMEOUT_SECONDS: seconds(DEFAULT_TIMEOUT_MS),
  MIN_TEST_PASS_RATE: rate(DEFAULT_MIN_TEST_PASS_RATE),
  MIN_ASSERTION_PASS_RATE: rate(DEFAULT_MIN_ASSERTION_PASS_RATE),
  LOG_LEVEL: z.preprocess(
    (v) => (typeof v === "string" ? blankToUndefined(v.toLowerCase()) : v),
    z.enum(LOG_LEVELS).default("info")
  ),
});

/**
 * Reads configuration from an environment map. Loading `.env` files is left
 * to the entry point so this stays a pure function of its input.
 */
export function loadConfig(env: Env = process.env): CallgateConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw ValidationError.fromZod("Invalid configuration", parsed.error);
  }

  const e = parsed.data;
  return {
    apiKey: e.CALLGATE_API_KEY,
    apiBaseUrl: e.CALLGATE_API_BASE_URL.replace(/\/+$/, ""),
    uiBaseUrl: e.CALLGATE_UI_BASE_URL.replace(/\/+$/, ""),
    agentId: e.AGENT_ID,
    phoneNumbers: e.PHONE_NUMBERS,
    tagIds: e.TAG_IDS,
    testCaseIds: e.TEST_CASE_IDS,
    personaOverride: e.PERSONA_OVERRIDE,
    scenarioOverride: e.SCENARIO_OVERRIDE,
    pollIntervalMs: e.POLL_INTERVAL_SECONDS,
    timeoutMs: e.TIMEOUT_SECONDS,
    minTestPassRate: e.MIN_TEST_PASS_RATE,
    minAssertionPassRate: e.MIN_ASSERTION_PASS_RATE,
    logLevel: e.LOG_LEVEL,
  };
}

export function requireApiKey(config: Pick<CallgateConfig, "apiKey">): string {
  if (!config.apiKey) {
    throw new AuthenticationError("CALLGATE_API_KEY is not set");
  }
  return config.apiKey;
}

export function parseCommaSeparated(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}
