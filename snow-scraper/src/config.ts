import { z } from "zod";
import { DEFAULT_OPENAI_BASE_URL } from "./completion";
import { DEFAULT_USER_AGENT } from "./fetch";
import { REPORT_SELECTOR } from "./select";
import { DEFAULT_TABLE } from "./store";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

// dotenv leaves unset keys as "" when written as KEY=
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const required = (name: string) => z.preprocess(blankToUndefined, z.string({ required_error: `${name} is required` }));
const optionalText = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));
const count = (fallback: number) => z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));
const millis = (fallback: number) => z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(fallback));
const flag = (fallback: boolean) =>
  z.preprocess(
    blankToUndefined,
    z
      .enum(["true", "false", "1", "0"])
      .optional()
      .transform((v) => (v === undefined ? fallback : v === "true" || v === "1"))
  );

const EnvSchema = z
  .object({
    OPENAI_API_KEY: required("OPENAI_API_KEY"),
    LLM_MODEL: optionalText("gpt-4o-mini"),
    OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_OPENAI_BASE_URL)),
    SUPABASE_URL: z.preprocess(blankToUndefined, z.string({ required_error: "SUPABASE_URL is required" }).url()),
    SUPABASE_SERVICE_KEY: required("SUPABASE_SERVICE_KEY"),
    SUPABASE_TABLE: optionalText(DEFAULT_TABLE),
    URLS_FILE: optionalText("USACANADA.txt"),
    BATCH_SIZE: count(3),
    EXTRACT_BATCH_SIZE: count(3),
    EXTRACT_DELAY_MS: millis(1000),
    BATCH_DELAY_MS: millis(2000),
    HEADLESS: flag(true),
    PAGE_TIMEOUT_MS: millis(60000),
    LLM_TIMEOUT_MS: millis(60000),
    USER_AGENT: optionalText(DEFAULT_USER_AGENT),
    REPORT_SELECTOR: optionalText(REPORT_SELECTOR),
    REPORT_DIR: z.preprocess(blankToUndefined, z.string().optional()),
  })
  .refine((env) => env.EXTRACT_BATCH_SIZE <= env.BATCH_SIZE, {
    message: "EXTRACT_BATCH_SIZE must not exceed BATCH_SIZE",
    path: ["EXTRACT_BATCH_SIZE"],
  });

export type Config = {
  openai: { apiKey: string; model: string; baseUrl: string; timeoutMs: number };
  supabase: { url: string; serviceKey: string; table: string };
  urlsFile: string;
  batchSize: number;
  extractBatchSize: number;
  extractDelayMs: number;
  batchDelayMs: number;
  browser: { headless: boolean; timeoutMs: number; userAgent: string };
  reportSelector: string;
  reportDir?: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;

  return {
    openai: { apiKey: e.OPENAI_API_KEY, model: e.LLM_MODEL, baseUrl: e.OPENAI_BASE_URL, timeoutMs: e.LLM_TIMEOUT_MS },
    supabase: { url: e.SUPABASE_URL, serviceKey: e.SUPABASE_SERVICE_KEY, table: e.SUPABASE_TABLE },
    urlsFile: e.URLS_FILE,
    batchSize: e.BATCH_SIZE,
    extractBatchSize: e.EXTRACT_BATCH_SIZE,
    extractDelayMs: e.EXTRACT_DELAY_MS,
    batchDelayMs: e.BATCH_DELAY_MS,
    browser: { headless: e.HEADLESS, timeoutMs: e.PAGE_TIMEOUT_MS, userAgent: e.USER_AGENT },
    reportSelector: e.REPORT_SELECTOR,
    reportDir: e.REPORT_DIR,
  };
}
