// src/config.ts
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { LogLevel } from "./logger.js";
import { REPORT_SYSTEM_PROMPT, SUMMARY_SYSTEM_PROMPT } from "./prompts.js";

export const TIME_WINDOWS = ["1d", "1w", "1m", "1y"] as const;
export type TimeWindow = (typeof TIME_WINDOWS)[number];

export const SEARCH_DEPTHS = ["basic", "advanced"] as const;
export type SearchDepth = (typeof SEARCH_DEPTHS)[number];

export const DEFAULT_QUERY = "artificial intelligence and machine learning news";

export type SearchSettings = {
  query: string;
  timeWindow: TimeWindow;
  searchDepth: SearchDepth;
  maxResults: number;
};

export type ModelSettings = {
  model: string;
  temperature: number;
  maxTokens: number;
};

export type PipelineConfig = {
  tavilyApiKey: string;
  openaiApiKey: string;
  search: SearchSettings;
  model: ModelSettings;
  prompts: {
    summary: string;
    report: string;
  };
  summaryConcurrency: number;
  outputDir: string;
  requestTimeoutMs: number;
  logLevel: LogLevel;
  port: number;
};

const envSchema = z.object({
  TAVILY_API_KEY: z.string().trim().min(1, "is required"),
  OPENAI_API_KEY: z.string().trim().min(1, "is required"),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
  NEWS_QUERY: z.string().trim().min(1).default(DEFAULT_QUERY),
  NEWS_TIME_WINDOW: z.enum(TIME_WINDOWS).default("1w"),
  NEWS_SEARCH_DEPTH: z.enum(SEARCH_DEPTHS).default("advanced"),
  NEWS_MAX_RESULTS: z.coerce.number().int().min(1).max(20).default(5),
  SUMMARY_CONCURRENCY: z.coerce.number().int().min(1).max(10).default(1),
  REPORT_OUTPUT_DIR: z.string().min(1).default("."),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  PORT: z.coerce.number().int().positive().default(8081),
});

/** Validate the environment. Every problem is reported at once, before any network call. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  // blank values count as unset so the defaults apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`);
    throw new ConfigurationError(issues);
  }

  const e = parsed.data;
  return {
    tavilyApiKey: e.TAVILY_API_KEY,
    openaiApiKey: e.OPENAI_API_KEY,
    search: {
      query: e.NEWS_QUERY,
      timeWindow: e.NEWS_TIME_WINDOW,
      searchDepth: e.NEWS_SEARCH_DEPTH,
      maxResults: e.NEWS_MAX_RESULTS,
    },
    model: {
      model: e.OPENAI_MODEL,
      temperature: e.OPENAI_TEMPERATURE,
      maxTokens: e.OPENAI_MAX_TOKENS,
    },
    prompts: {
      summary: SUMMARY_SYSTEM_PROMPT,
      report: REPORT_SYSTEM_PROMPT,
    },
    summaryConcurrency: e.SUMMARY_CONCURRENCY,
    outputDir: e.REPORT_OUTPUT_DIR,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
    port: e.PORT,
  };
}

export function timeWindowLabel(window: TimeWindow): string {
  switch (window) {
    case "1d": return "day";
    case "1w": return "week";
    case "1m": return "month";
    case "1y": return "year";
  }
}
