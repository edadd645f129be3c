import { vi } from "vitest";
import { DEFAULT_QUERY } from "../src/config.js";
import { silentLogger } from "../src/logger.js";
import { REPORT_SYSTEM_PROMPT, SUMMARY_SYSTEM_PROMPT } from "../src/prompts.js";
import type { ReportWriter } from "../src/report-writer.js";
import type { PipelineDeps, PipelineSettings } from "../src/stages.js";
import type {
  CallOptions,
  GenerationRequest,
  NewsSearchRequest,
  NewsSearchResult,
} from "../src/tools.js";

// 18 Oct 2026, 09:05:03 local time
export const FIXED_NOW = new Date(2026, 9, 18, 9, 5, 3);

export function settings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    search: { query: DEFAULT_QUERY, timeWindow: "1w", searchDepth: "advanced", maxResults: 5 },
    prompts: { summary: SUMMARY_SYSTEM_PROMPT, report: REPORT_SYSTEM_PROMPT },
    summaryConcurrency: 1,
    ...overrides,
  };
}

export function results(n: number): NewsSearchResult[] {
  return Array.from({ length: n }, (_, i) => ({
    title: `Story ${i + 1}`,
    url: `https://news.example.com/story-${i + 1}`,
    content: `Body of story ${i + 1}.`,
  }));
}

export function fakeSearch(found: NewsSearchResult[]) {
  return {
    search: vi.fn(async (_request: NewsSearchRequest, _opts?: CallOptions) => found),
  };
}

export function titleOf(payload: string): string {
  return payload.split("\n")[0].replace("Title: ", "");
}

/**
 * Summaries come back as "SUMMARY:<title>"; the report call echoes its payload.
 */
export function echoGenerator() {
  return {
    generate: vi.fn(async (request: GenerationRequest, _opts?: CallOptions) =>
      request.system === SUMMARY_SYSTEM_PROMPT ? `SUMMARY:${titleOf(request.user)}` : request.user
    ),
  };
}

export class MemoryReportWriter implements ReportWriter {
  readonly files = new Map<string, string>();

  locate(date: Date): string {
    return `memory/${date.toISOString()}.md`;
  }

  async write(date: Date, report: string): Promise<string> {
    const path = this.locate(date);
    this.files.set(path, report);
    return path;
  }
}

export function deps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
  return {
    search: fakeSearch(results(5)),
    generator: echoGenerator(),
    writer: new MemoryReportWriter(),
    logger: silentLogger,
    settings: settings(),
    now: () => FIXED_NOW,
    ...overrides,
  };
}
