// src/stages.ts
import { timeWindowLabel, type PipelineConfig, type SearchSettings } from "./config.js";
import { DiscoveryError, GenerationError, PersistenceError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { articlePayload } from "./prompts.js";
import type { ReportWriter } from "./report-writer.js";
import type { Article, AwaitingPublish, AwaitingSearch, AwaitingSummary, Done, Summary } from "./state.js";
import type { CallOptions, NewsSearchPort, NewsSearchResult, TextGeneratorPort } from "./tools.js";

export type PipelineSettings = Pick<PipelineConfig, "search" | "prompts" | "summaryConcurrency">;

export type PipelineDeps = {
  search: NewsSearchPort;
  generator: TextGeneratorPort;
  writer: ReportWriter;
  logger: Logger;
  settings: PipelineSettings;
  now?: () => Date;
};

/** Search stage: one article per discovery result, in result order. */
export async function searchNews(
  _state: AwaitingSearch,
  deps: PipelineDeps,
  opts: CallOptions = {}
): Promise<AwaitingSummary> {
  const { query, timeWindow, searchDepth, maxResults } = deps.settings.search;
  deps.logger.info("search:start", { query, timeWindow, searchDepth, maxResults });

  let results: NewsSearchResult[];
  try {
    results = await deps.search.search({ query, timeWindow, searchDepth, maxResults }, opts);
  } catch (e) {
    if (e instanceof DiscoveryError) throw e;
    throw new DiscoveryError(`News search failed: ${errorMessage(e)}`, { cause: e });
  }

  const articles: Article[] = results.map((r) => ({
    title: r.title.trim() || r.url,
    url: r.url,
    content: r.content,
    ...(r.publishedDate ? { publishedDate: r.publishedDate } : {}),
  }));

  deps.logger.info("search:done", { articles: articles.length });
  return { status: "AWAITING_SUMMARY", articles };
}

/**
 * Summarize stage. Calls run `summaryConcurrency` at a time (1 = strictly
 * sequential); summaries[i] always belongs to articles[i].
 */
export async function summarizeArticles(
  state: AwaitingSummary,
  deps: PipelineDeps,
  opts: CallOptions = {}
): Promise<AwaitingPublish> {
  const { articles } = state;
  const total = articles.length;
  deps.logger.info("summarize:start", {
    articles: total,
    concurrency: deps.settings.summaryConcurrency,
  });

  const summaries = await mapInOrder(
    articles,
    deps.settings.summaryConcurrency,
    opts.signal,
    async (article, i, signal): Promise<Summary> => {
      let text: string;
      try {
        text = await deps.generator.generate(
          { system: deps.settings.prompts.summary, user: articlePayload(article.title, article.content) },
          { signal }
        );
      } catch (e) {
        throw new GenerationError(
          "summarize",
          `Failed to summarize article ${i + 1}/${total} (${article.url}): ${errorMessage(e)}`,
          { cause: e, articleIndex: i }
        );
      }
      deps.logger.debug("summarize:article", { index: i, url: article.url });
      return { title: article.title, url: article.url, summary: text };
    }
  );

  deps.logger.info("summarize:done", { summaries: summaries.length });
  return { status: "AWAITING_PUBLISH", articles, summaries };
}

/** Publish stage: one composed report, persisted before the state reports success. */
export async function publishReport(
  state: AwaitingPublish,
  deps: PipelineDeps,
  opts: CallOptions = {}
): Promise<Done> {
  const { articles, summaries } = state;
  const now = deps.now?.() ?? new Date();
  deps.logger.info("publish:start", { summaries: summaries.length });

  let report: string;
  if (summaries.length === 0) {
    report = emptyReport(deps.settings.search);
    deps.logger.warn("publish:empty", { query: deps.settings.search.query });
  } else {
    try {
      report = await deps.generator.generate(
        { system: deps.settings.prompts.report, user: renderSummaries(summaries) },
        opts
      );
    } catch (e) {
      throw new GenerationError("publish", `Failed to compose report: ${errorMessage(e)}`, {
        cause: e,
      });
    }
  }

  let reportPath: string;
  try {
    reportPath = await deps.writer.write(now, report);
  } catch (e) {
    if (e instanceof PersistenceError) throw e;
    throw new PersistenceError(deps.writer.locate(now), { cause: e });
  }

  deps.logger.info("publish:done", { path: reportPath });
  return { status: "DONE", articles, summaries, report, reportPath };
}

export function renderSummaries(summaries: readonly Summary[]): string {
  return summaries
    .map((s) => `Title: ${s.title}\nSummary: ${s.summary}\nSource: ${s.url}`)
    .join("\n\n");
}

export function emptyReport(search: SearchSettings): string {
  return `No new articles were found for "${search.query}" in the last ${timeWindowLabel(search.timeWindow)}.`;
}

/**
 * Map with at most `concurrency` calls in flight, results stored by input
 * index. The first failure aborts the shared signal and stops new calls.
 */
export async function mapInOrder<T, R>(
  items: readonly T[],
  concurrency: number,
  signal: AbortSignal | undefined,
  fn: (item: T, index: number, signal: AbortSignal) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (signal?.aborted) controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  let next = 0;
  const worker = async () => {
    while (next < items.length && !controller.signal.aborted) {
      const i = next++;
      try {
        results[i] = await fn(items[i], i, controller.signal);
      } catch (e) {
        controller.abort();
        throw e;
      }
    }
  };

  try {
    const workers = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: workers }, worker));
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }

  if (controller.signal.aborted && signal?.aborted) {
    throw new GenerationError("summarize", "Summarization cancelled");
  }
  return results;
}
