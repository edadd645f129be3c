// src/graph.ts
import { Annotation, END, START, StateGraph, type LangGraphRunnableConfig } from "@langchain/langgraph";
import type { PipelineConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { FileReportWriter } from "./report-writer.js";
import { publishReport, searchNews, summarizeArticles, type PipelineDeps } from "./stages.js";
import { expectStatus, initialState, type Done, type WorkflowState } from "./state.js";
import { ChatModelGenerator, TavilySearch, type CallOptions } from "./tools.js";

// A single channel holding the tagged state; each node replaces it with the next variant.
const State = Annotation.Root({
  workflow: Annotation<WorkflowState>(),
});

type GraphState = typeof State.State;
type GraphUpdate = typeof State.Update;

/** Build & compile graph: START -> search -> summarize -> publish -> END */
export function buildGraph(deps: PipelineDeps) {
  async function doSearch(state: GraphState, config?: LangGraphRunnableConfig): Promise<GraphUpdate> {
    const next = await searchNews(expectStatus(state.workflow, "AWAITING_SEARCH"), deps, {
      signal: config?.signal,
    });
    return { workflow: next };
  }

  async function doSummarize(state: GraphState, config?: LangGraphRunnableConfig): Promise<GraphUpdate> {
    const next = await summarizeArticles(expectStatus(state.workflow, "AWAITING_SUMMARY"), deps, {
      signal: config?.signal,
    });
    return { workflow: next };
  }

  async function doPublish(state: GraphState, config?: LangGraphRunnableConfig): Promise<GraphUpdate> {
    const next = await publishReport(expectStatus(state.workflow, "AWAITING_PUBLISH"), deps, {
      signal: config?.signal,
    });
    return { workflow: next };
  }

  return new StateGraph(State)
    .addNode("node_search", doSearch)
    .addNode("node_summarize", doSummarize)
    .addNode("node_publish", doPublish)
    .addEdge(START, "node_search")
    .addEdge("node_search", "node_summarize")
    .addEdge("node_summarize", "node_publish")
    .addEdge("node_publish", END)
    .compile();
}

/**
 * Run the pipeline once on a fresh state. Stage failures are not caught here:
 * they reject the returned promise and no report is produced.
 */
export async function runPipeline(deps: PipelineDeps, opts: CallOptions = {}): Promise<Done> {
  const graph = buildGraph(deps);
  const started = Date.now();
  deps.logger.info("pipeline:start", { query: deps.settings.search.query });

  const out = await graph.invoke({ workflow: initialState() }, { signal: opts.signal });
  const done = expectStatus(out.workflow, "DONE");

  deps.logger.info("pipeline:done", {
    articles: done.articles.length,
    path: done.reportPath,
    duration_ms: Date.now() - started,
  });
  return done;
}

/** Wire the production collaborators from configuration. */
export function createPipelineDeps(config: PipelineConfig, logger: Logger): PipelineDeps {
  return {
    search: new TavilySearch({ apiKey: config.tavilyApiKey, timeoutMs: config.requestTimeoutMs }),
    generator: ChatModelGenerator.openAI(config.openaiApiKey, config.model, config.requestTimeoutMs),
    writer: new FileReportWriter(config.outputDir),
    logger,
    settings: {
      search: config.search,
      prompts: config.prompts,
      summaryConcurrency: config.summaryConcurrency,
    },
  };
}
