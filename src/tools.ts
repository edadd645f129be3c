// src/tools.ts
import fetch from "node-fetch";
import { z } from "zod";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage, SystemMessage, type MessageContent } from "@langchain/core/messages";
import { ChatOpenAI } from "@langchain/openai";
import { timeWindowLabel, type ModelSettings, type SearchDepth, type TimeWindow } from "./config.js";
import { DiscoveryError } from "./errors.js";

export type CallOptions = { signal?: AbortSignal };

export type NewsSearchRequest = {
  query: string;
  timeWindow: TimeWindow;
  searchDepth: SearchDepth;
  maxResults: number;
};

export type NewsSearchResult = {
  title: string;
  url: string;
  content: string;
  publishedDate?: string;
};

/** Discovery collaborator: ranked news results for a query. */
export interface NewsSearchPort {
  search(request: NewsSearchRequest, opts?: CallOptions): Promise<NewsSearchResult[]>;
}

export type GenerationRequest = { system: string; user: string };

/** Generation collaborator: one system instruction, one user payload, one text back. */
export interface TextGeneratorPort {
  generate(request: GenerationRequest, opts?: CallOptions): Promise<string>;
}

const TAVILY_URL = "https://api.tavily.com/search";

const tavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().nullish(),
      url: z.string(),
      content: z.string().nullish(),
      published_date: z.string().nullish(),
    })
  ),
});

export type TavilySearchOptions = {
  apiKey: string;
  timeoutMs?: number;
  endpoint?: string;
  fetchImpl?: typeof fetch;
};

/** Tavily news search over its REST API. One request per call, no retry. */
export class TavilySearch implements NewsSearchPort {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: TavilySearchOptions) {
    this.apiKey = opts.apiKey;
    this.timeoutMs = opts.timeoutMs ?? 15000;
    this.endpoint = opts.endpoint ?? TAVILY_URL;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async search(request: NewsSearchRequest, opts: CallOptions = {}): Promise<NewsSearchResult[]> {
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    if (opts.signal?.aborted) controller.abort();
    opts.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const r = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          query: request.query,
          topic: "news",
          time_range: timeWindowLabel(request.timeWindow),
          search_depth: request.searchDepth,
          max_results: request.maxResults,
        }),
        signal: controller.signal,
      });

      if (!r.ok) {
        const txt = await r.text().catch(() => "");
        throw new DiscoveryError(`Tavily ${describeStatus(r.status)}: ${txt.slice(0, 200)}`, {
          status: r.status,
        });
      }

      const parsed = tavilyResponseSchema.safeParse(await r.json());
      if (!parsed.success) {
        throw new DiscoveryError("Tavily returned an unexpected response shape", {
          cause: parsed.error,
        });
      }

      return parsed.data.results.map((res) => ({
        title: res.title ?? "",
        url: res.url,
        content: res.content ?? "",
        ...(res.published_date ? { publishedDate: res.published_date } : {}),
      }));
    } catch (e) {
      if (e instanceof DiscoveryError) throw e;
      if (e instanceof Error && e.name === "AbortError") {
        const reason = opts.signal?.aborted ? "cancelled" : `timed out after ${this.timeoutMs}ms`;
        throw new DiscoveryError(`Tavily search ${reason}`, { cause: e });
      }
      throw new DiscoveryError(`Tavily request failed: ${String(e)}`, { cause: e });
    } finally {
      clearTimeout(t);
      opts.signal?.removeEventListener("abort", onAbort);
    }
  }
}

function describeStatus(status: number): string {
  if (status === 401 || status === 403) return `rejected the API key (${status})`;
  if (status === 429) return "rate limit exceeded (429)";
  return `returned HTTP ${status}`;
}

/** Any LangChain chat model as the generation collaborator. */
export class ChatModelGenerator implements TextGeneratorPort {
  constructor(private readonly llm: BaseChatModel) {}

  static openAI(apiKey: string, settings: ModelSettings, timeoutMs: number): ChatModelGenerator {
    return new ChatModelGenerator(
      new ChatOpenAI({
        apiKey,
        model: settings.model,
        temperature: settings.temperature,
        maxTokens: settings.maxTokens,
        timeout: timeoutMs,
        // failures surface to the pipeline as-is
        maxRetries: 0,
      })
    );
  }

  async generate(request: GenerationRequest, opts: CallOptions = {}): Promise<string> {
    const out = await this.llm.invoke(
      [new SystemMessage(request.system), new HumanMessage(request.user)],
      { signal: opts.signal }
    );
    return messageText(out.content);
  }
}

/** Flatten message content to its text parts. */
export function messageText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}
