import { once } from "node:events";
import type { Server } from "node:http";
import fetch from "node-fetch";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp, createReportHandler, type ReportResponse } from "../src/app.js";
import { GenerationError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import type { Done } from "../src/state.js";

const done: Done = {
  status: "DONE",
  articles: [{ title: "Story 1", url: "https://news.example.com/story-1", content: "Body." }],
  summaries: [{ title: "Story 1", url: "https://news.example.com/story-1", summary: "Short." }],
  report: "# Report",
  reportPath: "ai_news_report_2026-10-18.md",
};

describe("createReportHandler", () => {
  it("should respond with the published report", async () => {
    const handle = createReportHandler(async () => done, silentLogger);

    await expect(handle()).resolves.toEqual({
      status: 200,
      body: {
        ok: true,
        report: "# Report",
        path: "ai_news_report_2026-10-18.md",
        articles: [{ title: "Story 1", url: "https://news.example.com/story-1" }],
      },
    });
  });

  it("should list each article's publication date when known", async () => {
    const dated: Done = {
      ...done,
      articles: [{ ...done.articles[0], publishedDate: "2026-10-16" }],
    };
    const result = await createReportHandler(async () => dated, silentLogger)();

    expect(result.body.articles).toEqual([
      { title: "Story 1", url: "https://news.example.com/story-1", publishedDate: "2026-10-16" },
    ]);
  });

  it("should report the failing stage", async () => {
    const run = vi.fn(async (): Promise<Done> => {
      throw new GenerationError("publish", "Failed to compose report: timeout");
    });
    const handle = createReportHandler(run, silentLogger);

    await expect(handle()).resolves.toEqual({
      status: 500,
      body: { ok: false, error: "Failed to compose report: timeout", stage: "publish" },
    });
  });

  it("should refuse a second run while one is in flight", async () => {
    let finish: (value: Done) => void = () => {};
    const run = vi.fn(
      () =>
        new Promise<Done>((resolve) => {
          finish = resolve;
        })
    );
    const handle = createReportHandler(run, silentLogger);

    const first = handle();
    const second = await handle();
    finish(done);

    expect(second.status).toBe(409);
    expect((await first).status).toBe(200);
    expect(run).toHaveBeenCalledTimes(1);
  });
});

describe("createApp", () => {
  let server: Server;
  let base: string;
  const handleReport = vi.fn(
    async (): Promise<ReportResponse> => ({
      status: 500,
      body: { ok: false, error: "Tavily rate limit exceeded (429): slow down", stage: "search" },
    })
  );

  beforeEach(async () => {
    handleReport.mockClear();
    server = createApp(handleReport).listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP address");
    base = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())));
  });

  it("should answer the health check", async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, status: "healthy" });
  });

  it("should forward the handler's status and body for POST /reports", async () => {
    const res = await fetch(`${base}/reports`, { method: "POST" });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      ok: false,
      error: "Tavily rate limit exceeded (429): slow down",
      stage: "search",
    });
    expect(handleReport).toHaveBeenCalledTimes(1);
  });

  it("should answer preflight requests without running the pipeline", async () => {
    const res = await fetch(`${base}/reports`, { method: "OPTIONS" });

    expect(res.status).toBe(200);
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
    expect(await res.text()).toBe("ok");
    expect(handleReport).not.toHaveBeenCalled();
  });
});
