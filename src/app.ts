// src/app.ts
import express, { type NextFunction, type Request, type Response } from "express";
import { PipelineError, errorDetails, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Done } from "./state.js";

export type ReportResponse = {
  status: number;
  body: Record<string, unknown>;
};

/**
 * One pipeline run per request. Runs do not overlap: the daily report file
 * is shared, so a request arriving mid-run gets 409.
 */
export function createReportHandler(run: () => Promise<Done>, logger: Logger) {
  let inFlight = false;

  return async (): Promise<ReportResponse> => {
    if (inFlight) {
      return { status: 409, body: { ok: false, error: "A report run is already in progress" } };
    }
    inFlight = true;
    try {
      const done = await run();
      return {
        status: 200,
        body: {
          ok: true,
          report: done.report,
          path: done.reportPath,
          articles: done.articles.map((a) => ({
            title: a.title,
            url: a.url,
            ...(a.publishedDate && { publishedDate: a.publishedDate }),
          })),
        },
      };
    } catch (e) {
      logger.error("server:run_failed", errorDetails(e));
      return {
        status: 500,
        body: {
          ok: false,
          error: errorMessage(e),
          stage: e instanceof PipelineError ? e.stage : "pipeline",
        },
      };
    } finally {
      inFlight = false;
    }
  };
}

export function createApp(handleReport: () => Promise<ReportResponse>) {
  const app = express();
  app.use(express.json());

  // browser dashboards trigger runs cross-origin
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "authorization, content-type");
    res.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") {
      res.status(200).send("ok");
      return;
    }
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true, status: "healthy" });
  });

  app.post("/reports", (_req, res, next) => {
    handleReport()
      .then((r) => {
        res.status(r.status).json(r.body);
      })
      .catch(next);
  });

  app.get("/", (_req, res) => {
    res.send("News report pipeline is running. POST /reports");
  });

  return app;
}
