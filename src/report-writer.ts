// src/report-writer.ts
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { PersistenceError } from "./errors.js";

export interface ReportWriter {
  /** Where the report for the calendar day of `date` goes. */
  locate(date: Date): string;
  /** Persist the report for the calendar day of `date`; resolves to the written path. */
  write(date: Date, report: string): Promise<string>;
}

export function reportFileName(date: Date): string {
  return `ai_news_report_${formatDate(date)}.md`;
}

export function renderReportFile(date: Date, report: string): string {
  return `# AI News Report\n\nGenerated on: ${formatDate(date)} ${formatTime(date)}\n\n${report}\n`;
}

/** One markdown file per day in `outputDir`; a rerun on the same day overwrites it. */
export class FileReportWriter implements ReportWriter {
  constructor(private readonly outputDir: string) {}

  locate(date: Date): string {
    return path.join(this.outputDir, reportFileName(date));
  }

  async write(date: Date, report: string): Promise<string> {
    const file = this.locate(date);
    try {
      await mkdir(this.outputDir, { recursive: true });
      await writeFile(file, renderReportFile(date, report), "utf8");
    } catch (e) {
      throw new PersistenceError(file, { cause: e });
    }
    return file;
  }
}

const pad = (n: number) => String(n).padStart(2, "0");

// local calendar date, not UTC
export function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

function formatTime(d: Date): string {
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}
