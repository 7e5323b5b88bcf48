import * as path from "node:path";
import type { IFileSystem } from "../abstractions/IFileSystem";
import type { ResultRecord } from "../batch/types";

export const TITLE_WIDTH = 50;
export const SUMMARY_WIDTH = 80;

export const DATASET_HEADER = `# Paper Codebase Dataset

| Paper Title | ArXiv URL | GitHub URL | Valid | Codebase Summary | Relevance |
|-------------|-----------|------------|-------|------------------|-----------|
`;

/**
 * Collapse whitespace, cut to `width` code points, and keep `|` from opening
 * a new column. Counting code points keeps astral characters such as 𝒳 whole.
 */
export function formatCell(value: string, width?: number): string {
  const collapsed = value.replace(/\s+/g, " ").trim();
  const cut = width === undefined ? collapsed : Array.from(collapsed).slice(0, width).join("");
  return cut.replace(/\|/g, "/");
}

export function formatRow(result: ResultRecord): string {
  const cells = [
    formatCell(result.title, TITLE_WIDTH),
    formatCell(result.externalUrl),
    result.githubUrl ? formatCell(result.githubUrl) : "N/A",
    result.githubValid ? "✓" : "✗",
    formatCell(result.codebaseSummary, SUMMARY_WIDTH),
    result.relevanceScore.toFixed(1),
  ];
  return `| ${cells.join(" | ")} |\n`;
}

/**
 * Sole writer of the dataset report. Rows go straight to disk one at a time
 * so an interrupted run keeps everything appended before the interruption.
 */
export class DatasetWriter {
  constructor(
    private readonly fs: IFileSystem,
    private readonly reportPath: string
  ) {}

  /** Returns true when the report was created by this call. */
  async ensureHeader(): Promise<boolean> {
    if (await this.fs.exists(this.reportPath)) {
      return false;
    }
    await this.fs.mkdir(path.dirname(this.reportPath), { recursive: true });
    await this.fs.writeFile(this.reportPath, DATASET_HEADER);
    return true;
  }

  async append(result: ResultRecord): Promise<void> {
    await this.fs.appendFile(this.reportPath, formatRow(result));
  }
}
