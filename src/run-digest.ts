import { aggregate, type ArchiveBase } from "@/lib/aggregate";
import { DAY_MS, LOOKBACK_DAYS } from "@/lib/constants";
import { silentLogger, type Logger } from "@/lib/log";
import { formatDay } from "@/lib/report";
import type {
  CommitInfo,
  DateRange,
  DigestConfig,
  DocumentSource,
  HighlightSource,
  Publisher,
  Report
} from "@/lib/types";
import { renderDigest } from "./render-markdown";

export type DigestPhase = "documents" | "highlights" | "render" | "publish";

export interface PhaseEvent {
  phase: DigestPhase;
  status: "start" | "done";
  detail?: string;
}

export interface DigestDependencies {
  documents: DocumentSource;
  highlights: HighlightSource;
  publisher: Publisher;
  config: DigestConfig;
  now?: () => Date;
  archiveBase?: ArchiveBase;
  logger?: Logger;
  onProgress?: (event: PhaseEvent) => void;
}

export interface DigestResult {
  report: Report;
  markdown: string;
  filePath: string;
  commit: CommitInfo;
}

export function resolveDateRange(now: Date): DateRange {
  return { start: new Date(now.getTime() - LOOKBACK_DAYS * DAY_MS), end: now };
}

export function digestFilePath(range: DateRange, config: DigestConfig): string {
  const dir = config.publish.posts_dir.replace(/\/+$/, "");
  return `${dir}/${formatDay(range.start)}-${config.publish.filename_suffix}.md`;
}

export function commitMessageFor(range: DateRange): string {
  return `feat: Add weekly reading digest draft ${formatDay(range.start)}`;
}

/**
 * One full run: archived documents, then highlights, then the report, the markdown and the
 * publish step. A fetch failure aborts the run before anything is published.
 */
export async function runDigest(deps: DigestDependencies): Promise<DigestResult> {
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger ?? silentLogger;
  const progress = deps.onProgress ?? (() => {});

  const range = resolveDateRange(now());
  logger.info(`Fetching data for ${range.start.toISOString()} → ${range.end.toISOString()}`);

  progress({ phase: "documents", status: "start" });
  const documents = await deps.documents.listArchived(range.start);
  progress({ phase: "documents", status: "done", detail: `${documents.length} archived documents` });

  progress({ phase: "highlights", status: "start" });
  const highlights = await deps.highlights.listRecent(range.start);
  progress({ phase: "highlights", status: "done", detail: `${highlights.length} highlights` });

  progress({ phase: "render", status: "start" });
  const report = aggregate(documents, highlights, range, { now, archiveBase: deps.archiveBase });
  const markdown = renderDigest(report, {
    readingWpm: deps.config.digest.reading_wpm,
    maxHighlights: deps.config.digest.max_highlights,
    timezone: deps.config.timezone
  });
  progress({
    phase: "render",
    status: "done",
    detail: `${report.documents.totalCount} articles, ${report.highlights.totalCount} highlights`
  });

  const filePath = digestFilePath(range, deps.config);
  progress({ phase: "publish", status: "start", detail: filePath });
  const commit = await deps.publisher.publish(filePath, markdown, commitMessageFor(range));
  progress({ phase: "publish", status: "done", detail: commit.url });

  return { report, markdown, filePath, commit };
}
