import { HOUR_MS, UNKNOWN_LABEL } from "./constants";
import { freezeReport } from "./report";
import type {
  Breakdown,
  DateRange,
  DocumentStats,
  HighlightStats,
  ProcessedDocument,
  ProcessedHighlight,
  RawDocument,
  RawHighlight,
  Report
} from "./types";

/** Picks the instant a document's time-to-archive is measured from. */
export type ArchiveBase = (doc: RawDocument) => Date | null;

export const savedOrCreated: ArchiveBase = (doc) => doc.savedAt ?? doc.createdAt;

export interface AggregateOptions {
  archiveBase?: ArchiveBase;
  now?: () => Date;
}

export function labelOf(value: string): string {
  return value.trim().length > 0 ? value : UNKNOWN_LABEL;
}

/** Counts labels, most frequent first; equal counts keep first-seen order. */
export function tally(labels: Iterable<string>): Breakdown {
  const counts = new Map<string, number>();
  for (const label of labels) {
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return Array.from(counts, ([label, count]) => ({ label, count })).sort((a, b) => b.count - a.count);
}

export function timeToArchiveHours(doc: RawDocument, archiveBase: ArchiveBase = savedOrCreated): number | null {
  if (!doc.lastMovedAt) return null;
  const base = archiveBase(doc);
  if (!base) return null;
  const elapsed = doc.lastMovedAt.getTime() - base.getTime();
  if (elapsed < 0) return null;
  return elapsed / HOUR_MS;
}

function byMostRecentlyArchived(a: ProcessedDocument, b: ProcessedDocument): number {
  const aTime = a.lastMovedAt?.getTime();
  const bTime = b.lastMovedAt?.getTime();
  if (aTime === undefined && bTime === undefined) return 0;
  if (aTime === undefined) return 1;
  if (bTime === undefined) return -1;
  return bTime - aTime;
}

function processDocument(doc: RawDocument, archiveBase: ArchiveBase): ProcessedDocument {
  return {
    title: doc.title,
    author: doc.author,
    source: labelOf(doc.source),
    category: labelOf(doc.category),
    location: labelOf(doc.location),
    wordCount: doc.wordCount,
    sourceUrl: doc.sourceUrl,
    siteName: doc.siteName,
    publishedDate: doc.publishedDate,
    summary: doc.summary,
    tags: [...doc.tags],
    lastMovedAt: doc.lastMovedAt,
    updatedAt: doc.updatedAt,
    timeToArchiveHours: timeToArchiveHours(doc, archiveBase)
  };
}

export function summariseDocuments(docs: RawDocument[], archiveBase: ArchiveBase = savedOrCreated): DocumentStats {
  const processed = docs.map((doc) => processDocument(doc, archiveBase));
  const totalCount = processed.length;
  const totalWordCount = processed.reduce((sum, doc) => sum + doc.wordCount, 0);

  const archiveTimes = processed
    .map((doc) => doc.timeToArchiveHours)
    .filter((hours): hours is number => hours !== null);
  const averageTimeToArchiveHours =
    archiveTimes.length > 0 ? archiveTimes.reduce((sum, hours) => sum + hours, 0) / archiveTimes.length : null;

  return {
    totalCount,
    totalWordCount,
    averageWordsPerArticle: totalCount > 0 ? Math.floor(totalWordCount / totalCount) : 0,
    averageTimeToArchiveHours,
    categoryBreakdown: tally(processed.map((doc) => doc.category)),
    sourceBreakdown: tally(processed.map((doc) => doc.source)),
    locationBreakdown: tally(processed.map((doc) => doc.location)),
    tagBreakdown: tally(processed.flatMap((doc) => doc.tags)),
    documents: [...processed].sort(byMostRecentlyArchived)
  };
}

export function summariseHighlights(highlights: RawHighlight[]): HighlightStats {
  const processed: ProcessedHighlight[] = highlights
    .filter((highlight) => highlight.text.trim().length > 0)
    .map((highlight) => ({ ...highlight, source: UNKNOWN_LABEL }));

  // Highlights carry only a book id, so every one is attributed to "unknown".
  return {
    totalCount: processed.length,
    highlights: processed,
    sourceBreakdown: tally(processed.map((highlight) => highlight.source))
  };
}

/** Turns one window's raw records into the report. No I/O. */
export function aggregate(
  docs: RawDocument[],
  highlights: RawHighlight[],
  range: DateRange,
  options: AggregateOptions = {}
): Report {
  const now = options.now ?? (() => new Date());
  return freezeReport({
    dateRange: { start: range.start, end: range.end },
    documents: summariseDocuments(docs, options.archiveBase),
    highlights: summariseHighlights(highlights),
    generatedAt: now()
  });
}
