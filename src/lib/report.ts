import type { Breakdown, Report } from "./types";

export interface ReportJSON {
  dateRange: { start: string; end: string };
  generatedAt: string;
  documents: {
    totalCount: number;
    totalWordCount: number;
    averageWordsPerArticle: number;
    averageTimeToArchiveHours: number | null;
    categoryBreakdown: Record<string, number>;
    sourceBreakdown: Record<string, number>;
    locationBreakdown: Record<string, number>;
    tagBreakdown: Record<string, number>;
    documents: Array<{
      title: string;
      author: string;
      source: string;
      category: string;
      location: string;
      wordCount: number;
      sourceUrl: string;
      siteName: string;
      publishedDate: string;
      summary: string;
      tags: string[];
      lastMovedAt: string | null;
      updatedAt: string | null;
      timeToArchiveHours: number | null;
    }>;
  };
  highlights: {
    totalCount: number;
    sourceBreakdown: Record<string, number>;
    highlights: Array<{
      text: string;
      note: string;
      location: string;
      highlightedAt: string | null;
      bookId: number | null;
      readwiseUrl: string;
      source: string;
    }>;
  };
}

function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || value instanceof Date || Object.isFrozen(value)) {
    return value;
  }
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}

/** Freezes every object and array in the report. Dates are left as they are. */
export function freezeReport(report: Report): Report {
  return deepFreeze(report);
}

/**
 * Mapping view of a breakdown. Object keys that look like integers are enumerated first,
 * so use the array form when order matters.
 */
export function breakdownToRecord(breakdown: Breakdown): Record<string, number> {
  return Object.fromEntries(breakdown.map(({ label, count }) => [label, count]));
}

export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function isoOrNull(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function reportToJSON(report: Report): ReportJSON {
  const { documents, highlights } = report;
  return {
    dateRange: {
      start: report.dateRange.start.toISOString(),
      end: report.dateRange.end.toISOString()
    },
    generatedAt: report.generatedAt.toISOString(),
    documents: {
      totalCount: documents.totalCount,
      totalWordCount: documents.totalWordCount,
      averageWordsPerArticle: documents.averageWordsPerArticle,
      averageTimeToArchiveHours: documents.averageTimeToArchiveHours,
      categoryBreakdown: breakdownToRecord(documents.categoryBreakdown),
      sourceBreakdown: breakdownToRecord(documents.sourceBreakdown),
      locationBreakdown: breakdownToRecord(documents.locationBreakdown),
      tagBreakdown: breakdownToRecord(documents.tagBreakdown),
      documents: documents.documents.map((doc) => ({
        ...doc,
        tags: [...doc.tags],
        lastMovedAt: isoOrNull(doc.lastMovedAt),
        updatedAt: isoOrNull(doc.updatedAt)
      }))
    },
    highlights: {
      totalCount: highlights.totalCount,
      sourceBreakdown: breakdownToRecord(highlights.sourceBreakdown),
      highlights: highlights.highlights.map((highlight) => ({
        ...highlight,
        highlightedAt: isoOrNull(highlight.highlightedAt)
      }))
    }
  };
}
