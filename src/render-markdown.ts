import YAML from "yaml";
import { formatDay } from "@/lib/report";
import type { Breakdown, DocumentStats, HighlightStats, ProcessedDocument, Report } from "@/lib/types";

export interface RenderOptions {
  readingWpm?: number;
  maxHighlights?: number | null;
  timezone?: string;
}

const DEFAULT_READING_WPM = 225;

const SPECIAL_NAMES: Record<string, string> = {
  ios: "iOS",
  macos: "macOS",
  rss: "RSS",
  api: "API",
  url: "URL",
  pdf: "PDF",
  epub: "EPUB",
  html: "HTML"
};

const numberFormat = new Intl.NumberFormat("en-US");

export function formatNumber(value: number): string {
  return numberFormat.format(value);
}

export function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/** `reader_ios` → `Reader iOS`, `import-url` → `Import URL`. */
export function formatSourceName(source: string): string {
  const whole = SPECIAL_NAMES[source.toLowerCase()];
  if (whole) {
    return whole;
  }
  return source
    .replace(/[_-]/g, " ")
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .map((part) => SPECIAL_NAMES[part.toLowerCase()] ?? titleCase(part))
    .join(" ");
}

export function formatReadingTime(words: number, wpm: number = DEFAULT_READING_WPM): string {
  const minutes = Math.round(words / wpm);
  if (minutes < 60) {
    return `${minutes} minutes`;
  }
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

export function formatHours(hours: number): string {
  if (hours >= 48) {
    return `${(hours / 24).toFixed(1)} days`;
  }
  return `${hours.toFixed(1)} hours`;
}

export function formatGeneratedAt(date: Date, timezone = "UTC"): string {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23"
  });
  const parts = Object.fromEntries(formatter.formatToParts(date).map((part) => [part.type, part.value]));
  return `${parts.year}-${parts.month}-${parts.day} at ${parts.hour}:${parts.minute} ${timezone}`;
}

export function digestTitle(report: Report): string {
  return `Weekly Reading Digest - ${formatDay(report.dateRange.start)} to ${formatDay(report.dateRange.end)}`;
}

function renderFrontMatter(report: Report): string {
  const frontmatter = {
    title: digestTitle(report),
    date: report.generatedAt.toISOString(),
    draft: false,
    tags: ["reading", "digest", "readwise"],
    categories: ["Reading"]
  };
  const yaml = YAML.stringify(frontmatter, {
    defaultStringType: "QUOTE_DOUBLE",
    defaultKeyType: "PLAIN",
    lineWidth: 0
  }).trim();
  return `---\n${yaml}\n---`;
}

function renderOverview(documents: DocumentStats, highlights: HighlightStats, wpm: number): string {
  const lines = [
    "## Overview",
    "",
    `- **Articles Archived**: ${documents.totalCount}`,
    `- **Total Words Read**: ${formatNumber(documents.totalWordCount)}`
  ];
  if (documents.totalCount > 0) {
    lines.push(`- **Average Words per Article**: ${formatNumber(documents.averageWordsPerArticle)}`);
  }
  lines.push(`- **Time Spent Reading**: ${formatReadingTime(documents.totalWordCount, wpm)}`);
  if (documents.averageTimeToArchiveHours !== null) {
    lines.push(`- **Average Time to Archive**: ${formatHours(documents.averageTimeToArchiveHours)}`);
  }
  lines.push(`- **Highlights Created**: ${highlights.totalCount}`);
  return lines.join("\n");
}

function renderBreakdown(heading: string, breakdown: Breakdown, format: (label: string) => string): string[] {
  if (breakdown.length === 0) {
    return [];
  }
  return [heading, "", ...breakdown.map(({ label, count }) => `- **${format(label)}**: ${count}`), ""];
}

function renderArticle(doc: ProcessedDocument): string[] {
  let line = doc.sourceUrl ? `- **[${doc.title}](${doc.sourceUrl})**` : `- **${doc.title}**`;
  if (doc.author) {
    line += ` by ${doc.author}`;
  }
  if (doc.wordCount > 0) {
    line += ` (${formatNumber(doc.wordCount)} words)`;
  }
  if (doc.timeToArchiveHours !== null) {
    line += ` · archived after ${formatHours(doc.timeToArchiveHours)}`;
  }
  const lines = [line];
  if (doc.summary) {
    lines.push(`  - ${doc.summary}`);
  }
  return lines;
}

function renderDocuments(documents: DocumentStats): string {
  const lines = [
    "## Article Breakdowns",
    "",
    ...renderBreakdown("### By Category", documents.categoryBreakdown, titleCase),
    ...renderBreakdown("### By Source", documents.sourceBreakdown, formatSourceName),
    ...renderBreakdown("### By Location", documents.locationBreakdown, titleCase),
    ...renderBreakdown("### By Tag", documents.tagBreakdown, (label) => label)
  ];
  if (documents.documents.length > 0) {
    lines.push("### Archived Articles", "", ...documents.documents.flatMap(renderArticle), "");
  }
  return lines.join("\n");
}

function renderHighlights(highlights: HighlightStats, limit: number | null): string {
  const lines = ["## Highlights from the Past Week", ""];
  const shown = limit === null ? highlights.highlights : highlights.highlights.slice(0, limit);
  shown.forEach((highlight, index) => {
    lines.push(`${index + 1}. "${highlight.text.trim()}"`);
    const note = highlight.note.trim();
    if (note) {
      lines.push(`   - *Note: ${note}*`);
    }
    lines.push("");
  });
  const hidden = highlights.highlights.length - shown.length;
  if (hidden > 0) {
    lines.push(`_…and ${hidden} more highlights._`, "");
  }
  return lines.join("\n");
}

/** Markdown post with front matter for a static site generator. */
export function renderDigest(report: Report, options: RenderOptions = {}): string {
  const wpm = options.readingWpm ?? DEFAULT_READING_WPM;
  const sections = [renderFrontMatter(report), `# ${digestTitle(report)}`, "", renderOverview(report.documents, report.highlights, wpm), ""];
  if (report.documents.totalCount > 0) {
    sections.push(renderDocuments(report.documents));
  }
  if (report.highlights.totalCount > 0) {
    sections.push(renderHighlights(report.highlights, options.maxHighlights ?? null));
  }
  sections.push("---", "", `*Generated on ${formatGeneratedAt(report.generatedAt, options.timezone)} using Readwise API*`);
  return `${sections.join("\n")}\n`;
}
