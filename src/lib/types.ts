export interface RawDocument {
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
  lastMovedAt: Date | null;
  updatedAt: Date | null;
  createdAt: Date | null;
  savedAt: Date | null;
  tags: string[];
}

export interface RawHighlight {
  text: string;
  note: string;
  location: string;
  highlightedAt: Date | null;
  bookId: number | null;
  readwiseUrl: string;
}

export interface DateRange {
  start: Date;
  end: Date;
}

export interface ProcessedDocument {
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
  lastMovedAt: Date | null;
  updatedAt: Date | null;
  timeToArchiveHours: number | null;
}

export interface ProcessedHighlight {
  text: string;
  note: string;
  location: string;
  highlightedAt: Date | null;
  bookId: number | null;
  readwiseUrl: string;
  source: string;
}

export interface BreakdownEntry {
  label: string;
  count: number;
}

export type Breakdown = BreakdownEntry[];

export interface DocumentStats {
  totalCount: number;
  totalWordCount: number;
  averageWordsPerArticle: number;
  averageTimeToArchiveHours: number | null;
  categoryBreakdown: Breakdown;
  sourceBreakdown: Breakdown;
  locationBreakdown: Breakdown;
  tagBreakdown: Breakdown;
  documents: ProcessedDocument[];
}

export interface HighlightStats {
  totalCount: number;
  highlights: ProcessedHighlight[];
  sourceBreakdown: Breakdown;
}

export interface Report {
  dateRange: DateRange;
  documents: DocumentStats;
  highlights: HighlightStats;
  generatedAt: Date;
}

export interface DocumentSource {
  listArchived(since: Date): Promise<RawDocument[]>;
}

export interface HighlightSource {
  listRecent(since: Date): Promise<RawHighlight[]>;
}

export interface CommitInfo {
  sha: string;
  url: string;
  message: string;
  filePath: string;
}

export interface Publisher {
  publish(filePath: string, content: string, commitMessage: string): Promise<CommitInfo>;
}

export interface DigestConfig {
  timezone: string;
  digest: {
    reading_wpm: number;
    max_highlights: number | null;
  };
  publish: {
    posts_dir: string;
    filename_suffix: string;
  };
}

export interface DigestEnv {
  readwiseToken: string;
  github: {
    token: string;
    owner: string;
    repo: string;
    branch: string;
  } | null;
}
