import { READER_BASE_URL } from "@/lib/constants";
import { MalformedRecord } from "@/lib/errors";
import type { ResilientFetcher } from "@/lib/fetcher";
import { silentLogger, type Logger } from "@/lib/log";
import { normaliseDocument, parsePage, readerPageSchema } from "@/lib/normalise";
import type { DocumentSource, RawDocument } from "@/lib/types";

export const ARCHIVE_LOCATION = "archive";

export interface ReaderDocumentSourceOptions {
  baseUrl?: string;
  logger?: Logger;
}

export function toApiTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Decides whether a document really moved into the archive inside the window. The listing
 * reports `location` as of request time but does not always stamp the move itself, so
 * `lastMovedAt` wins and `updatedAt` is the fallback.
 */
export function wasArchivedSince(doc: RawDocument, since: Date): boolean {
  if (doc.location !== ARCHIVE_LOCATION) {
    return false;
  }
  if (doc.lastMovedAt) {
    return doc.lastMovedAt.getTime() >= since.getTime();
  }
  if (doc.updatedAt) {
    return doc.updatedAt.getTime() >= since.getTime();
  }
  return false;
}

/** Walks the Reader `list/` endpoint page by page through `nextPageCursor`. */
export class ReaderDocumentSource implements DocumentSource {
  private readonly endpoint: string;
  private readonly logger: Logger;

  constructor(
    private readonly fetcher: ResilientFetcher,
    options: ReaderDocumentSourceOptions = {}
  ) {
    this.endpoint = new URL("list/", options.baseUrl ?? READER_BASE_URL).toString();
    this.logger = options.logger ?? silentLogger;
  }

  async listArchived(since: Date): Promise<RawDocument[]> {
    const all: RawDocument[] = [];
    const updatedAfter = toApiTimestamp(since);
    let cursor: string | undefined;
    let pageNumber = 0;

    while (true) {
      pageNumber++;
      const body = await this.fetcher.fetch("GET", this.endpoint, {
        location: ARCHIVE_LOCATION,
        updatedAfter,
        pageCursor: cursor
      });
      const page = parsePage(readerPageSchema, body, this.endpoint);

      const kept = this.filterPage(page.results, since);
      all.push(...kept);
      this.logger.detail(`Page ${pageNumber}: kept ${kept.length}/${page.results.length} archived documents`);

      if (!page.nextPageCursor) {
        break;
      }
      cursor = page.nextPageCursor;
    }

    this.logger.info(`Total archived documents fetched: ${all.length}`);
    return all;
  }

  private filterPage(results: unknown[], since: Date): RawDocument[] {
    const kept: RawDocument[] = [];
    for (const raw of results) {
      let doc: RawDocument;
      try {
        doc = normaliseDocument(raw);
      } catch (error) {
        if (error instanceof MalformedRecord) {
          this.logger.warn(`Skipping document: ${error.message}`);
          continue;
        }
        throw error;
      }
      if (wasArchivedSince(doc, since)) {
        kept.push(doc);
      }
    }
    return kept;
  }
}
