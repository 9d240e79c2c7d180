import { HIGHLIGHT_PAGE_SIZE, MAIN_BASE_URL } from "@/lib/constants";
import { MalformedRecord } from "@/lib/errors";
import type { ResilientFetcher } from "@/lib/fetcher";
import { silentLogger, type Logger } from "@/lib/log";
import { highlightPageSchema, normaliseHighlight, parsePage } from "@/lib/normalise";
import type { HighlightSource, RawHighlight } from "@/lib/types";
import { toApiTimestamp } from "./document-source";

export interface ReadwiseHighlightSourceOptions {
  baseUrl?: string;
  pageSize?: number;
  logger?: Logger;
}

/**
 * Walks the v2 `highlights/` endpoint by page number. The date bound is applied by the
 * server only.
 */
export class ReadwiseHighlightSource implements HighlightSource {
  private readonly endpoint: string;
  private readonly pageSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly fetcher: ResilientFetcher,
    options: ReadwiseHighlightSourceOptions = {}
  ) {
    this.endpoint = new URL("highlights/", options.baseUrl ?? MAIN_BASE_URL).toString();
    this.pageSize = options.pageSize ?? HIGHLIGHT_PAGE_SIZE;
    this.logger = options.logger ?? silentLogger;
  }

  async listRecent(since: Date): Promise<RawHighlight[]> {
    const all: RawHighlight[] = [];
    const highlightedAfter = toApiTimestamp(since);
    let page = 1;

    while (true) {
      const body = await this.fetcher.fetch("GET", this.endpoint, {
        highlighted_at__gt: highlightedAfter,
        page_size: this.pageSize,
        page
      });
      const parsed = parsePage(highlightPageSchema, body, this.endpoint);
      if (parsed.results.length === 0) {
        break;
      }

      for (const raw of parsed.results) {
        try {
          all.push(normaliseHighlight(raw));
        } catch (error) {
          if (error instanceof MalformedRecord) {
            this.logger.warn(`Skipping highlight: ${error.message}`);
            continue;
          }
          throw error;
        }
      }
      this.logger.detail(`Page ${page}: ${parsed.results.length} highlights`);

      if (!parsed.next) {
        break;
      }
      page++;
    }

    this.logger.info(`Total highlights fetched: ${all.length}`);
    return all;
  }
}
