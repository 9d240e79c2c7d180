import { vi } from "vitest";
import type { Sleeper, Transport } from "@/lib/fetcher";
import type { RawDocument, RawHighlight } from "@/lib/types";

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers }
  });
}

export function emptyResponse(status: number, headers: Record<string, string> = {}): Response {
  return new Response(null, { status, headers });
}

/** Transport that answers each call with the next queued step. */
export function queuedTransport(steps: Array<Response | Error>) {
  const queue = [...steps];
  return vi.fn<Transport>(async () => {
    const next = queue.shift();
    if (next === undefined) {
      throw new Error("queuedTransport: no more responses");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
}

export function recordingSleep() {
  return vi.fn<Sleeper>(async () => {});
}

export function calledUrl(transport: ReturnType<typeof queuedTransport>, call: number): URL {
  return new URL(transport.mock.calls[call][0]);
}

export function makeDocument(overrides: Partial<RawDocument> = {}): RawDocument {
  return {
    title: "Untitled",
    author: "",
    source: "",
    category: "",
    location: "archive",
    wordCount: 0,
    sourceUrl: "",
    siteName: "",
    publishedDate: "",
    summary: "",
    lastMovedAt: null,
    updatedAt: null,
    createdAt: null,
    savedAt: null,
    tags: [],
    ...overrides
  };
}

export function makeHighlight(overrides: Partial<RawHighlight> = {}): RawHighlight {
  return {
    text: "A highlighted passage",
    note: "",
    location: "",
    highlightedAt: null,
    bookId: null,
    readwiseUrl: "",
    ...overrides
  };
}
