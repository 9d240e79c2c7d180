import { describe, it, expect } from "vitest";
import { aggregate, labelOf, summariseDocuments, summariseHighlights, tally, timeToArchiveHours } from "./aggregate";
import { breakdownToRecord } from "./report";
import type { DateRange } from "./types";
import { makeDocument, makeHighlight } from "@/test-support/http";

const range: DateRange = {
  start: new Date("2023-01-01T00:00:00Z"),
  end: new Date("2023-01-08T00:00:00Z")
};
const fixedNow = () => new Date("2023-01-08T00:00:00Z");

describe("tally", () => {
  it("orders by count and keeps first-seen order on ties", () => {
    expect(tally(["rss", "article", "rss", "email", "article"])).toEqual([
      { label: "rss", count: 2 },
      { label: "article", count: 2 },
      { label: "email", count: 1 }
    ]);
  });

  it("keeps numeric-looking labels in count order", () => {
    expect(tally(["b", "2023", "b"]).map((entry) => entry.label)).toEqual(["b", "2023"]);
  });

  it("returns an empty breakdown for no labels", () => {
    expect(tally([])).toEqual([]);
  });
});

describe("labelOf", () => {
  it("substitutes unknown for blank values", () => {
    expect(labelOf("")).toBe("unknown");
    expect(labelOf("  ")).toBe("unknown");
    expect(labelOf("pdf")).toBe("pdf");
  });
});

describe("timeToArchiveHours", () => {
  it("measures from the saved time by default", () => {
    const doc = makeDocument({
      savedAt: new Date("2023-01-01T00:00:00Z"),
      createdAt: new Date("2022-12-01T00:00:00Z"),
      lastMovedAt: new Date("2023-01-02T12:00:00Z")
    });
    expect(timeToArchiveHours(doc)).toBe(36);
  });

  it("falls back to the creation time", () => {
    const doc = makeDocument({
      createdAt: new Date("2023-01-04T00:00:00Z"),
      lastMovedAt: new Date("2023-01-04T06:30:00Z")
    });
    expect(timeToArchiveHours(doc)).toBe(6.5);
  });

  it("is absent without both instants or when the move predates the base", () => {
    expect(timeToArchiveHours(makeDocument({ lastMovedAt: new Date("2023-01-04T00:00:00Z") }))).toBeNull();
    expect(timeToArchiveHours(makeDocument({ savedAt: new Date("2023-01-04T00:00:00Z") }))).toBeNull();
    expect(
      timeToArchiveHours(
        makeDocument({ savedAt: new Date("2023-01-05T00:00:00Z"), lastMovedAt: new Date("2023-01-04T00:00:00Z") })
      )
    ).toBeNull();
  });

  it("accepts another base", () => {
    const doc = makeDocument({
      updatedAt: new Date("2023-01-04T00:00:00Z"),
      lastMovedAt: new Date("2023-01-04T03:00:00Z")
    });
    expect(timeToArchiveHours(doc, (d) => d.updatedAt)).toBe(3);
  });
});

describe("summariseDocuments", () => {
  it("handles an empty week", () => {
    expect(summariseDocuments([])).toEqual({
      totalCount: 0,
      totalWordCount: 0,
      averageWordsPerArticle: 0,
      averageTimeToArchiveHours: null,
      categoryBreakdown: [],
      sourceBreakdown: [],
      locationBreakdown: [],
      tagBreakdown: [],
      documents: []
    });
  });

  it("orders documents by archive time, missing last", () => {
    const stats = summariseDocuments([
      makeDocument({ title: "third", lastMovedAt: new Date("2023-01-03T00:00:00Z") }),
      makeDocument({ title: "never" }),
      makeDocument({ title: "fifth", lastMovedAt: new Date("2023-01-05T00:00:00Z") })
    ]);
    expect(stats.documents.map((doc) => doc.title)).toEqual(["fifth", "third", "never"]);
  });

  it("counts every tag of every document", () => {
    const stats = summariseDocuments([
      makeDocument({ tags: ["ai", "essays"] }),
      makeDocument({ tags: ["essays"] }),
      makeDocument()
    ]);
    expect(stats.tagBreakdown).toEqual([
      { label: "essays", count: 2 },
      { label: "ai", count: 1 }
    ]);
  });

  it("breakdowns add up to the document count", () => {
    const stats = summariseDocuments([
      makeDocument({ category: "article", source: "rss" }),
      makeDocument({ category: "pdf", source: "" }),
      makeDocument({ category: "", source: "rss", location: "" })
    ]);
    for (const breakdown of [stats.categoryBreakdown, stats.sourceBreakdown, stats.locationBreakdown]) {
      expect(breakdown.reduce((sum, entry) => sum + entry.count, 0)).toBe(3);
    }
    expect(breakdownToRecord(stats.sourceBreakdown)).toEqual({ rss: 2, unknown: 1 });
    expect(breakdownToRecord(stats.locationBreakdown)).toEqual({ archive: 2, unknown: 1 });
  });

  it("averages time to archive over the documents that have one", () => {
    const stats = summariseDocuments([
      makeDocument({ savedAt: new Date("2023-01-01T00:00:00Z"), lastMovedAt: new Date("2023-01-02T12:00:00Z") }),
      makeDocument({ createdAt: new Date("2023-01-04T00:00:00Z"), lastMovedAt: new Date("2023-01-04T06:00:00Z") }),
      makeDocument({ lastMovedAt: new Date("2023-01-06T00:00:00Z") })
    ]);
    expect(stats.averageTimeToArchiveHours).toBe(21);
    expect(stats.documents.map((doc) => doc.timeToArchiveHours)).toEqual([null, 6, 36]);
  });
});

describe("summariseHighlights", () => {
  it("drops blank highlights and keeps the rest verbatim", () => {
    const stats = summariseHighlights([
      makeHighlight({ text: "  first  " }),
      makeHighlight({ text: " \n\t " }),
      makeHighlight({ text: "second", note: "why it matters" })
    ]);
    expect(stats.totalCount).toBe(2);
    expect(stats.highlights.map((h) => h.text)).toEqual(["  first  ", "second"]);
    expect(stats.highlights.every((h) => h.source === "unknown")).toBe(true);
    expect(stats.sourceBreakdown).toEqual([{ label: "unknown", count: 2 }]);
  });

  it("has no source entries when nothing is left", () => {
    expect(summariseHighlights([makeHighlight({ text: "" })])).toEqual({
      totalCount: 0,
      highlights: [],
      sourceBreakdown: []
    });
  });
});

describe("aggregate", () => {
  const docs = [
    makeDocument({ title: "One", wordCount: 1000, category: "article", lastMovedAt: new Date("2023-01-02T00:00:00Z") }),
    makeDocument({ title: "Two", wordCount: 2000, category: "article", lastMovedAt: new Date("2023-01-03T00:00:00Z") }),
    makeDocument({ title: "Three", category: "pdf", lastMovedAt: new Date("2023-01-04T00:00:00Z") }),
    makeDocument({ title: "Four", wordCount: 3000, category: "email", updatedAt: new Date("2023-01-05T00:00:00Z") }),
    makeDocument({ title: "Five", wordCount: 1500, category: "article", lastMovedAt: new Date("2023-01-06T00:00:00Z") })
  ];
  const highlights = Array.from({ length: 10 }, (_, index) =>
    makeHighlight({ text: index === 4 ? "   " : `Highlight ${index + 1}` })
  );

  it("summarises a week of reading", () => {
    const report = aggregate(docs, highlights, range, { now: fixedNow });

    expect(report.documents.totalCount).toBe(5);
    expect(report.documents.totalWordCount).toBe(7500);
    expect(report.documents.averageWordsPerArticle).toBe(1500);
    expect(report.highlights.totalCount).toBe(9);
    expect(report.highlights.highlights).toHaveLength(9);
    expect(report.documents.categoryBreakdown).toEqual([
      { label: "article", count: 3 },
      { label: "pdf", count: 1 },
      { label: "email", count: 1 }
    ]);
    expect(report.documents.documents.map((doc) => doc.title)).toEqual(["Five", "Three", "Two", "One", "Four"]);
    expect(report.dateRange).toEqual(range);
    expect(report.generatedAt).toEqual(fixedNow());
  });

  it("floors the average word count", () => {
    const report = aggregate(
      [makeDocument({ wordCount: 10 }), makeDocument({ wordCount: 5 })],
      [],
      range,
      { now: fixedNow }
    );
    expect(report.documents.averageWordsPerArticle).toBe(7);
  });

  it("gives the same report for the same input", () => {
    const first = aggregate(docs, highlights, range, { now: fixedNow });
    const second = aggregate(docs, highlights, range, { now: fixedNow });
    expect(second).toEqual(first);
  });

  it("returns a frozen report and leaves the input alone", () => {
    const report = aggregate(docs, highlights, range, { now: fixedNow });
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.documents.documents)).toBe(true);
    expect(() => report.documents.documents.push(report.documents.documents[0])).toThrow(TypeError);
    expect(Object.isFrozen(docs)).toBe(false);
    expect(Object.isFrozen(docs[0].tags)).toBe(false);
  });
});
