import { describe, it, expect } from "vitest";
import {
  formatGeneratedAt,
  formatHours,
  formatReadingTime,
  formatSourceName,
  renderDigest,
  titleCase
} from "./render-markdown";
import { aggregate } from "@/lib/aggregate";
import { makeDocument, makeHighlight } from "@/test-support/http";

const range = { start: new Date("2023-01-01T00:00:00Z"), end: new Date("2023-01-08T00:00:00Z") };
const now = () => new Date("2023-01-08T12:30:00Z");

function bodyOf(markdown: string): string {
  return markdown.slice(markdown.indexOf("# Weekly"));
}

describe("formatReadingTime", () => {
  it("stays in minutes under an hour", () => {
    expect(formatReadingTime(2250)).toBe("10 minutes");
  });

  it("switches to hours and minutes", () => {
    expect(formatReadingTime(15000)).toBe("1h 7m");
    expect(formatReadingTime(13500)).toBe("1h 0m");
  });

  it("uses the configured speed", () => {
    expect(formatReadingTime(3000, 300)).toBe("10 minutes");
  });
});

describe("formatSourceName", () => {
  it("knows the usual abbreviations", () => {
    expect(formatSourceName("rss")).toBe("RSS");
    expect(formatSourceName("reader_ios")).toBe("Reader iOS");
    expect(formatSourceName("import-url")).toBe("Import URL");
    expect(formatSourceName("web_clipper")).toBe("Web Clipper");
  });
});

describe("small formatters", () => {
  it("title-cases words", () => {
    expect(titleCase("long read")).toBe("Long Read");
    expect(titleCase("PDF")).toBe("Pdf");
  });

  it("shows days past two days", () => {
    expect(formatHours(24)).toBe("24.0 hours");
    expect(formatHours(50)).toBe("2.1 days");
  });

  it("formats the generation time in a timezone", () => {
    expect(formatGeneratedAt(now())).toBe("2023-01-08 at 12:30 UTC");
    expect(formatGeneratedAt(now(), "Europe/Paris")).toBe("2023-01-08 at 13:30 Europe/Paris");
  });
});

describe("renderDigest", () => {
  it("renders a full week", () => {
    const report = aggregate(
      [
        makeDocument({ title: "Notes", category: "pdf", source: "upload", lastMovedAt: new Date("2023-01-02T00:00:00Z") }),
        makeDocument({
          title: "Deep Work",
          author: "Cal",
          sourceUrl: "https://example.com/deep",
          wordCount: 2250,
          category: "article",
          source: "reader_ios",
          tags: ["focus"],
          summary: "On focus.",
          savedAt: new Date("2023-01-02T00:00:00Z"),
          lastMovedAt: new Date("2023-01-03T00:00:00Z")
        })
      ],
      [makeHighlight({ text: "Quote one", note: "my note" }), makeHighlight({ text: " Quote two " })],
      range,
      { now }
    );

    const markdown = renderDigest(report);

    expect(markdown.startsWith('---\ntitle: "Weekly Reading Digest - 2023-01-01 to 2023-01-08"\n')).toBe(true);
    expect(markdown).toContain("\ndraft: false\n");
    expect(bodyOf(markdown)).toBe(
      [
        "# Weekly Reading Digest - 2023-01-01 to 2023-01-08",
        "",
        "## Overview",
        "",
        "- **Articles Archived**: 2",
        "- **Total Words Read**: 2,250",
        "- **Average Words per Article**: 1,125",
        "- **Time Spent Reading**: 10 minutes",
        "- **Average Time to Archive**: 24.0 hours",
        "- **Highlights Created**: 2",
        "",
        "## Article Breakdowns",
        "",
        "### By Category",
        "",
        "- **Pdf**: 1",
        "- **Article**: 1",
        "",
        "### By Source",
        "",
        "- **Upload**: 1",
        "- **Reader iOS**: 1",
        "",
        "### By Location",
        "",
        "- **Archive**: 2",
        "",
        "### By Tag",
        "",
        "- **focus**: 1",
        "",
        "### Archived Articles",
        "",
        "- **[Deep Work](https://example.com/deep)** by Cal (2,250 words) · archived after 24.0 hours",
        "  - On focus.",
        "- **Notes**",
        "",
        "## Highlights from the Past Week",
        "",
        '1. "Quote one"',
        "   - *Note: my note*",
        "",
        '2. "Quote two"',
        "",
        "---",
        "",
        "*Generated on 2023-01-08 at 12:30 UTC using Readwise API*",
        ""
      ].join("\n")
    );
  });

  it("renders an empty week", () => {
    const markdown = renderDigest(aggregate([], [], range, { now }));
    expect(bodyOf(markdown)).toBe(
      [
        "# Weekly Reading Digest - 2023-01-01 to 2023-01-08",
        "",
        "## Overview",
        "",
        "- **Articles Archived**: 0",
        "- **Total Words Read**: 0",
        "- **Time Spent Reading**: 0 minutes",
        "- **Highlights Created**: 0",
        "",
        "---",
        "",
        "*Generated on 2023-01-08 at 12:30 UTC using Readwise API*",
        ""
      ].join("\n")
    );
  });

  it("caps the highlight list", () => {
    const report = aggregate(
      [],
      [makeHighlight({ text: "a" }), makeHighlight({ text: "b" }), makeHighlight({ text: "c" })],
      range,
      { now }
    );
    const markdown = renderDigest(report, { maxHighlights: 1 });
    expect(markdown).toContain('1. "a"\n\n_…and 2 more highlights._\n');
    expect(markdown).not.toContain('2. "b"');
  });
});
