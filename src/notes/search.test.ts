import { describe, expect, it } from "vitest";
import { SearchIndex, extractSnippet } from "./search.js";
import { Note } from "./types.js";

function makeNote(id: string, title: string, content: string, updated = "2024-01-01T00:00:00.000Z"): Note {
  return {
    id,
    kind: id.startsWith("events/") ? "event" : "standalone",
    filePath: `/notes/${id}`,
    frontmatter: { title, created: "2024-01-01T00:00:00.000Z", updated, tags: [] },
    content,
  };
}

const exact = { maxResults: 20, fuzzy: false };

describe("SearchIndex", () => {
  const notes = [
    makeNote("standalone/body.md", "Weekly sync", "We went over the budget again."),
    makeNote("standalone/review.md", "Budget review", "Numbers for Q3."),
    makeNote("standalone/exact.md", "Budget", "Top level."),
    makeNote("standalone/other.md", "Other", "Nothing relevant."),
  ];

  it("returns nothing for queries shorter than two characters", () => {
    const index = SearchIndex.build(notes, exact);

    expect(index.search("")).toEqual([]);
    expect(index.search("b")).toEqual([]);
    expect(index.search(" b ")).toEqual([]);
  });

  it("ranks exact titles, then title matches, then body matches", () => {
    const results = SearchIndex.build(notes, exact).search("budget");

    expect(results.map((result) => [result.id, result.match])).toEqual([
      ["standalone/exact.md", "exact-title"],
      ["standalone/review.md", "title"],
      ["standalone/body.md", "body"],
    ]);
  });

  it("matches regardless of case", () => {
    expect(SearchIndex.build(notes, exact).search("BUDGET REVIEW").map((result) => result.id)).toEqual([
      "standalone/review.md",
    ]);
  });

  it("breaks ties by most recent update, then by path", () => {
    const tied = [
      makeNote("standalone/b.md", "B", "mentions roadmap", "2024-01-02T00:00:00.000Z"),
      makeNote("standalone/a.md", "A", "mentions roadmap", "2024-01-02T00:00:00.000Z"),
      makeNote("standalone/c.md", "C", "mentions roadmap", "2024-01-03T00:00:00.000Z"),
    ];

    const results = SearchIndex.build(tied, exact).search("roadmap");

    expect(results.map((result) => result.id)).toEqual(["standalone/c.md", "standalone/a.md", "standalone/b.md"]);
  });

  it("truncates to maxResults", () => {
    const results = SearchIndex.build(notes, { maxResults: 2, fuzzy: false }).search("budget");

    expect(results.map((result) => result.id)).toEqual(["standalone/exact.md", "standalone/review.md"]);
  });

  it("appends fuzzy matches after substring matches", () => {
    const withTypo = [...notes, makeNote("events/plan.md", "Quarterly planning", "Roadmap talk.")];

    const results = SearchIndex.build(withTypo, { maxResults: 20, fuzzy: true }).search("plannig");

    expect(results.map((result) => [result.id, result.match])).toEqual([["events/plan.md", "fuzzy"]]);
    expect(results[0].kind).toBe("event");
  });

  it("leaves fuzzy matching out when disabled", () => {
    const withTypo = [...notes, makeNote("events/plan.md", "Quarterly planning", "Roadmap talk.")];

    expect(SearchIndex.build(withTypo, exact).search("plannig")).toEqual([]);
  });

  it("carries a snippet of the body", () => {
    const [result] = SearchIndex.build(notes, exact).search("went over");

    expect(result).toMatchObject({
      id: "standalone/body.md",
      title: "Weekly sync",
      filePath: "/notes/standalone/body.md",
      updated: "2024-01-01T00:00:00.000Z",
      snippet: "We went over the budget again.",
      match: "body",
    });
  });

  it("counts the indexed notes", () => {
    expect(SearchIndex.build(notes, exact).size).toBe(4);
  });
});

describe("extractSnippet", () => {
  it("returns short bodies whole with whitespace collapsed", () => {
    expect(extractSnippet("# Title\n\nDiscussed the budget\nfor Q3", "budget")).toBe(
      "# Title Discussed the budget for Q3"
    );
  });

  it("centres long bodies on the match", () => {
    const content = `${"lorem ".repeat(40)}budget${" ipsum".repeat(40)}`;

    const snippet = extractSnippet(content, "budget", 40);

    expect(snippet).toBe("...lorem lorem lorem budget ipsum ipsum...");
  });

  it("falls back to the start of the body", () => {
    expect(extractSnippet("abcdefghij", "zz", 4)).toBe("abcd...");
  });
});
