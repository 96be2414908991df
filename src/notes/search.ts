import MiniSearch from "minisearch";
import type { SearchConfig } from "../config/index.js";
import { Note, NoteKind } from "./types.js";

export const MIN_QUERY_LENGTH = 2;
const SNIPPET_LENGTH = 200;

export type MatchTier = "exact-title" | "title" | "body" | "fuzzy";

const TIER_ORDER: Record<MatchTier, number> = {
  "exact-title": 0,
  title: 1,
  body: 2,
  fuzzy: 3,
};

export interface SearchResult {
  id: string;
  filePath: string;
  kind: NoteKind;
  title: string;
  updated: string;
  snippet: string;
  match: MatchTier;
}

interface IndexEntry {
  note: Note;
  title: string; // lower-cased
  body: string; // lower-cased
  updatedMs: number;
}

interface FuzzyDoc {
  id: string;
  title: string;
  content: string;
}

/** Text around the first occurrence of the query (or one of its words). */
export function extractSnippet(content: string, query: string, snippetLength: number = SNIPPET_LENGTH): string {
  const text = content.replace(/\s+/g, " ").trim();
  const lowerText = text.toLowerCase();
  const lowerQuery = query.trim().toLowerCase();

  let bestPos = lowerQuery ? lowerText.indexOf(lowerQuery) : -1;
  if (bestPos === -1) {
    const terms = lowerQuery.split(/\s+/).filter((t) => t.length >= MIN_QUERY_LENGTH);
    for (const term of terms) {
      const pos = lowerText.indexOf(term);
      if (pos !== -1 && (bestPos === -1 || pos < bestPos)) {
        bestPos = pos;
      }
    }
  }

  if (bestPos === -1) {
    return text.slice(0, snippetLength) + (text.length > snippetLength ? "..." : "");
  }

  const halfLength = Math.floor(snippetLength / 2);
  let start = Math.max(0, bestPos - halfLength);
  let end = Math.min(text.length, bestPos + halfLength);

  // Don't cut words
  if (start > 0) {
    const spacePos = text.indexOf(" ", start);
    if (spacePos !== -1 && spacePos < bestPos) {
      start = spacePos + 1;
    }
  }
  if (end < text.length) {
    const spacePos = text.lastIndexOf(" ", end);
    if (spacePos > bestPos) {
      end = spacePos;
    }
  }

  let snippet = text.slice(start, end);
  if (start > 0) snippet = "..." + snippet;
  if (end < text.length) snippet = snippet + "...";
  return snippet;
}

function compareEntries(a: IndexEntry, b: IndexEntry): number {
  if (a.updatedMs !== b.updatedMs) {
    return b.updatedMs - a.updatedMs;
  }
  return a.note.id < b.note.id ? -1 : a.note.id > b.note.id ? 1 : 0;
}

/**
 * In-memory index over a snapshot of notes. Built fresh for each search session;
 * never updated in place.
 */
export class SearchIndex {
  private entries: Map<string, IndexEntry>;
  private fuzzyIndex: MiniSearch<FuzzyDoc> | null;
  private options: SearchConfig;

  private constructor(notes: Note[], options: SearchConfig) {
    this.options = options;
    this.entries = new Map(
      notes.map((note) => {
        const updatedMs = Date.parse(note.frontmatter.updated);
        return [
          note.id,
          {
            note,
            title: note.frontmatter.title.toLowerCase(),
            body: note.content.toLowerCase(),
            updatedMs: Number.isNaN(updatedMs) ? 0 : updatedMs,
          },
        ];
      })
    );

    this.fuzzyIndex = null;
    if (options.fuzzy) {
      this.fuzzyIndex = new MiniSearch<FuzzyDoc>({
        fields: ["title", "content"],
        searchOptions: {
          boost: { title: 2 },
          fuzzy: 0.2,
          prefix: true,
        },
      });
      this.fuzzyIndex.addAll(
        notes.map((note) => ({ id: note.id, title: note.frontmatter.title, content: note.content }))
      );
    }
  }

  static build(notes: Note[], options: SearchConfig): SearchIndex {
    return new SearchIndex(notes, options);
  }

  get size(): number {
    return this.entries.size;
  }

  search(query: string): SearchResult[] {
    const needle = query.trim().toLowerCase();
    if (needle.length < MIN_QUERY_LENGTH) {
      return [];
    }

    const hits: Array<{ entry: IndexEntry; tier: MatchTier }> = [];
    for (const entry of this.entries.values()) {
      if (entry.title === needle) {
        hits.push({ entry, tier: "exact-title" });
      } else if (entry.title.includes(needle)) {
        hits.push({ entry, tier: "title" });
      } else if (entry.body.includes(needle)) {
        hits.push({ entry, tier: "body" });
      }
    }
    hits.sort((a, b) => TIER_ORDER[a.tier] - TIER_ORDER[b.tier] || compareEntries(a.entry, b.entry));

    const results = hits.map(({ entry, tier }) => this.toResult(entry, tier, query));

    if (this.fuzzyIndex) {
      const seen = new Set(hits.map(({ entry }) => entry.note.id));
      const extras = this.fuzzyIndex
        .search(query.trim())
        .map((result) => ({ id: String(result.id), score: result.score }))
        .filter((result) => !seen.has(result.id))
        .sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

      for (const extra of extras) {
        const entry = this.entries.get(extra.id);
        if (entry) {
          results.push(this.toResult(entry, "fuzzy", query));
        }
      }
    }

    return results.slice(0, this.options.maxResults);
  }

  private toResult(entry: IndexEntry, tier: MatchTier, query: string): SearchResult {
    return {
      id: entry.note.id,
      filePath: entry.note.filePath,
      kind: entry.note.kind,
      title: entry.note.frontmatter.title,
      updated: entry.note.frontmatter.updated,
      snippet: extractSnippet(entry.note.content, query),
      match: tier,
    };
  }
}
