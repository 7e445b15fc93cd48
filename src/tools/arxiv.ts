import { z } from "zod";
import { defineTool, type ToolDefinition } from "./registry.js";
import { DEFAULT_HTTP_TIMEOUT_MS, getText, type HttpToolOptions } from "./http.js";

// ── arXiv Search — Atom feed ─────────────────────────────

const QUERY_URL = "https://export.arxiv.org/api/query";
const SUMMARY_CHARS = 200;

export interface Paper {
  title: string;
  summary: string;
  published: string;
}

/** Decode the handful of entities arXiv emits. */
function decodeEntities(s: string): string {
  return s
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&amp;/g, "&");
}

function tagText(entry: string, tag: string): string {
  const match = new RegExp(`<${tag}[^>]*>([\\s\\S]*?)</${tag}>`).exec(entry);
  return decodeEntities((match?.[1] ?? "").replace(/\s+/g, " ").trim());
}

/** Pull title, summary and date out of each <entry> in an Atom feed. */
export function parseArxivFeed(xml: string): Paper[] {
  const papers: Paper[] = [];
  for (const match of xml.matchAll(/<entry>([\s\S]*?)<\/entry>/g)) {
    const entry = match[1] ?? "";
    const summary = tagText(entry, "summary");
    papers.push({
      title: tagText(entry, "title"),
      summary: summary.length > SUMMARY_CHARS ? `${summary.slice(0, SUMMARY_CHARS)}...` : summary,
      published: tagText(entry, "published").slice(0, 10),
    });
  }
  return papers;
}

export function createArxivTool(options: HttpToolOptions = {}): ToolDefinition {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

  return defineTool({
    name: "search_arxiv",
    description: "Searches arXiv for recent research papers on a topic.",
    example: 'search_arxiv("transformers", 3)',
    parameters: {
      query: z.coerce.string().trim().min(1).describe("Search terms"),
      max_results: z.coerce.number().int().min(1).max(10).default(3).describe("Papers to return"),
    },
    execute: async ({ query, max_results }) => {
      const xml = await getText(
        QUERY_URL,
        {
          search_query: `all:${query}`,
          start: 0,
          max_results,
          sortBy: "submittedDate",
          sortOrder: "descending",
        },
        timeoutMs,
      );

      const papers = parseArxivFeed(xml).slice(0, max_results);
      if (papers.length === 0) {
        return `No papers found for query '${query}'`;
      }

      const lines = [`Found ${papers.length} recent paper(s) on '${query}':`];
      papers.forEach((paper, i) => {
        lines.push(`\n${i + 1}. ${paper.title}`);
        lines.push(`   Published: ${paper.published}`);
        lines.push(`   Summary: ${paper.summary}`);
      });
      return lines.join("\n");
    },
  });
}
