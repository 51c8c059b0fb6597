/**
 * Research stage: one sub-pipeline per plan section.
 */

import { advance, StageGraph, type Step } from "../graph/index.js";
import type { SearchHit } from "../collaborators/types.js";
import type {
  ResearchRequest,
  SectionOutcome,
  SectionResult,
  SectionSpec,
} from "../run/index.js";
import { formatQuestions, generateRequired, type StageContext } from "./context.js";

export interface Finding {
  readonly query: string;
  readonly hits: readonly SearchHit[];
}

export interface SectionState {
  readonly topic: string;
  readonly section: SectionSpec;
  readonly searchDepth: number;
  readonly queries?: string[];
  readonly findings?: Finding[];
  readonly result?: SectionResult;
}

type SectionStep = Step<SectionState, StageContext>;

/** Leading bullets or list numbering on a query line */
const LIST_MARKER_RE = /^(?:\d+[.)]|[-*•])\s*/;

/**
 * One query per non-empty line, list markers and quotes stripped,
 * duplicates dropped, at most `limit`.
 */
export function parseQueries(text: string, limit: number): string[] {
  const queries: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const query = line
      .trim()
      .replace(LIST_MARKER_RE, "")
      .replace(/^["']|["']$/g, "")
      .trim();
    if (query.length > 0 && !queries.includes(query)) {
      queries.push(query);
    }
  }
  return queries.slice(0, limit);
}

/** Hit URLs without duplicates, in first-seen order. */
export function collectSources(findings: readonly Finding[]): string[] {
  const sources: string[] = [];
  for (const finding of findings) {
    for (const hit of finding.hits) {
      if (hit.url.length > 0 && !sources.includes(hit.url)) {
        sources.push(hit.url);
      }
    }
  }
  return sources;
}

export function formatFindings(findings: readonly Finding[], maxContentLength: number): string {
  const blocks = findings.map((finding) => {
    const hits =
      finding.hits.length === 0
        ? "(no results)"
        : finding.hits
            .map((hit) => `Source: ${hit.url}\nTitle: ${hit.title}\nContent: ${hit.snippet.slice(0, maxContentLength)}`)
            .join("\n\n");
    return `Query: ${finding.query}\n\n${hits}`;
  });
  return blocks.join("\n\n---\n\n");
}

const generateQueries: SectionStep = {
  name: "generate_queries",
  writes: ["queries"],
  async run(state, context) {
    const prompt = context.prompts.render("search-queries", {
      topic: state.topic,
      sectionTitle: state.section.title,
      questions: formatQuestions(state.section.questions),
      queryCount: state.searchDepth,
    });
    const answer = await context.gateway.generateText(prompt, { signal: context.signal });
    const queries = parseQueries(answer, state.searchDepth);
    return advance({
      queries: queries.length > 0 ? queries : [`${state.section.title} ${state.topic}`],
    });
  },
};

const conductSearches: SectionStep = {
  name: "conduct_searches",
  writes: ["findings"],
  async run(state, context) {
    const findings: Finding[] = [];
    for (const query of state.queries ?? []) {
      const hits = await context.gateway.webSearch(query, state.searchDepth, {
        signal: context.signal,
      });
      findings.push({ query, hits });
    }
    return advance({ findings });
  },
};

const synthesizeContent: SectionStep = {
  name: "synthesize_content",
  writes: ["result"],
  async run(state, context) {
    const findings = state.findings ?? [];
    const prompt = context.prompts.render("section-synthesis", {
      topic: state.topic,
      sectionTitle: state.section.title,
      questions: formatQuestions(state.section.questions),
      findings: formatFindings(findings, context.config.search.maxContentLength),
    });
    const content = await generateRequired(context, prompt, "section content");

    return advance({
      result: {
        index: state.section.index,
        title: state.section.title,
        content,
        sources: collectSources(findings),
        queries: state.queries ?? [],
      },
    });
  },
};

export function createSectionGraph(): StageGraph<SectionState, StageContext> {
  return new StageGraph("research", [generateQueries, conductSearches, synthesizeContent]);
}

/**
 * Run one section sub-pipeline and reduce it to an outcome. Never rejects.
 */
export async function researchSection(
  graph: StageGraph<SectionState, StageContext>,
  request: ResearchRequest,
  section: SectionSpec,
  context: StageContext
): Promise<SectionOutcome> {
  const result = await graph.run(
    { topic: request.topic, section, searchDepth: request.searchDepth },
    context
  );

  if (result.ok && result.state.result !== undefined) {
    return { status: "completed", result: result.state.result };
  }

  return {
    status: "failed",
    index: section.index,
    title: section.title,
    error: result.ok
      ? { kind: "Internal", message: "Section graph finished without a result" }
      : { kind: result.error.kind, message: result.error.message },
  };
}
