/**
 * Report stage: assembles completed sections into the final report.
 * Sections arrive in plan order and stay in it.
 */

import { advance, StageGraph, StepError, type Step } from "../graph/index.js";
import type {
  FinalReport,
  OmittedSection,
  ResearchPlan,
  SectionResult,
  SourceList,
} from "../run/index.js";
import { generateRequired, type StageContext } from "./context.js";

/** Length of the section excerpt quoted to summary prompts */
const EXCERPT_LENGTH = 200;

export interface MainContent {
  readonly tableOfContents: string[];
  readonly markdown: string;
}

export interface ReportState {
  readonly plan: ResearchPlan;
  readonly sections: readonly SectionResult[];
  readonly omitted: readonly OmittedSection[];
  readonly executiveSummary?: string;
  readonly body?: MainContent;
  readonly conclusion?: string;
  readonly sources?: SourceList;
  readonly report?: FinalReport;
}

type ReportStep = Step<ReportState, StageContext>;

export function summarizeSections(sections: readonly SectionResult[]): string {
  return sections
    .map((s) => {
      const excerpt =
        s.content.length > EXCERPT_LENGTH ? `${s.content.slice(0, EXCERPT_LENGTH)}...` : s.content;
      return `- ${s.title}: ${excerpt}`;
    })
    .join("\n");
}

export function compileSources(sections: readonly SectionResult[]): SourceList {
  const unique = new Set<string>();
  for (const section of sections) {
    for (const source of section.sources) {
      const trimmed = source.trim();
      if (trimmed.length > 0) unique.add(trimmed);
    }
  }
  const all = [...unique];
  return {
    web: all.filter((s) => s.startsWith("http")).sort(),
    other: all.filter((s) => !s.startsWith("http")).sort(),
  };
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function renderSources(sources: SourceList): string {
  const blocks = ["## Sources"];
  if (sources.web.length > 0) {
    blocks.push(["### Web Sources", ...sources.web.map((s, i) => `${i + 1}. ${s}`)].join("\n"));
  }
  if (sources.other.length > 0) {
    blocks.push(["### Other Sources", ...sources.other.map((s) => `- ${s}`)].join("\n"));
  }
  if (blocks.length === 1) {
    blocks.push("No sources were collected.");
  }
  return blocks.join("\n\n");
}

const createExecutiveSummary: ReportStep = {
  name: "create_executive_summary",
  writes: ["executiveSummary"],
  async run(state, context) {
    const prompt = context.prompts.render("executive-summary", {
      topic: state.plan.topic,
      methodology: state.plan.methodology,
      sectionSummaries: summarizeSections(state.sections),
    });
    return advance({
      executiveSummary: await generateRequired(context, prompt, "executive summary"),
    });
  },
};

const compileMainContent: ReportStep = {
  name: "compile_main_content",
  writes: ["body"],
  async run(state) {
    const tableOfContents = state.sections.map((s, i) => `${i + 1}. ${s.title}`);
    const blocks = [
      "## Table of Contents",
      tableOfContents.join("\n"),
      "## Methodology",
      state.plan.methodology,
      "---",
      ...state.sections.map((s, i) => `## ${i + 1}. ${s.title}\n\n${s.content}`),
    ];
    if (state.omitted.length > 0) {
      blocks.push(
        "## Omitted Sections",
        state.omitted
          .map((o) => `- ${o.title} (${o.error.kind}: ${o.error.message})`)
          .join("\n")
      );
    }
    return advance({ body: { tableOfContents, markdown: blocks.join("\n\n") } });
  },
};

const createConclusion: ReportStep = {
  name: "create_conclusion",
  writes: ["conclusion"],
  async run(state, context) {
    const prompt = context.prompts.render("conclusion", {
      topic: state.plan.topic,
      sectionSummaries: summarizeSections(state.sections),
    });
    return advance({ conclusion: await generateRequired(context, prompt, "conclusion") });
  },
};

const compileSourcesStep: ReportStep = {
  name: "compile_sources",
  writes: ["sources"],
  async run(state) {
    return advance({ sources: compileSources(state.sections) });
  },
};

const finalizeReport: ReportStep = {
  name: "finalize_report",
  writes: ["report"],
  async run(state, context) {
    const { executiveSummary, body, conclusion, sources } = state;
    if (
      executiveSummary === undefined ||
      body === undefined ||
      conclusion === undefined ||
      sources === undefined
    ) {
      throw new StepError("Internal", "finalize_report ran before the report parts were written");
    }

    const title = `${state.plan.topic} - Research Report`;
    const totalQueries = state.sections.reduce((sum, s) => sum + s.queries.length, 0);
    const totalSources = sources.web.length + sources.other.length;

    const markdown = [
      `# ${title}`,
      "## Executive Summary",
      executiveSummary,
      body.markdown,
      "## Conclusion",
      conclusion,
      renderSources(sources),
      "---",
      [
        `*Sections researched: ${state.sections.length}*`,
        `*Total sources: ${totalSources}*`,
        `*Total queries executed: ${totalQueries}*`,
      ].join("\n"),
    ].join("\n\n");

    return advance({
      report: {
        title,
        executiveSummary,
        tableOfContents: body.tableOfContents,
        methodology: state.plan.methodology,
        sections: state.sections.map((s) => ({
          index: s.index,
          title: s.title,
          content: s.content,
          sources: s.sources,
        })),
        conclusion,
        sources,
        omittedSections: [...state.omitted],
        metadata: {
          sectionCount: state.sections.length,
          totalSources,
          totalQueries,
          wordCount: countWords(markdown),
          generatedAt: context.now().toISOString(),
        },
        markdown: `${markdown}\n`,
      },
    });
  },
};

export function createReportGraph(): StageGraph<ReportState, StageContext> {
  return new StageGraph("report", [
    createExecutiveSummary,
    compileMainContent,
    createConclusion,
    compileSourcesStep,
    finalizeReport,
  ]);
}
