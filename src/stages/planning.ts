/**
 * Planning stage: topic analysis, plan draft, optional refinement and
 * the final plan with stable section indexes.
 */

import { advance, branchTo, StageGraph, StepError, type Step } from "../graph/index.js";
import type { ResearchPlan, ResearchRequest } from "../run/index.js";
import { generateRequired, type StageContext } from "./context.js";
import {
  DraftPlanSchema,
  PlanAdditionsSchema,
  parseJsonAnswer,
  uniqueSections,
  type DraftPlan,
  type DraftSection,
} from "./json.js";

export interface PlanningState {
  readonly topic: string;
  readonly sectionCount: number;
  readonly analysis?: string;
  readonly draft?: DraftPlan;
  readonly additions?: DraftSection[];
  readonly plan?: ResearchPlan;
}

type PlanningStep = Step<PlanningState, StageContext>;

const analyzeTopic: PlanningStep = {
  name: "analyze_topic",
  writes: ["analysis"],
  async run(state, context) {
    const prompt = context.prompts.render("topic-analysis", {
      topic: state.topic,
      sectionCount: state.sectionCount,
    });
    return advance({ analysis: await generateRequired(context, prompt, "topic analysis") });
  },
};

const draftPlan: PlanningStep = {
  name: "draft_plan",
  writes: ["draft"],
  branches: ["finalize_plan"],
  async run(state, context) {
    const prompt = context.prompts.render("research-plan", {
      topic: state.topic,
      analysis: state.analysis ?? "",
      sectionCount: state.sectionCount,
    });
    const answer = await generateRequired(context, prompt, "research plan");
    const draft = parseJsonAnswer(answer, DraftPlanSchema, "research plan");

    if (uniqueSections(draft.sections).length >= state.sectionCount) {
      return branchTo("finalize_plan", { draft });
    }
    return advance({ draft });
  },
};

const refinePlan: PlanningStep = {
  name: "refine_plan",
  writes: ["additions"],
  async run(state, context) {
    const existing = uniqueSections(state.draft?.sections ?? []);
    const prompt = context.prompts.render("plan-refinement", {
      topic: state.topic,
      existingSections:
        existing.length > 0 ? existing.map((s) => `- ${s.title}`).join("\n") : "- (none)",
      missingCount: state.sectionCount - existing.length,
    });
    const answer = await generateRequired(context, prompt, "plan refinement");
    const { sections } = parseJsonAnswer(answer, PlanAdditionsSchema, "plan refinement");
    return advance({ additions: sections });
  },
};

const finalizePlan: PlanningStep = {
  name: "finalize_plan",
  writes: ["plan"],
  async run(state) {
    if (state.draft === undefined) {
      throw new StepError("Internal", "finalize_plan ran without a draft");
    }

    const sections = uniqueSections([...state.draft.sections, ...(state.additions ?? [])]).slice(
      0,
      state.sectionCount
    );
    if (sections.length < state.sectionCount) {
      throw new StepError(
        "InvalidOutput",
        `Plan has ${sections.length} distinct section(s), ${state.sectionCount} required`
      );
    }

    return advance({
      plan: {
        topic: state.topic,
        methodology: state.draft.methodology,
        sections: sections.map((s, index) => ({
          index,
          title: s.title,
          questions: s.questions,
        })),
      },
    });
  },
};

export function createPlanningGraph(): StageGraph<PlanningState, StageContext> {
  return new StageGraph("planning", [analyzeTopic, draftPlan, refinePlan, finalizePlan]);
}

export function initialPlanningState(request: ResearchRequest): PlanningState {
  return { topic: request.topic, sectionCount: request.sectionCount };
}
