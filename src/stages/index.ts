export {
  generateRequired,
  formatQuestions,
  type StageContext,
  type StepGateway,
} from "./context.js";
export {
  extractJsonObject,
  parseJsonAnswer,
  uniqueSections,
  DraftPlanSchema,
  type DraftPlan,
  type DraftSection,
} from "./json.js";
export { createPlanningGraph, initialPlanningState, type PlanningState } from "./planning.js";
export {
  createSectionGraph,
  researchSection,
  parseQueries,
  collectSources,
  formatFindings,
  type Finding,
  type SectionState,
} from "./research.js";
export {
  createReportGraph,
  compileSources,
  summarizeSections,
  renderSources,
  countWords,
  type MainContent,
  type ReportState,
} from "./report.js";
