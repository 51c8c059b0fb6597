export {
  dispatchSections,
  type DispatchOptions,
  type DispatchReport,
  type SectionRunner,
} from "./dispatcher.js";
