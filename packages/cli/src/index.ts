// pattern: Functional Core

export {
  COMPONENT_KINDS,
  type ComponentKind,
  type ComponentSelection,
  expandSelection,
  parseComponentToken,
} from "./adr/component-kind.js";
export {
  type Environment,
  probeEnvironment,
} from "./adr/environment-probe.js";
export { type DiagnosticHome, listHomes, parseHomes } from "./adr/home-catalog.js";
export {
  ArchiveManager,
  type ArchiveManagerOptions,
  withStagingArea,
} from "./archive/index.js";
export {
  type ComponentReport,
  extractComponent,
  type OutputSink,
} from "./extractor/index.js";
export {
  currentIdentity,
  type RunContext,
  type RunDependencies,
  runLogFetch,
  type RunSummary,
} from "./runner/index.js";
export { loadSettings } from "./settings/loader.js";
export { DEFAULT_SETTINGS, type Settings } from "./settings/schema.js";
export * from "./utils/errors.js";
