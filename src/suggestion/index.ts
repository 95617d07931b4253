export {
  DEFAULT_MARKERS,
  type EngineConfigInput,
  engineConfigSchema,
  resolveEngineConfig,
} from "./config.ts";
export {
  type ChangeListener,
  SuggestionEngine,
  type SuggestionEngineOptions,
} from "./engine.ts";
export {
  findSuggestionBlock,
  renderSuggestionBlock,
  type SuggestionBlock,
} from "./markup.ts";
export { type PresentedSuggestion, toPresentedSuggestion } from "./panel.ts";
export { anchorLineFor, presentSuggestions, renderCandidate } from "./presenter.ts";
export {
  acceptSuggestion,
  cycleSuggestion,
  locateBlock,
  nextIndex,
  rejectSuggestion,
  stripBlock,
} from "./resolver.ts";
export {
  completionCandidateSchema,
  type EditorSnapshotInput,
  editorSnapshotSchema,
  parseCandidates,
  parseEditorSnapshot,
} from "./schema.ts";
export { createPresentationStore, type PresentationStore } from "./session.ts";
export * from "./types.ts";
