export {
  AbstractInstantiationError,
  FlowAlreadyStartedError,
  InvalidConfigurationError,
  NotImplementedError,
  ScreenError,
  WorkerConflictError,
  type ScreenErrorCode,
} from "./errors";
export { Screen } from "./screen";
export {
  DEFAULT_STANDALONE_PRIORITY,
  StandaloneScreen,
  type StandaloneEvent,
} from "./standalone-screen";
export { NormalScreen, checkWorkerNameFor } from "./normal-screen";
export { PersonalizationScreen } from "./personalization-screen";
export {
  ScreenRegistry,
  isScreenClass,
  isStandaloneClass,
  matchesCategory,
  type ModuleLoadFailure,
  type ModuleLoadReport,
  type ScreenClass,
  type ScreenMetadata,
  type ScreenModuleLoader,
  type StandaloneScreenClass,
} from "./registry";
export type { CheckState, ScreenContext, ScreenKind, ScreenRuntime } from "./types";
