export { ProgressHub, SummaryHub, defineHub, type HubCategory } from "./categories";
export {
  Hub,
  assertDistinctCheckWorkers,
  displayTitle,
  type HubBlockers,
  type HubContinueResult,
  type HubOptions,
  type HubScreen,
} from "./hub";
