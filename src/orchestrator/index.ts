export { OutcomeLog } from "./outcome-log.js";
export {
  DEFAULT_CONCURRENCY,
  runDownloads,
  type RunOptions,
  type RunOutcomes,
  type RunProgress,
} from "./orchestrator.js";
