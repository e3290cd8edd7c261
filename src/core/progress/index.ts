export { ProgressBus } from "./progress-bus.ts";
export { sendProgressOnLongTask, type LongTaskOwner } from "./long-task.ts";
export type {
  ProgressInfo,
  ProgressLevel,
  ProgressListener,
  ProgressScope,
  ProgressStep,
} from "./progress-types.ts";
