export { systemClock, type Clock } from "./clock.ts";
export { ResourcePool } from "./resource-pool.ts";
export {
  RetryPolicy,
  pollUntil,
  type AttemptFailure,
  type PollOptions,
  type PollOutcome,
} from "./retry-policy.ts";
