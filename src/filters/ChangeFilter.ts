import { Action } from "../adiff/ChangeContainer";

/**
 * A predicate over one change, plus a human-readable description of what it
 * watches for. `explanation()` depends only on how the filter was configured,
 * so it can be used as a grouping key for alerts.
 */
export default interface ChangeFilter {
  matches(action: Action): boolean;
  explanation(): string;
}
