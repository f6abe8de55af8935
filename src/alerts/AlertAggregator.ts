import {
  Action,
  ChangeContainer,
  actionChangesetID,
} from "../adiff/ChangeContainer";
import { UserInterest } from "./UserInterest";

// Explanation -> changeset IDs that triggered it.
export type ExplainedChangesets = Map<string, Set<number>>;

// Alerted user -> their explained changesets.
export type Alerts = Map<string, ExplainedChangesets>;

/**
 * Evaluates every filter of every interest against each change in the
 * container. Users and explanations appear in the order they first matched.
 *
 * Filters with internal state (NewUserFilter) see each action exactly once.
 */
export function aggregateAlerts(
  container: ChangeContainer,
  interests: readonly UserInterest[],
): Alerts {
  const alerts: Alerts = new Map();

  for (const action of container.changes()) {
    for (const interest of interests) {
      for (const filter of interest.filters) {
        if (filter.matches(action)) {
          recordMatch(alerts, interest.userId, filter.explanation(), action);
        }
      }
    }
  }

  return alerts;
}

function recordMatch(
  alerts: Alerts,
  userId: string,
  explanation: string,
  action: Action,
) {
  let explained = alerts.get(userId);
  if (!explained) {
    explained = new Map();
    alerts.set(userId, explained);
  }

  let changesetIDs = explained.get(explanation);
  if (!changesetIDs) {
    changesetIDs = new Set();
    explained.set(explanation, changesetIDs);
  }

  // Bare deletion stubs may carry no changeset; the explanation is still kept.
  const changesetID = actionChangesetID(action);
  if (changesetID !== undefined) {
    changesetIDs.add(changesetID);
  }
}

/**
 * Distinct changeset IDs that triggered an alert, for enrichment.
 */
export function alertedChangesetIDs(alerts: Alerts): number[] {
  const ids = new Set<number>();
  for (const explained of alerts.values()) {
    for (const changesetIDs of explained.values()) {
      changesetIDs.forEach((id) => ids.add(id));
    }
  }
  return Array.from(ids);
}
