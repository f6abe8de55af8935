import { SequencedContainer } from "./io/AugmentedDiffStream";
import {
  Alerts,
  aggregateAlerts,
  alertedChangesetIDs,
} from "./alerts/AlertAggregator";
import { formatAlertReport } from "./alerts/AlertReport";
import ChangesetEnricher from "./alerts/ChangesetEnricher";
import { UserInterest } from "./alerts/UserInterest";

export type WatchOptions = {
  // Stop after this many diffs, otherwise watch forever
  maxContainers?: number;
  report?: (lines: string[], sequence: number, alerts: Alerts) => void;
};

/**
 * Evaluates every diff from the stream against the users' interests and
 * reports the changesets that matched, one diff at a time.
 */
export default async function watchChanges(
  stream: AsyncIterable<SequencedContainer>,
  interests: readonly UserInterest[],
  enricher: ChangesetEnricher,
  options: WatchOptions = {},
): Promise<number> {
  const report = options.report ?? logReport;
  let processed = 0;

  if (options.maxContainers !== undefined && options.maxContainers <= 0) {
    return processed;
  }

  for await (const { sequence, container } of stream) {
    const changes = container.changes();
    console.log(`Found ${changes.length} changes in sequence ${sequence}`);

    const alerts = aggregateAlerts(container, interests);
    if (alerts.size === 0) {
      console.log(
        "😭 No interesting changesets found in this batch of changes",
      );
    } else {
      const changesets = await enricher.enrich(alertedChangesetIDs(alerts));
      report(formatAlertReport(alerts, changesets), sequence, alerts);
    }

    processed++;
    if (
      options.maxContainers !== undefined &&
      processed >= options.maxContainers
    ) {
      break;
    }
  }

  return processed;
}

function logReport(lines: string[]) {
  lines.forEach((line) => console.log(line));
}
