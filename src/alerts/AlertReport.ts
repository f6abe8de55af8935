import { Changeset } from "../osm/Changeset";
import { Alerts } from "./AlertAggregator";

export function formatAlertReport(
  alerts: Alerts,
  changesets: ReadonlyMap<number, Changeset>,
): string[] {
  const lines: string[] = [];
  for (const [userId, explained] of alerts) {
    lines.push(`⚠️ User ${userId} interesting changesets`);
    for (const [explanation, changesetIDs] of explained) {
      const described = Array.from(changesetIDs, (id) =>
        describeChangeset(id, changesets.get(id)),
      );
      const listed = described.join(", ") || "(no changeset)";
      lines.push(`  ${explanation}: ${listed}`);
    }
  }
  return lines;
}

function describeChangeset(id: number, changeset: Changeset | undefined) {
  if (!changeset) {
    return `${id}`;
  }
  const comment = changeset.tags["comment"];
  return comment
    ? `${id} by ${changeset.userName} "${comment}"`
    : `${id} by ${changeset.userName}`;
}
