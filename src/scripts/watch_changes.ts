import { configFromEnvironment } from "../Config";
import watchChanges from "../WatchChanges";
import ChangesetEnricher from "../alerts/ChangesetEnricher";
import { loadUserInterests } from "../filters/FilterDefinitions";
import AugmentedDiffStream from "../io/AugmentedDiffStream";
import OSMAPIClient from "../io/OSMAPIClient";

async function main() {
  const config = configFromEnvironment();
  const { interests } = await loadUserInterests(
    config.interestsPath,
    new Set(config.seenUserIds),
  );
  console.log(
    `Watching for ${interests.length} users from sequence ${config.augmentedDiffs.startSequence}`,
  );

  await watchChanges(
    new AugmentedDiffStream(config.augmentedDiffs),
    interests,
    new ChangesetEnricher(new OSMAPIClient(config.osmAPI)),
  );
}

main().catch((reason: unknown) => {
  console.error("Watching changes failed", reason);
  process.exit(1);
});
