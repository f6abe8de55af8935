export type AugmentedDiffConfig = {
  // URL of one minutely augmented diff, `{seqn}` stands for the sequence number
  urlTemplate: string;
  // Sequence number to start watching from
  startSequence: number;
  // Wait before polling again for a diff not produced yet, in milliseconds
  pollIntervalMillis: number;
};

export type OSMAPIConfig = {
  url: string;
  userAgent: string;
};

export interface Config {
  augmentedDiffs: AugmentedDiffConfig;
  osmAPI: OSMAPIConfig;
  // JSON file declaring which filters alert which users
  interestsPath: string;
  // User IDs that NewUserFilter should not consider new
  seenUserIds: number[];
}

export const defaultAugmentedDiffURLTemplate =
  "https://adiffs.osmcha.org/replication/minute/{seqn}.adiff";

export const defaultOSMAPIURL = "https://api.openstreetmap.org/api/0.6";

export function configFromEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const startSequence = env.START_SEQUENCE;
  if (startSequence === undefined) {
    throw new Error("START_SEQUENCE must be set");
  }

  return {
    augmentedDiffs: {
      urlTemplate: env.ADIFF_URL_TEMPLATE || defaultAugmentedDiffURLTemplate,
      startSequence: parseInteger("START_SEQUENCE", startSequence),
      pollIntervalMillis:
        env.POLL_INTERVAL_MS !== undefined
          ? parseInteger("POLL_INTERVAL_MS", env.POLL_INTERVAL_MS)
          : 30 * 1000,
    },
    osmAPI: {
      url: env.OSM_API_URL || defaultOSMAPIURL,
      userAgent: env.OSM_API_USER_AGENT || "osm-change-watch",
    },
    interestsPath: env.INTERESTS_PATH ?? "config/interests.json",
    seenUserIds: env.SEEN_USER_IDS
      ? env.SEEN_USER_IDS.split(",").map((id) =>
          parseInteger("SEEN_USER_IDS", id.trim()),
        )
      : [],
  };
}

function parseInteger(name: string, value: string): number {
  const number = Number(value);
  if (value.trim() === "" || !Number.isInteger(number) || number < 0) {
    throw new Error(
      `Invalid ${name}: ${value}. Must be a non-negative integer`,
    );
  }
  return number;
}
