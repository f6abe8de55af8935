import {
  configFromEnvironment,
  defaultAugmentedDiffURLTemplate,
  defaultOSMAPIURL,
} from "./Config";

describe("Config", () => {
  it("uses defaults for everything but the start sequence", () => {
    expect(configFromEnvironment({ START_SEQUENCE: "6460395" })).toEqual({
      augmentedDiffs: {
        urlTemplate: defaultAugmentedDiffURLTemplate,
        startSequence: 6460395,
        pollIntervalMillis: 30000,
      },
      osmAPI: {
        url: defaultOSMAPIURL,
        userAgent: "osm-change-watch",
      },
      interestsPath: "config/interests.json",
      seenUserIds: [],
    });
  });

  it("reads overrides from the environment", () => {
    const config = configFromEnvironment({
      START_SEQUENCE: "10",
      ADIFF_URL_TEMPLATE: "http://adiffs.example.com/{seqn}.adiff",
      POLL_INTERVAL_MS: "500",
      OSM_API_URL: "http://api.example.com/api/0.6",
      INTERESTS_PATH: "/etc/interests.json",
      SEEN_USER_IDS: "1, 2,3",
    });

    expect(config.augmentedDiffs).toEqual({
      urlTemplate: "http://adiffs.example.com/{seqn}.adiff",
      startSequence: 10,
      pollIntervalMillis: 500,
    });
    expect(config.osmAPI.url).toBe("http://api.example.com/api/0.6");
    expect(config.interestsPath).toBe("/etc/interests.json");
    expect(config.seenUserIds).toEqual([1, 2, 3]);
  });

  it("requires a start sequence", () => {
    expect(() => configFromEnvironment({})).toThrow(
      "START_SEQUENCE must be set",
    );
  });

  it("rejects invalid numbers", () => {
    expect(() => configFromEnvironment({ START_SEQUENCE: "abc" })).toThrow(
      "Invalid START_SEQUENCE: abc. Must be a non-negative integer",
    );
    expect(() =>
      configFromEnvironment({ START_SEQUENCE: "1", SEEN_USER_IDS: "1,,2" }),
    ).toThrow("Invalid SEEN_USER_IDS: . Must be a non-negative integer");
  });
});
