import nock from "nock";
import { augmentedDiffXML } from "../TestHelpers";
import AugmentedDiffStream, {
  SequencedContainer,
  augmentedDiffURL,
} from "./AugmentedDiffStream";

const adiffsURL = "http://adiffs.example.com";
const urlTemplate = adiffsURL + "/replication/minute/{seqn}.adiff";

const createNode =
  `<action type="create"><node id="1" uid="5" changeset="9" lat="1" lon="2"/></action>`;

async function take(
  stream: AsyncIterable<SequencedContainer>,
  count: number,
): Promise<SequencedContainer[]> {
  const taken: SequencedContainer[] = [];
  for await (const item of stream) {
    taken.push(item);
    if (taken.length >= count) {
      break;
    }
  }
  return taken;
}

describe("AugmentedDiffStream", () => {
  let sleeps: number[];

  function stream(startSequence: number, maxAttempts: number = 3) {
    return new AugmentedDiffStream(
      { urlTemplate, startSequence, pollIntervalMillis: 30000 },
      {
        maxAttempts,
        retryStartingDelayMillis: 1,
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      },
    );
  }

  beforeAll(() => {
    nock.disableNetConnect();
  });

  beforeEach(() => {
    sleeps = [];
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it("fills the sequence number into the URL template", () => {
    expect(augmentedDiffURL(urlTemplate, 6460395)).toBe(
      "http://adiffs.example.com/replication/minute/6460395.adiff",
    );
  });

  it("yields consecutive sequences", async () => {
    nock(adiffsURL)
      .get("/replication/minute/100.adiff")
      .reply(200, augmentedDiffXML([createNode]))
      .get("/replication/minute/101.adiff")
      .reply(200, augmentedDiffXML([]));

    const taken = await take(stream(100), 2);

    expect(taken.map(({ sequence }) => sequence)).toEqual([100, 101]);
    expect(taken[0].container.creates).toHaveLength(1);
    expect(taken[1].container.changes()).toEqual([]);
  });

  it("waits for sequences that are not produced yet", async () => {
    nock(adiffsURL)
      .get("/replication/minute/200.adiff")
      .reply(404)
      .get("/replication/minute/200.adiff")
      .reply(404)
      .get("/replication/minute/200.adiff")
      .reply(200, augmentedDiffXML([createNode]));

    const [first] = await take(stream(200), 1);

    expect(first.sequence).toBe(200);
    expect(sleeps).toEqual([30000, 30000]);
  });

  it("skips documents that cannot be decoded", async () => {
    nock(adiffsURL)
      .get("/replication/minute/300.adiff")
      .reply(200, `<osm generator="test"></osm>`)
      .get("/replication/minute/301.adiff")
      .reply(200, augmentedDiffXML([]));

    const [first] = await take(stream(300), 1);

    expect(first.sequence).toBe(301);
  });

  it("retries failed requests", async () => {
    nock(adiffsURL)
      .get("/replication/minute/400.adiff")
      .reply(502)
      .get("/replication/minute/400.adiff")
      .reply(200, augmentedDiffXML([]));

    const [first] = await take(stream(400), 1);

    expect(first.sequence).toBe(400);
    expect(sleeps).toEqual([]);
  });

  it("gives up after repeated failures", async () => {
    nock(adiffsURL)
      .get("/replication/minute/500.adiff")
      .times(2)
      .reply(500);

    await expect(take(stream(500, 2), 1)).rejects.toThrow(
      "Augmented diff request failed with status 500",
    );
  });
});
