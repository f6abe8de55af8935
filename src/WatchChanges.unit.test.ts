import { ChangeContainer } from "./adiff/ChangeContainer";
import ChangesetEnricher from "./alerts/ChangesetEnricher";
import { UserIDMadeChangeFilter } from "./filters/UserFilters";
import { SequencedContainer } from "./io/AugmentedDiffStream";
import { Changeset } from "./osm/Changeset";
import { mockChangeset, mockCreate, mockNode } from "./TestHelpers";
import watchChanges from "./WatchChanges";

async function* containers(
  items: ChangeContainer[],
): AsyncGenerator<SequencedContainer> {
  let sequence = 1;
  for (const container of items) {
    yield { sequence: sequence++, container };
  }
}

function containerWithUIDs(uids: number[]) {
  return new ChangeContainer({
    version: "0.6",
    generator: "test",
    creates: uids.map((uid, index) =>
      mockCreate(mockNode({ id: index + 1, uid, changeset: uid * 10 })),
    ),
  });
}

describe("watchChanges", () => {
  const interests = [
    { userId: "alice", filters: [new UserIDMadeChangeFilter(4732)] },
  ];
  let requested: number[][];
  let enricher: ChangesetEnricher;

  beforeEach(() => {
    requested = [];
    enricher = new ChangesetEnricher({
      changesets: async (ids: readonly number[]): Promise<Changeset[]> => {
        requested.push([...ids]);
        return ids.map((id) => mockChangeset({ id, userName: "someone" }));
      },
    });
  });

  it("reports the alerts of each container", async () => {
    const reports: [number, string[]][] = [];

    const processed = await watchChanges(
      containers([
        containerWithUIDs([4732, 5]),
        containerWithUIDs([5]),
        containerWithUIDs([4732]),
      ]),
      interests,
      enricher,
      { report: (lines, sequence) => reports.push([sequence, lines]) },
    );

    expect(processed).toBe(3);
    expect(reports).toEqual([
      [
        1,
        [
          "⚠️ User alice interesting changesets",
          "  User ID 4732 made a change: 47320 by someone",
        ],
      ],
      [
        3,
        [
          "⚠️ User alice interesting changesets",
          "  User ID 4732 made a change: 47320 by someone",
        ],
      ],
    ]);
    // Only alerted changesets are looked up, and closed ones only once.
    expect(requested).toEqual([[47320]]);
  });

  it("stops after the requested number of containers", async () => {
    const processed = await watchChanges(
      containers([
        containerWithUIDs([1]),
        containerWithUIDs([2]),
        containerWithUIDs([3]),
      ]),
      interests,
      enricher,
      { maxContainers: 2 },
    );

    expect(processed).toBe(2);
    expect(requested).toEqual([]);
  });
});
