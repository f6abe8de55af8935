import { Semaphore } from "async-mutex";
import DataLoader from "dataloader";
import { maxChangesetsPerRequest } from "../io/OSMAPIClient";
import { Changeset } from "../osm/Changeset";

export interface ChangesetSource {
  changesets(ids: readonly number[]): Promise<Changeset[]>;
}

/**
 * Resolves changeset IDs into changeset metadata for alert reports, batching
 * lookups and caching closed changesets.
 *
 * IDs the API doesn't return yet are left out of the result and not cached,
 * so asking again later retries them. Open changesets are also not cached
 * since their metadata still changes.
 */
export default class ChangesetEnricher {
  private loader: DataLoader<number, Changeset | null>;
  private semaphore: Semaphore;

  constructor(
    private source: ChangesetSource,
    maxConcurrentRequests: number = 2,
  ) {
    this.semaphore = new Semaphore(maxConcurrentRequests);
    this.loader = new DataLoader<number, Changeset | null>(
      async (ids) => await this.fetchBatch(ids),
      { batch: true, maxBatchSize: maxChangesetsPerRequest },
    );
  }

  enrich = async (ids: readonly number[]): Promise<Map<number, Changeset>> => {
    const results = await this.loader.loadMany(ids);
    const changesets = new Map<number, Changeset>();

    results.forEach((result, index) => {
      const id = ids[index];
      if (result instanceof Error) {
        console.warn(`Could not fetch changeset ${id}: ${result.message}`);
        this.loader.clear(id);
      } else if (result === null) {
        this.loader.clear(id);
      } else {
        if (result.open) {
          this.loader.clear(id);
        }
        changesets.set(id, result);
      }
    });

    return changesets;
  };

  private fetchBatch = async (
    ids: readonly number[],
  ): Promise<(Changeset | null)[]> => {
    const [, release] = await this.semaphore.acquire();
    try {
      console.log(`Fetching metadata for ${ids.length} changesets`);
      const changesets = await this.source.changesets(ids);
      const byID = new Map(
        changesets.map((changeset) => [changeset.id, changeset]),
      );
      return ids.map((id) => byID.get(id) ?? null);
    } finally {
      release();
    }
  };
}
