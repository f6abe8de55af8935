import { OSMAPIConfig } from "../Config";
import { Changeset, decodeChangesets } from "../osm/Changeset";
import { parseXMLDocument } from "./XMLElements";

// The API refuses larger `changesets=` lists.
export const maxChangesetsPerRequest = 100;

export default class OSMAPIClient {
  private config: OSMAPIConfig;

  constructor(config: OSMAPIConfig) {
    this.config = config;
  }

  /**
   * Fetches metadata for up to `maxChangesetsPerRequest` changesets in one
   * request. IDs the API doesn't know about are missing from the result.
   */
  changesets = async (ids: readonly number[]): Promise<Changeset[]> => {
    if (ids.length === 0) {
      return [];
    }
    if (ids.length > maxChangesetsPerRequest) {
      throw new Error(
        `Cannot fetch ${ids.length} changesets at once, limit is ${maxChangesetsPerRequest}`,
      );
    }

    const url =
      `${this.config.url}/changesets?` +
      new URLSearchParams({ changesets: ids.join(",") }).toString();

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          Accept: "application/xml",
          "User-Agent": this.config.userAgent,
        },
        signal: AbortSignal.timeout(60 * 1000),
      });
    } catch (error) {
      console.error(`Changeset fetch failed for ${url}:`, error);
      throw error;
    }

    if (!response.ok) {
      throw new Error(
        `Changeset request failed with status ${response.status} for ${url}`,
      );
    }

    return decodeChangesets(parseXMLDocument(await response.text()));
  };
}
