import { backOff } from "exponential-backoff";
import { AugmentedDiffConfig } from "../Config";
import { decodeAugmentedDiff } from "../adiff/AugmentedDiffDecoder";
import { ChangeContainer } from "../adiff/ChangeContainer";
import { DecodeError } from "../osm/DecodeError";

export type SequencedContainer = {
  sequence: number;
  container: ChangeContainer;
};

export type AugmentedDiffStreamOptions = {
  // Attempts per sequence for failures other than "not produced yet"
  maxAttempts?: number;
  retryStartingDelayMillis?: number;
  sleep?: (ms: number) => Promise<void>;
};

export function augmentedDiffURL(urlTemplate: string, sequence: number) {
  return urlTemplate.replace("{seqn}", sequence.toString());
}

/**
 * Yields decoded augmented diffs in sequence order, starting at
 * `config.startSequence` and never skipping a sequence that exists.
 *
 * A 404 means the diff hasn't been produced yet: the stream waits
 * `pollIntervalMillis` and asks again. Documents that can't be decoded are
 * logged and skipped.
 */
export default class AugmentedDiffStream
  implements AsyncIterable<SequencedContainer>
{
  private config: AugmentedDiffConfig;
  private maxAttempts: number;
  private retryStartingDelayMillis: number;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    config: AugmentedDiffConfig,
    options: AugmentedDiffStreamOptions = {},
  ) {
    this.config = config;
    this.maxAttempts = options.maxAttempts ?? 10;
    this.retryStartingDelayMillis = options.retryStartingDelayMillis ?? 1000;
    this.sleep = options.sleep ?? sleep;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<SequencedContainer> {
    let sequence = this.config.startSequence;

    while (true) {
      const xml = await this.fetchWhenProduced(sequence);

      let container: ChangeContainer;
      try {
        container = decodeAugmentedDiff(xml);
      } catch (error) {
        if (!(error instanceof DecodeError)) {
          throw error;
        }
        console.error(`Skipping sequence ${sequence}: ${error.message}`);
        sequence++;
        continue;
      }

      yield { sequence, container };
      sequence++;
    }
  }

  fetchWhenProduced = async (sequence: number): Promise<string> => {
    while (true) {
      const xml = await backOff(() => this.fetchSequence(sequence), {
        numOfAttempts: this.maxAttempts,
        startingDelay: this.retryStartingDelayMillis,
        retry: (error, attemptNumber) => {
          console.log(
            `Fetching sequence ${sequence} failed (attempt ${attemptNumber}): ${error}`,
          );
          return true;
        },
      });

      if (xml !== null) {
        return xml;
      }

      console.log(
        `No changes found for sequence ${sequence}, waiting ${this.config.pollIntervalMillis}ms`,
      );
      await this.sleep(this.config.pollIntervalMillis);
    }
  };

  /**
   * Returns null when the sequence hasn't been produced yet.
   */
  fetchSequence = async (sequence: number): Promise<string | null> => {
    const url = augmentedDiffURL(this.config.urlTemplate, sequence);
    console.log(`Fetching ${url}`);

    const response = await fetch(url, {
      signal: AbortSignal.timeout(60 * 1000),
    });

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new Error(
        `Augmented diff request failed with status ${response.status} for ${url}`,
      );
    }
    return await response.text();
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
