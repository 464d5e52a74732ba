import type { StoreConfig } from '../config';
import { ListingValidationError } from '../storage/errors';
import type { ListingStore } from '../storage/listing-store';
import type { ListingInput } from '../storage/validation';
import { Logger, describeError } from '../utils/logger';
import { normalizeParsedOffer, type ParsedOffer } from './offer-normalizer';

type Observations<T> = Iterable<T> | AsyncIterable<T>;

type SessionWriter = Pick<ListingStore, 'startSession' | 'saveListing' | 'finishSession' | 'failSession'>;

interface IngestionRunnerDependencies {
  logger: Logger;
  config: Pick<StoreConfig, 'default_source'>;
  store: SessionWriter;
}

export interface IngestionSummary {
  sessionId: string;
  parsed: number;
  saved: number;
  inserted: number;
  updated: number;
  unchanged: number;
  rejected: number;
}

export class IngestionRunner {
  constructor(private readonly deps: IngestionRunnerDependencies) {}

  run(source: string, observations: Observations<ListingInput>, notes = ''): Promise<IngestionSummary> {
    return this.ingest(source, observations, (observation) => observation, notes);
  }

  /** Offers carry no source of their own; it defaults to `store.default_source`. */
  runParsedOffers(
    offers: Observations<ParsedOffer>,
    source = this.deps.config.default_source,
    notes = ''
  ): Promise<IngestionSummary> {
    return this.ingest(source, offers, (offer) => normalizeParsedOffer(offer, source), notes);
  }

  private async ingest<T>(
    source: string,
    observations: Observations<T>,
    toListing: (observation: T) => ListingInput,
    notes: string
  ): Promise<IngestionSummary> {
    const sessionId = await this.deps.store.startSession(source, notes);
    const summary: IngestionSummary = {
      sessionId,
      parsed: 0,
      saved: 0,
      inserted: 0,
      updated: 0,
      unchanged: 0,
      rejected: 0
    };

    try {
      for await (const observation of observations) {
        summary.parsed += 1;
        try {
          const outcome = await this.deps.store.saveListing(toListing(observation));
          summary[outcome] += 1;
          summary.saved += 1;
        } catch (error) {
          if (!(error instanceof ListingValidationError)) {
            throw error;
          }
          summary.rejected += 1;
          this.deps.logger.warn('Skipping invalid listing observation', {
            sessionId,
            issues: error.issues
          });
        }
      }
    } catch (error) {
      await this.deps.store
        .failSession(sessionId, describeError(error), { totalParsed: summary.parsed, totalSaved: summary.saved })
        .catch((failError) => {
          this.deps.logger.error('Could not mark parsing session as failed', {
            sessionId,
            error: describeError(failError)
          });
        });
      throw error;
    }

    await this.deps.store.finishSession(sessionId, summary.parsed, summary.saved);

    this.deps.logger.info('Ingestion run complete', { ...summary });
    return summary;
  }
}
