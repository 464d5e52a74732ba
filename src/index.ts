import { mkdirSync } from 'node:fs';
import { resolve } from 'node:path';

import { applyEnvOverrides, loadEnvConfig, loadSettings } from './config';
import { ListingStore } from './storage';
import { Logger, describeError } from './utils/logger';

export * from './storage';
export * from './ingest';
export { Logger } from './utils/logger';
export { applyEnvOverrides, loadEnvConfig, loadSettings } from './config';
export type { Settings } from './config';

/**
 * Maintenance entry point: opens the store, refreshes today's daily statistic and
 * logs the current totals.
 */
export async function bootstrap(): Promise<void> {
  const settings = applyEnvOverrides(loadSettings(), loadEnvConfig());

  mkdirSync(resolve(process.cwd(), settings.paths.data_dir), { recursive: true });

  const logger = new Logger({ level: settings.logging.level, format: settings.logging.format });

  let store: ListingStore | null = null;

  try {
    store = await ListingStore.initialize(settings.paths.db_file, { logger, settings: settings.store });

    const daily = await store.computeDailyStatistic();
    const statistics = await store.getStatistics();

    logger.info('Listing store summary', {
      totalListings: statistics.totalListings,
      visibleListings: statistics.visibleListings,
      openListings: statistics.openListings,
      avgPrice: statistics.avgPrice,
      medianPrice: statistics.medianPrice,
      bySource: statistics.bySource,
      sessions: statistics.sessions,
      today: daily
    });
  } catch (error) {
    logger.error('Listing store maintenance failed', { error: describeError(error) });
    throw error;
  } finally {
    if (store) {
      await store.close().catch((error) => {
        logger.warn('Failed to close listing store cleanly', { error: describeError(error) });
      });
    }
  }
}

if (require.main === module) {
  bootstrap().catch((error) => {
    // eslint-disable-next-line no-console
    console.error('Bootstrap failed', error);
    process.exitCode = 1;
  });
}
