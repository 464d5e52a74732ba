import { mkdirSync } from 'node:fs';
import { randomUUID } from 'node:crypto';
import { dirname, resolve } from 'node:path';

import sqlite3 from 'sqlite3';

import type { StoreConfig } from '../config';
import { Logger, describeError } from '../utils/logger';
import { median } from '../utils/stats';
import { escapeLikePattern } from '../utils/text';
import { toCompactStamp, toDateKey, toSqlTimestamp } from '../utils/time';
import {
  columnValues,
  fromDailyStatRow,
  fromListingRow,
  fromSessionRow,
  sameColumns,
  toListingColumns
} from './codec';
import { InvalidSessionStateError, ListingNotFoundError, ListingStoreError, StorageError } from './errors';
import type {
  DailyStatRow,
  DailyStatistic,
  Listing,
  ListingFilters,
  ListingRow,
  ListingStatistics,
  ListingStatus,
  ParsingSession,
  SaveOutcome,
  SessionRow,
  SessionTotals
} from './types';
import {
  dateKeySchema,
  listingIdSchema,
  listingInputSchema,
  listingQuerySchema,
  pageLimitSchema,
  sessionStartSchema,
  sessionTotalsSchema,
  validate,
  type ListingInput
} from './validation';

const OPEN_FLAGS = sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE;
const IN_MEMORY = ':memory:';

const LISTING_SELECT = `
  SELECT l.id, l.source, l.price, l.area, l.description, l.url, l.floor, l.address, l.lat, l.lng,
         l.seller, l.photos, l.status, l.visible, a.first_seen_at, a.updated_at
    FROM real_estate_listings l
    LEFT JOIN listing_activity a ON a.listing_id = l.id`;

const SESSION_SELECT = `
  SELECT session_id, started_at, finished_at, total_parsed, total_saved, source, status, notes
    FROM parsing_sessions`;

const DAILY_SELECT = `
  SELECT date, total_listings, new_listings, updated_listings, avg_price, min_price, max_price, created_at
    FROM daily_stats`;

type SqlParam = string | number | null;

export interface ListingStoreOptions {
  logger: Logger;
  settings: StoreConfig;
  now?: () => Date;
}

export class ListingStore {
  private queue: Promise<unknown> = Promise.resolve();
  private readonly logger: Logger;
  private readonly settings: StoreConfig;
  private readonly now: () => Date;

  private constructor(private readonly db: sqlite3.Database, options: ListingStoreOptions) {
    this.logger = options.logger;
    this.settings = options.settings;
    this.now = options.now ?? (() => new Date());
  }

  /** Opens (creating if needed) the database file and its tables. Pass `:memory:` for a private in-process database. */
  static async initialize(dbFile: string, options: ListingStoreOptions): Promise<ListingStore> {
    const inMemory = dbFile === IN_MEMORY;
    const resolvedPath = inMemory ? IN_MEMORY : resolve(process.cwd(), dbFile);
    if (!inMemory) {
      mkdirSync(dirname(resolvedPath), { recursive: true });
    }

    const database = await new Promise<sqlite3.Database>((resolveDb, rejectDb) => {
      const db = new sqlite3.Database(resolvedPath, OPEN_FLAGS, (err) => {
        if (err) {
          rejectDb(new StorageError('open database', err));
          return;
        }
        resolveDb(db);
      });
    });
    database.configure('busyTimeout', options.settings.busy_timeout_ms);

    const store = new ListingStore(database, options);
    try {
      await store.bootstrap(inMemory);
    } catch (error) {
      await store.close().catch((closeError) => {
        options.logger.warn('Failed to close listing store after schema error', {
          error: describeError(closeError)
        });
      });
      throw new StorageError('initialize schema', error);
    }

    options.logger.info('Listing store ready', { dbFile: resolvedPath });
    return store;
  }

  private exec(sql: string): Promise<void> {
    return new Promise((resolveExec, rejectExec) => {
      this.db.exec(sql, (err) => {
        if (err) {
          rejectExec(err);
          return;
        }
        resolveExec();
      });
    });
  }

  private run(sql: string, params: SqlParam[]): Promise<number> {
    return new Promise((resolveRun, rejectRun) => {
      this.db.run(sql, params, function runCallback(err) {
        if (err) {
          rejectRun(err);
          return;
        }
        resolveRun(this.changes ?? 0);
      });
    });
  }

  private get<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    return new Promise((resolveGet, rejectGet) => {
      this.db.get(sql, params, (err, row) => {
        if (err) {
          rejectGet(err);
          return;
        }
        resolveGet(row as T | undefined);
      });
    });
  }

  private all<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    return new Promise((resolveAll, rejectAll) => {
      this.db.all(sql, params, (err, rows) => {
        if (err) {
          rejectAll(err);
          return;
        }
        resolveAll(rows as T[]);
      });
    });
  }

  private timestamp(): string {
    return toSqlTimestamp(this.now());
  }

  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof ListingStoreError) {
        throw error;
      }
      this.logger.error('Listing store operation failed', { operation, error: describeError(error) });
      throw new StorageError(operation, error);
    }
  }

  /**
   * Runs `work` once every operation queued before it has settled. Reads and writes share
   * one connection, so reads wait here too and only ever see committed state.
   */
  private enqueue<T>(operation: string, work: () => Promise<T>): Promise<T> {
    const task = this.queue.then(() => this.guard(operation, work));
    // The queue only orders operations; each caller sees its own failure through `task`.
    this.queue = task.catch(() => undefined);
    return task;
  }

  private transaction<T>(operation: string, work: () => Promise<T>): Promise<T> {
    return this.enqueue(operation, async () => {
      await this.exec('BEGIN IMMEDIATE');
      try {
        const result = await work();
        await this.exec('COMMIT');
        return result;
      } catch (error) {
        await this.exec('ROLLBACK').catch((rollbackError) => {
          this.logger.error('Rollback failed', { operation, error: describeError(rollbackError) });
        });
        throw error;
      }
    });
  }

  private async bootstrap(inMemory: boolean): Promise<void> {
    if (!inMemory) {
      await this.exec('PRAGMA journal_mode = WAL');
    }

    await this.exec(`
      CREATE TABLE IF NOT EXISTS real_estate_listings (
        id TEXT PRIMARY KEY,
        source TEXT NOT NULL,
        price REAL,
        area TEXT,
        description TEXT,
        url TEXT,
        floor TEXT,
        address TEXT,
        lat TEXT,
        lng TEXT,
        seller TEXT,
        photos TEXT,
        status TEXT DEFAULT 'open',
        visible INTEGER DEFAULT 1
      )
    `);

    await this.exec(`
      CREATE TABLE IF NOT EXISTS parsing_sessions (
        session_id TEXT PRIMARY KEY,
        started_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        finished_at TIMESTAMP,
        total_parsed INTEGER DEFAULT 0,
        total_saved INTEGER DEFAULT 0,
        source TEXT,
        status TEXT DEFAULT 'running',
        notes TEXT
      )
    `);

    await this.exec(`
      CREATE TABLE IF NOT EXISTS daily_stats (
        date TEXT PRIMARY KEY,
        total_listings INTEGER DEFAULT 0,
        new_listings INTEGER DEFAULT 0,
        updated_listings INTEGER DEFAULT 0,
        avg_price REAL,
        min_price REAL,
        max_price REAL,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await this.exec(`
      CREATE TABLE IF NOT EXISTS listing_activity (
        listing_id TEXT PRIMARY KEY,
        first_seen_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        last_seen_at TEXT NOT NULL
      )
    `);

    await this.exec('CREATE INDEX IF NOT EXISTS idx_listings_source ON real_estate_listings(source)');
    await this.exec('CREATE INDEX IF NOT EXISTS idx_listings_price ON real_estate_listings(price)');
    await this.exec('CREATE INDEX IF NOT EXISTS idx_listings_coordinates ON real_estate_listings(lat, lng)');
    await this.exec('CREATE INDEX IF NOT EXISTS idx_listing_activity_updated ON listing_activity(updated_at)');
  }

  private async recordSighting(listingId: string, timestamp: string, changed: boolean): Promise<void> {
    await this.run(
      `INSERT INTO listing_activity (listing_id, first_seen_at, updated_at, last_seen_at)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(listing_id) DO UPDATE SET
         last_seen_at=excluded.last_seen_at,
         updated_at=CASE WHEN ? = 1 THEN excluded.updated_at ELSE listing_activity.updated_at END`,
      [listingId, timestamp, timestamp, timestamp, changed ? 1 : 0]
    );
  }

  private async markChanged(listingId: string, timestamp: string): Promise<void> {
    await this.run(
      `INSERT INTO listing_activity (listing_id, first_seen_at, updated_at, last_seen_at)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(listing_id) DO UPDATE SET updated_at=excluded.updated_at`,
      [listingId, timestamp, timestamp, timestamp]
    );
  }

  private fetchListingRow(listingId: string): Promise<ListingRow | undefined> {
    return this.get<ListingRow>(`${LISTING_SELECT} WHERE l.id = ?`, [listingId]);
  }

  private async requireListingRow(listingId: string): Promise<ListingRow> {
    const row = await this.fetchListingRow(listingId);
    if (!row) {
      throw new ListingNotFoundError(listingId);
    }
    return row;
  }

  async startSession(source: string, notes = ''): Promise<string> {
    const input = validate(sessionStartSchema, { source, notes }, 'parsing session');
    const startedAt = this.now();
    const sessionId = `${input.source}_${toCompactStamp(startedAt)}_${randomUUID().replace(/-/g, '').slice(0, 8)}`;

    await this.transaction('startSession', () =>
      this.run(
        `INSERT INTO parsing_sessions (session_id, started_at, source, status, notes)
         VALUES (?, ?, ?, 'running', ?)`,
        [sessionId, toSqlTimestamp(startedAt), input.source, input.notes]
      )
    );

    this.logger.info('Parsing session started', { sessionId, source: input.source });
    return sessionId;
  }

  async finishSession(sessionId: string, totalParsed: number, totalSaved: number): Promise<ParsingSession> {
    const totals = validate(sessionTotalsSchema, { totalParsed, totalSaved }, 'session totals');
    const session = await this.transaction('finishSession', () =>
      this.closeSession(sessionId, 'completed', totals, null)
    );

    this.logger.info('Parsing session completed', {
      sessionId,
      totalParsed: session.totalParsed,
      totalSaved: session.totalSaved
    });
    return session;
  }

  /** Marks a running session failed. Counts stay as stored unless `totals` is given. */
  async failSession(sessionId: string, reason: string, totals?: SessionTotals): Promise<ParsingSession> {
    const checkedTotals = totals ? validate(sessionTotalsSchema, totals, 'session totals') : null;
    const session = await this.transaction('failSession', () =>
      this.closeSession(sessionId, 'failed', checkedTotals, reason.trim() || null)
    );

    this.logger.warn('Parsing session failed', { sessionId, reason });
    return session;
  }

  private async closeSession(
    sessionId: string,
    status: 'completed' | 'failed',
    totals: SessionTotals | null,
    note: string | null
  ): Promise<ParsingSession> {
    const changes = await this.run(
      `UPDATE parsing_sessions
          SET finished_at = ?,
              total_parsed = COALESCE(?, total_parsed),
              total_saved = COALESCE(?, total_saved),
              status = ?,
              notes = CASE
                WHEN ? IS NULL THEN notes
                WHEN notes IS NULL OR notes = '' THEN ?
                ELSE notes || ' | ' || ?
              END
        WHERE session_id = ? AND status = 'running' AND finished_at IS NULL`,
      [
        this.timestamp(),
        totals?.totalParsed ?? null,
        totals?.totalSaved ?? null,
        status,
        note,
        note,
        note,
        sessionId
      ]
    );

    const row = await this.get<SessionRow>(`${SESSION_SELECT} WHERE session_id = ?`, [sessionId]);
    if (changes === 0 || !row) {
      const current = row ? fromSessionRow(row).status : null;
      this.logger.warn('Rejected parsing session transition', { sessionId, requested: status, current });
      throw new InvalidSessionStateError(sessionId, current);
    }
    return fromSessionRow(row);
  }

  async getSession(sessionId: string): Promise<ParsingSession | null> {
    const row = await this.enqueue('getSession', () =>
      this.get<SessionRow>(`${SESSION_SELECT} WHERE session_id = ?`, [sessionId])
    );
    return row ? fromSessionRow(row) : null;
  }

  async listSessions(limit = this.settings.default_page_size): Promise<ParsingSession[]> {
    const checkedLimit = validate(pageLimitSchema(this.settings.max_page_size), limit, 'session limit');
    const rows = await this.enqueue('listSessions', () =>
      this.all<SessionRow>(`${SESSION_SELECT} ORDER BY started_at DESC, rowid DESC LIMIT ?`, [checkedLimit])
    );
    return rows.map(fromSessionRow);
  }

  /**
   * Inserts or overwrites the listing keyed by its id. Re-saving identical data is a no-op
   * apart from the last-seen timestamp.
   */
  async saveListing(listingData: ListingInput): Promise<SaveOutcome> {
    const listing = validate(listingInputSchema, listingData, 'listing');
    const columns = toListingColumns(listing);

    const outcome = await this.transaction('saveListing', async (): Promise<SaveOutcome> => {
      const timestamp = this.timestamp();
      const existing = await this.fetchListingRow(listing.id);

      if (!existing) {
        await this.run(
          `INSERT INTO real_estate_listings (
             id, source, price, area, description, url, floor, address, lat, lng, seller, photos, status, visible
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          [listing.id, ...columnValues(columns)]
        );
        await this.recordSighting(listing.id, timestamp, true);
        return 'inserted';
      }

      const changed = !sameColumns(existing, columns);
      if (changed) {
        await this.run(
          `UPDATE real_estate_listings SET
             source = ?, price = ?, area = ?, description = ?, url = ?, floor = ?, address = ?,
             lat = ?, lng = ?, seller = ?, photos = ?, status = ?, visible = ?
           WHERE id = ?`,
          [...columnValues(columns), listing.id]
        );
      }
      await this.recordSighting(listing.id, timestamp, changed);
      return changed ? 'updated' : 'unchanged';
    });

    this.logger.debug('Listing saved', { id: listing.id, source: listing.source, outcome });
    return outcome;
  }

  async getListingById(id: string): Promise<Listing | null> {
    const row = await this.enqueue('getListingById', () => this.fetchListingRow(id));
    return row ? fromListingRow(row) : null;
  }

  /** Newest insertion first. Re-saving a listing does not move it. */
  async getListings(limit = this.settings.default_page_size, filters: ListingFilters = {}): Promise<Listing[]> {
    const query = validate(listingQuerySchema(this.settings.max_page_size), { ...filters, limit }, 'listing query');

    const clauses: string[] = [];
    const params: SqlParam[] = [];
    if (query.source !== undefined) {
      clauses.push('l.source = ?');
      params.push(query.source);
    }
    if (query.status !== undefined) {
      clauses.push(`COALESCE(l.status, 'open') = ?`);
      params.push(query.status);
    }
    if (query.visible !== undefined) {
      clauses.push('COALESCE(l.visible, 1) = ?');
      params.push(query.visible ? 1 : 0);
    }
    if (query.minPrice !== undefined) {
      clauses.push('l.price >= ?');
      params.push(query.minPrice);
    }
    if (query.maxPrice !== undefined) {
      clauses.push('l.price <= ?');
      params.push(query.maxPrice);
    }
    if (query.addressContains !== undefined) {
      clauses.push(`l.address LIKE ? ESCAPE '\\'`);
      params.push(`%${escapeLikePattern(query.addressContains)}%`);
    }

    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
    const rows = await this.enqueue('getListings', () =>
      this.all<ListingRow>(`${LISTING_SELECT}${where} ORDER BY l.rowid DESC LIMIT ? OFFSET ?`, [
        ...params,
        query.limit,
        query.offset
      ])
    );
    return rows.map(fromListingRow);
  }

  async closeListing(id: string): Promise<Listing> {
    return this.updateSoftDeleteState(id, 'closeListing', { status: 'closed' });
  }

  async setListingVisibility(id: string, visible: boolean): Promise<Listing> {
    return this.updateSoftDeleteState(id, 'setListingVisibility', { visible });
  }

  private async updateSoftDeleteState(
    id: string,
    operation: string,
    change: { status?: ListingStatus; visible?: boolean }
  ): Promise<Listing> {
    const listingId = validate(listingIdSchema, id, 'listing id');

    const listing = await this.transaction(operation, async () => {
      const row = await this.requireListingRow(listingId);
      const current = fromListingRow(row);
      const status = change.status ?? current.status;
      const visible = change.visible ?? current.visible;

      if (status === current.status && visible === current.visible) {
        return current;
      }

      await this.run('UPDATE real_estate_listings SET status = ?, visible = ? WHERE id = ?', [
        status,
        visible ? 1 : 0,
        listingId
      ]);
      await this.markChanged(listingId, this.timestamp());
      return fromListingRow(await this.requireListingRow(listingId));
    });

    this.logger.info('Listing state changed', { id: listingId, status: listing.status, visible: listing.visible });
    return listing;
  }

  async getStatistics(): Promise<ListingStatistics> {
    return this.enqueue('getStatistics', async () => {
      const totals = await this.get<{
        total_listings: number;
        visible_listings: number;
        open_listings: number;
        avg_price: number | null;
        min_price: number | null;
        max_price: number | null;
        sources_count: number;
      }>(
        `SELECT COUNT(*) AS total_listings,
                COUNT(CASE WHEN COALESCE(visible, 1) = 1 THEN 1 END) AS visible_listings,
                COUNT(CASE WHEN COALESCE(status, 'open') = 'open' THEN 1 END) AS open_listings,
                AVG(CASE WHEN price > 0 THEN price END) AS avg_price,
                MIN(CASE WHEN price > 0 THEN price END) AS min_price,
                MAX(CASE WHEN price > 0 THEN price END) AS max_price,
                COUNT(DISTINCT source) AS sources_count
           FROM real_estate_listings`
      );

      const sources = await this.all<{ source: string; count: number }>(
        `SELECT source, COUNT(*) AS count FROM real_estate_listings GROUP BY source ORDER BY source`
      );

      const prices = await this.all<{ price: number }>(
        'SELECT price FROM real_estate_listings WHERE price > 0'
      );

      const sessions = await this.get<{ total: number; completed: number; running: number; failed: number }>(
        `SELECT COUNT(*) AS total,
                COUNT(CASE WHEN status = 'completed' THEN 1 END) AS completed,
                COUNT(CASE WHEN status = 'running' THEN 1 END) AS running,
                COUNT(CASE WHEN status = 'failed' THEN 1 END) AS failed
           FROM parsing_sessions`
      );

      return {
        totalListings: totals?.total_listings ?? 0,
        visibleListings: totals?.visible_listings ?? 0,
        openListings: totals?.open_listings ?? 0,
        avgPrice: totals?.avg_price ?? null,
        minPrice: totals?.min_price ?? null,
        maxPrice: totals?.max_price ?? null,
        medianPrice: median(prices.map((row) => row.price)),
        sourcesCount: totals?.sources_count ?? 0,
        bySource: Object.fromEntries(sources.map((row) => [row.source, row.count])),
        sessions: {
          total: sessions?.total ?? 0,
          completed: sessions?.completed ?? 0,
          running: sessions?.running ?? 0,
          failed: sessions?.failed ?? 0
        }
      };
    });
  }

  /**
   * Recomputes the snapshot for one UTC calendar day and overwrites any earlier row.
   * A listing counts for the day its content last changed; it is new when it was also
   * first seen that day.
   */
  async computeDailyStatistic(date: string | Date = this.now()): Promise<DailyStatistic> {
    const dateKey = validate(dateKeySchema, typeof date === 'string' ? date : toDateKey(date), 'statistic date');

    const statistic = await this.transaction('computeDailyStatistic', async () => {
      const aggregate = await this.get<{
        total_listings: number;
        new_listings: number;
        avg_price: number | null;
        min_price: number | null;
        max_price: number | null;
      }>(
        `SELECT COUNT(*) AS total_listings,
                COUNT(CASE WHEN substr(a.first_seen_at, 1, 10) = ? THEN 1 END) AS new_listings,
                AVG(CASE WHEN l.price > 0 THEN l.price END) AS avg_price,
                MIN(CASE WHEN l.price > 0 THEN l.price END) AS min_price,
                MAX(CASE WHEN l.price > 0 THEN l.price END) AS max_price
           FROM real_estate_listings l
           JOIN listing_activity a ON a.listing_id = l.id
          WHERE substr(a.updated_at, 1, 10) = ? AND COALESCE(l.visible, 1) = 1`,
        [dateKey, dateKey]
      );

      const totalListings = aggregate?.total_listings ?? 0;
      const newListings = aggregate?.new_listings ?? 0;
      const row: DailyStatRow = {
        date: dateKey,
        total_listings: totalListings,
        new_listings: newListings,
        updated_listings: totalListings - newListings,
        avg_price: aggregate?.avg_price ?? null,
        min_price: aggregate?.min_price ?? null,
        max_price: aggregate?.max_price ?? null,
        created_at: this.timestamp()
      };

      await this.run(
        `INSERT INTO daily_stats (
           date, total_listings, new_listings, updated_listings, avg_price, min_price, max_price, created_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(date) DO UPDATE SET
           total_listings=excluded.total_listings,
           new_listings=excluded.new_listings,
           updated_listings=excluded.updated_listings,
           avg_price=excluded.avg_price,
           min_price=excluded.min_price,
           max_price=excluded.max_price,
           created_at=excluded.created_at`,
        [
          row.date,
          row.total_listings,
          row.new_listings,
          row.updated_listings,
          row.avg_price,
          row.min_price,
          row.max_price,
          row.created_at
        ]
      );

      return fromDailyStatRow(row);
    });

    this.logger.info('Daily statistic recomputed', {
      date: statistic.date,
      totalListings: statistic.totalListings,
      newListings: statistic.newListings,
      updatedListings: statistic.updatedListings
    });
    return statistic;
  }

  async getDailyStatistic(date: string): Promise<DailyStatistic | null> {
    const dateKey = validate(dateKeySchema, date, 'statistic date');
    const row = await this.enqueue('getDailyStatistic', () =>
      this.get<DailyStatRow>(`${DAILY_SELECT} WHERE date = ?`, [dateKey])
    );
    return row ? fromDailyStatRow(row) : null;
  }

  async listDailyStatistics(limit = this.settings.default_page_size): Promise<DailyStatistic[]> {
    const checkedLimit = validate(pageLimitSchema(this.settings.max_page_size), limit, 'statistic limit');
    const rows = await this.enqueue('listDailyStatistics', () =>
      this.all<DailyStatRow>(`${DAILY_SELECT} ORDER BY date DESC LIMIT ?`, [checkedLimit])
    );
    return rows.map(fromDailyStatRow);
  }

  async close(): Promise<void> {
    await this.queue;
    await new Promise<void>((resolveClose, rejectClose) => {
      this.db.close((err) => {
        if (err) {
          rejectClose(new StorageError('close database', err));
          return;
        }
        resolveClose();
      });
    });
  }
}
