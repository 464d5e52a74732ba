import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import sqlite3 from 'sqlite3';

import {
  InvalidSessionStateError,
  ListingNotFoundError,
  ListingValidationError,
  StorageError
} from '../../src/storage/errors';
import { ListingStore } from '../../src/storage/listing-store';
import { buildListing, createClock, createLogger, openMemoryStore, storeSettings, type TestClock } from '../helpers/store';

function execRaw(db: sqlite3.Database, sql: string): Promise<void> {
  return new Promise((resolveExec, rejectExec) => {
    db.exec(sql, (err) => (err ? rejectExec(err) : resolveExec()));
  });
}

function closeRaw(db: sqlite3.Database): Promise<void> {
  return new Promise((resolveClose, rejectClose) => {
    db.close((err) => (err ? rejectClose(err) : resolveClose()));
  });
}

function openRaw(path: string): Promise<sqlite3.Database> {
  return new Promise((resolveDb, rejectDb) => {
    const db = new sqlite3.Database(path, (err) => (err ? rejectDb(err) : resolveDb(db)));
  });
}

describe('ListingStore', () => {
  let clock: TestClock;
  let store: ListingStore;

  beforeEach(async () => {
    clock = createClock('2026-03-10T09:15:00Z');
    store = await openMemoryStore(clock);
  });

  afterEach(async () => {
    await store.close();
  });

  describe('saveListing', () => {
    it('inserts a new listing with open status and visible flag', async () => {
      const outcome = await store.saveListing(buildListing());

      expect(outcome).toBe('inserted');
      expect(await store.getListingById('A')).toEqual({
        id: 'A',
        source: 'cian',
        price: 1000,
        area: '100 м²',
        description: 'Street-level office with its own entrance',
        url: 'https://listings.example.test/offer/A',
        floor: '1',
        address: 'Lenina 1',
        lat: '58.0105',
        lng: '56.2502',
        seller: { phone: '+7 900 000-00-00', profileUrl: 'https://listings.example.test/agent/7' },
        photos: ['https://listings.example.test/photos/a1.jpg'],
        status: 'open',
        visible: true,
        firstSeenAt: '2026-03-10 09:15:00',
        updatedAt: '2026-03-10 09:15:00'
      });
    });

    it('is idempotent for identical observations', async () => {
      await store.saveListing(buildListing());
      const first = await store.getListingById('A');

      clock.set('2026-03-10T18:00:00Z');
      const outcome = await store.saveListing(buildListing());

      expect(outcome).toBe('unchanged');
      expect(await store.getListingById('A')).toEqual(first);
      expect(await store.getListings(10)).toHaveLength(1);
    });

    it('updates an existing row instead of duplicating it', async () => {
      await store.saveListing(buildListing());

      clock.set('2026-03-11T08:00:00Z');
      const outcome = await store.saveListing(buildListing({ price: 1500, photos: [] }));

      expect(outcome).toBe('updated');
      const stored = await store.getListingById('A');
      expect(stored?.price).toBe(1500);
      expect(stored?.photos).toEqual([]);
      expect(stored?.firstSeenAt).toBe('2026-03-10 09:15:00');
      expect(stored?.updatedAt).toBe('2026-03-11 08:00:00');
      expect(await store.getListings(10)).toHaveLength(1);
    });

    it('stores numeric ids and coordinates as text', async () => {
      await store.saveListing(buildListing({ id: 305118, lat: 58.0105, lng: 56.25 }));

      const stored = await store.getListingById('305118');
      expect(stored?.lat).toBe('58.0105');
      expect(stored?.lng).toBe('56.25');
    });

    it('rejects malformed input before writing', async () => {
      await expect(store.saveListing(buildListing({ source: '  ' }))).rejects.toThrow(ListingValidationError);
      await expect(store.saveListing(buildListing({ id: '' }))).rejects.toThrow(ListingValidationError);

      const rejection = store.saveListing(buildListing({ price: -5 }));
      await expect(rejection).rejects.toMatchObject({
        issues: ['price: Number must be greater than or equal to 0']
      });

      const statistics = await store.getStatistics();
      expect(statistics.totalListings).toBe(0);
    });

    it('serializes concurrent writers', async () => {
      const outcomes = await Promise.all([
        store.saveListing(buildListing({ id: 'A' })),
        store.saveListing(buildListing({ id: 'B' })),
        store.computeDailyStatistic('2026-03-10'),
        store.saveListing(buildListing({ id: 'A', price: 1100 }))
      ]);

      expect(outcomes[0]).toBe('inserted');
      expect(outcomes[1]).toBe('inserted');
      expect(outcomes[3]).toBe('updated');
      expect((await store.getListingById('A'))?.price).toBe(1100);
    });
  });

  describe('reads during writes', () => {
    it('sees a listing only once its save has committed', async () => {
      const saving = store.saveListing(buildListing({ id: 'X' }));
      const reads = await Promise.all([1, 2, 3, 4, 5].map(() => store.getListingById('X')));
      await saving;

      expect(reads.map((listing) => listing?.firstSeenAt)).toEqual([
        '2026-03-10 09:15:00',
        '2026-03-10 09:15:00',
        '2026-03-10 09:15:00',
        '2026-03-10 09:15:00',
        '2026-03-10 09:15:00'
      ]);
    });

    it('waits for statistics until pending writes settle', async () => {
      const writes = Promise.all([
        store.saveListing(buildListing({ id: 'A', price: 1000 })),
        store.saveListing(buildListing({ id: 'B', price: 3000 }))
      ]);
      const statistics = await store.getStatistics();
      await writes;

      expect(statistics.totalListings).toBe(2);
      expect(statistics.avgPrice).toBe(2000);
    });
  });

  describe('getListingById', () => {
    it('returns null for an id never saved', async () => {
      expect(await store.getListingById('missing')).toBeNull();
    });
  });

  describe('getListings', () => {
    beforeEach(async () => {
      await store.saveListing(buildListing({ id: 'A', price: 1000, address: 'Lenina 1' }));
      await store.saveListing(buildListing({ id: 'B', price: 2000, address: 'Komsomolsky 50%' }));
      await store.saveListing(buildListing({ id: 'C', price: 3000, source: 'avito', address: 'Lenina 72' }));
    });

    it('returns newest insertions first and keeps order after updates', async () => {
      await store.saveListing(buildListing({ id: 'A', price: 1250 }));

      const listings = await store.getListings(10);
      expect(listings.map((listing) => listing.id)).toEqual(['C', 'B', 'A']);
    });

    it('pages with limit and offset', async () => {
      const page = await store.getListings(2, { offset: 1 });
      expect(page.map((listing) => listing.id)).toEqual(['B', 'A']);
    });

    it('filters by source, price range and address fragment', async () => {
      expect((await store.getListings(10, { source: 'avito' })).map((listing) => listing.id)).toEqual(['C']);
      expect((await store.getListings(10, { minPrice: 1500, maxPrice: 3000 })).map((listing) => listing.id)).toEqual([
        'C',
        'B'
      ]);
      expect((await store.getListings(10, { addressContains: 'lenina' })).map((listing) => listing.id)).toEqual([
        'C',
        'A'
      ]);
      expect((await store.getListings(10, { addressContains: '50%' })).map((listing) => listing.id)).toEqual(['B']);
    });

    it('filters by soft-delete state', async () => {
      await store.closeListing('B');
      await store.setListingVisibility('C', false);

      expect((await store.getListings(10, { status: 'closed' })).map((listing) => listing.id)).toEqual(['B']);
      expect((await store.getListings(10, { visible: true })).map((listing) => listing.id)).toEqual(['B', 'A']);
    });

    it('rejects limits outside the page bounds', async () => {
      await expect(store.getListings(0)).rejects.toThrow(ListingValidationError);
      await expect(store.getListings(storeSettings.max_page_size + 1)).rejects.toThrow(ListingValidationError);
      await expect(store.getListings(10, { minPrice: 5, maxPrice: 1 })).rejects.toThrow(
        'Invalid listing query: minPrice: minPrice must not exceed maxPrice'
      );
    });
  });

  describe('soft delete', () => {
    it('closes a listing without removing it', async () => {
      await store.saveListing(buildListing());
      clock.set('2026-03-12T10:00:00Z');

      const closed = await store.closeListing('A');

      expect(closed.status).toBe('closed');
      expect(closed.visible).toBe(true);
      expect(closed.updatedAt).toBe('2026-03-12 10:00:00');
      const statistics = await store.getStatistics();
      expect(statistics.totalListings).toBe(1);
      expect(statistics.openListings).toBe(0);
    });

    it('hides a listing', async () => {
      await store.saveListing(buildListing());

      const hidden = await store.setListingVisibility('A', false);

      expect(hidden.visible).toBe(false);
      expect((await store.getStatistics()).visibleListings).toBe(0);
    });

    it('leaves updatedAt alone when nothing changes', async () => {
      await store.saveListing(buildListing({ status: 'closed' }));
      clock.set('2026-03-12T10:00:00Z');

      const closed = await store.closeListing('A');

      expect(closed.updatedAt).toBe('2026-03-10 09:15:00');
    });

    it('reports unknown listings', async () => {
      await expect(store.closeListing('missing')).rejects.toThrow(ListingNotFoundError);
      await expect(store.setListingVisibility('missing', false)).rejects.toThrow('Listing missing does not exist');
    });
  });

  describe('parsing sessions', () => {
    it('records a complete session', async () => {
      const sessionId = await store.startSession('cian', 'test');
      await store.saveListing(buildListing());
      clock.set('2026-03-10T09:20:00Z');

      const finished = await store.finishSession(sessionId, 1, 1);

      expect(sessionId).toMatch(/^cian_20260310_091500_[0-9a-f]{8}$/);
      expect(finished).toEqual({
        sessionId,
        source: 'cian',
        status: 'completed',
        startedAt: '2026-03-10 09:15:00',
        finishedAt: '2026-03-10 09:20:00',
        totalParsed: 1,
        totalSaved: 1,
        notes: 'test'
      });
      expect(await store.getSession(sessionId)).toEqual(finished);
    });

    it('keeps a new session running until it finishes', async () => {
      const sessionId = await store.startSession('cian');

      const session = await store.getSession(sessionId);
      expect(session?.status).toBe('running');
      expect(session?.finishedAt).toBeNull();
      expect(session?.totalParsed).toBe(0);
    });

    it('generates distinct ids for sessions started in the same second', async () => {
      const first = await store.startSession('cian');
      const second = await store.startSession('cian');

      expect(first).not.toBe(second);
    });

    it('refuses to finish an unknown session', async () => {
      const rejection = store.finishSession('cian_20260310_000000_deadbeef', 1, 1);

      await expect(rejection).rejects.toThrow(InvalidSessionStateError);
      await expect(rejection).rejects.toMatchObject({ currentStatus: null });
      expect((await store.getStatistics()).sessions.total).toBe(0);
    });

    it('refuses to finish a session twice and leaves the first result', async () => {
      const sessionId = await store.startSession('cian', 'test');
      const finished = await store.finishSession(sessionId, 4, 3);
      clock.set('2026-03-10T10:00:00Z');

      await expect(store.finishSession(sessionId, 9, 9)).rejects.toMatchObject({
        name: 'InvalidSessionStateError',
        currentStatus: 'completed'
      });
      expect(await store.getSession(sessionId)).toEqual(finished);
    });

    it('marks a session failed with the reason appended to its notes', async () => {
      const sessionId = await store.startSession('cian', 'nightly');

      const failed = await store.failSession(sessionId, 'network down', { totalParsed: 2, totalSaved: 1 });

      expect(failed.status).toBe('failed');
      expect(failed.notes).toBe('nightly | network down');
      expect(failed.totalParsed).toBe(2);
      expect(failed.finishedAt).toBe('2026-03-10 09:15:00');
      await expect(store.finishSession(sessionId, 2, 1)).rejects.toThrow(
        `Parsing session ${sessionId} is failed, expected running`
      );
    });

    it('rejects negative counts', async () => {
      const sessionId = await store.startSession('cian');

      await expect(store.finishSession(sessionId, -1, 0)).rejects.toThrow(ListingValidationError);
      expect((await store.getSession(sessionId))?.status).toBe('running');
    });

    it('lists sessions newest first', async () => {
      const older = await store.startSession('cian');
      clock.set('2026-03-11T09:15:00Z');
      const newer = await store.startSession('avito');

      const sessions = await store.listSessions(10);
      expect(sessions.map((session) => session.sessionId)).toEqual([newer, older]);
    });
  });

  describe('getStatistics', () => {
    it('aggregates counts and prices over the listing table', async () => {
      await store.saveListing(buildListing({ id: 'A', price: 1000 }));
      await store.saveListing(buildListing({ id: 'B', price: 2000 }));
      await store.saveListing(buildListing({ id: 'C', price: 3000 }));

      const statistics = await store.getStatistics();

      expect(statistics).toEqual({
        totalListings: 3,
        visibleListings: 3,
        openListings: 3,
        avgPrice: 2000,
        minPrice: 1000,
        maxPrice: 3000,
        medianPrice: 2000,
        sourcesCount: 1,
        bySource: { cian: 3 },
        sessions: { total: 0, completed: 0, running: 0, failed: 0 }
      });
    });

    it('ignores missing and zero prices in price figures', async () => {
      await store.saveListing(buildListing({ id: 'A', price: 0 }));
      await store.saveListing(buildListing({ id: 'B', price: null, source: 'avito' }));

      const statistics = await store.getStatistics();

      expect(statistics.totalListings).toBe(2);
      expect(statistics.avgPrice).toBeNull();
      expect(statistics.medianPrice).toBeNull();
      expect(statistics.bySource).toEqual({ avito: 1, cian: 1 });
    });
  });

  describe('computeDailyStatistic', () => {
    beforeEach(async () => {
      await store.saveListing(buildListing({ id: 'A', price: 1000 }));
      await store.saveListing(buildListing({ id: 'B', price: 2000 }));
      clock.set('2026-03-11T12:00:00Z');
      await store.saveListing(buildListing({ id: 'C', price: 3000 }));
      await store.saveListing(buildListing({ id: 'A', price: 1200 }));
    });

    it('buckets listings by the day their content last changed', async () => {
      const statistic = await store.computeDailyStatistic('2026-03-11');

      expect(statistic).toEqual({
        date: '2026-03-11',
        totalListings: 2,
        newListings: 1,
        updatedListings: 1,
        avgPrice: 2100,
        minPrice: 1200,
        maxPrice: 3000,
        createdAt: '2026-03-11 12:00:00'
      });
      const earlier = await store.computeDailyStatistic('2026-03-10');
      expect(earlier.totalListings).toBe(1);
      expect(earlier.newListings).toBe(1);
    });

    it('overwrites the row for a date instead of appending', async () => {
      const first = await store.computeDailyStatistic('2026-03-11');
      const second = await store.computeDailyStatistic('2026-03-11');

      expect(second).toEqual(first);
      expect(await store.listDailyStatistics(10)).toEqual([first]);
      expect(await store.getDailyStatistic('2026-03-11')).toEqual(first);
    });

    it('defaults to the current day and skips hidden listings', async () => {
      await store.setListingVisibility('C', false);

      const statistic = await store.computeDailyStatistic();

      expect(statistic.date).toBe('2026-03-11');
      expect(statistic.totalListings).toBe(1);
      expect(statistic.maxPrice).toBe(1200);
    });

    it('rejects malformed dates', async () => {
      await expect(store.computeDailyStatistic('2026-02-30')).rejects.toThrow(ListingValidationError);
      expect(await store.getDailyStatistic('2026-03-09')).toBeNull();
    });
  });
});

describe('ListingStore on disk', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'listing-store-'));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('persists listings across reopen', async () => {
    const clock = createClock('2026-03-10T09:15:00Z');
    const dbFile = join(workDir, 'nested', 'listings.db');
    const options = { logger: createLogger(), settings: storeSettings, now: clock.now };

    const first = await ListingStore.initialize(dbFile, options);
    await first.saveListing(buildListing());
    await first.close();

    const second = await ListingStore.initialize(dbFile, options);
    expect((await second.getListingById('A'))?.price).toBe(1000);
    await second.close();
  });

  it('adopts rows written before activity tracking', async () => {
    const dbFile = join(workDir, 'legacy.db');
    const raw = await openRaw(dbFile);
    await execRaw(
      raw,
      `CREATE TABLE real_estate_listings (
         id TEXT PRIMARY KEY, source TEXT NOT NULL, price REAL, area TEXT, description TEXT, url TEXT,
         floor TEXT, address TEXT, lat TEXT, lng TEXT, seller TEXT, photos TEXT,
         status TEXT DEFAULT 'open', visible INTEGER DEFAULT 1
       );
       INSERT INTO real_estate_listings (id, source, price, seller, photos)
       VALUES ('legacy-1', 'cian', 150000, 'Agent Smith | https://listings.example.test/agent/9', '["a.jpg"]');`
    );
    await closeRaw(raw);

    const clock = createClock('2026-03-10T09:15:00Z');
    const store = await ListingStore.initialize(dbFile, {
      logger: createLogger(),
      settings: storeSettings,
      now: clock.now
    });

    const legacy = await store.getListingById('legacy-1');
    expect(legacy?.firstSeenAt).toBeNull();
    expect(legacy?.seller).toEqual({ phone: 'Agent Smith', profileUrl: 'https://listings.example.test/agent/9' });
    expect(legacy?.photos).toEqual(['a.jpg']);

    const outcome = await store.saveListing({
      id: 'legacy-1',
      source: 'cian',
      price: 150000,
      seller: { phone: 'Agent Smith', profileUrl: 'https://listings.example.test/agent/9' },
      photos: ['a.jpg']
    });
    expect(outcome).toBe('unchanged');
    expect((await store.getListingById('legacy-1'))?.firstSeenAt).toBe('2026-03-10 09:15:00');
    await store.close();
  });

  it('never exposes a save that rolls back', async () => {
    const dbFile = join(workDir, 'rollback.db');
    const clock = createClock('2026-03-10T09:15:00Z');
    const store = await ListingStore.initialize(dbFile, {
      logger: createLogger(),
      settings: storeSettings,
      now: clock.now
    });

    const raw = await openRaw(dbFile);
    await execRaw(
      raw,
      `CREATE TRIGGER block_activity BEFORE INSERT ON listing_activity
       BEGIN SELECT RAISE(ABORT, 'activity writes blocked'); END;`
    );
    await closeRaw(raw);

    const saving = store.saveListing(buildListing({ id: 'X' }));
    const reads = Promise.all([1, 2, 3].map(() => store.getListingById('X')));

    await expect(saving).rejects.toThrow(StorageError);
    expect(await reads).toEqual([null, null, null]);
    expect((await store.getStatistics()).totalListings).toBe(0);
    await store.close();
  });

  it('treats differently formatted photo arrays as the same observation', async () => {
    const dbFile = join(workDir, 'photos.db');
    const raw = await openRaw(dbFile);
    await execRaw(
      raw,
      `CREATE TABLE real_estate_listings (
         id TEXT PRIMARY KEY, source TEXT NOT NULL, price REAL, area TEXT, description TEXT, url TEXT,
         floor TEXT, address TEXT, lat TEXT, lng TEXT, seller TEXT, photos TEXT,
         status TEXT DEFAULT 'open', visible INTEGER DEFAULT 1
       );
       INSERT INTO real_estate_listings (id, source, price, photos)
       VALUES ('spaced-1', 'cian', 90000, '["a.jpg", "b.jpg"]');`
    );
    await closeRaw(raw);

    const clock = createClock('2026-03-10T09:15:00Z');
    const store = await ListingStore.initialize(dbFile, {
      logger: createLogger(),
      settings: storeSettings,
      now: clock.now
    });

    const input = { id: 'spaced-1', source: 'cian', price: 90000, photos: ['a.jpg', 'b.jpg'] };
    expect(await store.saveListing(input)).toBe('unchanged');

    clock.set('2026-03-12T10:00:00Z');
    expect(await store.saveListing(input)).toBe('unchanged');
    expect((await store.getListingById('spaced-1'))?.updatedAt).toBe('2026-03-10 09:15:00');
    await store.close();
  });

  it('wraps engine failures in StorageError', async () => {
    await expect(
      ListingStore.initialize(workDir, { logger: createLogger(), settings: storeSettings })
    ).rejects.toThrow(StorageError);
  });
});
