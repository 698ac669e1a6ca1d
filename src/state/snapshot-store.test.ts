import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { SnapshotStore, SnapshotWriteError, countEntities, emptySnapshot } from './snapshot-store.js';
import { createFakeLogger, type FakeLogger } from '../../tests/helpers/fixtures.js';

const SEEN = '2025-01-02T08:00:00.000Z';

describe('SnapshotStore', () => {
  let dir: string;
  let logger: FakeLogger;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'snapshot-store-'));
    logger = createFakeLogger();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should start fresh when the file does not exist', async () => {
      const store = new SnapshotStore(join(dir, 'missing.json'), { logger });

      const snapshot = await store.load();

      expect(snapshot).toEqual(emptySnapshot());
      expect(logger.warn).toHaveBeenCalledWith(
        { path: join(dir, 'missing.json') },
        'No snapshot file found. Starting fresh.'
      );
    });

    it('should start fresh when the file is empty', async () => {
      const path = join(dir, 'state.json');
      await writeFile(path, '');

      const snapshot = await new SnapshotStore(path, { logger }).load();

      expect(snapshot).toEqual(emptySnapshot());
      expect(logger.warn).toHaveBeenCalledWith({ path }, 'Snapshot file is empty. Starting fresh.');
    });

    it('should start fresh when the file is not valid JSON', async () => {
      const path = join(dir, 'state.json');
      await writeFile(path, '{"bills": {');

      const snapshot = await new SnapshotStore(path, { logger }).load();

      expect(snapshot).toEqual(emptySnapshot());
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn.mock.calls[0][1]).toBe('Snapshot file is not valid JSON. Starting fresh.');
    });

    it('should start fresh when the document has the wrong shape', async () => {
      const path = join(dir, 'state.json');
      await writeFile(path, JSON.stringify({ bills: ['not', 'a', 'mapping'] }));

      const snapshot = await new SnapshotStore(path, { logger }).load();

      expect(snapshot).toEqual(emptySnapshot());
      expect(logger.warn.mock.calls[0][1]).toBe('Snapshot file does not match the expected layout. Starting fresh.');
    });

    it('should fill in mappings missing from an older file', async () => {
      const path = join(dir, 'state.json');
      await writeFile(
        path,
        JSON.stringify({
          last_run: SEEN,
          bills: {
            '119-hr-1': {
              bill_id: '119-hr-1',
              title: 'Disaster Recovery Act',
              last_action: 'Introduced',
              last_action_date: '2025-01-01',
              first_seen: SEEN,
            },
          },
        })
      );

      const snapshot = await new SnapshotStore(path, { logger }).load();

      expect(snapshot.last_run).toBe(SEEN);
      expect(snapshot.bills['119-hr-1'].last_updated).toBe(SEEN);
      expect(snapshot.committee_meetings).toEqual({});
      expect(snapshot.watchlist_bills).toEqual({});
    });

    it('should return the same snapshot on repeated loads', async () => {
      const store = new SnapshotStore(join(dir, 'state.json'), { logger });

      const first = await store.load();
      const second = await store.load();

      expect(second).toBe(first);
      expect(store.isLoaded).toBe(true);
    });
  });

  describe('getSnapshot', () => {
    it('should load the file on first use', async () => {
      const path = join(dir, 'state.json');
      await writeFile(path, JSON.stringify({ last_run: SEEN }));
      const store = new SnapshotStore(path, { logger });

      const snapshot = await store.getSnapshot();

      expect(snapshot.last_run).toBe(SEEN);
      expect(store.isLoaded).toBe(true);
    });

    it('should return the snapshot already in memory', async () => {
      const store = new SnapshotStore(join(dir, 'state.json'), { logger });
      const loaded = await store.load();
      loaded.last_run = SEEN;

      expect(await store.getSnapshot()).toBe(loaded);
    });
  });

  describe('save', () => {
    it('should round-trip every mapping', async () => {
      const path = join(dir, 'state.json');
      const store = new SnapshotStore(path, { logger });
      const snapshot = await store.load();
      const timestamps = { first_seen: SEEN, last_updated: SEEN };

      snapshot.bills['119-hr-1'] = {
        bill_id: '119-hr-1',
        title: 'Disaster Recovery Act',
        last_action: null,
        last_action_date: null,
        ...timestamps,
      };
      snapshot.federal_register_documents['2025-01234'] = {
        document_number: '2025-01234',
        title: 'Floodplain Management Standard',
        doc_type: 'Proposed Rule',
        publication_date: '2025-03-01',
        ...timestamps,
      };
      snapshot.committee_items['item-1'] = {
        item_id: 'item-1',
        title: 'Hearing on Levee Safety',
        link: 'https://committee.example.gov/hearings/1',
        published_date: '2025-03-02',
        source_name: 'House Transportation',
        ...timestamps,
      };
      snapshot.committee_meetings['118000'] = {
        event_id: '118000',
        committee_code: 'hspw00',
        meeting_type: 'Hearing',
        title: 'Water Resources Oversight',
        date: '2025-03-05',
        time: null,
        ...timestamps,
      };
      snapshot.disaster_declarations['4800-KY-Pike (County)'] = {
        disaster_number: 4800,
        state: 'KY',
        designated_area: 'Pike (County)',
        declaration_title: 'Severe Storms',
        incident_type: 'Flood',
        incident_end_date: null,
        ...timestamps,
      };
      snapshot.watchlist_bills['119-s-50'] = {
        bill_id: '119-s-50',
        title: 'Watershed Protection Act',
        category: 'funding',
        last_action: 'Referred',
        last_action_date: '2025-01-20',
        ...timestamps,
      };
      store.updateLastRun(new Date('2025-03-10T12:00:00.000Z'));
      await store.save();

      const reloaded = await new SnapshotStore(path, { logger }).load();

      expect(reloaded).toEqual(snapshot);
      expect(countEntities(reloaded)).toEqual({
        bills: 1,
        federal_register_documents: 1,
        committee_items: 1,
        committee_meetings: 1,
        disaster_declarations: 1,
        watchlist_bills: 1,
      });

      const written = await readFile(path, 'utf-8');
      const again = new SnapshotStore(path, { logger });
      await again.load();
      await again.save();
      expect(await readFile(path, 'utf-8')).toBe(written);
    });

    it('should write indented JSON with a trailing newline', async () => {
      const path = join(dir, 'state.json');
      const store = new SnapshotStore(path, { logger });
      await store.load();
      await store.save();

      expect(await readFile(path, 'utf-8')).toBe(JSON.stringify(emptySnapshot(), null, 2) + '\n');
    });

    it('should create missing parent directories', async () => {
      const path = join(dir, 'nested', 'deeper', 'state.json');
      const store = new SnapshotStore(path, { logger });
      await store.load();

      await store.save();

      expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual(emptySnapshot());
    });

    it('should do nothing before a load', async () => {
      const path = join(dir, 'state.json');
      await new SnapshotStore(path, { logger }).save();

      await expect(readFile(path, 'utf-8')).rejects.toThrow();
      expect(logger.warn).toHaveBeenCalledWith({ path }, 'No snapshot loaded; nothing to save');
    });

    it('should raise SnapshotWriteError when the location is unwritable', async () => {
      const blocker = join(dir, 'blocker');
      await writeFile(blocker, 'a file, not a directory');
      const path = join(blocker, 'state.json');
      const store = new SnapshotStore(path, { logger });
      await store.load();

      const error = await store.save().then(
        () => null,
        (caught: unknown) => caught
      );

      expect(error).toBeInstanceOf(SnapshotWriteError);
      expect(error).toMatchObject({ name: 'SnapshotWriteError', path });
    });
  });

  describe('updateLastRun', () => {
    it('should require a loaded snapshot', () => {
      const store = new SnapshotStore(join(dir, 'state.json'), { logger });
      expect(() => store.updateLastRun()).toThrow('Snapshot must be loaded before updating last_run');
    });

    it('should stamp the run time', async () => {
      const store = new SnapshotStore(join(dir, 'state.json'), { logger });
      const snapshot = await store.load();

      store.updateLastRun(new Date('2025-03-10T12:00:00.000Z'));

      expect(snapshot.last_run).toBe('2025-03-10T12:00:00.000Z');
    });
  });

  describe('reset', () => {
    it('should delete the file and report that it existed', async () => {
      const path = join(dir, 'state.json');
      const store = new SnapshotStore(path, { logger });
      await store.load();
      await store.save();

      expect(await store.reset()).toBe(true);
      expect(store.isLoaded).toBe(false);
      await expect(readFile(path, 'utf-8')).rejects.toThrow();
    });

    it('should report false when there was no file', async () => {
      const store = new SnapshotStore(join(dir, 'state.json'), { logger });
      expect(await store.reset()).toBe(false);
    });
  });
});
