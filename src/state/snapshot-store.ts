import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { createChildLogger, type ComponentLogger } from '../utils/logger.js';
import { SnapshotSchema } from './schema.js';
import type { EntityKind, Snapshot } from './types.js';

/**
 * Raised when the snapshot cannot be persisted. Fatal for the run.
 */
export class SnapshotWriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to write snapshot to ${path}: ${reason}`, { cause });
    this.name = 'SnapshotWriteError';
    this.path = path;
  }
}

export interface SnapshotStoreOptions {
  logger?: ComponentLogger;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Snapshot with every mapping empty and no previous run
 */
export function emptySnapshot(): Snapshot {
  return SnapshotSchema.parse({});
}

/**
 * Number of tracked entries per entity kind
 */
export function countEntities(snapshot: Snapshot): Record<EntityKind, number> {
  return {
    bills: Object.keys(snapshot.bills).length,
    federal_register_documents: Object.keys(snapshot.federal_register_documents).length,
    committee_items: Object.keys(snapshot.committee_items).length,
    committee_meetings: Object.keys(snapshot.committee_meetings).length,
    disaster_declarations: Object.keys(snapshot.disaster_declarations).length,
    watchlist_bills: Object.keys(snapshot.watchlist_bills).length,
  };
}

/**
 * Persists the tracker snapshot as a single JSON document.
 *
 * One store is used per run: load() reads the file once and returns the same
 * in-memory snapshot afterwards; save() replaces the whole file.
 */
export class SnapshotStore {
  private readonly path: string;
  private readonly logger: ComponentLogger;
  private snapshot: Snapshot | null = null;

  constructor(path: string, options: SnapshotStoreOptions = {}) {
    this.path = path;
    this.logger = options.logger ?? createChildLogger('snapshot-store');
  }

  get filePath(): string {
    return this.path;
  }

  get isLoaded(): boolean {
    return this.snapshot !== null;
  }

  /**
   * Load the snapshot, starting fresh when the file is missing or unreadable
   */
  async load(): Promise<Snapshot> {
    if (this.snapshot) {
      return this.snapshot;
    }

    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger.warn({ path: this.path }, 'No snapshot file found. Starting fresh.');
      } else {
        this.logger.warn(
          { path: this.path, error: error instanceof Error ? error.message : String(error) },
          'Unable to read snapshot file. Starting fresh.'
        );
      }
      this.snapshot = emptySnapshot();
      return this.snapshot;
    }

    this.snapshot = this.parse(raw);
    const counts = countEntities(this.snapshot);
    this.logger.info({ path: this.path, lastRun: this.snapshot.last_run, counts }, 'Loaded snapshot');
    return this.snapshot;
  }

  /**
   * The in-memory snapshot, loaded on first use
   */
  async getSnapshot(): Promise<Snapshot> {
    return this.snapshot ?? this.load();
  }

  private parse(raw: string): Snapshot {
    if (raw.trim() === '') {
      this.logger.warn({ path: this.path }, 'Snapshot file is empty. Starting fresh.');
      return emptySnapshot();
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(
        { path: this.path, error: error instanceof Error ? error.message : String(error) },
        'Snapshot file is not valid JSON. Starting fresh.'
      );
      return emptySnapshot();
    }

    const result = SnapshotSchema.safeParse(data);
    if (!result.success) {
      this.logger.warn(
        { path: this.path, issues: result.error.issues.slice(0, 5) },
        'Snapshot file does not match the expected layout. Starting fresh.'
      );
      return emptySnapshot();
    }
    return result.data;
  }

  /**
   * Record the time of this run on the loaded snapshot
   */
  updateLastRun(now: Date = new Date()): void {
    if (!this.snapshot) {
      throw new Error('Snapshot must be loaded before updating last_run');
    }
    this.snapshot.last_run = now.toISOString();
  }

  /**
   * Replace the persisted file with the in-memory snapshot.
   * Writes a temporary file beside the target and renames it into place.
   */
  async save(): Promise<void> {
    if (!this.snapshot) {
      this.logger.warn({ path: this.path }, 'No snapshot loaded; nothing to save');
      return;
    }

    const tempPath = `${this.path}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tempPath, JSON.stringify(this.snapshot, null, 2) + '\n', 'utf-8');
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug({ tempPath, cleanupError }, 'Could not remove temporary snapshot file');
      });
      throw new SnapshotWriteError(this.path, error);
    }

    this.logger.info({ path: this.path }, 'Saved snapshot');
  }

  /**
   * Discard all tracked state. Returns whether a snapshot file existed.
   */
  async reset(): Promise<boolean> {
    this.snapshot = null;
    try {
      await rm(this.path);
      this.logger.info({ path: this.path }, 'Snapshot reset');
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }
}
