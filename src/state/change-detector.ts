import { createChildLogger, type ComponentLogger } from '../utils/logger.js';
import type {
  ChangePlan,
  DetectionResult,
  EntityUpdate,
  Fingerprint,
  GroupedUpdates,
  TrackedEntity,
  TrackedMapping,
  TrackingSpec,
} from './types.js';

/**
 * Options shared by planChanges and detectAndRecord
 */
export interface DetectOptions {
  /** Clock used for first_seen / last_updated */
  now?: () => Date;
  logger?: ComponentLogger;
}

let defaultLogger: ComponentLogger | null = null;

function getDefaultLogger(): ComponentLogger {
  if (!defaultLogger) {
    defaultLogger = createChildLogger('change-detector');
  }
  return defaultLogger;
}

/**
 * True when either half of the fingerprint differs
 */
export function fingerprintChanged(stored: Fingerprint, current: Fingerprint): boolean {
  return stored.primary !== current.primary || stored.secondary !== current.secondary;
}

/**
 * Pick the later of two timestamps so last_updated never moves backwards
 */
function laterTimestamp(previous: string, candidate: string): string {
  const previousMs = Date.parse(previous);
  const candidateMs = Date.parse(candidate);
  if (isNaN(previousMs) || candidateMs >= previousMs) {
    return candidate;
  }
  return previous;
}

/**
 * Classify fetched entities against the stored mapping without touching it.
 *
 * A key repeated within one batch is compared against the state its earlier
 * occurrence would leave behind, so plan + apply matches in-place updating.
 */
export function planChanges<TEntity, TSummary>(
  spec: TrackingSpec<TEntity, TSummary>,
  mapping: Readonly<TrackedMapping<TSummary>>,
  fetched: readonly TEntity[],
  options: DetectOptions = {}
): ChangePlan<TEntity, TSummary> {
  const logger = options.logger ?? getDefaultLogger();
  const now = (options.now ?? (() => new Date()))().toISOString();

  const updates: EntityUpdate<TEntity>[] = [];
  const writes: ChangePlan<TEntity, TSummary>['writes'] = [];
  const pending = new Map<string, TrackedEntity<TSummary>>();
  let skipped = 0;

  fetched.forEach((entity, index) => {
    const key = spec.identity(entity);
    if (!key) {
      skipped++;
      logger.warn({ kind: spec.kind, index }, 'Skipping record without identity key');
      return;
    }

    const existing = pending.get(key) ?? (Object.hasOwn(mapping, key) ? mapping[key] : undefined);
    const current = spec.fingerprint(entity);

    if (!existing) {
      const record: TrackedEntity<TSummary> = {
        ...spec.summarize(entity),
        first_seen: now,
        last_updated: now,
      };
      updates.push({ kind: 'new', key, entity });
      writes.push({ key, record });
      pending.set(key, record);
      logger.debug({ kind: spec.kind, key }, 'New entity detected');
      return;
    }

    const previous = spec.storedFingerprint(existing);
    if (!fingerprintChanged(previous, current)) {
      return;
    }

    const record: TrackedEntity<TSummary> = {
      ...spec.summarize(entity),
      first_seen: existing.first_seen,
      last_updated: laterTimestamp(existing.last_updated, now),
    };
    updates.push({ kind: 'status_change', key, entity, previous });
    writes.push({ key, record });
    pending.set(key, record);
    logger.debug({ kind: spec.kind, key, previous, current }, 'Status change detected');
  });

  if (fetched.length > 0 && skipped === fetched.length) {
    logger.error(
      { kind: spec.kind, records: fetched.length },
      'Every fetched record lacked an identity key'
    );
  }

  return { updates, writes, skipped };
}

/**
 * Apply a plan's writes to the mapping in place
 */
export function applyChanges<TEntity, TSummary>(
  mapping: TrackedMapping<TSummary>,
  plan: ChangePlan<TEntity, TSummary>
): void {
  for (const { key, record } of plan.writes) {
    mapping[key] = record;
  }
}

/**
 * Detect new and changed entities and record them in the mapping.
 *
 * The mapping is mutated in place, so a second call with the same batch
 * reports nothing. Keys absent from the batch are kept and not reported.
 */
export function detectAndRecord<TEntity, TSummary>(
  spec: TrackingSpec<TEntity, TSummary>,
  mapping: TrackedMapping<TSummary>,
  fetched: readonly TEntity[],
  options: DetectOptions = {}
): DetectionResult<TEntity> {
  const logger = options.logger ?? getDefaultLogger();
  const plan = planChanges(spec, mapping, fetched, { ...options, logger });
  applyChanges(mapping, plan);

  const grouped = groupUpdatesByKind(plan.updates);
  logger.info(
    {
      kind: spec.kind,
      fetched: fetched.length,
      new: grouped.new.length,
      statusChanges: grouped.status_change.length,
      skipped: plan.skipped,
    },
    `${spec.label}: change detection complete`
  );

  return { updates: plan.updates, skipped: plan.skipped };
}

/**
 * Split updates by kind, preserving their relative order
 */
export function groupUpdatesByKind<TEntity>(updates: readonly EntityUpdate<TEntity>[]): GroupedUpdates<TEntity> {
  const grouped: GroupedUpdates<TEntity> = { new: [], status_change: [] };
  for (const update of updates) {
    if (update.kind === 'new') {
      grouped.new.push(update);
    } else {
      grouped.status_change.push(update);
    }
  }
  return grouped;
}
