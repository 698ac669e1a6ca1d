import {
  billTracking,
  committeeItemTracking,
  committeeMeetingTracking,
  countEntities,
  detectAndRecord,
  disasterTracking,
  federalRegisterTracking,
  watchlistTracking,
  type EntityUpdate,
  type SnapshotStore,
  type TrackedMapping,
  type TrackingSpec,
} from '../state/index.js';
import type { CongressClient } from '../sources/congress.js';
import { getClosingCommentPeriods, type ClosingCommentPeriod, type FederalRegisterClient } from '../sources/federal-register.js';
import { fetchCommitteeItems, type CommitteeRssClient } from '../sources/committee-rss.js';
import { fetchCommitteeMeetings, type CommitteeMeetingClient } from '../sources/committee-meetings.js';
import type { OpenFemaClient } from '../sources/openfema.js';
import type { WatchlistClient } from '../sources/watchlist.js';
import type { FederalRegisterDocument, RegulatoryItem } from '../sources/types.js';
import type { TrackerSettings } from '../types/index.js';
import { DigestRenderer, saveDigest } from '../digest/renderer.js';
import type { EmailClient } from '../notifications/email.js';
import { isoDay } from '../utils/dates.js';
import { createChildLogger, type ComponentLogger } from '../utils/logger.js';
import { emptyRunUpdates, type RunResult, type SourceError, type SourceName } from './types.js';

/**
 * Collaborators of a daily check. Each source is narrowed to the calls the
 * run makes, so tests can pass plain objects.
 */
export interface DailyCheckDeps {
  settings: TrackerSettings;
  store: SnapshotStore;
  congress: Pick<CongressClient, 'findRelevantBills'>;
  federalRegister: Pick<FederalRegisterClient, 'fetchAgencyDocuments'>;
  committeeRss: Pick<CommitteeRssClient, 'fetchFeed'>;
  committeeMeetings: Pick<CommitteeMeetingClient, 'getTrackedMeetings'>;
  openFema: Pick<OpenFemaClient, 'getFloodRelatedDisasters'>;
  watchlist: Pick<WatchlistClient, 'getWatchlistBillsWithStatus' | 'getRegulatoryItems'>;
  email?: Pick<EmailClient, 'sendDigest' | 'sendCommentAlert'>;
  renderer?: DigestRenderer;
  logger?: ComponentLogger;
  now?: () => Date;
}

export interface DailyCheckOptions {
  /** Sources not polled this run; their mappings stay as they are */
  skip?: readonly SourceName[];
  /** Federal Register look-back, overriding the settings */
  daysBack?: number;
  /** Directory to write the digest to; null to skip writing */
  digestDir?: string | null;
  sendEmail?: boolean;
}

/**
 * Run every enabled source through change detection, persist the snapshot
 * once and render the digest.
 *
 * A source that fails to fetch is reported in sourceErrors and leaves its
 * mapping untouched. An error from change detection propagates, and the
 * snapshot is not saved.
 */
export async function runDailyCheck(deps: DailyCheckDeps, options: DailyCheckOptions = {}): Promise<RunResult> {
  const logger = deps.logger ?? createChildLogger('daily-check');
  const now = (deps.now ?? (() => new Date()))();
  const { settings } = deps;
  const skip = new Set(options.skip ?? []);
  const sourceErrors: SourceError[] = [];
  const updates = emptyRunUpdates();

  logger.info({ skip: [...skip] }, 'Starting daily check');
  const snapshot = await deps.store.load();

  async function fetchSource<T>(source: SourceName, fetcher: () => Promise<T[]>): Promise<T[] | null> {
    if (skip.has(source)) {
      logger.info({ source }, 'Source skipped');
      return null;
    }
    try {
      const records = await fetcher();
      logger.info({ source, count: records.length }, 'Fetched source');
      return records;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ source, error: message }, 'Source fetch failed');
      sourceErrors.push({ source, kind: 'fetch', message });
      return null;
    }
  }

  function track<TEntity, TSummary>(
    source: SourceName,
    spec: TrackingSpec<TEntity, TSummary>,
    mapping: TrackedMapping<TSummary>,
    fetched: readonly TEntity[]
  ): EntityUpdate<TEntity>[] {
    const result = detectAndRecord(spec, mapping, fetched, { now: () => now });
    if (fetched.length > 0 && result.skipped === fetched.length) {
      sourceErrors.push({
        source,
        kind: 'adapter_contract',
        message: `${spec.label}: none of ${fetched.length} records had an identity`,
      });
    }
    return result.updates;
  }

  const bills = await fetchSource('bills', () => deps.congress.findRelevantBills(settings.congress));
  if (bills) {
    updates.bills = track('bills', billTracking, snapshot.bills, bills);
  }

  let documents: FederalRegisterDocument[] = [];
  const fetchedDocuments = await fetchSource('federal-register', () =>
    deps.federalRegister.fetchAgencyDocuments(
      settings.federal_register,
      options.daysBack ?? settings.federal_register.days_back,
      now
    )
  );
  if (fetchedDocuments) {
    documents = fetchedDocuments;
    updates.federalRegister = track(
      'federal-register',
      federalRegisterTracking,
      snapshot.federal_register_documents,
      documents
    );
  }

  const items = await fetchSource('committees', () => fetchCommitteeItems(deps.committeeRss, settings));
  if (items) {
    updates.committeeItems = track('committees', committeeItemTracking, snapshot.committee_items, items);
  }

  const meetings = await fetchSource('meetings', () => fetchCommitteeMeetings(deps.committeeMeetings, settings, now));
  if (meetings) {
    updates.committeeMeetings = track('meetings', committeeMeetingTracking, snapshot.committee_meetings, meetings);
  }

  const disasters = await fetchSource('disasters', () =>
    deps.openFema.getFloodRelatedDisasters(
      { daysBack: settings.disasters.days_back, limit: settings.disasters.limit },
      settings.disasters.incident_types,
      now
    )
  );
  if (disasters) {
    updates.disasters = track('disasters', disasterTracking, snapshot.disaster_declarations, disasters);
  }

  let regulatoryItems: RegulatoryItem[] = [];
  const watchlistBills = await fetchSource('watchlist', async () => {
    regulatoryItems = await deps.watchlist.getRegulatoryItems(now);
    return deps.watchlist.getWatchlistBillsWithStatus();
  });
  if (watchlistBills) {
    // A failed lookup carries no status; comparing it would read as a change
    const known = watchlistBills.filter((bill) => bill.statusKnown);
    if (known.length < watchlistBills.length) {
      logger.warn(
        { unknown: watchlistBills.filter((bill) => !bill.statusKnown).map((bill) => bill.billId) },
        'Leaving watchlist bills without a current status untouched'
      );
    }
    updates.watchlist = track('watchlist', watchlistTracking, snapshot.watchlist_bills, known);
  }

  const closingCommentPeriods: ClosingCommentPeriod[] = getClosingCommentPeriods(
    documents,
    settings.federal_register.comment_warning_days,
    now
  );

  deps.store.updateLastRun(now);
  await deps.store.save();

  const renderer = deps.renderer ?? new DigestRenderer();
  const digest = renderer.renderDailyDigest({
    date: now,
    updates,
    closingCommentPeriods,
    regulatoryItems,
    sourceErrors,
  });

  const digestDir = options.digestDir ?? null;
  const digestPath = digestDir ? await saveDigest(digest, digestDir, undefined, now) : null;

  let emailSent = false;
  if (options.sendEmail) {
    if (!deps.email) {
      logger.warn('Email requested but no email client configured');
    } else {
      const result = await deps.email.sendDigest(settings.notifications, `Legislative Digest: ${isoDay(now)}`, digest);
      emailSent = result.success;
      if (!result.success) {
        logger.error({ message: result.message }, 'Digest email failed');
      }
      if (closingCommentPeriods.length > 0) {
        const alert = await deps.email.sendCommentAlert(settings.notifications, closingCommentPeriods);
        if (!alert.success) {
          logger.error({ message: alert.message }, 'Comment alert email failed');
        }
      }
    }
  }

  const counts = countEntities(snapshot);
  logger.info(
    {
      newBills: updates.bills.filter((update) => update.kind === 'new').length,
      federalRegister: updates.federalRegister.length,
      commentAlerts: closingCommentPeriods.length,
      sourceErrors: sourceErrors.length,
    },
    'Daily check complete'
  );

  return {
    runAt: now.toISOString(),
    updates,
    closingCommentPeriods,
    regulatoryItems,
    counts,
    sourceErrors,
    digest,
    digestPath,
    emailSent,
  };
}
