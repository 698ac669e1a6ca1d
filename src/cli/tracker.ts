#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { createInterface } from 'readline/promises';
import { getConfig, loadTrackerSettings } from '../config/index.js';
import { buildBillInfo } from '../sources/congress.js';
import { ENTITY_KINDS, SnapshotStore, countEntities, type EntityKind, type Snapshot } from '../state/index.js';
import { createTrackerClients } from '../tracker/clients.js';
import { runDailyCheck } from '../tracker/daily-check.js';
import { SOURCE_NAMES, isSourceName, type SourceName } from '../tracker/types.js';
import type { BillInfo } from '../sources/types.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('tracker-cli');

const program = new Command();

const KIND_LABELS: Record<EntityKind, string> = {
  bills: 'Bills',
  federal_register_documents: 'Federal Register documents',
  committee_items: 'Committee feed items',
  committee_meetings: 'Committee meetings',
  disaster_declarations: 'Disaster declarations',
  watchlist_bills: 'Watchlist bills',
};

const PRIORITY_MARKERS: Record<BillInfo['priority'], string> = {
  critical: ' !!!',
  high: ' !!',
  normal: '',
};

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function collectSource(value: string, previous: SourceName[] = []): SourceName[] {
  if (!isSourceName(value)) {
    throw new InvalidArgumentError(`Expected one of: ${SOURCE_NAMES.join(', ')}.`);
  }
  return [...previous, value];
}

function fail(error: unknown, context: string): never {
  logger.error({ error }, context);
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
}

function printBill(bill: BillInfo): void {
  console.log(`\n[${bill.priority.toUpperCase()}]${PRIORITY_MARKERS[bill.priority]} ${bill.billType.toUpperCase()} ${bill.billNumber}`);
  console.log(`   Title: ${bill.title}`);
  if (bill.policyArea) {
    console.log(`   Policy area: ${bill.policyArea}`);
  }
  if (bill.sponsor) {
    console.log(`   Sponsor: ${bill.sponsor}`);
  }
  if (bill.latestAction) {
    console.log(`   Latest action (${bill.latestActionDate ?? 'undated'}): ${bill.latestAction}`);
  }
  console.log(`   URL: ${bill.url}`);
}

function recordTitle(snapshot: Snapshot, kind: EntityKind, key: string): string {
  const record = snapshot[kind][key];
  if (!record) {
    return key;
  }
  return 'title' in record ? record.title : record.declaration_title;
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

program
  .name('tracker')
  .description('Legislative and government data change tracker')
  .version('1.0.0');

/**
 * Poll every source, record changes and produce the digest
 */
program
  .command('daily-check')
  .description('Run the daily check across all sources')
  .option('--no-save-digest', 'Do not write the digest to the digest directory')
  .option('--send-email', 'Send the digest by email', false)
  .option('--days-back <n>', 'Days of Federal Register documents to fetch', parsePositiveInt)
  .option('--skip <source...>', `Sources to skip (${SOURCE_NAMES.join(', ')})`, collectSource)
  .action(
    async (options: { saveDigest: boolean; sendEmail: boolean; daysBack?: number; skip?: SourceName[] }) => {
      try {
        const config = getConfig();
        const settings = await loadTrackerSettings(config.paths.settings);
        const clients = createTrackerClients(config);

        console.log('\n🔍 Running daily check...\n');

        const result = await runDailyCheck(
          { settings, ...clients },
          {
            skip: options.skip,
            daysBack: options.daysBack,
            digestDir: options.saveDigest ? config.paths.digestDir : null,
            sendEmail: options.sendEmail,
          }
        );

        console.log('━'.repeat(60));
        console.log(result.digest);
        console.log('━'.repeat(60));

        const newBills = result.updates.bills.filter((update) => update.kind === 'new').length;
        console.log('Summary:');
        console.log(`  New bills: ${newBills}`);
        console.log(`  Bill status changes: ${result.updates.bills.length - newBills}`);
        console.log(`  Federal Register documents: ${result.updates.federalRegister.length}`);
        console.log(`  Comment alerts: ${result.closingCommentPeriods.length}`);
        console.log(`  Source errors: ${result.sourceErrors.length}`);
        if (result.digestPath) {
          console.log(`  Digest saved to: ${result.digestPath}`);
        }
        if (options.sendEmail) {
          console.log(`  Email sent: ${result.emailSent ? 'yes' : 'no'}`);
        }
        console.log('');
      } catch (error) {
        fail(error, 'Daily check failed');
      }
    }
  );

/**
 * Search Congress.gov bills
 */
program
  .command('search')
  .description('Search bills matching a query')
  .argument('<query>', 'Search text')
  .option('--congress <n>', 'Congress number', parsePositiveInt, 119)
  .option('--limit <n>', 'Maximum results', parsePositiveInt, 10)
  .action(async (query: string, options: { congress: number; limit: number }) => {
    try {
      const config = getConfig();
      const settings = await loadTrackerSettings(config.paths.settings);
      const { congress } = createTrackerClients(config);

      const raw = await congress.searchBills(query, { congress: options.congress, limit: options.limit });
      const bills = raw.map((bill) => buildBillInfo(bill, settings.congress.priority_keywords, options.congress));

      console.log(`\nFound ${bills.length} bills:`);
      bills.forEach(printBill);
      console.log('');
    } catch (error) {
      fail(error, 'Search failed');
    }
  });

/**
 * Preview relevant bills without touching the snapshot
 */
program
  .command('find-bills')
  .description('Find relevant bills using the configured filters')
  .option('--limit <n>', 'Maximum bills to show', parsePositiveInt, 10)
  .action(async (options: { limit: number }) => {
    try {
      const config = getConfig();
      const settings = await loadTrackerSettings(config.paths.settings);
      const { congress } = createTrackerClients(config);

      const bills = await congress.findRelevantBills(settings.congress);

      console.log(`\nFound ${bills.length} relevant bills:`);
      bills.slice(0, options.limit).forEach(printBill);
      if (bills.length > options.limit) {
        console.log(`\n... and ${bills.length - options.limit} more bills`);
      }
      console.log('');
    } catch (error) {
      fail(error, 'Bill search failed');
    }
  });

/**
 * Show what the snapshot currently tracks
 */
program
  .command('show-state')
  .description('Show the current tracking state')
  .option('-v, --verbose', 'List tracked entries', false)
  .action(async (options: { verbose: boolean }) => {
    try {
      const store = new SnapshotStore(getConfig().paths.state);
      const snapshot = await store.load();
      const counts = countEntities(snapshot);

      console.log('\n📋 Tracking State\n');
      console.log('━'.repeat(60));
      console.log(`Last run: ${snapshot.last_run ?? 'Never'}`);
      for (const kind of ENTITY_KINDS) {
        console.log(`${KIND_LABELS[kind]}: ${counts[kind]}`);
      }

      if (options.verbose) {
        for (const kind of ENTITY_KINDS) {
          const keys = Object.keys(snapshot[kind]);
          if (keys.length === 0) {
            continue;
          }
          console.log(`\n${KIND_LABELS[kind]}:`);
          for (const key of keys.slice(0, 10)) {
            const record = snapshot[kind][key];
            console.log(`  - ${key}: ${recordTitle(snapshot, kind, key).slice(0, 60)}`);
            console.log(`    First seen: ${record.first_seen}`);
            console.log(`    Last updated: ${record.last_updated}`);
          }
          if (keys.length > 10) {
            console.log(`  ... and ${keys.length - 10} more`);
          }
        }
      }
      console.log('\n' + '━'.repeat(60));
    } catch (error) {
      fail(error, 'Failed to show state');
    }
  });

/**
 * Forget everything tracked so far
 */
program
  .command('reset-state')
  .description('Delete the snapshot so every item is reported as new again')
  .option('-y, --yes', 'Skip the confirmation prompt', false)
  .action(async (options: { yes: boolean }) => {
    try {
      if (!options.yes && !(await confirm('Are you sure you want to reset the state?'))) {
        console.log('Aborted.');
        return;
      }
      const store = new SnapshotStore(getConfig().paths.state);
      const removed = await store.reset();
      console.log(removed ? 'State reset successfully.' : 'No state file found.');
    } catch (error) {
      fail(error, 'Failed to reset state');
    }
  });

/**
 * Check connectivity to each upstream API
 */
program
  .command('test-api')
  .description('Test the connection to each upstream API')
  .action(async () => {
    const config = getConfig();
    let failures = 0;

    const check = async (name: string, probe: () => Promise<string>) => {
      try {
        const detail = await probe();
        console.log(`✓ ${name}: ${detail}`);
      } catch (error) {
        failures++;
        logger.debug({ error, api: name }, 'API check failed');
        console.log(`✗ ${name}: ${error instanceof Error ? error.message : String(error)}`);
      }
    };

    try {
      const settings = await loadTrackerSettings(config.paths.settings);
      const clients = createTrackerClients(config);
      const congressNumber = settings.congress.current_congress;

      console.log('\n🔌 Testing API connections...\n');
      console.log('━'.repeat(60));

      await check('Congress.gov bill listing', async () => {
        const bills = await clients.congress.getRecentBills(congressNumber, 3);
        return `${bills.length} bills returned`;
      });
      await check('Congress.gov bill details', async () => {
        const bill = await clients.congress.getBillDetails(congressNumber, 'hr', 1);
        return bill ? `HR 1: ${(bill.title ?? 'No title').slice(0, 50)}` : 'no data returned';
      });
      await check('Congress.gov subjects', async () => {
        const subjects = await clients.congress.getBillSubjects(congressNumber, 'hr', 1);
        return `policy area ${subjects.policyArea ?? 'none'}, ${subjects.legislativeSubjects.length} subjects`;
      });
      await check('Federal Register', async () => {
        const documents = await clients.federalRegister.searchDocuments({ perPage: 3 });
        return `${documents.length} documents returned`;
      });
      await check('OpenFEMA', async () => {
        const disasters = await clients.openFema.getRecentDisasters({ daysBack: 30, limit: 3 });
        return `${disasters.length} declarations returned`;
      });
      console.log(`${clients.email.isConfigured ? '✓' : '○'} SendGrid: ${clients.email.isConfigured ? 'key configured' : 'no key'}`);
      console.log('━'.repeat(60));
    } catch (error) {
      fail(error, 'API test failed');
    }

    if (failures > 0) {
      console.error(`\n${failures} API check(s) failed`);
      process.exit(1);
    }
    console.log('\nAll API checks passed');
  });

/**
 * Show the watchlist with live status
 */
program
  .command('watchlist')
  .description('Show watchlist bills and regulatory deadlines')
  .action(async () => {
    try {
      const { watchlist } = createTrackerClients(getConfig());
      const bills = await watchlist.getWatchlistBillsWithStatus();
      const items = await watchlist.getRegulatoryItems();

      console.log('\n👀 Watchlist Bills\n');
      console.log('━'.repeat(60));
      if (bills.length === 0) {
        console.log('No bills on the watchlist.');
      }
      for (const bill of bills) {
        console.log(`\n${bill.billId} [${bill.category}] ${bill.title}`);
        if (!bill.statusKnown) {
          console.log('   Status unavailable from Congress.gov');
        } else if (bill.latestAction) {
          console.log(`   Latest action (${bill.latestActionDate ?? 'undated'}): ${bill.latestAction}`);
        }
        if (bill.notes) {
          console.log(`   Notes: ${bill.notes}`);
        }
        console.log(`   URL: ${bill.url}`);
      }

      console.log('\n📅 Regulatory Deadlines\n');
      console.log('━'.repeat(60));
      if (items.length === 0) {
        console.log('No regulatory items on the watchlist.');
      }
      for (const item of items) {
        const deadline = item.commentDeadline ?? item.effectiveDate ?? 'no date';
        const days = item.daysUntil === null ? '' : ` (${item.daysUntil} days)`;
        console.log(`\n${item.name}`);
        console.log(`   Deadline: ${deadline}${days}`);
        if (item.status) {
          console.log(`   Status: ${item.status}`);
        }
      }
      console.log('\n' + '━'.repeat(60));
    } catch (error) {
      fail(error, 'Failed to show watchlist');
    }
  });

program.parseAsync().catch((error: unknown) => fail(error, 'Command failed'));
