import { describe, it, expect, beforeEach } from 'vitest';
import {
  applyChanges,
  detectAndRecord,
  fingerprintChanged,
  groupUpdatesByKind,
  planChanges,
} from './change-detector.js';
import { billTracking } from './trackers.js';
import type { BillSummary, TrackedMapping } from './types.js';
import { createFakeLogger, fixedClock, makeBill, type FakeLogger } from '../../tests/helpers/fixtures.js';

const NOW = '2025-03-10T12:00:00.000Z';

function storedBill(overrides: Partial<TrackedMapping<BillSummary>[string]> = {}): TrackedMapping<BillSummary>[string] {
  return {
    bill_id: '119-hr-1',
    title: 'Disaster Recovery Act',
    last_action: 'Referred to committee',
    last_action_date: '2025-01-01',
    first_seen: '2025-01-02T08:00:00.000Z',
    last_updated: '2025-01-02T08:00:00.000Z',
    ...overrides,
  };
}

describe('fingerprintChanged', () => {
  it('should be false for identical fingerprints', () => {
    expect(fingerprintChanged({ primary: 'a', secondary: 'b' }, { primary: 'a', secondary: 'b' })).toBe(false);
  });

  it('should treat null and empty string as different', () => {
    expect(fingerprintChanged({ primary: null, secondary: 'b' }, { primary: '', secondary: 'b' })).toBe(true);
  });
});

describe('detectAndRecord', () => {
  let logger: FakeLogger;
  let mapping: TrackedMapping<BillSummary>;

  beforeEach(() => {
    logger = createFakeLogger();
    mapping = {};
  });

  it('should report every bill as new against an empty mapping', () => {
    const bills = [
      makeBill({ billId: '119-hr-1' }),
      makeBill({ billId: '119-hr-2' }),
      makeBill({ billId: '119-s-3' }),
    ];

    const result = detectAndRecord(billTracking, mapping, bills, { now: fixedClock(NOW), logger });

    expect(result.updates.map((u) => u.kind)).toEqual(['new', 'new', 'new']);
    expect(Object.keys(mapping)).toEqual(['119-hr-1', '119-hr-2', '119-s-3']);
    for (const entry of Object.values(mapping)) {
      expect(entry.first_seen).toBe(NOW);
      expect(entry.last_updated).toBe(NOW);
    }
  });

  it('should store the bill summary fields', () => {
    detectAndRecord(
      billTracking,
      mapping,
      [makeBill({ billId: '119-hr-9', title: 'Levee Act', latestAction: 'Passed House', latestActionDate: '2025-02-02' })],
      { now: fixedClock(NOW), logger }
    );

    expect(mapping['119-hr-9']).toEqual({
      bill_id: '119-hr-9',
      title: 'Levee Act',
      last_action: 'Passed House',
      last_action_date: '2025-02-02',
      first_seen: NOW,
      last_updated: NOW,
    });
  });

  it('should report a status change when only the action date moves', () => {
    mapping['119-hr-1'] = storedBill();
    const bill = makeBill({
      billId: '119-hr-1',
      latestAction: 'Referred to committee',
      latestActionDate: '2025-01-05',
    });

    const result = detectAndRecord(billTracking, mapping, [bill], { now: fixedClock(NOW), logger });

    expect(result.updates).toEqual([
      {
        kind: 'status_change',
        key: '119-hr-1',
        entity: bill,
        previous: { primary: 'Referred to committee', secondary: '2025-01-01' },
      },
    ]);
    expect(mapping['119-hr-1'].last_action_date).toBe('2025-01-05');
    expect(mapping['119-hr-1'].first_seen).toBe('2025-01-02T08:00:00.000Z');
    expect(mapping['119-hr-1'].last_updated).toBe(NOW);
  });

  it('should report a status change when only the action text moves', () => {
    mapping['119-hr-1'] = storedBill();

    const result = detectAndRecord(
      billTracking,
      mapping,
      [makeBill({ billId: '119-hr-1', latestAction: 'Reported by committee', latestActionDate: '2025-01-01' })],
      { now: fixedClock(NOW), logger }
    );

    expect(result.updates).toHaveLength(1);
    expect(result.updates[0].kind).toBe('status_change');
  });

  it('should leave an unchanged bill untouched', () => {
    const before = storedBill();
    mapping['119-hr-1'] = { ...before };

    const result = detectAndRecord(
      billTracking,
      mapping,
      [makeBill({ billId: '119-hr-1', latestAction: 'Referred to committee', latestActionDate: '2025-01-01' })],
      { now: fixedClock(NOW), logger }
    );

    expect(result.updates).toEqual([]);
    expect(mapping['119-hr-1']).toEqual(before);
  });

  it('should skip a record without identity and keep going', () => {
    const bills = [makeBill({ billId: '119-hr-1' }), makeBill({ billId: '' }), makeBill({ billId: '119-hr-2' })];

    const result = detectAndRecord(billTracking, mapping, bills, { now: fixedClock(NOW), logger });

    expect(result.updates.map((u) => u.key)).toEqual(['119-hr-1', '119-hr-2']);
    expect(result.skipped).toBe(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith({ kind: 'bills', index: 1 }, 'Skipping record without identity key');
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should treat a whitespace-only identity as missing', () => {
    const result = detectAndRecord(billTracking, mapping, [makeBill({ billId: '   ' })], {
      now: fixedClock(NOW),
      logger,
    });

    expect(result.updates).toEqual([]);
    expect(mapping).toEqual({});
  });

  it('should log an error when every record lacks identity', () => {
    const result = detectAndRecord(billTracking, mapping, [makeBill({ billId: '' }), makeBill({ billId: '' })], {
      now: fixedClock(NOW),
      logger,
    });

    expect(result).toEqual({ updates: [], skipped: 2 });
    expect(logger.error).toHaveBeenCalledWith(
      { kind: 'bills', records: 2 },
      'Every fetched record lacked an identity key'
    );
  });

  it('should not log an error for an empty batch', () => {
    const result = detectAndRecord(billTracking, mapping, [], { now: fixedClock(NOW), logger });

    expect(result).toEqual({ updates: [], skipped: 0 });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should report nothing when the same batch is recorded twice', () => {
    const bills = [makeBill({ billId: '119-hr-1' }), makeBill({ billId: '119-hr-2' })];

    const first = detectAndRecord(billTracking, mapping, bills, { now: fixedClock(NOW), logger });
    const second = detectAndRecord(billTracking, mapping, bills, { now: fixedClock(NOW), logger });

    expect(first.updates).toHaveLength(2);
    expect(second.updates).toEqual([]);
  });

  it('should grow the mapping by exactly the number of new updates and keep absent keys', () => {
    mapping['119-hr-1'] = storedBill();
    mapping['119-hr-old'] = storedBill({ bill_id: '119-hr-old' });
    const bills = [
      makeBill({ billId: '119-hr-1', latestAction: 'Passed House', latestActionDate: '2025-02-01' }),
      makeBill({ billId: '119-hr-7' }),
    ];

    const result = detectAndRecord(billTracking, mapping, bills, { now: fixedClock(NOW), logger });
    const newCount = result.updates.filter((u) => u.kind === 'new').length;

    expect(newCount).toBe(1);
    expect(Object.keys(mapping)).toHaveLength(2 + newCount);
    expect(mapping['119-hr-old']).toEqual(storedBill({ bill_id: '119-hr-old' }));
  });

  it('should keep updates in input order across kinds', () => {
    mapping['119-hr-2'] = storedBill({ bill_id: '119-hr-2' });
    const bills = [
      makeBill({ billId: '119-hr-3' }),
      makeBill({ billId: '119-hr-2', latestAction: 'Passed House' }),
      makeBill({ billId: '119-hr-1' }),
    ];

    const result = detectAndRecord(billTracking, mapping, bills, { now: fixedClock(NOW), logger });

    expect(result.updates.map((u) => [u.kind, u.key])).toEqual([
      ['new', '119-hr-3'],
      ['status_change', '119-hr-2'],
      ['new', '119-hr-1'],
    ]);
  });

  it('should never move last_updated backwards', () => {
    const future = '2030-01-01T00:00:00.000Z';
    mapping['119-hr-1'] = storedBill({ last_updated: future });

    detectAndRecord(billTracking, mapping, [makeBill({ billId: '119-hr-1', latestAction: 'Became law' })], {
      now: fixedClock(NOW),
      logger,
    });

    expect(mapping['119-hr-1'].last_action).toBe('Became law');
    expect(mapping['119-hr-1'].last_updated).toBe(future);
  });

  it('should log a summary at info level', () => {
    detectAndRecord(billTracking, mapping, [makeBill({ billId: '119-hr-1' })], { now: fixedClock(NOW), logger });

    expect(logger.info).toHaveBeenCalledWith(
      { kind: 'bills', fetched: 1, new: 1, statusChanges: 0, skipped: 0 },
      'Bills: change detection complete'
    );
  });
});

describe('planChanges', () => {
  it('should not modify the mapping', () => {
    const mapping: TrackedMapping<BillSummary> = { '119-hr-1': storedBill() };
    const before = structuredClone(mapping);

    const plan = planChanges(
      billTracking,
      mapping,
      [makeBill({ billId: '119-hr-1', latestAction: 'Passed House' }), makeBill({ billId: '119-hr-2' })],
      { now: fixedClock(NOW), logger: createFakeLogger() }
    );

    expect(plan.updates).toHaveLength(2);
    expect(plan.writes.map((w) => w.key)).toEqual(['119-hr-1', '119-hr-2']);
    expect(mapping).toEqual(before);
  });

  it('should compare a repeated key against its earlier occurrence in the batch', () => {
    const mapping: TrackedMapping<BillSummary> = {};
    const plan = planChanges(
      billTracking,
      mapping,
      [
        makeBill({ billId: '119-hr-1', latestAction: 'Introduced in House' }),
        makeBill({ billId: '119-hr-1', latestAction: 'Introduced in House' }),
        makeBill({ billId: '119-hr-1', latestAction: 'Referred to committee' }),
      ],
      { now: fixedClock(NOW), logger: createFakeLogger() }
    );

    expect(plan.updates.map((u) => u.kind)).toEqual(['new', 'status_change']);

    applyChanges(mapping, plan);
    expect(mapping['119-hr-1'].last_action).toBe('Referred to committee');
    expect(mapping['119-hr-1'].first_seen).toBe(NOW);
  });
});

describe('groupUpdatesByKind', () => {
  it('should split updates and keep their relative order', () => {
    const a = makeBill({ billId: 'a' });
    const b = makeBill({ billId: 'b' });
    const c = makeBill({ billId: 'c' });
    const previous = { primary: null, secondary: null };

    const grouped = groupUpdatesByKind([
      { kind: 'status_change', key: 'a', entity: a, previous },
      { kind: 'new', key: 'b', entity: b },
      { kind: 'status_change', key: 'c', entity: c, previous },
    ]);

    expect(grouped.new.map((u) => u.key)).toEqual(['b']);
    expect(grouped.status_change.map((u) => u.key)).toEqual(['a', 'c']);
  });
});
