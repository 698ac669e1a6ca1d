import { describe, it, expect } from 'vitest';
import { daysAgo, daysUntil, isoDay } from './dates.js';

const NOW = new Date('2025-03-10T23:30:00.000Z');

describe('dates', () => {
  it('should format the UTC calendar day', () => {
    expect(isoDay(NOW)).toBe('2025-03-10');
  });

  it('should step back whole days across a month boundary', () => {
    expect(daysAgo(NOW, 14)).toBe('2025-02-24');
  });

  it('should count calendar days regardless of the time of day', () => {
    expect(daysUntil('2025-03-11', NOW)).toBe(1);
    expect(daysUntil('2025-03-10', NOW)).toBe(0);
    expect(daysUntil('2025-01-01', NOW)).toBe(-68);
  });

  it('should accept a timestamp and reject anything else', () => {
    expect(daysUntil('2025-03-12T00:00:00Z', NOW)).toBe(2);
    expect(daysUntil('March 12', NOW)).toBeNull();
    expect(daysUntil(null, NOW)).toBeNull();
  });
});
