import type { Priority, PriorityKeywords } from '../types/index.js';

/**
 * Tag a title by the first matching keyword: critical before high, otherwise normal.
 * Matching is a case-insensitive substring test.
 */
export function determinePriority(text: string, keywords: PriorityKeywords | undefined): Priority {
  if (!keywords) {
    return 'normal';
  }
  const lower = text.toLowerCase();
  if (keywords.critical.some((keyword) => lower.includes(keyword.toLowerCase()))) {
    return 'critical';
  }
  if (keywords.high.some((keyword) => lower.includes(keyword.toLowerCase()))) {
    return 'high';
  }
  return 'normal';
}

const PRIORITY_ORDER: Record<Priority, number> = { critical: 0, high: 1, normal: 2 };

/**
 * Stable sort, critical first
 */
export function sortByPriority<T extends { priority: Priority }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]);
}
