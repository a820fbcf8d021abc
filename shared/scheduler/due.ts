import { isDue } from './engine';
import type { ReviewRecord } from './types';

function compareDue(a: ReviewRecord, b: ReviewRecord): number {
  const byDue = Date.parse(a.due_at) - Date.parse(b.due_at);
  if (byDue !== 0) return byDue;
  if (a.item_id < b.item_id) return -1;
  if (a.item_id > b.item_id) return 1;
  return 0;
}

/**
 * Records whose due instant is at or before `now`, oldest first.
 * Ties are broken by item_id so the order is stable across calls.
 */
export function dueItems(records: Iterable<ReviewRecord>, now: Date): ReviewRecord[] {
  const due: ReviewRecord[] = [];
  for (const record of records) {
    if (isDue(record, now)) due.push(record);
  }
  return due.sort(compareDue);
}

export function dueCount(records: Iterable<ReviewRecord>, now: Date): number {
  let count = 0;
  for (const record of records) {
    if (isDue(record, now)) count++;
  }
  return count;
}

/**
 * Pick the catalogue items that are due for review, in due order.
 * Items without a review record are not part of the review queue.
 */
export function filterDue<T>(
  items: readonly T[],
  records: Iterable<ReviewRecord>,
  now: Date,
  getId: (item: T) => string
): T[] {
  const itemsById = new Map<string, T>();
  for (const item of items) {
    itemsById.set(getId(item), item);
  }

  const result: T[] = [];
  for (const record of dueItems(records, now)) {
    const item = itemsById.get(record.item_id);
    if (item !== undefined) result.push(item);
  }
  return result;
}
