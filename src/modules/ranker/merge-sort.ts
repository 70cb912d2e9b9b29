/**
 * Top-down merge sort, descending by score.
 *
 * Ties go to the left half, so equal scores keep their input order. Ranking
 * output depends on this tie-break; do not swap in Array.prototype.sort.
 */

export interface Scored {
  score: number;
}

export function mergeSortDescending<T extends Scored>(items: readonly T[]): T[] {
  const sorted = [...items];
  if (sorted.length > 1) {
    sortRange(sorted, 0, sorted.length - 1);
  }
  return sorted;
}

/** Sorts the inclusive range [begin, end] in place. */
function sortRange<T extends Scored>(items: T[], begin: number, end: number): void {
  if (begin >= end) return;

  const mid = Math.floor((begin + end) / 2);
  sortRange(items, begin, mid);
  sortRange(items, mid + 1, end);
  merge(items, begin, mid, end);
}

function merge<T extends Scored>(items: T[], begin: number, mid: number, end: number): void {
  const left = items.slice(begin, mid + 1);
  const right = items.slice(mid + 1, end + 1);

  let i = 0;
  let j = 0;
  let k = begin;

  while (i < left.length && j < right.length) {
    if (left[i].score >= right[j].score) {
      items[k++] = left[i++];
    } else {
      items[k++] = right[j++];
    }
  }
  while (i < left.length) items[k++] = left[i++];
  while (j < right.length) items[k++] = right[j++];
}
