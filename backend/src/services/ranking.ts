export type Direction = 'asc' | 'desc';

export type Comparator<T> = (a: T, b: T) => number;

type SortKey = string | number | null;

export type PartitionSpec<T> = {
  partitionBy: (row: T) => SortKey;
  orderBy: Comparator<T>[];
};

export type Ranked<T> = {
  row: T;
  rank: number;
};

/**
 * Orders by the selected key. Nulls sort after every value in either direction.
 */
export function compareBy<T>(select: (row: T) => SortKey, direction: Direction = 'asc'): Comparator<T> {
  const sign = direction === 'asc' ? 1 : -1;
  return (a, b) => {
    const left = select(a);
    const right = select(b);
    if (left === right) return 0;
    if (left === null) return 1;
    if (right === null) return -1;
    if (typeof left === 'number' && typeof right === 'number') {
      return (left - right) * sign;
    }
    const l = String(left);
    const r = String(right);
    return (l < r ? -1 : l > r ? 1 : 0) * sign;
  };
}

export function chain<T>(comparators: Comparator<T>[]): Comparator<T> {
  return (a, b) => {
    for (const compare of comparators) {
      const result = compare(a, b);
      if (result !== 0) return result;
    }
    return 0;
  };
}

export function groupBy<T, K>(rows: Iterable<T>, key: (row: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const row of rows) {
    const k = key(row);
    const bucket = groups.get(k);
    if (bucket) {
      bucket.push(row);
    } else {
      groups.set(k, [row]);
    }
  }
  return groups;
}

/**
 * ROW_NUMBER() OVER (PARTITION BY … ORDER BY …). Array#sort is stable, so rows
 * the comparators treat as equal keep their input order. Partitions come back
 * in first-seen order.
 */
export function rankWithinPartitions<T>(rows: Iterable<T>, spec: PartitionSpec<T>): Ranked<T>[] {
  const compare = chain(spec.orderBy);
  const ranked: Ranked<T>[] = [];
  for (const partition of groupBy(rows, spec.partitionBy).values()) {
    const sorted = [...partition].sort(compare);
    sorted.forEach((row, index) => {
      ranked.push({ row, rank: index + 1 });
    });
  }
  return ranked;
}

export function topPerPartition<T>(rows: Iterable<T>, spec: PartitionSpec<T>, limit: number): Ranked<T>[] {
  return rankWithinPartitions(rows, spec).filter((entry) => entry.rank <= limit);
}

export function* concatSequences<T>(...sequences: Iterable<T>[]): Generator<T> {
  for (const sequence of sequences) {
    yield* sequence;
  }
}
