export type Reducer<TRecord, TValue> = (group: TRecord[]) => TValue;

export interface AggregatedGroup<TKey, TRow> {
  key: TKey;
  row: TRow;
}

/**
 * Groups records by key and reduces each group into one row.
 * Groups come out in `compareKeys` order; records keep their scan order inside a group,
 * so `first` and `latestBy` below see the order the records arrived in.
 */
export function aggregateBy<TRecord, TKey, TRow>(
  records: TRecord[],
  keyOf: (record: TRecord) => TKey,
  reduceGroup: (group: TRecord[], key: TKey) => TRow,
  compareKeys: (a: TKey, b: TKey) => number
): Array<AggregatedGroup<TKey, TRow>> {
  const groups = new Map<TKey, TRecord[]>();
  for (const record of records) {
    const key = keyOf(record);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(record);
    } else {
      groups.set(key, [record]);
    }
  }

  return Array.from(groups.keys())
    .sort(compareKeys)
    .map((key) => {
      const group = groups.get(key) ?? [];
      return { key, row: reduceGroup(group, key) };
    });
}

/** First non-null value in scan order. */
export function first<TRecord, TValue>(pick: (record: TRecord) => TValue | null): Reducer<TRecord, TValue | null> {
  return (group) => {
    for (const record of group) {
      const value = pick(record);
      if (value !== null) {
        return value;
      }
    }
    return null;
  };
}

export function max<TRecord>(pick: (record: TRecord) => string): Reducer<TRecord, string> {
  return (group) => group.reduce((best, record) => {
    const value = pick(record);
    return value > best ? value : best;
  }, "");
}

export function sum<TRecord>(pick: (record: TRecord) => number): Reducer<TRecord, number> {
  return (group) => group.reduce((total, record) => total + pick(record), 0);
}

/**
 * Non-null value of the record with the greatest `orderBy`; the earliest
 * record in scan order wins a tie.
 */
export function latestBy<TRecord, TValue>(
  pick: (record: TRecord) => TValue | null,
  orderBy: (record: TRecord) => string
): Reducer<TRecord, TValue | null> {
  return (group) => {
    let best: { order: string; value: TValue } | null = null;
    for (const record of group) {
      const value = pick(record);
      if (value === null) {
        continue;
      }
      const order = orderBy(record);
      if (!best || order > best.order) {
        best = { order, value };
      }
    }
    return best ? best.value : null;
  };
}
