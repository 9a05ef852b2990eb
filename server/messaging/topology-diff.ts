/**
 * Topology Diff
 * Keyed structural diff between an expected and an actual record sequence.
 */

import {
  bindingKey,
  compareKeys,
  exchangeKey,
  queueKey,
  type Topology,
} from './rabbitmq-topology';

export interface DiffResult<K> {
  missing: Set<K>;
  extra: Set<K>;
  different: Set<K>;
}

export interface DiffOptions<K> {
  /** Called once per repeated key inside one sequence; the last record wins */
  onDuplicateKey?: (key: K, side: 'expected' | 'actual') => void;
}

export interface DiffReport {
  missing: string[];
  extra: string[];
  different: string[];
}

export interface TopologyDiff {
  exchanges: DiffReport;
  queues: DiffReport;
  bindings: DiffReport;
  inSync: boolean;
}

/**
 * Recursively sort object keys so that maps compare order-insensitively
 */
function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value).sort(([a], [b]) => compareKeys(a, b))) {
      sorted[key] = sortKeys(inner);
    }
    return sorted;
  }
  return value;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

export function recordsEqual(a: unknown, b: unknown): boolean {
  return canonicalJson(a) === canonicalJson(b);
}

function indexByKey<T, K>(
  records: readonly T[],
  keyOf: (record: T) => K,
  side: 'expected' | 'actual',
  options: DiffOptions<K>
): Map<K, T> {
  const index = new Map<K, T>();
  for (const record of records) {
    const key = keyOf(record);
    if (index.has(key)) {
      options.onDuplicateKey?.(key, side);
    }
    index.set(key, record);
  }
  return index;
}

export function diff<T, K>(
  expected: readonly T[],
  actual: readonly T[],
  keyOf: (record: T) => K,
  options: DiffOptions<K> = {}
): DiffResult<K> {
  const expectedIndex = indexByKey(expected, keyOf, 'expected', options);
  const actualIndex = indexByKey(actual, keyOf, 'actual', options);

  const result: DiffResult<K> = { missing: new Set(), extra: new Set(), different: new Set() };

  for (const [key, expectedRecord] of expectedIndex) {
    if (!actualIndex.has(key)) {
      result.missing.add(key);
    } else if (!recordsEqual(expectedRecord, actualIndex.get(key))) {
      result.different.add(key);
    }
  }

  for (const key of actualIndex.keys()) {
    if (!expectedIndex.has(key)) {
      result.extra.add(key);
    }
  }

  return result;
}

export function toDiffReport(result: DiffResult<string>): DiffReport {
  return {
    missing: [...result.missing].sort(compareKeys),
    extra: [...result.extra].sort(compareKeys),
    different: [...result.different].sort(compareKeys),
  };
}

function isEmptyReport(report: DiffReport): boolean {
  return report.missing.length === 0 && report.extra.length === 0 && report.different.length === 0;
}

export function diffTopologies(
  expected: Topology,
  actual: Topology,
  onDuplicateKey?: (entity: 'exchange' | 'queue' | 'binding', key: string, side: 'expected' | 'actual') => void
): TopologyDiff {
  const exchanges = toDiffReport(
    diff(expected.exchanges, actual.exchanges, exchangeKey, {
      onDuplicateKey: (key, side) => onDuplicateKey?.('exchange', key, side),
    })
  );
  const queues = toDiffReport(
    diff(expected.queues, actual.queues, queueKey, {
      onDuplicateKey: (key, side) => onDuplicateKey?.('queue', key, side),
    })
  );
  const bindings = toDiffReport(
    diff(expected.bindings, actual.bindings, bindingKey, {
      onDuplicateKey: (key, side) => onDuplicateKey?.('binding', key, side),
    })
  );

  return {
    exchanges,
    queues,
    bindings,
    inSync: isEmptyReport(exchanges) && isEmptyReport(queues) && isEmptyReport(bindings),
  };
}

/**
 * Set-based equality keyed by the diff key functions, not positional
 */
export function topologiesEqual(a: Topology, b: Topology): boolean {
  return diffTopologies(a, b).inSync;
}
