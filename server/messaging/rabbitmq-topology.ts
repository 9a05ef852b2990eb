/**
 * RabbitMQ Topology Model
 * Typed records for exchanges, queues and bindings and the immutable
 * container that groups them for one command run.
 */

import { z } from 'zod';
import { StructuralError, type EntityKind } from '../services/rabbitmq-errors';

const argumentsSchema = z.record(z.unknown()).default({});

// Keys outside the declared shape pass through untouched: they are the
// broker-specific attribute map and take part in equality.
export const exchangeRecordSchema = z
  .object({
    name: z.string(),
    vhost: z.string(),
    // plugin exchange types (x-delayed-message, x-consistent-hash) are valid too
    type: z.string().min(1),
    durable: z.boolean(),
    auto_delete: z.boolean(),
    internal: z.boolean().default(false),
    arguments: argumentsSchema,
  })
  .passthrough();

export const queueRecordSchema = z
  .object({
    name: z.string(),
    vhost: z.string(),
    durable: z.boolean(),
    auto_delete: z.boolean(),
    arguments: argumentsSchema,
  })
  .passthrough();

export const bindingRecordSchema = z
  .object({
    source: z.string(),
    destination: z.string(),
    destination_type: z.enum(['queue', 'exchange']),
    routing_key: z.string().default(''),
    vhost: z.string(),
    arguments: argumentsSchema,
  })
  .passthrough();

const snapshotSchema = z.object({
  exchanges: z.array(z.unknown()),
  queues: z.array(z.unknown()),
  bindings: z.array(z.unknown()),
});

export type ExchangeRecord = z.infer<typeof exchangeRecordSchema>;
export type QueueRecord = z.infer<typeof queueRecordSchema>;
export type BindingRecord = z.infer<typeof bindingRecordSchema>;

export interface TopologySnapshot {
  exchanges: ExchangeRecord[];
  queues: QueueRecord[];
  bindings: BindingRecord[];
}

/**
 * Raw arrays as returned by the management API, before canonicalization
 */
export interface RawTopologyRecords {
  exchanges: readonly unknown[];
  queues: readonly unknown[];
  bindings: readonly unknown[];
}

/**
 * Live consumer counts keyed by {@link resourceIdentity}. Only a broker
 * query can supply them; snapshots carry none.
 */
export type ConsumerCounts = ReadonlyMap<string, number>;

export interface TopologyParts {
  exchanges: readonly ExchangeRecord[];
  queues: readonly QueueRecord[];
  bindings: readonly BindingRecord[];
  consumerCounts?: ConsumerCounts;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length ? issue.path.join('.') : '(record)'}: ${issue.message}`)
    .join('; ');
}

function parseRecord<S extends z.ZodTypeAny>(schema: S, entity: EntityKind, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new StructuralError(entity, formatIssues(result.error), raw);
  }
  return result.data;
}

export function parseExchange(raw: unknown): ExchangeRecord {
  return parseRecord(exchangeRecordSchema, 'exchange', raw);
}

export function parseQueue(raw: unknown): QueueRecord {
  return parseRecord(queueRecordSchema, 'queue', raw);
}

export function parseBinding(raw: unknown): BindingRecord {
  return parseRecord(bindingRecordSchema, 'binding', raw);
}

/**
 * Namespace-qualified identity of an exchange or queue
 */
export function resourceIdentity(record: { vhost: string; name: string }): string {
  return JSON.stringify([record.vhost, record.name]);
}

function requireString(entity: EntityKind, record: Record<string, unknown>, field: string): string {
  const value = record[field];
  if (typeof value !== 'string') {
    throw new StructuralError(entity, `${field}: Required`, record);
  }
  return value;
}

export function exchangeKey(record: { name?: unknown }): string {
  return requireString('exchange', record, 'name');
}

export function queueKey(record: { name?: unknown }): string {
  return requireString('queue', record, 'name');
}

/**
 * routing_key is left out on purpose: a routing-key change shows up as a
 * "different" binding instead of a remove/add pair.
 */
export function bindingKey(record: {
  source?: unknown;
  destination?: unknown;
  destination_type?: unknown;
}): string {
  const source = requireString('binding', record, 'source');
  const destination = requireString('binding', record, 'destination');
  const destinationType = requireString('binding', record, 'destination_type');
  return `${source} -> ${destinationType}:${destination}`;
}

export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function sortedBy<T>(records: readonly T[], keyOf: (record: T) => string): T[] {
  return [...records].sort((a, b) => compareKeys(keyOf(a), keyOf(b)));
}

function assertUniqueNames(entity: EntityKind, records: readonly { vhost: string; name: string }[]): void {
  const seen = new Set<string>();
  for (const record of records) {
    const identity = resourceIdentity(record);
    if (seen.has(identity)) {
      throw new StructuralError(entity, `duplicate name "${record.name}" in vhost "${record.vhost}"`, record);
    }
    seen.add(identity);
  }
}

/**
 * One topology per command run. Built from a trusted snapshot or from a
 * canonicalized broker query, and never mutated afterwards.
 */
export class Topology {
  readonly exchanges: readonly ExchangeRecord[];
  readonly queues: readonly QueueRecord[];
  readonly bindings: readonly BindingRecord[];
  readonly consumerCounts: ConsumerCounts;

  constructor(parts: TopologyParts) {
    assertUniqueNames('exchange', parts.exchanges);
    assertUniqueNames('queue', parts.queues);

    this.exchanges = Object.freeze([...parts.exchanges]);
    this.queues = Object.freeze([...parts.queues]);
    this.bindings = Object.freeze([...parts.bindings]);
    this.consumerCounts = new Map(parts.consumerCounts ?? []);
  }

  /**
   * Load a previously saved snapshot. Records are validated but not
   * canonicalized again.
   */
  static fromSnapshot(document: unknown): Topology {
    const result = snapshotSchema.safeParse(document);
    if (!result.success) {
      throw new StructuralError('snapshot', formatIssues(result.error), document);
    }

    return new Topology({
      exchanges: result.data.exchanges.map(parseExchange),
      queues: result.data.queues.map(parseQueue),
      bindings: result.data.bindings.map(parseBinding),
    });
  }

  /**
   * Snapshot document with every sequence sorted by its diff key
   */
  toSnapshot(): TopologySnapshot {
    return {
      exchanges: sortedBy(this.exchanges, exchangeKey),
      queues: sortedBy(this.queues, queueKey),
      bindings: sortedBy(this.bindings, bindingKey),
    };
  }

  getStats(): { exchanges: number; queues: number; bindings: number } {
    return {
      exchanges: this.exchanges.length,
      queues: this.queues.length,
      bindings: this.bindings.length,
    };
  }
}
