/**
 * Canonical Topology
 * Turns raw management API records into configuration-only records so two
 * brokers can be compared on what was declared, not on runtime state.
 *
 * Pipeline per entity, in this order:
 *   exchanges: parse -> isUserExchange -> isPermanent -> strip statistics
 *   queues:    parse -> isPermanent -> strip runtime fields
 *   bindings:  parse -> hasDeclaredSource -> strip properties_key
 *
 * Consumer counts are runtime data that the queue strip removes, so they are
 * captured from the parsed queues before any cleaning happens.
 */

import {
  Topology,
  parseBinding,
  parseExchange,
  parseQueue,
  resourceIdentity,
  type BindingRecord,
  type ExchangeRecord,
  type QueueRecord,
  type RawTopologyRecords,
} from './rabbitmq-topology';

export const INTERNAL_EXCHANGE_PREFIX = 'amq.';

// Statistics, applied policies and audit metadata the management API attaches
export const EXCHANGE_STATISTICS_FIELDS: ReadonlySet<string> = new Set([
  'message_stats',
  'incoming',
  'outgoing',
  'policy',
  'operator_policy',
  'effective_policy_definition',
  'user_who_performed_action',
]);

export const QUEUE_RUNTIME_FIELDS: ReadonlySet<string> = new Set([
  'node',
  'leader',
  'members',
  'online',
  'consumers',
  'consumer_details',
  'consumer_utilisation',
  'consumer_capacity',
  'active_consumers',
  'exclusive_consumer_tag',
  'single_active_consumer_tag',
  'memory',
  'idle_since',
  'head_message_timestamp',
  'backing_queue_status',
  'policy',
  'operator_policy',
  'effective_policy_definition',
  'slave_nodes',
  'synchronised_slave_nodes',
  'recoverable_slaves',
  'state',
  'garbage_collection',
  'reductions',
  'user_who_performed_action',
]);

// messages, messages_ready, message_bytes_ram, message_stats, ...
const QUEUE_RUNTIME_PREFIXES = ['messages', 'message_'];

export const BINDING_INTERNAL_FIELDS: ReadonlySet<string> = new Set(['properties_key']);

export interface CanonicalizeOptions {
  /** Keep durable=false / auto_delete=true resources */
  includeTransient?: boolean;
}

export function isUserExchange(exchange: ExchangeRecord): boolean {
  return exchange.name !== '' && !exchange.name.startsWith(INTERNAL_EXCHANGE_PREFIX) && !exchange.internal;
}

export function isPermanent(resource: { durable: boolean; auto_delete: boolean }): boolean {
  return resource.durable && !resource.auto_delete;
}

export function hasDeclaredSource(binding: BindingRecord): boolean {
  return binding.source !== '';
}

function isQueueRuntimeField(key: string): boolean {
  return (
    QUEUE_RUNTIME_FIELDS.has(key) ||
    key.endsWith('_details') ||
    QUEUE_RUNTIME_PREFIXES.some(prefix => key.startsWith(prefix))
  );
}

function omitKeys(record: Record<string, unknown>, drop: (key: string) => boolean): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!drop(key)) out[key] = value;
  }
  return out;
}

// Parse, strip, then parse again: the stripped keys are never part of the
// declared shape, so the second pass only restores the record type.
export function cleanExchange(raw: unknown): ExchangeRecord {
  return parseExchange(omitKeys(parseExchange(raw), key => EXCHANGE_STATISTICS_FIELDS.has(key)));
}

export function cleanQueue(raw: unknown): QueueRecord {
  return parseQueue(omitKeys(parseQueue(raw), isQueueRuntimeField));
}

export function cleanBinding(raw: unknown): BindingRecord {
  return parseBinding(omitKeys(parseBinding(raw), key => BINDING_INTERNAL_FIELDS.has(key)));
}

export function canonicalizeExchanges(
  raw: readonly unknown[],
  options: CanonicalizeOptions = {}
): ExchangeRecord[] {
  return raw
    .map(parseExchange)
    .filter(isUserExchange)
    .filter(exchange => options.includeTransient || isPermanent(exchange))
    .map(cleanExchange);
}

export function canonicalizeQueues(raw: readonly unknown[], options: CanonicalizeOptions = {}): QueueRecord[] {
  return raw
    .map(parseQueue)
    .filter(queue => options.includeTransient || isPermanent(queue))
    .map(cleanQueue);
}

export function canonicalizeBindings(raw: readonly unknown[]): BindingRecord[] {
  return raw.map(parseBinding).filter(hasDeclaredSource).map(cleanBinding);
}

/**
 * Read the live consumer count of every raw queue that reports one
 */
export function captureConsumerCounts(rawQueues: readonly unknown[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const raw of rawQueues) {
    const queue = parseQueue(raw);
    if (typeof queue.consumers === 'number') {
      counts.set(resourceIdentity(queue), queue.consumers);
    }
  }
  return counts;
}

export function canonicalizeTopology(raw: RawTopologyRecords, options: CanonicalizeOptions = {}): Topology {
  const consumerCounts = captureConsumerCounts(raw.queues);

  return new Topology({
    exchanges: canonicalizeExchanges(raw.exchanges, options),
    queues: canonicalizeQueues(raw.queues, options),
    bindings: canonicalizeBindings(raw.bindings),
    consumerCounts,
  });
}
