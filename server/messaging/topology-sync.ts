/**
 * Topology Sync
 * Replays a topology onto a target broker with idempotent create calls.
 *
 * Tiers run strictly in order (exchanges, then queues, then bindings) since
 * bindings reference both. A rejected create is recorded and the run goes on;
 * a transport error thrown by the target aborts the run.
 */

import type { Logger } from '../bootstrap/logger';
import {
  bindingKey,
  exchangeKey,
  queueKey,
  type BindingRecord,
  type ExchangeRecord,
  type QueueRecord,
  type Topology,
} from './rabbitmq-topology';

export interface MutationResponse {
  /** Request target, e.g. `/api/queues/%2F/jobs` */
  target: string;
  status: number;
  payload?: unknown;
}

/**
 * What sync needs from a broker. The management API client implements it.
 */
export interface TopologyTarget {
  createExchange(exchange: ExchangeRecord): Promise<MutationResponse>;
  createQueue(queue: QueueRecord): Promise<MutationResponse>;
  createBinding(binding: BindingRecord): Promise<MutationResponse>;
  /** Request target used in the failure entry of an unsupported binding */
  bindingTarget(binding: BindingRecord): string;
}

export type SyncEntity = 'exchange' | 'queue' | 'binding';

export interface SyncFailure {
  entity: SyncEntity;
  /** Diff key of the record */
  key: string;
  target: string;
  status: number | null;
  error: unknown;
}

export interface SyncOptions {
  logger?: Pick<Logger, 'debug' | 'warn'>;
}

export const UNSUPPORTED_EXCHANGE_BINDING = 'exchange-to-exchange bindings are not supported';

/**
 * 201 Created and 204 No Content (already exists) are both success
 */
export function isSuccessfulMutation(status: number): boolean {
  return status >= 200 && status < 300;
}

async function replayTier<T>(
  entity: SyncEntity,
  records: readonly T[],
  keyOf: (record: T) => string,
  create: (record: T) => Promise<MutationResponse | SyncFailure>,
  failures: SyncFailure[],
  options: SyncOptions
): Promise<void> {
  for (const record of records) {
    const key = keyOf(record);
    const outcome = await create(record);

    if ('entity' in outcome) {
      failures.push(outcome);
      options.logger?.warn({ entity, key, reason: outcome.error }, 'Skipped unsupported create');
      continue;
    }

    options.logger?.debug({ entity, key, target: outcome.target, status: outcome.status }, 'Create call returned');
    if (!isSuccessfulMutation(outcome.status)) {
      failures.push({ entity, key, target: outcome.target, status: outcome.status, error: outcome.payload ?? null });
      options.logger?.warn({ entity, key, status: outcome.status }, 'Create call rejected by broker');
    }
  }
}

/**
 * @returns failures in replay order; empty when the target is fully synced
 */
export async function syncTopology(
  source: Topology,
  target: TopologyTarget,
  options: SyncOptions = {}
): Promise<SyncFailure[]> {
  const failures: SyncFailure[] = [];

  await replayTier('exchange', source.exchanges, exchangeKey, exchange => target.createExchange(exchange), failures, options);
  await replayTier('queue', source.queues, queueKey, queue => target.createQueue(queue), failures, options);
  await replayTier(
    'binding',
    source.bindings,
    bindingKey,
    async (binding): Promise<MutationResponse | SyncFailure> => {
      if (binding.destination_type === 'exchange') {
        return {
          entity: 'binding',
          key: bindingKey(binding),
          target: target.bindingTarget(binding),
          status: null,
          error: { reason: UNSUPPORTED_EXCHANGE_BINDING },
        };
      }
      return target.createBinding(binding);
    },
    failures,
    options
  );

  return failures;
}
