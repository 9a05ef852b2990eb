/**
 * Topology Governance Checks
 *
 * Advisory rules over a canonicalized, permanent-only topology. A check never
 * fails; it only lists the resources that break the rule.
 */

import {
  resourceIdentity,
  type BindingRecord,
  type ConsumerCounts,
  type ExchangeRecord,
  type QueueRecord,
  type Topology,
} from './rabbitmq-topology';

export const MESSAGE_TTL_ARGUMENT = 'x-message-ttl';
export const DEAD_LETTER_EXCHANGE_ARGUMENT = 'x-dead-letter-exchange';

export enum GovernanceRule {
  UNBOUND_QUEUES = 'unbound_queues',
  UNBOUND_EXCHANGES = 'unbound_exchanges',
  NO_CONSUMERS_NO_TTL = 'no_consumers_no_ttl',
  NO_CONSUMERS_NO_DLX = 'no_consumers_no_dlx',
}

export type GovernanceReport = Record<GovernanceRule, string[]>;

export const RULE_DESCRIPTIONS: Record<GovernanceRule, string> = {
  [GovernanceRule.UNBOUND_QUEUES]: 'Queue has no binding routing messages into it',
  [GovernanceRule.UNBOUND_EXCHANGES]: 'Exchange is not bound anywhere and is nobody\'s dead-letter exchange',
  [GovernanceRule.NO_CONSUMERS_NO_TTL]: 'Queue has no consumers and no message TTL, so messages can pile up',
  [GovernanceRule.NO_CONSUMERS_NO_DLX]: 'Queue has no consumers and no dead-letter exchange for its messages',
};

function uniqueNames(records: readonly { name: string }[]): string[] {
  return [...new Set(records.map(record => record.name))];
}

function hasArgument(queue: QueueRecord, argument: string): boolean {
  return queue.arguments[argument] !== undefined && queue.arguments[argument] !== null;
}

export function findUnboundQueues(
  queues: readonly QueueRecord[],
  bindings: readonly BindingRecord[]
): string[] {
  const boundQueues = new Set(
    bindings.filter(binding => binding.destination_type === 'queue').map(binding => binding.destination)
  );
  return uniqueNames(queues.filter(queue => !boundQueues.has(queue.name)));
}

/**
 * Dead-letter wiring counts as a binding for reachability
 */
export function findUnboundExchanges(
  exchanges: readonly ExchangeRecord[],
  bindings: readonly BindingRecord[],
  queues: readonly QueueRecord[]
): string[] {
  const referenced = new Set<string>();
  for (const binding of bindings) {
    referenced.add(binding.source);
    if (binding.destination_type === 'exchange') {
      referenced.add(binding.destination);
    }
  }
  for (const queue of queues) {
    const dlx = queue.arguments[DEAD_LETTER_EXCHANGE_ARGUMENT];
    if (typeof dlx === 'string') {
      referenced.add(dlx);
    }
  }
  return uniqueNames(exchanges.filter(exchange => !referenced.has(exchange.name)));
}

/**
 * Queues with an unknown consumer count (snapshot input) are not flagged
 */
function idleQueues(queues: readonly QueueRecord[], consumerCounts: ConsumerCounts): QueueRecord[] {
  return queues.filter(queue => consumerCounts.get(resourceIdentity(queue)) === 0);
}

export function findQueuesWithoutTtl(queues: readonly QueueRecord[], consumerCounts: ConsumerCounts): string[] {
  return uniqueNames(idleQueues(queues, consumerCounts).filter(queue => !hasArgument(queue, MESSAGE_TTL_ARGUMENT)));
}

export function findQueuesWithoutDlx(queues: readonly QueueRecord[], consumerCounts: ConsumerCounts): string[] {
  return uniqueNames(
    idleQueues(queues, consumerCounts).filter(queue => !hasArgument(queue, DEAD_LETTER_EXCHANGE_ARGUMENT))
  );
}

export function checkTopology(topology: Topology): GovernanceReport {
  return {
    [GovernanceRule.UNBOUND_QUEUES]: findUnboundQueues(topology.queues, topology.bindings),
    [GovernanceRule.UNBOUND_EXCHANGES]: findUnboundExchanges(topology.exchanges, topology.bindings, topology.queues),
    [GovernanceRule.NO_CONSUMERS_NO_TTL]: findQueuesWithoutTtl(topology.queues, topology.consumerCounts),
    [GovernanceRule.NO_CONSUMERS_NO_DLX]: findQueuesWithoutDlx(topology.queues, topology.consumerCounts),
  };
}

export function countFindings(report: GovernanceReport): number {
  return Object.values(report).reduce((total, names) => total + names.length, 0);
}
