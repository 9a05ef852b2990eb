/**
 * Renders a topology as a Graphviz digraph
 */

import { DEAD_LETTER_EXCHANGE_ARGUMENT } from './governance';
import type { BindingRecord, Topology } from './rabbitmq-topology';

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`;
}

export function exchangeNodeId(name: string): string {
  return quote(`exchange:${name}`);
}

export function queueNodeId(name: string): string {
  return quote(`queue:${name}`);
}

function destinationNodeId(binding: BindingRecord): string {
  return binding.destination_type === 'exchange'
    ? exchangeNodeId(binding.destination)
    : queueNodeId(binding.destination);
}

export function renderTopologyGraph(topology: Topology): string {
  const snapshot = topology.toSnapshot();
  const lines = ['digraph topology {', '  rankdir=LR;'];

  for (const exchange of snapshot.exchanges) {
    lines.push(`  ${exchangeNodeId(exchange.name)} [shape=box, label=${quote(`${exchange.name}\n(${exchange.type})`)}];`);
  }
  for (const queue of snapshot.queues) {
    lines.push(`  ${queueNodeId(queue.name)} [shape=ellipse, label=${quote(queue.name)}];`);
  }
  for (const binding of snapshot.bindings) {
    lines.push(
      `  ${exchangeNodeId(binding.source)} -> ${destinationNodeId(binding)} [label=${quote(binding.routing_key)}];`
    );
  }
  for (const queue of snapshot.queues) {
    const dlx = queue.arguments[DEAD_LETTER_EXCHANGE_ARGUMENT];
    if (typeof dlx === 'string' && dlx !== '') {
      lines.push(`  ${queueNodeId(queue.name)} -> ${exchangeNodeId(dlx)} [style=dashed, label="dead-letter"];`);
    }
  }

  lines.push('}');
  return `${lines.join('\n')}\n`;
}
