/**
 * Topology Source
 * Resolves a command argument to a topology: a snapshot file or a live broker
 */

import fs from 'fs/promises';
import type { Logger } from '../bootstrap/logger';
import { canonicalizeTopology, type CanonicalizeOptions } from '../messaging/canonical-topology';
import type { Topology } from '../messaging/rabbitmq-topology';
import {
  RabbitMQManagementClient,
  resolveManagementUrl,
  type Credentials,
  type ResolveOptions,
} from './rabbitmq-management';
import { SnapshotError } from './rabbitmq-errors';
import { readSnapshot } from './snapshot-store';

export interface BrokerOptions extends ResolveOptions {
  credentials: Credentials;
}

export interface SourceOptions extends BrokerOptions, CanonicalizeOptions {
  logger?: Pick<Logger, 'info' | 'debug'>;
}

export async function isSnapshotPath(ref: string): Promise<boolean> {
  if (ref.toLowerCase().endsWith('.json')) {
    return true;
  }
  try {
    const stats = await fs.stat(ref);
    return stats.isFile();
  } catch (error) {
    // no such file: the argument is a broker address
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false;
    }
    throw new SnapshotError('Cannot inspect snapshot path', ref, error);
  }
}

export async function connectBroker(address: string, options: BrokerOptions): Promise<RabbitMQManagementClient> {
  const baseUrl = await resolveManagementUrl(address, options);
  return new RabbitMQManagementClient({
    baseUrl,
    credentials: options.credentials,
    timeoutMs: options.timeoutMs,
    http: options.http,
  });
}

export async function loadTopology(ref: string, options: SourceOptions): Promise<Topology> {
  if (await isSnapshotPath(ref)) {
    options.logger?.debug({ snapshot: ref }, 'Loading topology snapshot');
    return readSnapshot(ref);
  }

  const client = await connectBroker(ref, options);
  options.logger?.info({ broker: client.baseUrl }, 'Querying broker topology');
  const raw = await client.fetchRawTopology();
  return canonicalizeTopology(raw, { includeTransient: options.includeTransient });
}
