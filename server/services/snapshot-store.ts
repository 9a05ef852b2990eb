/**
 * Snapshot Store
 * Plain JSON persistence of a canonical topology
 */

import fs from 'fs/promises';
import { Topology } from '../messaging/rabbitmq-topology';
import { SnapshotError } from './rabbitmq-errors';

export function serializeSnapshot(topology: Topology): string {
  return `${JSON.stringify(topology.toSnapshot(), null, 2)}\n`;
}

/**
 * Snapshots are trusted: they are validated but not canonicalized again
 */
export async function readSnapshot(path: string): Promise<Topology> {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf8');
  } catch (error) {
    throw new SnapshotError('Cannot read snapshot', path, error);
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new SnapshotError('Snapshot is not valid JSON', path, error);
  }
  return Topology.fromSnapshot(document);
}

export async function writeSnapshot(path: string, topology: Topology): Promise<void> {
  try {
    await fs.writeFile(path, serializeSnapshot(topology), 'utf8');
  } catch (error) {
    throw new SnapshotError('Cannot write snapshot', path, error);
  }
}
