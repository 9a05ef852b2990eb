/**
 * Topology Error Classification
 * Separates failures that abort a command from the ones sync records and skips
 */

export type EntityKind = 'exchange' | 'queue' | 'binding' | 'snapshot';

/**
 * Base class for every error the topology tooling throws
 */
export abstract class TopologyError extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * A record is missing an identity field or has the wrong shape.
 * Fatal for the current command.
 */
export class StructuralError extends TopologyError {
  constructor(
    public readonly entity: EntityKind,
    message: string,
    public readonly record?: unknown
  ) {
    super(`Malformed ${entity} record: ${message}`);
  }
}

/**
 * The broker is unreachable or answered a query with something unusable.
 * Fatal for the current command, never retried.
 */
export class TransportError extends TopologyError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    originalError?: unknown
  ) {
    super(message, originalError);
  }
}

/**
 * A snapshot file could not be read or parsed
 */
export class SnapshotError extends TopologyError {
  constructor(message: string, public readonly path: string, originalError?: unknown) {
    super(`${message}: ${path}`, originalError);
  }
}

/**
 * Shape an error for JSON output at the command boundary
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof StructuralError) {
    return { name: error.name, message: error.message, entity: error.entity };
  }
  if (error instanceof TransportError) {
    return { name: error.name, message: error.message, url: error.url, status: error.status };
  }
  if (error instanceof SnapshotError) {
    return { name: error.name, message: error.message, path: error.path };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}
