/**
 * RabbitMQ Management API Client
 * Reads raw topology records from a broker and issues create calls for sync
 */

import axios, { AxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import type { BindingRecord, ExchangeRecord, QueueRecord, RawTopologyRecords } from '../messaging/rabbitmq-topology';
import type { MutationResponse, TopologyTarget } from '../messaging/topology-sync';
import { TransportError } from './rabbitmq-errors';

export const DEFAULT_MANAGEMENT_PORT = 15672;

export interface Credentials {
  username: string;
  password: string;
}

export interface ManagementClientOptions {
  /** Origin serving the API, e.g. `http://rabbit.internal:15672` */
  baseUrl: string;
  credentials: Credentials;
  timeoutMs?: number;
  http?: AxiosInstance;
}

export interface ResolveOptions {
  defaultPort?: number;
  maxRedirects?: number;
  timeoutMs?: number;
  http?: AxiosInstance;
}

function describeFailure(error: unknown): string {
  if (error instanceof AxiosError) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

function segment(value: string): string {
  return encodeURIComponent(value);
}

export class RabbitMQManagementClient implements TopologyTarget {
  private client: AxiosInstance;
  private credentials: Credentials;
  private timeoutMs: number;
  readonly baseUrl: string;

  constructor(options: ManagementClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.client = options.http ?? axios.create();
    this.credentials = { ...options.credentials };
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  private async send(method: 'get' | 'put' | 'post', path: string, body?: unknown): Promise<AxiosResponse<unknown>> {
    try {
      return await this.client.request<unknown>({
        method,
        baseURL: this.baseUrl,
        url: path,
        data: body,
        auth: this.credentials,
        timeout: this.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
        // status codes are classified by the caller, never thrown by axios
        validateStatus: () => true,
      });
    } catch (error) {
      throw new TransportError(
        `Management API unreachable (${describeFailure(error)})`,
        `${this.baseUrl}${path}`,
        undefined,
        error
      );
    }
  }

  private async list(path: string): Promise<unknown[]> {
    const response = await this.send('get', path);
    const url = `${this.baseUrl}${path}`;

    if (response.status < 200 || response.status >= 300) {
      throw new TransportError(`Management API query failed with HTTP ${response.status}`, url, response.status);
    }
    if (!Array.isArray(response.data)) {
      throw new TransportError('Management API returned a non-array payload', url, response.status);
    }
    return response.data;
  }

  listExchanges(): Promise<unknown[]> {
    return this.list('/api/exchanges');
  }

  listQueues(): Promise<unknown[]> {
    return this.list('/api/queues');
  }

  listBindings(): Promise<unknown[]> {
    return this.list('/api/bindings');
  }

  async fetchRawTopology(): Promise<RawTopologyRecords> {
    const exchanges = await this.listExchanges();
    const queues = await this.listQueues();
    const bindings = await this.listBindings();
    return { exchanges, queues, bindings };
  }

  private async mutate(method: 'put' | 'post', path: string, body: unknown): Promise<MutationResponse> {
    const response = await this.send(method, path, body);
    return {
      target: path,
      status: response.status,
      payload: response.data === '' ? undefined : response.data,
    };
  }

  createExchange(exchange: ExchangeRecord): Promise<MutationResponse> {
    return this.mutate('put', `/api/exchanges/${segment(exchange.vhost)}/${segment(exchange.name)}`, {
      type: exchange.type,
      durable: exchange.durable,
      auto_delete: exchange.auto_delete,
      internal: exchange.internal,
      arguments: exchange.arguments,
    });
  }

  createQueue(queue: QueueRecord): Promise<MutationResponse> {
    return this.mutate('put', `/api/queues/${segment(queue.vhost)}/${segment(queue.name)}`, {
      durable: queue.durable,
      auto_delete: queue.auto_delete,
      arguments: queue.arguments,
    });
  }

  bindingTarget(binding: BindingRecord): string {
    const kind = binding.destination_type === 'exchange' ? 'e' : 'q';
    return `/api/bindings/${segment(binding.vhost)}/e/${segment(binding.source)}/${kind}/${segment(binding.destination)}`;
  }

  createBinding(binding: BindingRecord): Promise<MutationResponse> {
    return this.mutate('post', this.bindingTarget(binding), {
      routing_key: binding.routing_key,
      arguments: binding.arguments,
    });
  }
}

/**
 * Turn `host[:port]` (optionally with a scheme) into a probe URL
 */
export function managementUrlFor(address: string, defaultPort: number = DEFAULT_MANAGEMENT_PORT): URL {
  const hasScheme = /^https?:\/\//i.test(address);
  const withScheme = hasScheme ? address : `http://${address}`;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch (error) {
    throw new TransportError(`Invalid broker address "${address}"`, address, undefined, error);
  }
  // an explicit :80 is normalised away by URL, so look at the raw address
  if (!hasScheme && !/:\d+\/?$/.test(address)) {
    url.port = String(defaultPort);
  }
  return url;
}

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

/**
 * Find the origin that actually serves the management API, following
 * redirects (e.g. http -> https) by hand.
 */
export async function resolveManagementUrl(address: string, options: ResolveOptions = {}): Promise<string> {
  const http = options.http ?? axios.create();
  const maxRedirects = options.maxRedirects ?? 5;
  let current = managementUrlFor(address, options.defaultPort);

  for (let hop = 0; ; hop++) {
    let response: AxiosResponse<unknown>;
    try {
      response = await http.request<unknown>({
        method: 'get',
        url: current.href,
        maxRedirects: 0,
        timeout: options.timeoutMs ?? 10000,
        validateStatus: () => true,
      });
    } catch (error) {
      throw new TransportError(`Broker probe failed (${describeFailure(error)})`, current.href, undefined, error);
    }

    if (!isRedirect(response.status)) {
      return current.origin;
    }

    const location = response.headers['location'];
    if (typeof location !== 'string' || location === '') {
      throw new TransportError('Redirect without a Location header', current.href, response.status);
    }
    if (hop >= maxRedirects) {
      throw new TransportError(`Too many redirects (limit ${maxRedirects})`, current.href, response.status);
    }
    try {
      current = new URL(location, current);
    } catch (error) {
      throw new TransportError(`Invalid redirect target "${location}"`, current.href, response.status, error);
    }
  }
}
