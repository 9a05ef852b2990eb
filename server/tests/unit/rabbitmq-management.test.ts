/**
 * Unit Tests: RabbitMQ Management API Client
 * Requests are answered by an in-process axios adapter, nothing leaves the process
 */

import { describe, it, expect, beforeEach } from 'vitest';
import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import {
  managementUrlFor,
  RabbitMQManagementClient,
  resolveManagementUrl,
} from '../../services/rabbitmq-management';
import { TransportError } from '../../services/rabbitmq-errors';
import { binding, exchange, queue } from '../fixtures/topology';

interface RecordedRequest {
  method: string | undefined;
  url: string;
  auth: InternalAxiosRequestConfig['auth'];
  body: unknown;
}

interface Reply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

function fakeHttp(reply: (request: RecordedRequest) => Reply, requests: RecordedRequest[]): AxiosInstance {
  return axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const request: RecordedRequest = {
        method: config.method,
        url: `${config.baseURL ?? ''}${config.url ?? ''}`,
        auth: config.auth,
        body: typeof config.data === 'string' ? JSON.parse(config.data) : undefined,
      };
      requests.push(request);
      const { status, data = '', headers = {} } = reply(request);
      return { data, status, statusText: '', headers, config };
    },
  });
}

const BASE_URL = 'http://rabbit.internal:15672';
const credentials = { username: 'guest', password: 'test-secret' };

describe('RabbitMQ Management Client', () => {
  let requests: RecordedRequest[];

  beforeEach(() => {
    requests = [];
  });

  describe('queries', () => {
    it('should list every entity with basic auth', async () => {
      const http = fakeHttp(request => ({ status: 200, data: [{ from: request.url }] }), requests);
      const client = new RabbitMQManagementClient({ baseUrl: `${BASE_URL}/`, credentials, http });

      const raw = await client.fetchRawTopology();

      expect(raw).toEqual({
        exchanges: [{ from: `${BASE_URL}/api/exchanges` }],
        queues: [{ from: `${BASE_URL}/api/queues` }],
        bindings: [{ from: `${BASE_URL}/api/bindings` }],
      });
      expect(requests.map(request => request.method)).toEqual(['get', 'get', 'get']);
      expect(requests[0].auth).toEqual({ username: 'guest', password: 'test-secret' });
    });

    it('should fail on a non-success status', async () => {
      const client = new RabbitMQManagementClient({
        baseUrl: BASE_URL,
        credentials,
        http: fakeHttp(() => ({ status: 401, data: { error: 'not_authorised' } }), requests),
      });

      await expect(client.listQueues()).rejects.toThrow('Management API query failed with HTTP 401');
    });

    it('should fail on a payload that is not an array', async () => {
      const client = new RabbitMQManagementClient({
        baseUrl: BASE_URL,
        credentials,
        http: fakeHttp(() => ({ status: 200, data: { exchanges: [] } }), requests),
      });

      await expect(client.listExchanges()).rejects.toThrow('Management API returned a non-array payload');
    });

    it('should wrap connection failures in a transport error', async () => {
      const http = axios.create({
        adapter: () => Promise.reject(new AxiosError('connect ECONNREFUSED 127.0.0.1:15672', 'ECONNREFUSED')),
      });
      const client = new RabbitMQManagementClient({ baseUrl: BASE_URL, credentials, http });

      const error = await client.listBindings().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.message).toBe('Management API unreachable (ECONNREFUSED: connect ECONNREFUSED 127.0.0.1:15672)');
        expect(error.url).toBe(`${BASE_URL}/api/bindings`);
        expect(error.status).toBeUndefined();
      }
    });
  });

  describe('create calls', () => {
    let client: RabbitMQManagementClient;

    beforeEach(() => {
      client = new RabbitMQManagementClient({
        baseUrl: BASE_URL,
        credentials,
        http: fakeHttp(request => (request.method === 'put' ? { status: 204 } : { status: 201 }), requests),
      });
    });

    it('should PUT an exchange under its encoded vhost', async () => {
      const response = await client.createExchange(exchange('orders', { arguments: { 'alternate-exchange': 'unrouted' } }));

      expect(response).toEqual({ target: '/api/exchanges/%2F/orders', status: 204, payload: undefined });
      expect(requests[0]).toMatchObject({
        method: 'put',
        url: `${BASE_URL}/api/exchanges/%2F/orders`,
        body: {
          type: 'topic',
          durable: true,
          auto_delete: false,
          internal: false,
          arguments: { 'alternate-exchange': 'unrouted' },
        },
      });
    });

    it('should PUT a queue with its declared arguments', async () => {
      await client.createQueue(queue('orders created', { vhost: 'billing', arguments: { 'x-message-ttl': 60000 } }));

      expect(requests[0]).toMatchObject({
        method: 'put',
        url: `${BASE_URL}/api/queues/billing/orders%20created`,
        body: { durable: true, auto_delete: false, arguments: { 'x-message-ttl': 60000 } },
      });
    });

    it('should POST a binding to the exchange/queue pair', async () => {
      const response = await client.createBinding(binding('orders', 'orders.created', 'created'));

      expect(response.status).toBe(201);
      expect(requests[0]).toMatchObject({
        method: 'post',
        url: `${BASE_URL}/api/bindings/%2F/e/orders/q/orders.created`,
        body: { routing_key: 'created', arguments: {} },
      });
    });

    it('should name exchange destinations with the e segment', () => {
      const target = client.bindingTarget(binding('orders', 'audit', '#', { destination_type: 'exchange' }));
      expect(target).toBe('/api/bindings/%2F/e/orders/e/audit');
    });

    it('should return the broker error payload of a rejected create', async () => {
      const rejecting = new RabbitMQManagementClient({
        baseUrl: BASE_URL,
        credentials,
        http: fakeHttp(() => ({ status: 400, data: { error: 'bad_request', reason: 'inequivalent arg' } }), requests),
      });

      await expect(rejecting.createQueue(queue('jobs'))).resolves.toEqual({
        target: '/api/queues/%2F/jobs',
        status: 400,
        payload: { error: 'bad_request', reason: 'inequivalent arg' },
      });
    });
  });

  describe('address resolution', () => {
    it('should add a scheme and the default port', () => {
      expect(managementUrlFor('rabbit.internal').href).toBe('http://rabbit.internal:15672/');
      expect(managementUrlFor('rabbit.internal', 8080).href).toBe('http://rabbit.internal:8080/');
    });

    it('should keep an explicit port or scheme', () => {
      expect(managementUrlFor('rabbit.internal:80').href).toBe('http://rabbit.internal/');
      expect(managementUrlFor('rabbit.internal:25672').href).toBe('http://rabbit.internal:25672/');
      expect(managementUrlFor('https://rabbit.internal').href).toBe('https://rabbit.internal/');
    });

    it('should reject an address that is not a host', () => {
      expect(() => managementUrlFor('bad host')).toThrow('Invalid broker address "bad host"');
    });

    it('should return the probed origin when there is no redirect', async () => {
      const http = fakeHttp(() => ({ status: 200, data: '<html></html>' }), requests);

      await expect(resolveManagementUrl('rabbit.internal', { http })).resolves.toBe(BASE_URL);
      expect(requests.map(request => request.url)).toEqual(['http://rabbit.internal:15672/']);
    });

    it('should follow redirects to the serving origin', async () => {
      const http = fakeHttp(request => {
        if (request.url === 'http://rabbit.internal:15672/') {
          return { status: 301, headers: { location: 'https://rabbit.internal:15671/' } };
        }
        if (request.url === 'https://rabbit.internal:15671/') {
          return { status: 302, headers: { location: '/ui/' } };
        }
        return { status: 200 };
      }, requests);

      await expect(resolveManagementUrl('rabbit.internal', { http })).resolves.toBe('https://rabbit.internal:15671');
      expect(requests.map(request => request.url)).toEqual([
        'http://rabbit.internal:15672/',
        'https://rabbit.internal:15671/',
        'https://rabbit.internal:15671/ui/',
      ]);
    });

    it('should stop after the redirect limit', async () => {
      const http = fakeHttp(() => ({ status: 302, headers: { location: '/again' } }), requests);

      await expect(resolveManagementUrl('rabbit.internal', { http, maxRedirects: 2 })).rejects.toThrow(
        'Too many redirects (limit 2)'
      );
      expect(requests).toHaveLength(3);
    });

    it('should fail on a redirect without a location', async () => {
      const http = fakeHttp(() => ({ status: 307 }), requests);

      await expect(resolveManagementUrl('rabbit.internal', { http })).rejects.toThrow(
        'Redirect without a Location header'
      );
    });

    it('should wrap probe failures in a transport error', async () => {
      const http = axios.create({
        adapter: () => Promise.reject(new AxiosError('getaddrinfo ENOTFOUND nowhere.invalid', 'ENOTFOUND')),
      });

      await expect(resolveManagementUrl('nowhere.invalid', { http })).rejects.toThrow(
        'Broker probe failed (ENOTFOUND: getaddrinfo ENOTFOUND nowhere.invalid)'
      );
    });
  });
});
