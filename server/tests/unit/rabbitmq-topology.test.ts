/**
 * Unit Tests: Topology Model
 */

import { describe, it, expect } from 'vitest';
import {
  bindingKey,
  exchangeKey,
  parseBinding,
  parseExchange,
  queueKey,
  resourceIdentity,
  Topology,
} from '../../messaging/rabbitmq-topology';
import { StructuralError } from '../../services/rabbitmq-errors';
import { binding, exchange, queue } from '../fixtures/topology';

describe('Topology Model', () => {
  describe('records', () => {
    it('should accept plugin exchange types and keep extension attributes', () => {
      const record = parseExchange({ ...exchange('delayed'), type: 'x-delayed-message', policy: 'ha' });

      expect(record.type).toBe('x-delayed-message');
      expect(record.policy).toBe('ha');
    });

    it('should reject an empty exchange type', () => {
      expect(() => parseExchange({ ...exchange('orders'), type: '' })).toThrow(StructuralError);
    });

    it('should reject an unknown destination type', () => {
      expect(() => parseBinding({ ...binding('orders', 'jobs', 'k'), destination_type: 'stream' })).toThrow(
        /^Malformed binding record: destination_type: /
      );
    });
  });

  describe('keys', () => {
    it('should key exchanges and queues by name', () => {
      expect(exchangeKey(exchange('orders'))).toBe('orders');
      expect(queueKey(queue('jobs'))).toBe('jobs');
    });

    it('should key bindings by source and destination only', () => {
      const created = binding('orders', 'orders.created', 'created');
      const renamed = binding('orders', 'orders.created', 'order.created');

      expect(bindingKey(created)).toBe('orders -> queue:orders.created');
      expect(bindingKey(renamed)).toBe(bindingKey(created));
      expect(bindingKey({ ...created, destination_type: 'exchange' })).toBe('orders -> exchange:orders.created');
    });

    it('should fail on a record without its identity field', () => {
      expect(() => queueKey({})).toThrow('Malformed queue record: name: Required');
      expect(() => bindingKey({ source: 'orders', destination_type: 'queue' })).toThrow(
        'Malformed binding record: destination: Required'
      );
    });

    it('should qualify resource identity by vhost', () => {
      expect(resourceIdentity({ vhost: '/', name: 'jobs' })).not.toBe(resourceIdentity({ vhost: 'staging', name: 'jobs' }));
    });
  });

  describe('Topology', () => {
    it('should not be changed by later edits to the input arrays', () => {
      const queues = [queue('jobs')];
      const topology = new Topology({ exchanges: [], queues, bindings: [] });

      queues.push(queue('late'));

      expect(topology.queues.map(q => q.name)).toEqual(['jobs']);
      expect(Object.isFrozen(topology.queues)).toBe(true);
    });

    it('should allow the same name in different vhosts', () => {
      const topology = new Topology({
        exchanges: [exchange('orders'), exchange('orders', { vhost: 'staging' })],
        queues: [],
        bindings: [],
      });
      expect(topology.getStats().exchanges).toBe(2);
    });

    it('should reject a duplicate name in one vhost', () => {
      expect(
        () => new Topology({ exchanges: [exchange('orders'), exchange('orders')], queues: [], bindings: [] })
      ).toThrow('Malformed exchange record: duplicate name "orders" in vhost "/"');
    });

    it('should sort snapshot sections by key', () => {
      const topology = new Topology({
        exchanges: [exchange('b'), exchange('a')],
        queues: [queue('z'), queue('m')],
        bindings: [binding('b', 'z', 'k'), binding('a', 'z', 'k'), binding('a', 'm', 'k')],
      });

      const snapshot = topology.toSnapshot();

      expect(snapshot.exchanges.map(e => e.name)).toEqual(['a', 'b']);
      expect(snapshot.queues.map(q => q.name)).toEqual(['m', 'z']);
      expect(snapshot.bindings.map(bindingKey)).toEqual(['a -> queue:m', 'a -> queue:z', 'b -> queue:z']);
    });

    it('should build from a snapshot document', () => {
      const topology = Topology.fromSnapshot({
        exchanges: [exchange('orders')],
        queues: [{ ...queue('jobs'), arguments: undefined }],
        bindings: [{ source: 'orders', destination: 'jobs', destination_type: 'queue', vhost: '/' }],
      });

      expect(topology.queues[0].arguments).toEqual({});
      expect(topology.bindings[0].routing_key).toBe('');
      expect(topology.consumerCounts.size).toBe(0);
    });

    it('should reject a document that is not a snapshot', () => {
      expect(() => Topology.fromSnapshot([])).toThrow(/^Malformed snapshot record: /);
    });
  });
});
