import { describe, it, expect } from '@jest/globals';
import { QueueNotFoundError } from '../../src/core/errors.js';
import { InMemoryBroker } from '../../src/queue/inmemory.js';
import { QueueValidator } from '../../src/retrieval/queue-validator.js';

describe('QueueValidator', () => {
  it('should report depth and consumers of an existing queue', async () => {
    const broker = new InMemoryBroker().declareQueue('orders');
    broker.publish('orders', 'a');
    broker.publish('orders', 'b');

    const snapshot = await new QueueValidator().validate(broker, 'orders');

    expect(snapshot).toEqual({ exists: true, queue: 'orders', messageCount: 2, consumerCount: 0 });
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('should raise QueueNotFoundError for a missing queue', async () => {
    const broker = new InMemoryBroker();

    const error = await new QueueValidator().validate(broker, 'missing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QueueNotFoundError);
    expect(error).toHaveProperty('message', "Queue 'missing' not found");
    expect(broker.operations).toEqual([]);
  });
});
