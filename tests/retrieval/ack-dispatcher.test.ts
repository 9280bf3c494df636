import { describe, it, expect } from '@jest/globals';
import { AsyncQueue } from '../../src/core/async-queue.js';
import { InMemoryBroker } from '../../src/queue/inmemory.js';
import { AckDispatcher } from '../../src/retrieval/ack-dispatcher.js';
import type { AckDecision } from '../../src/retrieval/types.js';

async function deliverAll(broker: InMemoryBroker, count: number): Promise<void> {
  broker.declareQueue('orders');
  for (let i = 1; i <= count; i++) broker.publish('orders', `m${i}`);

  let received = 0;
  let finish: () => void = () => undefined;
  const allDelivered = new Promise<void>((resolve) => {
    finish = resolve;
  });
  const consumerTag = await broker.subscribe('orders', () => {
    received++;
    if (received === count) finish();
  });
  await allDelivered;
  // nothing gets redelivered while decisions are issued
  await broker.unsubscribe(consumerTag);
}

describe('AckDispatcher', () => {
  it('should issue each decision in order with the matching broker call', async () => {
    const broker = new InMemoryBroker();
    await deliverAll(broker, 3);
    const acks = new AsyncQueue<AckDecision>();
    acks.push({ deliveryTag: 1, outcome: 'ack' });
    acks.push({ deliveryTag: 2, outcome: 'reject' });
    acks.push({ deliveryTag: 3, outcome: 'requeue' });
    acks.close();

    const result = await new AckDispatcher().run(acks, broker);

    expect(result).toEqual({ dispatched: 3, failed: 0 });
    expect(broker.operations.slice(-3)).toEqual([
      { type: 'ack', deliveryTag: 1 },
      { type: 'reject', deliveryTag: 2 },
      { type: 'requeue', deliveryTag: 3 },
    ]);
    expect(broker.bodies('orders')).toEqual(['m3']);
  });

  it('should count a failed acknowledgment and carry on', async () => {
    const broker = new InMemoryBroker();
    await deliverAll(broker, 2);
    broker.failOn('ack', 1);
    const acks = new AsyncQueue<AckDecision>();
    acks.push({ deliveryTag: 1, outcome: 'ack' });
    acks.push({ deliveryTag: 2, outcome: 'ack' });
    acks.close();

    const result = await new AckDispatcher().run(acks, broker);

    expect(result).toEqual({ dispatched: 1, failed: 1 });
    expect(broker.unackedCount).toBe(1);
  });

  it('should finish only after the queue is closed', async () => {
    const broker = new InMemoryBroker();
    await deliverAll(broker, 1);
    const acks = new AsyncQueue<AckDecision>();
    const running = new AckDispatcher().run(acks, broker);

    acks.push({ deliveryTag: 1, outcome: 'ack' });
    acks.close();

    await expect(running).resolves.toEqual({ dispatched: 1, failed: 0 });
  });
});
