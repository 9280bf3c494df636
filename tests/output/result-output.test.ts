import { describe, it, expect } from '@jest/globals';
import { Writable } from 'stream';
import { RetrievalResultOutput, buildResponse } from '../../src/output/result-output.js';
import { StatusOutput } from '../../src/output/status.js';
import { QueueNotFoundError } from '../../src/core/errors.js';
import type { RetrievalResult } from '../../src/retrieval/types.js';

function capture() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf8'));
      callback();
    },
  });
  return { stream, output: () => chunks.join('') };
}

const result: RetrievalResult = {
  queue: 'orders',
  retrievalMode: 'consume',
  ackMode: 'ack',
  messagesReceived: 3,
  messagesProcessed: 3,
  messagesSkipped: 0,
  acksFailed: 0,
  totalSizeBytes: 2048,
  durationMs: 1500,
  cancelledByUser: false,
  cancellationReason: 'limit',
};

describe('Result output', () => {
  it('should build the response with snake_case keys', () => {
    expect(buildResponse(result, new Date('2024-01-01T00:00:00.000Z'))).toEqual({
      status: 'success',
      timestamp: '2024-01-01T00:00:00.000Z',
      queue: 'orders',
      result: {
        messages_received: 3,
        messages_processed: 3,
        messages_skipped: 0,
        duration_ms: 1500,
        duration: '1s 500ms',
        ack_mode: 'ack',
        retrieval_mode: 'consume',
        cancellation_reason: 'Message count limit reached',
        messages_per_second: 2,
        total_size_bytes: 2048,
        total_size: '2 KB',
      },
    });
  });

  it('should leave out the cancellation reason and rate when absent', () => {
    const response = buildResponse({ ...result, cancellationReason: undefined, durationMs: 0 });

    expect(response.result).not.toHaveProperty('cancellation_reason');
    expect(response.result.messages_per_second).toBe(0);
  });

  it('should summarize in plain text, noting skipped messages', () => {
    const { stream, output } = capture();
    const skipped = { ...result, messagesProcessed: 1, messagesSkipped: 2, totalSizeBytes: 10 };

    new RetrievalResultOutput({ format: 'plain', noColor: true }, stream).write(skipped);

    expect(output()).toBe(
      [
        '  Queue:      orders',
        '  Mode:       consume',
        '  Ack Mode:   ack',
        '  Received:   3 messages',
        '  Processed:  1 message (2 skipped & requeued by RabbitMQ)',
        '  Total size: 10 bytes',
        '  Duration:   1s 500ms',
        '  Stopped:    Message count limit reached',
      ].join('\n') + '\n'
    );
  });

  it('should tell an operator interrupt apart from a reached count', () => {
    const limit = capture();
    const user = capture();

    new RetrievalResultOutput({ format: 'plain', noColor: true }, limit.stream).write(result);
    new RetrievalResultOutput({ format: 'plain', noColor: true }, user.stream).write({
      ...result,
      cancelledByUser: true,
      cancellationReason: 'user',
    });

    expect(limit.output().split('\n').at(-2)).toBe('  Stopped:    Message count limit reached');
    expect(user.output().split('\n').at(-2)).toBe('  Stopped:    User cancellation (Ctrl+C)');
  });

  it('should leave out the stop row when no reason was recorded', () => {
    const { stream, output } = capture();

    new RetrievalResultOutput({ format: 'plain', noColor: true }, stream).write({
      ...result,
      cancellationReason: undefined,
    });

    expect(output().split('\n').at(-2)).toBe('  Duration:   1s 500ms');
  });

  it('should print one JSON line for the json format', () => {
    const { stream, output } = capture();

    new RetrievalResultOutput({ format: 'json' }, stream).write(result);

    const parsed: unknown = JSON.parse(output());
    expect(parsed).toMatchObject({ queue: 'orders', result: { messages_processed: 3, ack_mode: 'ack' } });
  });

  it('should print nothing when quiet', () => {
    const { stream, output } = capture();

    new RetrievalResultOutput({ format: 'plain', quiet: true }, stream).write(result);

    expect(output()).toBe('');
  });
});

describe('StatusOutput', () => {
  it('should print errors with their suggestion even when quiet', () => {
    const { stream, output } = capture();
    const status = new StatusOutput({ quiet: true, noColor: true }, stream);

    status.warning('hidden');
    status.error(new QueueNotFoundError('orders').toErrorInfo());

    expect(output()).toBe(
      "✗ Queue 'orders' not found\n  Suggestion: Check if the queue exists and is correctly configured\n"
    );
  });

  it('should list validation issues', () => {
    const { stream, output } = capture();
    const status = new StatusOutput({ noColor: true }, stream);

    status.error({
      code: 'INVALID_CONFIGURATION',
      error: 'Invalid configuration',
      category: 'validation',
      details: { issues: ['rabbitmq.port: Expected number'] },
    });

    expect(output()).toBe('✗ Invalid configuration\n  - rabbitmq.port: Expected number\n');
  });

  it('should mark warnings and successes', () => {
    const { stream, output } = capture();
    const status = new StatusOutput({ noColor: true }, stream);

    status.warning('careful');
    status.success('done');

    expect(output()).toBe('⚠ careful\n✓ done\n');
  });

  describe('completion', () => {
    it('should report a finished consume', () => {
      const { stream, output } = capture();

      new StatusOutput({ noColor: true }, stream).completion(result, 3);

      expect(output()).toBe('✓ Retrieved 3 messages in 1s 500ms\n');
    });

    it('should warn when the operator interrupted the run', () => {
      const { stream, output } = capture();
      const status = new StatusOutput({ noColor: true }, stream);

      status.completion({ ...result, cancelledByUser: true, cancellationReason: 'user' }, 10);
      status.completion(
        { ...result, retrievalMode: 'peek', cancelledByUser: true, cancellationReason: 'user' },
        0
      );

      expect(output()).toBe(
        [
          '⚠ Message retrieval cancelled by user',
          '✓ Retrieved 3 messages in 1s 500ms',
          '⚠ Peek operation cancelled by user',
          '✓ Peeked 3 messages in 1s 500ms',
        ].join('\n') + '\n'
      );
    });

    it('should warn when fewer messages than requested were available', () => {
      const { stream, output } = capture();
      const status = new StatusOutput({ noColor: true }, stream);

      status.completion({ ...result, retrievalMode: 'peek', messagesProcessed: 1 }, 5);

      expect(output()).toBe('⚠ Only 1 message was available in queue\n✓ Peeked 1 message in 1s 500ms\n');
    });

    it('should print nothing when quiet', () => {
      const { stream, output } = capture();

      new StatusOutput({ quiet: true }, stream).completion(result, 3);

      expect(output()).toBe('');
    });
  });
});
