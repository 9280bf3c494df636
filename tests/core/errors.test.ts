import { describe, it, expect } from '@jest/globals';
import {
  ConfigValidationError,
  OutputSinkError,
  QueueNotFoundError,
  toErrorInfo,
} from '../../src/core/errors.js';

describe('Errors', () => {
  it('should describe a missing queue with a suggestion', () => {
    const error = new QueueNotFoundError('orders', new Error('404 (NOT-FOUND)'));

    expect(error.toErrorInfo()).toEqual({
      code: 'QUEUE_NOT_FOUND',
      error: "Queue 'orders' not found",
      category: 'routing',
      suggestion: 'Check if the queue exists and is correctly configured',
      details: { reason: '404 (NOT-FOUND)' },
    });
  });

  it('should carry validation issues and their source', () => {
    const error = new ConfigValidationError('Invalid configuration', ['rabbitmq.port: too big'], 'queuetap.yaml');

    expect(error.code).toBe('INVALID_CONFIGURATION');
    expect(error.details).toEqual({ issues: ['rabbitmq.port: too big'], source: 'queuetap.yaml' });
  });

  it('should name the failing delivery on output errors', () => {
    const error = new OutputSinkError(7, new Error('EACCES'));

    expect(error.message).toBe('Failed to write message #7: EACCES');
    expect(error.category).toBe('output');
  });

  it('should fall back to an internal error for unknown throws', () => {
    expect(toErrorInfo(new Error('boom'))).toEqual({ code: 'INTERNAL_ERROR', error: 'boom', category: 'internal' });
    expect(toErrorInfo('plain')).toEqual({ code: 'INTERNAL_ERROR', error: 'plain', category: 'internal' });
  });
});
