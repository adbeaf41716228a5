import { describe, it, expect } from 'vitest';
import { ClassificationError, ConfigurationError, MergeError } from '@domain/errors';
import {
  isWorkerReply,
  isWorkerRequest,
  reviveError,
  serializeError,
} from '@infrastructure/worker-protocol';

const isString = (value: unknown): value is string => typeof value === 'string';

describe('worker messages', () => {
  it('should validate requests with the task guard', () => {
    expect(isWorkerRequest({ id: 1, task: 'a' }, isString)).toBe(true);
    expect(isWorkerRequest({ id: '1', task: 'a' }, isString)).toBe(false);
    expect(isWorkerRequest({ id: 1, task: 2 }, isString)).toBe(false);
  });

  it('should validate replies', () => {
    expect(isWorkerReply({ id: 1, ok: true, result: null })).toBe(true);
    expect(isWorkerReply({ id: 1, ok: true })).toBe(false);
    expect(isWorkerReply({ id: 1, ok: false, error: { name: 'Error', message: 'x' } })).toBe(true);
    expect(isWorkerReply({ id: 1, ok: false, error: 'x' })).toBe(false);
    expect(isWorkerReply(null)).toBe(false);
  });
});

describe('error transfer', () => {
  it('should keep domain error classes and their context', () => {
    const merge = reviveError(serializeError(new MergeError('bad union', 'T1')));
    expect(merge).toBeInstanceOf(MergeError);
    expect(merge instanceof MergeError && merge.tableName).toBe('T1');

    const classify = reviveError(serializeError(new ClassificationError('bad name', 'x.csv')));
    expect(classify instanceof ClassificationError && classify.fileName).toBe('x.csv');

    const config = reviveError(serializeError(new ConfigurationError('bad config')));
    expect(config).toBeInstanceOf(ConfigurationError);
    expect(config.message).toBe('bad config');
  });

  it('should keep the name of other errors', () => {
    const revived = reviveError(serializeError(new TypeError('not a function')));
    expect(revived.name).toBe('TypeError');
    expect(revived.message).toBe('not a function');
  });

  it('should serialize thrown non-errors', () => {
    expect(serializeError('plain')).toEqual({ name: 'Error', message: 'plain' });
  });
});
