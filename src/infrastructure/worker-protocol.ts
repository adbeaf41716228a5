// Messages exchanged between the task pool and its worker threads.
import {
  ClassificationError,
  ConfigurationError,
  MergeError,
} from '@domain/errors';

export interface WorkerRequest<TTask> {
  readonly id: number;
  readonly task: TTask;
}

export interface SerializedError {
  readonly name: string;
  readonly message: string;
  readonly stack?: string;
  readonly tableName?: string;
  readonly fileName?: string;
}

export type WorkerReply =
  | { readonly id: number; readonly ok: true; readonly result: unknown }
  | { readonly id: number; readonly ok: false; readonly error: SerializedError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isWorkerRequest<TTask>(
  value: unknown,
  isTask: (task: unknown) => task is TTask
): value is WorkerRequest<TTask> {
  return isRecord(value) && typeof value['id'] === 'number' && isTask(value['task']);
}

function isSerializedError(value: unknown): value is SerializedError {
  return (
    isRecord(value) &&
    typeof value['name'] === 'string' &&
    typeof value['message'] === 'string'
  );
}

export function isWorkerReply(value: unknown): value is WorkerReply {
  if (!isRecord(value) || typeof value['id'] !== 'number') return false;
  if (value['ok'] === true) return 'result' in value;
  return value['ok'] === false && isSerializedError(value['error']);
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof MergeError) {
    return { name: error.name, message: error.message, tableName: error.tableName };
  }
  if (error instanceof ClassificationError) {
    return { name: error.name, message: error.message, fileName: error.fileName };
  }
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(error.stack ? { stack: error.stack } : {}),
    };
  }
  return { name: 'Error', message: String(error) };
}

// Rebuilds the error on the pool side so callers can still match on its class
export function reviveError(serialized: SerializedError): Error {
  switch (serialized.name) {
    case 'MergeError':
      return new MergeError(serialized.message, serialized.tableName ?? '');
    case 'ClassificationError':
      return new ClassificationError(serialized.message, serialized.fileName ?? '');
    case 'ConfigurationError':
      return new ConfigurationError(serialized.message);
    default: {
      const error = new Error(serialized.message);
      error.name = serialized.name;
      if (serialized.stack) error.stack = serialized.stack;
      return error;
    }
  }
}
