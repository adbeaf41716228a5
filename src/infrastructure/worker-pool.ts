import { Worker } from 'worker_threads';
import { StackLogger, consoleLogger } from '@application/run-summary';
import {
  WorkerRequest,
  isWorkerReply,
  reviveError,
} from './worker-protocol';

/**
 * Fixed-size pool of independent units of work. Created once per run and
 * closed on every exit path; a unit of work that has been dispatched runs to
 * completion or failure.
 */
export interface TaskPool<TTask, TResult> {
  readonly size: number;
  run(task: TTask): Promise<TResult>;
  close(): Promise<void>;
}

export class PoolClosedError extends Error {
  constructor() {
    super('Task pool is closed');
    this.name = 'PoolClosedError';
  }
}

/**
 * Single-worker pool running tasks one after another in the calling thread.
 */
export class InlinePool<TTask, TResult> implements TaskPool<TTask, TResult> {
  readonly size = 1;
  private closed = false;
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly handler: (task: TTask) => Promise<TResult>) {}

  run(task: TTask): Promise<TResult> {
    if (this.closed) return Promise.reject(new PoolClosedError());
    const result = this.tail.then(() =>
      this.closed ? Promise.reject(new PoolClosedError()) : this.handler(task)
    );
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.tail;
  }
}

export interface WorkerEvents {
  onMessage(value: unknown): void;
  onError(error: Error): void;
  onExit(code: number): void;
}

export interface WorkerHandle<TTask> {
  post(request: WorkerRequest<TTask>): void;
  terminate(): Promise<void>;
}

export type WorkerFactory<TTask> = (events: WorkerEvents) => WorkerHandle<TTask>;

/** Spawns worker_threads running the given module. */
export function threadWorkerFactory<TTask>(script: URL): WorkerFactory<TTask> {
  return (events) => {
    const worker = new Worker(script);
    worker.on('message', (value: unknown) => events.onMessage(value));
    worker.on('error', (error: Error) => events.onError(error));
    worker.on('exit', (code: number) => events.onExit(code));
    return {
      post: (request) => worker.postMessage(request),
      terminate: async () => {
        await worker.terminate();
      },
    };
  };
}

interface Job<TTask, TResult> {
  readonly id: number;
  readonly task: TTask;
  readonly resolve: (result: TResult) => void;
  readonly reject: (error: Error) => void;
}

interface Slot<TTask, TResult> {
  readonly handle: WorkerHandle<TTask>;
  job: Job<TTask, TResult> | null;
}

export interface ThreadPoolOptions<TTask, TResult> {
  readonly size: number;
  readonly createWorker: WorkerFactory<TTask>;
  readonly isResult: (value: unknown) => value is TResult;
}

/**
 * Pool of OS threads. Workers are started on demand up to `size`, each runs
 * one task at a time, and queued tasks are handed out in submission order.
 * A worker that crashes fails only its current task and is replaced.
 */
export class ThreadPool<TTask, TResult> implements TaskPool<TTask, TResult> {
  readonly size: number;
  private readonly createWorker: WorkerFactory<TTask>;
  private readonly isResult: (value: unknown) => value is TResult;
  private readonly queue: Job<TTask, TResult>[] = [];
  private readonly slots: Slot<TTask, TResult>[] = [];
  private nextId = 1;
  private closed = false;

  constructor(options: ThreadPoolOptions<TTask, TResult>) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new Error(`Invalid pool size: ${options.size}`);
    }
    this.size = options.size;
    this.createWorker = options.createWorker;
    this.isResult = options.isResult;
  }

  get activeWorkers(): number {
    return this.slots.length;
  }

  run(task: TTask): Promise<TResult> {
    if (this.closed) return Promise.reject(new PoolClosedError());
    return new Promise<TResult>((resolve, reject) => {
      this.queue.push({ id: this.nextId++, task, resolve, reject });
      this.pump();
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const job of this.queue.splice(0)) job.reject(new PoolClosedError());
    const slots = this.slots.splice(0);
    for (const slot of slots) {
      slot.job?.reject(new PoolClosedError());
      slot.job = null;
    }
    await Promise.all(slots.map((s) => s.handle.terminate()));
  }

  private pump(): void {
    while (!this.closed && this.queue.length > 0) {
      const slot = this.slots.find((s) => s.job === null) ?? this.spawn();
      if (!slot) return;
      const job = this.queue.shift();
      if (!job) return;
      slot.job = job;
      slot.handle.post({ id: job.id, task: job.task });
    }
  }

  private spawn(): Slot<TTask, TResult> | null {
    if (this.slots.length >= this.size) return null;
    const slot: Slot<TTask, TResult> = {
      handle: this.createWorker({
        onMessage: (value) => this.settle(slot, value),
        onError: (error) => this.retire(slot, error),
        onExit: (code) =>
          this.retire(slot, new Error(`Worker exited unexpectedly with code ${code}`)),
      }),
      job: null,
    };
    this.slots.push(slot);
    return slot;
  }

  private settle(slot: Slot<TTask, TResult>, value: unknown): void {
    const job = slot.job;
    if (!job) return;
    slot.job = null;
    if (!isWorkerReply(value) || value.id !== job.id) {
      job.reject(new Error(`Malformed reply from worker for task ${job.id}`));
    } else if (!value.ok) {
      job.reject(reviveError(value.error));
    } else if (!this.isResult(value.result)) {
      job.reject(new Error(`Unexpected result shape from worker for task ${job.id}`));
    } else {
      job.resolve(value.result);
    }
    this.pump();
  }

  private retire(slot: Slot<TTask, TResult>, error: Error): void {
    const idx = this.slots.indexOf(slot);
    if (idx === -1) return;
    this.slots.splice(idx, 1);
    slot.job?.reject(error);
    slot.job = null;
    this.pump();
  }
}

export interface TaskPoolRunOptions {
  readonly logger?: StackLogger;
  // Interrupt source and exit hook; the current process by default
  readonly signals?: Pick<NodeJS.EventEmitter, 'once' | 'off'>;
  readonly exit?: (code: number) => void;
}

export const INTERRUPT_EXIT_CODE = 130;

/**
 * Runs `fn` with the pool and closes it afterwards, whether `fn` resolves or
 * throws. An interrupt during the run closes the pool before the process exits.
 */
export async function withTaskPool<TTask, TResult, T>(
  pool: TaskPool<TTask, TResult>,
  fn: (pool: TaskPool<TTask, TResult>) => Promise<T>,
  options: TaskPoolRunOptions = {}
): Promise<T> {
  const logger = options.logger ?? consoleLogger;
  const signals = options.signals ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, stopping workers`);
    pool.close().then(
      () => exit(INTERRUPT_EXIT_CODE),
      (error: unknown) => {
        logger.warn(`Failed to stop workers cleanly: ${String(error)}`);
        exit(INTERRUPT_EXIT_CODE);
      }
    );
  };
  signals.once('SIGINT', onSignal);
  signals.once('SIGTERM', onSignal);
  try {
    return await fn(pool);
  } finally {
    signals.off('SIGINT', onSignal);
    signals.off('SIGTERM', onSignal);
    await pool.close();
  }
}
