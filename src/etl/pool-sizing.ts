import { promises as fsp } from 'fs';
import * as path from 'path';
import { ConfigurationError } from '@domain/errors';
import { AUTO_PARALLEL_THRESHOLD_BYTES, SIZE_EXCLUDE_PATTERN } from './config';

export interface PoolSizeRequest {
  readonly nCores: number;
  readonly forceParallel: boolean;
  readonly availableCores: number;
  // Not called for forced runs
  readonly measureBytes: () => Promise<number>;
}

export type PoolSizeDecision =
  | { readonly reason: 'forced'; readonly workers: number }
  | {
      readonly reason: 'auto-parallel' | 'below-threshold';
      readonly workers: number;
      readonly aggregateBytes: number;
    };

export function assertCoresAvailable(nCores: number, availableCores: number): void {
  if (!Number.isInteger(nCores) || nCores < 1) {
    throw new ConfigurationError(
      `The number of cores must be a positive integer, not ${nCores}`
    );
  }
  if (nCores > availableCores) {
    throw new ConfigurationError(
      `The number of cores selected exceeds the available cores on your machine. The maximum number of cores allowed is ${availableCores}, not ${nCores}`
    );
  }
}

/**
 * Sizes the worker pool once per run. A forced run uses the requested count;
 * otherwise inputs larger than the threshold use every core and smaller ones
 * keep the requested count.
 */
export async function decidePoolSize(
  request: PoolSizeRequest
): Promise<PoolSizeDecision> {
  assertCoresAvailable(request.nCores, request.availableCores);
  if (request.forceParallel) {
    return { reason: 'forced', workers: request.nCores };
  }
  const aggregateBytes = await request.measureBytes();
  if (aggregateBytes >= AUTO_PARALLEL_THRESHOLD_BYTES) {
    return {
      reason: 'auto-parallel',
      workers: request.availableCores,
      aggregateBytes,
    };
  }
  return { reason: 'below-threshold', workers: request.nCores, aggregateBytes };
}

/** Total size of candidate inputs, ignoring archives and earlier stacked output. */
export async function measureCandidateBytes(
  folder: string,
  filePaths: readonly string[]
): Promise<number> {
  const candidates = filePaths.filter(
    (p) => !SIZE_EXCLUDE_PATTERN.test(path.relative(folder, p))
  );
  const stats = await Promise.all(candidates.map((p) => fsp.stat(p)));
  return stats.reduce((sum, s) => sum + s.size, 0);
}
