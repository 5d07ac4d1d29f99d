import crypto from 'crypto';
import { ConfigError, ExhaustedIdSpaceError } from '../errors.js';

export interface IdAllocationOptions {
  min?: number;
  max?: number;
  /** Random draws before falling back to picking among the free ids */
  maxAttempts?: number;
  /** Uniform integer in [min, max] */
  random?: (min: number, max: number) => number;
}

export const DEFAULT_ALLOCATION_ATTEMPTS = 64;

/** Largest space the crowded-space fallback will enumerate */
export const MAX_ENUMERABLE_ID_SPACE = 2 ** 20;

/** crypto.randomInt only covers ranges narrower than 2^48 */
const RANDOM_INT_LIMIT = 2 ** 48;

export function randomIntInclusive(min: number, max: number): number {
  if (max - min + 1 < RANDOM_INT_LIMIT) {
    return crypto.randomInt(min, max + 1);
  }
  return min + Math.floor(Math.random() * (max - min + 1));
}

/**
 * Pick a file id in [min, max] that is not in `existingIds`.
 *
 * Draws uniformly at random and resamples on collision. After `maxAttempts`
 * collisions it picks uniformly among the remaining free ids (spaces of up to
 * MAX_ENUMERABLE_ID_SPACE ids; larger ones keep drawing), and throws
 * ExhaustedIdSpaceError when there are none.
 */
export function allocateId(existingIds: Iterable<number>, options: IdAllocationOptions = {}): number {
  const min = options.min ?? 1;
  const max = options.max ?? 9999;
  const maxAttempts = options.maxAttempts ?? DEFAULT_ALLOCATION_ATTEMPTS;
  const random = options.random ?? randomIntInclusive;

  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max) || min < 1 || max < min) {
    throw new ConfigError(`Invalid id space ${min}-${max}`);
  }

  const taken = new Set<number>();
  for (const id of existingIds) {
    if (id >= min && id <= max) taken.add(id);
  }

  const spaceSize = max - min + 1;
  if (taken.size >= spaceSize) {
    throw new ExhaustedIdSpaceError(min, max);
  }

  const isFree = (candidate: number): boolean =>
    Number.isSafeInteger(candidate) && candidate >= min && candidate <= max && !taken.has(candidate);

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const candidate = random(min, max);
    if (isFree(candidate)) return candidate;
  }

  // Too large to list; taken.size < spaceSize, so a free id is always left to draw
  if (spaceSize > MAX_ENUMERABLE_ID_SPACE) {
    for (;;) {
      const candidate = random(min, max);
      if (isFree(candidate)) return candidate;
    }
  }

  // Crowded space: choose among the ids still free
  const free: number[] = [];
  for (let id = min; id <= max; id++) {
    if (!taken.has(id)) free.push(id);
  }
  const index = Math.min(Math.max(random(0, free.length - 1), 0), free.length - 1);
  return free[Number.isSafeInteger(index) ? index : 0];
}
