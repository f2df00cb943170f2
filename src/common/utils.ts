import { randomBytes, randomUUID } from 'crypto';
import { CancelledError } from './errors';
import { Stage } from '../types';

/**
 * Generate a random ID using crypto random bytes
 */
export function createId(): string {
  return randomBytes(16).toString('hex');
}

export function createMarker(): string {
  return randomUUID();
}

/**
 * Delay utility for async operations. Rejects with CancelledError when the
 * signal aborts before the delay elapses.
 */
export function delay(ms: number, signal?: AbortSignal, stage: Stage = 'settle'): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError(stage, abortReason(signal)));
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError(stage, abortReason(signal)));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    timer.unref(); // Prevent Jest hanging
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with whichever comes first: the operation, or the signal aborting.
 * The abandoned operation keeps running; its result is ignored.
 */
export function raceAbort<T>(operation: Promise<T>, signal: AbortSignal | undefined, stage: Stage): Promise<T> {
  if (!signal) {
    return operation;
  }
  if (signal.aborted) {
    operation.catch(() => undefined);
    return Promise.reject(new CancelledError(stage, abortReason(signal)));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError(stage, abortReason(signal)));
    signal.addEventListener('abort', onAbort, { once: true });
    operation.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export function throwIfAborted(signal: AbortSignal | undefined, stage: Stage): void {
  if (signal?.aborted) {
    throw new CancelledError(stage, abortReason(signal));
  }
}

export function cancellationError(signal: AbortSignal | undefined, stage: Stage): CancelledError {
  return new CancelledError(stage, abortReason(signal));
}

function abortReason(signal: AbortSignal | undefined): string | undefined {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason.message;
  return typeof reason === 'string' ? reason : undefined;
}

/**
 * Validate if a string is a valid address (IP or hostname)
 */
export function isValidAddress(address: string): boolean {
  // IPv4 pattern
  const ipv4Pattern = /^(\d{1,3}\.){3}\d{1,3}$/;
  // Basic hostname pattern
  const hostnamePattern = /^[a-zA-Z0-9.-]+$/;

  if (ipv4Pattern.test(address)) {
    // Validate IPv4 ranges
    const parts = address.split('.').map(Number);
    return parts.every(part => part >= 0 && part <= 255);
  }

  return hostnamePattern.test(address) && address.length > 0;
}

/**
 * Pick `count` distinct elements uniformly (partial Fisher-Yates)
 */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, random: () => number = Math.random): T[] {
  const pool = [...items];
  const take = Math.min(count, pool.length);
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
}

/**
 * Split `total` into `parts` near-equal shares, remainder to the first shares
 */
export function splitEvenly(total: number, parts: number): number[] {
  if (parts <= 0) return [];
  const base = Math.floor(total / parts);
  const remainder = total % parts;
  return Array.from({ length: parts }, (_, index) => base + (index < remainder ? 1 : 0));
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
