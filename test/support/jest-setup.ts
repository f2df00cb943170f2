/**
 * Jest setup: keeps test output clean and surfaces stray rejections
 */

import { afterEach } from '@jest/globals';

process.env.NODE_ENV = 'test';

// pg and friends emit deprecation warnings on newer Node releases
type EmitWarning = typeof process.emitWarning;

export function isDeprecationWarning(warning: string | Error, rest: unknown[]): boolean {
  const [options] = rest;
  const type = typeof options === 'string'
    ? options
    : typeof options === 'object' && options !== null && 'type' in options ? options.type : undefined;
  return type === 'DeprecationWarning' || (warning instanceof Error && warning.name === 'DeprecationWarning');
}

export function withoutDeprecations(emit: EmitWarning): EmitWarning {
  return (warning: string | Error, ...rest: unknown[]) => {
    if (isDeprecationWarning(warning, rest)) {
      return;
    }
    // type, code, ctor and options object all pass through unchanged
    Reflect.apply(emit, process, [warning, ...rest]);
  };
}

process.emitWarning = withoutDeprecations(process.emitWarning);

const unhandled: unknown[] = [];

process.on('unhandledRejection', reason => {
  unhandled.push(reason);
});

afterEach(() => {
  if (unhandled.length > 0) {
    const reasons = unhandled.splice(0);
    console.warn(`${reasons.length} unhandled rejection(s) during test:`, ...reasons);
  }
});
