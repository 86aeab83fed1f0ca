/**
 * Initializer constructors and the serializable form used by config files
 */

import { z } from 'zod';
import { InvalidInitializerError, formatZodError } from './errors.js';
import { txOpSchema } from './graph.js';
import type { Initializer, TxOp } from './types.js';

export const initializers = {
  /** Registered function name, or `specifier#exportName` */
  fn: (ref: string): Initializer => ({ kind: 'function', ref }),
  /** Config module identifier, e.g. `app.config` */
  module: (id: string): Initializer => ({ kind: 'module', id }),
  file: (filePath: string): Initializer => ({ kind: 'file', path: filePath }),
  ops: (ops: readonly TxOp[]): Initializer => ({ kind: 'ops', ops }),
  script: (source: string): Initializer => ({ kind: 'script', source }),
  none: (): Initializer => ({ kind: 'none' }),
};

export const initializerInputSchema = z.union([
  z.null(),
  z.strictObject({ fn: z.string().min(1) }),
  z.strictObject({ module: z.string().min(1) }),
  z.strictObject({ file: z.string().min(1) }),
  z.strictObject({ ops: z.array(txOpSchema) }),
  z.strictObject({ script: z.string() }),
]);

export type InitializerInput = z.input<typeof initializerInputSchema>;

/**
 * Convert `{ fn }`, `{ module }`, `{ file }`, `{ ops }`, `{ script }` or null
 */
export function parseInitializer(value: unknown): Initializer {
  const parsed = initializerInputSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidInitializerError(value, formatZodError(parsed.error));
  }
  const input = parsed.data;
  if (input === null) return initializers.none();
  if ('fn' in input) return initializers.fn(input.fn);
  if ('module' in input) return initializers.module(input.module);
  if ('file' in input) return initializers.file(input.file);
  if ('ops' in input) return initializers.ops(input.ops);
  return initializers.script(input.script);
}

/**
 * Short description for logs
 */
export function describeInitializer(initializer: Initializer): string {
  switch (initializer.kind) {
    case 'function':
      return `function ${initializer.ref}`;
    case 'module':
      return `module ${initializer.id}`;
    case 'file':
      return `file ${initializer.path}`;
    case 'ops':
      return `ops (${initializer.ops.length})`;
    case 'script':
      return 'inline script';
    case 'none':
      return 'none';
  }
}
