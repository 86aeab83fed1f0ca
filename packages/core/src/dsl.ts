/**
 * DSL function definition
 *
 * `defineDsl` turns a plain function plus an argument schema into a DSL
 * function that validates its arguments, tracks provenance and delegates.
 */

import { z } from 'zod';
import type { ZodType } from 'zod';
import { ArgumentValidationError, formatZodError } from './errors.js';
import { ID_ATTR, opValueSchema } from './graph.js';
import { log } from './log.js';
import { captureFrames, isScriptFrame, withProvenance, type ProvenanceContext } from './provenance.js';
import { resolveId } from './resolve.js';
import { transact } from './scope.js';
import type { EntityId, RefValue } from './types.js';

export interface DslDefinition<A extends readonly unknown[], O, R> {
  /** Simple name; scripts see the function under it */
  name: string;
  /** Qualifier of the name, default `user` */
  namespace?: string;
  doc?: string;
  /** Schema of the argument list, usually a `z.tuple` */
  args: ZodType<O, A>;
  /** Body; receives the parsed arguments and the raw ones */
  fn: (args: O, raw: A) => R;
}

export interface DslFunction<A extends readonly unknown[] = readonly unknown[], R = unknown> {
  (...args: A): R;
  readonly qualifiedName: string;
  readonly dslName: string;
  readonly doc: string | undefined;
}

export type AnyDslFunction = DslFunction<never, unknown>;

const NAME_PATTERN = /^[A-Za-z_$][\w$]*$/;
const NAMESPACE_PATTERN = /^[A-Za-z_$][\w$-]*(\.[A-Za-z_$][\w$-]*)*$/;

function assertValidName(name: string): string {
  if (typeof name !== 'string' || !name.trim()) {
    throw new Error('DSL function name must be a non-empty string');
  }
  if (!NAME_PATTERN.test(name)) {
    throw new Error(`DSL function name "${name}" must be a valid identifier`);
  }
  return name;
}

function assertValidNamespace(namespace: string): string {
  if (!NAMESPACE_PATTERN.test(namespace)) {
    throw new Error(`DSL namespace "${namespace}" must be dot-separated identifiers`);
  }
  return namespace;
}

export function defineDsl<A extends readonly unknown[], O, R>(definition: DslDefinition<A, O, R>): DslFunction<A, R> {
  const dslName = assertValidName(definition.name);
  const qualifiedName = `${assertValidNamespace(definition.namespace ?? 'user')}/${dslName}`;
  const { args: schema, fn } = definition;

  const invoke = (...args: A): R => {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      throw new ArgumentValidationError({ function: qualifiedName, args, issues: formatZodError(parsed.error) });
    }

    const context: ProvenanceContext = {
      function: qualifiedName,
      args,
      stackFilter: isScriptFrame,
      frames: captureFrames(isScriptFrame),
    };
    log.trace({ event: 'dsl-invoke', fn: qualifiedName });
    return withProvenance(context, () => fn(parsed.data, args));
  };

  return Object.assign(invoke, { qualifiedName, dslName, doc: definition.doc });
}

// Built-in DSL

const attrsSchema = z.record(z.string().min(1), opValueSchema);

export const entity = defineDsl({
  name: 'entity',
  namespace: 'cfgscript',
  doc: 'Create the entity with the given config id, or merge attributes onto it if it exists. Returns its id.',
  args: z.tuple([z.string().min(1), attrsSchema.optional()]),
  fn: ([id, attrs]): EntityId => {
    transact([{ op: 'create', attrs: { ...attrs, [ID_ATTR]: id } }]);
    return resolveId(id);
  },
});

export const ref = defineDsl({
  name: 'ref',
  namespace: 'cfgscript',
  doc: 'Reference value pointing at the entity with the given config id.',
  args: z.tuple([z.string().min(1)]),
  fn: ([id]): RefValue => ({ ref: resolveId(id) }),
});

export const setAttr = defineDsl({
  name: 'setAttr',
  namespace: 'cfgscript',
  doc: 'Set one attribute on the existing entity with the given config id. Returns its id.',
  args: z.tuple([z.string().min(1), z.string().min(1), opValueSchema]),
  fn: ([id, attrName, value]): EntityId => {
    const eid = resolveId(id);
    transact([{ op: 'assert', entity: eid, attr: attrName, value }]);
    return eid;
  },
});

export const BUILTIN_DSL: readonly AnyDslFunction[] = [entity, ref, setAttr];
