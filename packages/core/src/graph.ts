/**
 * In-memory entity store
 *
 * A pure, immutable transformation: applying the same ops to the same graph
 * always yields an equal graph. Nothing here mutates its input.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { TransactionError, formatZodError } from './errors.js';
import type {
  AttrValue,
  ConfigGraph,
  EntityAttrs,
  EntityId,
  EntityRef,
  LookupRef,
  OpValue,
  Provenance,
  TxOp,
  TxRecord,
} from './types.js';

/** Read-only attribute holding an entity's own id */
export const DB_ID = 'db/id';

/** Stable, user-facing identifier attribute (unique) */
export const ID_ATTR = 'config/id';

const attrValueSchema: z.ZodType<AttrValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(attrValueSchema),
    z.object({ ref: z.number().int().positive() }),
  ])
);

const entityRefSchema: z.ZodType<EntityRef> = z.union([
  z.number().int().positive(),
  z.string().min(1),
  z.object({ attr: z.string().min(1), value: attrValueSchema }),
]);

export const opValueSchema: z.ZodType<OpValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(opValueSchema),
    z.object({ ref: entityRefSchema }),
  ])
);

export const txOpSchema: z.ZodType<TxOp> = z.discriminatedUnion('op', [
  z.object({
    op: z.literal('create'),
    tempId: z.string().min(1).optional(),
    attrs: z.record(z.string().min(1), opValueSchema),
  }),
  z.object({ op: z.literal('assert'), entity: entityRefSchema, attr: z.string().min(1), value: opValueSchema }),
  z.object({ op: z.literal('retract'), entity: entityRefSchema, attr: z.string().min(1) }),
]);

const txSchema = z.array(txOpSchema);

/**
 * Recursively stable-sort object keys. Array order is significant and kept.
 */
export function stableStringify(obj: unknown): string {
  if (obj === null || typeof obj !== 'object') {
    return JSON.stringify(obj) ?? 'null';
  }
  if (Array.isArray(obj)) {
    return '[' + obj.map(stableStringify).join(',') + ']';
  }
  const record: Record<string, unknown> = { ...obj };
  const keys = Object.keys(record).sort();
  const pairs = keys.map((k) => JSON.stringify(k) + ':' + stableStringify(record[k]));
  return '{' + pairs.join(',') + '}';
}

function sameValue(a: AttrValue, b: AttrValue): boolean {
  return stableStringify(a) === stableStringify(b);
}

function isRefOp(value: OpValue): value is { readonly ref: EntityRef } {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'ref' in value;
}

function isOpArray(value: OpValue): value is readonly OpValue[] {
  return Array.isArray(value);
}

function isLookupRef(ref: EntityRef): ref is LookupRef {
  return typeof ref === 'object';
}

function findIn(entities: ReadonlyMap<EntityId, EntityAttrs>, attrName: string, value: AttrValue): EntityId | undefined {
  for (const [id, attrs] of entities) {
    const current = attrs[attrName];
    if (current !== undefined && sameValue(current, value)) return id;
  }
  return undefined;
}

export function emptyGraph(): ConfigGraph {
  return {
    basisTx: 0,
    nextId: 1,
    entities: new Map(),
    tempIds: new Map(),
    transactions: [],
  };
}

/**
 * Working state of one transaction
 */
class TxBuilder {
  readonly entities: Map<EntityId, EntityAttrs>;
  readonly tempIds = new Map<string, EntityId>();
  nextId: EntityId;
  private opIndex: number | null = null;

  constructor(graph: ConfigGraph) {
    this.entities = new Map(graph.entities);
    this.nextId = graph.nextId;
  }

  fail(reason: string, entity?: EntityId | string): never {
    throw new TransactionError({ reason, opIndex: this.opIndex, entity });
  }

  at(index: number): void {
    this.opIndex = index;
  }

  /**
   * Allocate (or upsert onto) the entity a create op addresses
   */
  allocate(tempId: string | undefined, attrs: Readonly<Record<string, OpValue>>): EntityId {
    if (DB_ID in attrs) this.fail(`\`${DB_ID}\` cannot be asserted`);

    const raw = attrs[ID_ATTR];
    if (raw !== undefined && typeof raw !== 'string') this.fail(`\`${ID_ATTR}\` must be a string`);
    const stable = typeof raw === 'string' ? raw : undefined;
    let id = stable === undefined ? undefined : findIn(this.entities, ID_ATTR, stable);
    if (id === undefined) {
      id = this.nextId++;
      this.entities.set(id, stable === undefined ? {} : { [ID_ATTR]: stable });
    }

    if (tempId !== undefined) {
      const bound = this.tempIds.get(tempId);
      if (bound !== undefined && bound !== id) this.fail(`tempid "${tempId}" is bound to two entities`, tempId);
      this.tempIds.set(tempId, id);
    }
    return id;
  }

  resolveRef(ref: EntityRef): EntityId {
    if (typeof ref === 'number') {
      if (!this.entities.has(ref)) this.fail(`entity ${ref} does not exist`, ref);
      return ref;
    }
    if (isLookupRef(ref)) {
      return (
        findIn(this.entities, ref.attr, ref.value) ??
        this.fail(`no entity has ${ref.attr} = ${stableStringify(ref.value)}`)
      );
    }
    return this.tempIds.get(ref) ?? this.fail(`tempid "${ref}" is not bound in this transaction`, ref);
  }

  resolveValue(value: OpValue): AttrValue {
    if (isRefOp(value)) return { ref: this.resolveRef(value.ref) };
    if (isOpArray(value)) return value.map((v) => this.resolveValue(v));
    return value;
  }

  set(id: EntityId, attrName: string, value: AttrValue): void {
    if (attrName === DB_ID) this.fail(`\`${DB_ID}\` cannot be asserted`, id);
    if (attrName === ID_ATTR) {
      if (typeof value !== 'string') this.fail(`\`${ID_ATTR}\` must be a string`, id);
      const holder = findIn(this.entities, ID_ATTR, value);
      if (holder !== undefined && holder !== id) {
        this.fail(`\`${ID_ATTR}\` "${value}" already belongs to entity ${holder}`, id);
      }
    }
    const current = this.entities.get(id) ?? {};
    this.entities.set(id, { ...current, [attrName]: value });
  }

  retract(id: EntityId, attrName: string): void {
    if (attrName === DB_ID) this.fail(`\`${DB_ID}\` cannot be retracted`, id);
    const next = { ...this.entities.get(id) };
    delete next[attrName];
    this.entities.set(id, next);
  }
}

/**
 * Apply a batch of ops, returning the new graph. An empty batch returns `graph` itself.
 */
export function applyOps(graph: ConfigGraph, ops: readonly TxOp[], provenance: Provenance | null = null): ConfigGraph {
  if (ops.length === 0) return graph;

  const parsed = txSchema.safeParse(ops);
  if (!parsed.success) {
    throw new TransactionError({ reason: formatZodError(parsed.error), opIndex: null });
  }
  const tx = parsed.data;
  const builder = new TxBuilder(graph);

  // Allocate every created entity first so refs may name tempids bound later in the batch
  const allocated = new Map<number, EntityId>();
  tx.forEach((op, index) => {
    builder.at(index);
    if (op.op === 'create') allocated.set(index, builder.allocate(op.tempId, op.attrs));
  });

  tx.forEach((op, index) => {
    builder.at(index);
    switch (op.op) {
      case 'create': {
        const target = allocated.get(index) ?? builder.fail('create op has no allocated entity');
        for (const [name, value] of Object.entries(op.attrs)) {
          if (name === ID_ATTR) continue;
          builder.set(target, name, builder.resolveValue(value));
        }
        break;
      }
      case 'assert':
        builder.set(builder.resolveRef(op.entity), op.attr, builder.resolveValue(op.value));
        break;
      case 'retract':
        builder.retract(builder.resolveRef(op.entity), op.attr);
        break;
    }
  });

  const record: TxRecord = { tx: graph.basisTx + 1, opCount: tx.length, provenance };
  return {
    basisTx: record.tx,
    nextId: builder.nextId,
    entities: builder.entities,
    tempIds: builder.tempIds,
    transactions: [...graph.transactions, record],
  };
}

/**
 * Entity id bound to `tempId` by the most recent transaction
 */
export function resolveTempId(graph: ConfigGraph, tempId: string): EntityId | undefined {
  return graph.tempIds.get(tempId);
}

export function findEntity(graph: ConfigGraph, attrName: string, value: AttrValue): EntityId | undefined {
  return findIn(graph.entities, attrName, value);
}

function lookupEntity(graph: ConfigGraph, ref: EntityRef): EntityId | undefined {
  if (typeof ref === 'number') return graph.entities.has(ref) ? ref : undefined;
  if (isLookupRef(ref)) return findIn(graph.entities, ref.attr, ref.value);
  return resolveTempId(graph, ref);
}

/**
 * Read one attribute; `db/id` reads the entity's own id
 */
export function attr(graph: ConfigGraph, ref: EntityRef, attrName: string): AttrValue | undefined {
  const id = lookupEntity(graph, ref);
  if (id === undefined) return undefined;
  if (attrName === DB_ID) return id;
  const attrs = graph.entities.get(id);
  return attrs && Object.prototype.hasOwnProperty.call(attrs, attrName) ? attrs[attrName] : undefined;
}

export function entityAttrs(graph: ConfigGraph, ref: EntityRef): EntityAttrs | undefined {
  const id = lookupEntity(graph, ref);
  return id === undefined ? undefined : graph.entities.get(id);
}

export interface GraphJSON {
  basisTx: number;
  entities: Array<Record<string, AttrValue>>;
  transactions: TxRecord[];
}

export function graphToJSON(graph: ConfigGraph): GraphJSON {
  return {
    basisTx: graph.basisTx,
    entities: [...graph.entities].map(([id, attrs]) => ({ [DB_ID]: id, ...attrs })),
    transactions: [...graph.transactions],
  };
}

/**
 * MD5 over a key-sorted serialization; equal graphs give equal fingerprints
 */
export function graphFingerprint(graph: ConfigGraph): string {
  return createHash('md5').update(stableStringify(graphToJSON(graph))).digest('hex');
}
