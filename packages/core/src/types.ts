/**
 * cfgscript type definitions
 */

/**
 * Entity identifier, allocated from 1 in transaction order
 */
export type EntityId = number;

/**
 * Reference value stored in an attribute
 */
export interface RefValue {
  readonly ref: EntityId;
}

export type AttrValue = string | number | boolean | null | readonly AttrValue[] | RefValue;

/**
 * Addresses an entity by a unique attribute value, e.g. `{ attr: 'config/id', value: 'app/server' }`
 */
export interface LookupRef {
  readonly attr: string;
  readonly value: AttrValue;
}

/**
 * How ops and lookups address an entity: id, tempid or lookup ref
 */
export type EntityRef = EntityId | string | LookupRef;

/**
 * Value accepted inside ops; `{ ref }` may name a tempid of the same transaction
 */
export type OpValue = string | number | boolean | null | readonly OpValue[] | { readonly ref: EntityRef };

export type TxOp =
  | { readonly op: 'create'; readonly tempId?: string; readonly attrs: Readonly<Record<string, OpValue>> }
  | { readonly op: 'assert'; readonly entity: EntityRef; readonly attr: string; readonly value: OpValue }
  | { readonly op: 'retract'; readonly entity: EntityRef; readonly attr: string };

export type EntityAttrs = Readonly<Record<string, AttrValue>>;

/**
 * One parsed stack frame
 */
export interface StackFrame {
  fn: string | null;
  file: string;
  line: number;
  column: number;
}

/**
 * Who contributed a transaction
 */
export interface Provenance {
  source: 'user';
  /** Qualified name of the DSL function */
  function: string;
  /** Script-originated frames of the call */
  frames: StackFrame[];
}

export interface TxRecord {
  readonly tx: number;
  readonly opCount: number;
  readonly provenance: Provenance | null;
}

/**
 * Immutable configuration graph
 */
export interface ConfigGraph {
  /** Number of transactions applied */
  readonly basisTx: number;
  readonly nextId: EntityId;
  readonly entities: ReadonlyMap<EntityId, EntityAttrs>;
  /** Tempid bindings of the most recent transaction */
  readonly tempIds: ReadonlyMap<string, EntityId>;
  readonly transactions: readonly TxRecord[];
}

/**
 * Named initializer function
 */
export type InitializerFn = (graph: ConfigGraph) => ConfigGraph | Promise<ConfigGraph>;

export type Initializer =
  | { readonly kind: 'function'; readonly ref: string }
  | { readonly kind: 'module'; readonly id: string }
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'ops'; readonly ops: readonly TxOp[] }
  | { readonly kind: 'script'; readonly source: string }
  | { readonly kind: 'none' };

/**
 * Discovered module
 */
export interface ModuleDescriptor {
  /** Dotted identifier, e.g. `app.config.base` */
  id: string;
  /** Absolute file path */
  path: string;
  /** Whether the module opens with the `'use config'` directive */
  isConfig: boolean;
}

/**
 * Module discovery contract
 */
export interface ModuleSource {
  listModules(): Promise<ModuleDescriptor[]>;
  readSource(descriptor: ModuleDescriptor): string;
}
