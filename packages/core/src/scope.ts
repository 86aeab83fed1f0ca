/**
 * Context scope: the configuration currently being built
 *
 * Each build runs in its own scope, carried by AsyncLocalStorage so nested
 * DSL calls can reach it at any call depth without a graph parameter.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { ScopeError } from './errors.js';
import { applyOps, resolveTempId } from './graph.js';
import { currentProvenance, toProvenance } from './provenance.js';
import type { ConfigGraph, EntityId, TxOp } from './types.js';

export class ContextScope {
  private graph: ConfigGraph;
  private open = true;

  constructor(initial: ConfigGraph) {
    this.graph = initial;
  }

  get isOpen(): boolean {
    return this.open;
  }

  read(): ConfigGraph {
    if (!this.open) throw new ScopeError();
    return this.graph;
  }

  write(next: ConfigGraph): ConfigGraph {
    if (!this.open) throw new ScopeError();
    this.graph = next;
    return next;
  }

  /**
   * Final value; the scope rejects every access afterwards
   */
  close(): ConfigGraph {
    this.open = false;
    return this.graph;
  }
}

const storage = new AsyncLocalStorage<ContextScope>();

function activeScope(): ContextScope {
  const scope = storage.getStore();
  if (!scope) throw new ScopeError();
  return scope;
}

export function hasScope(): boolean {
  return storage.getStore()?.isOpen ?? false;
}

/**
 * Return the config value currently in context
 */
export function currentGraph(): ConfigGraph {
  return activeScope().read();
}

/**
 * Replace the context config with `fn(current, ...args)` and return it
 */
export function updateGraph<A extends readonly unknown[]>(
  fn: (graph: ConfigGraph, ...args: A) => ConfigGraph,
  ...args: A
): ConfigGraph {
  const scope = activeScope();
  return scope.write(fn(scope.read(), ...args));
}

/**
 * Apply `ops` to the context config. With a tempid, returns the entity it
 * resolved to in the resulting graph.
 */
export function transact(ops: readonly TxOp[], tempId?: string): EntityId | undefined {
  const provenance = currentProvenance();
  const next = updateGraph(applyOps, ops, provenance ? toProvenance(provenance) : null);
  return tempId === undefined ? undefined : resolveTempId(next, tempId);
}

export interface ScopeResult<T> {
  result: T;
  graph: ConfigGraph;
}

/**
 * Run `body` with a fresh scope bound to `initial`. The scope is closed on
 * every exit path.
 */
export async function withScope<T>(initial: ConfigGraph, body: () => T | Promise<T>): Promise<ScopeResult<T>> {
  const scope = new ContextScope(initial);
  try {
    const result = await storage.run(scope, body);
    return { result, graph: scope.read() };
  } finally {
    scope.close();
  }
}
