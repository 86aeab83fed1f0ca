/**
 * ConfigEngine: applies initializers to configuration graphs
 */

import * as fsp from 'fs/promises';
import { createRequire } from 'module';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { BUILTIN_DSL, type AnyDslFunction } from './dsl.js';
import { InitializerNotFoundError, InvalidInitializerError, errorMessage } from './errors.js';
import { DB_ID, ID_ATTR, applyOps, attr, emptyGraph } from './graph.js';
import { describeInitializer, initializers } from './initializer.js';
import { log } from './log.js';
import { DirectoryModuleSource, ModuleLoader } from './modules.js';
import { resolveId } from './resolve.js';
import { createNamespace, evaluateScript, type ScriptGlobals } from './sandbox.js';
import { currentGraph, transact, updateGraph, withScope } from './scope.js';
import type { ConfigGraph, Initializer, InitializerFn, ModuleSource } from './types.js';

/**
 * ConfigEngine configuration
 */
export interface ConfigEngineOptions {
  /** Directories searched for modules, relative to `baseDir` */
  moduleRoots?: string[];
  /** Replaces directory discovery */
  moduleSource?: ModuleSource;
  /** Base for relative file paths and import specifiers, default cwd */
  baseDir?: string;
  /** Named initializer functions */
  functions?: Record<string, InitializerFn>;
  /** DSL functions exposed to scripts, in addition to the built-ins */
  dsl?: readonly AnyDslFunction[];
}

type ResolvedFn = (graph: ConfigGraph) => unknown;

/** Globals every script sees; DSL functions may not shadow them */
const CORE_GLOBALS = ['console', 'require', 'currentGraph', 'update', 'transact', 'resolveId', 'attr', 'DB_ID', 'ID_ATTR'];

function isConfigGraph(value: unknown): value is ConfigGraph {
  return (
    typeof value === 'object' &&
    value !== null &&
    'entities' in value &&
    value.entities instanceof Map &&
    'transactions' in value &&
    Array.isArray(value.transactions)
  );
}

function assertValidFunctionName(name: string): string {
  if (typeof name !== 'string' || !name.trim()) {
    throw new Error('Initializer function name must be a non-empty string');
  }
  if (name !== name.trim()) {
    throw new Error(`Initializer function name "${name}" must not have leading/trailing whitespace`);
  }
  return name;
}

export class ConfigEngine {
  readonly modules: ModuleLoader;
  readonly baseDir: string;
  private readonly functions = new Map<string, InitializerFn>();
  private readonly dsl = new Map<string, AnyDslFunction>();

  constructor(options: ConfigEngineOptions = {}) {
    this.baseDir = path.resolve(options.baseDir ?? process.cwd());
    const source =
      options.moduleSource ??
      new DirectoryModuleSource((options.moduleRoots ?? []).map((root) => path.resolve(this.baseDir, root)));
    this.modules = new ModuleLoader(source, () => this.scriptGlobals());

    for (const fn of BUILTIN_DSL) this.registerDsl(fn);
    for (const fn of options.dsl ?? []) this.registerDsl(fn);
    for (const [name, fn] of Object.entries(options.functions ?? {})) this.registerFunction(name, fn);
  }

  registerFunction(name: string, fn: InitializerFn): void {
    this.functions.set(assertValidFunctionName(name), fn);
  }

  /**
   * Expose a DSL function to scripts under its simple name
   */
  registerDsl(fn: AnyDslFunction): void {
    if (CORE_GLOBALS.includes(fn.dslName)) {
      throw new Error(`DSL function "${fn.qualifiedName}" would shadow the script global "${fn.dslName}"`);
    }
    const existing = this.dsl.get(fn.dslName);
    if (existing && existing !== fn) {
      log.warn({ event: 'dsl-replaced', name: fn.dslName, previous: existing.qualifiedName, next: fn.qualifiedName });
    }
    this.dsl.set(fn.dslName, fn);
  }

  /**
   * Bindings visible to scripts and config modules
   */
  scriptGlobals(): ScriptGlobals {
    const globals: ScriptGlobals = {
      console,
      currentGraph,
      update: updateGraph,
      transact,
      resolveId,
      attr,
      DB_ID,
      ID_ATTR,
    };
    for (const [name, fn] of this.dsl) globals[name] = fn;
    return globals;
  }

  /**
   * Apply one initializer to `graph`, returning the resulting graph. On
   * failure the promise rejects and `graph` is left as it was.
   */
  async applyInitializer(graph: ConfigGraph, initializer?: Initializer | null): Promise<ConfigGraph> {
    const init = initializer ?? initializers.none();
    const description = describeInitializer(init);
    log.debug({ event: 'apply-initializer', initializer: description, basisTx: graph.basisTx });

    try {
      const { graph: result } = await withScope(graph, () => this.dispatch(init));
      log.debug({ event: 'initializer-applied', initializer: description, basisTx: result.basisTx });
      return result;
    } catch (err) {
      log.warn({ event: 'initializer-failed', initializer: description, error: err });
      throw err;
    }
  }

  /**
   * Apply initializers in order
   */
  async build(inits: ReadonlyArray<Initializer | null | undefined>, graph: ConfigGraph = emptyGraph()): Promise<ConfigGraph> {
    let current = graph;
    for (const init of inits) {
      current = await this.applyInitializer(current, init);
    }
    return current;
  }

  private async dispatch(init: Initializer): Promise<void> {
    switch (init.kind) {
      case 'function': {
        const fn = await this.resolveFunction(init.ref);
        const next = await fn(currentGraph());
        if (!isConfigGraph(next)) {
          throw new InvalidInitializerError(init, `function \`${init.ref}\` did not return a config graph`);
        }
        updateGraph(() => next);
        return;
      }
      case 'module':
        await this.modules.load(init.id);
        return;
      case 'file': {
        const filePath = path.resolve(this.baseDir, init.path);
        const source = await fsp.readFile(filePath, 'utf-8');
        await this.runScript(source, filePath, filePath);
        return;
      }
      case 'ops':
        updateGraph(applyOps, init.ops);
        return;
      case 'script':
        if (!init.source.trim()) return;
        await this.runScript(init.source, 'inline', path.join(this.baseDir, 'inline.js'));
        return;
      case 'none':
        return;
      default: {
        const unreachable: never = init;
        throw new Error(`Unknown initializer: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /**
   * Run source in a fresh namespace; a promise completion value is awaited
   */
  private async runScript(source: string, origin: string, requireFrom: string): Promise<void> {
    const namespace = createNamespace({ ...this.scriptGlobals(), require: createRequire(requireFrom) });
    log.debug({ event: 'script-eval', namespace: namespace.name, origin });
    await evaluateScript(namespace, source, origin);
  }

  private async resolveFunction(ref: string): Promise<ResolvedFn> {
    const registered = this.functions.get(ref);
    if (registered) return registered;

    const hash = ref.lastIndexOf('#');
    if (hash <= 0 || hash === ref.length - 1) {
      throw new InitializerNotFoundError(ref, 'not registered, and not of the form `specifier#exportName`');
    }
    const specifier = ref.slice(0, hash);
    const exportName = ref.slice(hash + 1);
    const target =
      specifier.startsWith('.') || path.isAbsolute(specifier)
        ? pathToFileURL(path.resolve(this.baseDir, specifier)).href
        : specifier;

    let mod: unknown;
    try {
      mod = await import(/* @vite-ignore */ target);
    } catch (err) {
      throw new InitializerNotFoundError(ref, `cannot import "${specifier}": ${errorMessage(err)}`);
    }

    const exported: unknown = typeof mod === 'object' && mod !== null ? Reflect.get(mod, exportName) : undefined;
    if (typeof exported !== 'function') {
      throw new InitializerNotFoundError(ref, `"${specifier}" has no function export "${exportName}"`);
    }
    return (graph) => Reflect.apply(exported, undefined, [graph]);
  }
}
