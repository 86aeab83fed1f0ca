/**
 * Config module discovery and loading
 *
 * Config modules are reloaded from scratch on every load so a rebuild never
 * sees bindings left over from a previous one.
 */

import * as fs from 'fs';
import * as fsp from 'fs/promises';
import { createRequire } from 'module';
import * as path from 'path';
import { ModuleNotFoundError, NotAConfigModuleError } from './errors.js';
import { log } from './log.js';
import { createNamespace, evaluateModule, type ScriptGlobals, type ScriptModule } from './sandbox.js';
import type { ModuleDescriptor, ModuleSource } from './types.js';

export const MODULE_EXTENSIONS: readonly string[] = ['.js', '.cjs'];

const CONFIG_DIRECTIVE = /^(?:\s+|\/\/[^\n]*(?:\n|$)|\/\*[\s\S]*?\*\/)*(['"])use config\1/;

const ID_SEGMENT = /^[A-Za-z_$][\w$-]*$/;

/**
 * Whether source opens with the `'use config'` directive
 */
export function isConfigSource(source: string): boolean {
  return CONFIG_DIRECTIVE.test(source);
}

/**
 * `<root>/app/config/base.js` -> `app.config.base`; null for files that cannot be modules
 */
export function moduleIdFromPath(root: string, filePath: string): string | null {
  const ext = path.extname(filePath);
  if (!MODULE_EXTENSIONS.includes(ext)) return null;
  const relative = path.relative(root, filePath);
  if (relative.startsWith('..') || path.isAbsolute(relative)) return null;
  const segments = relative.slice(0, -ext.length).split(path.sep);
  if (!segments.every((seg) => ID_SEGMENT.test(seg))) return null;
  return segments.join('.');
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function listFiles(root: string): Promise<string[]> {
  const files: string[] = [];
  const stack = [root];

  while (stack.length) {
    const current = stack.pop();
    if (!current) continue;

    let dirents: fs.Dirent[];
    try {
      dirents = await fsp.readdir(current, { withFileTypes: true });
    } catch (err) {
      if (isMissing(err)) continue;
      throw err;
    }

    for (const dirent of dirents) {
      if (dirent.name.startsWith('.') || dirent.name === 'node_modules') continue;
      const fullPath = path.join(current, dirent.name);
      if (dirent.isDirectory()) stack.push(fullPath);
      else if (dirent.isFile()) files.push(fullPath);
    }
  }

  return files.sort();
}

/**
 * Discovers modules under a list of roots; the first root providing an id wins
 */
export class DirectoryModuleSource implements ModuleSource {
  readonly roots: readonly string[];

  constructor(roots: readonly string[]) {
    this.roots = roots.map((root) => path.resolve(root));
  }

  async listModules(): Promise<ModuleDescriptor[]> {
    const found = new Map<string, ModuleDescriptor>();
    for (const root of this.roots) {
      for (const file of await listFiles(root)) {
        const id = moduleIdFromPath(root, file);
        if (!id || found.has(id)) continue;
        const source = await fsp.readFile(file, 'utf-8');
        found.set(id, { id, path: file, isConfig: isConfigSource(source) });
      }
    }
    return [...found.values()];
  }

  readSource(descriptor: ModuleDescriptor): string {
    return fs.readFileSync(descriptor.path, 'utf-8');
  }
}

interface ModuleIndex {
  byId: Map<string, ModuleDescriptor>;
  byPath: Map<string, ModuleDescriptor>;
}

export class ModuleLoader {
  /** Config modules evaluated by the most recent load */
  private readonly loaded = new Map<string, ScriptModule>();
  /** Other discovered modules, kept across loads */
  private readonly libraries = new Map<string, ScriptModule>();

  constructor(
    private readonly source: ModuleSource,
    private readonly globals: () => ScriptGlobals
  ) {}

  listModules(): Promise<ModuleDescriptor[]> {
    return this.source.listModules();
  }

  loadedModules(): string[] {
    return [...this.loaded.keys()];
  }

  /**
   * Forget a module so the next load evaluates it again
   */
  unload(id: string): boolean {
    const removed = this.loaded.delete(id) || this.libraries.delete(id);
    if (removed) log.trace({ event: 'module-unloaded', module: id });
    return removed;
  }

  /**
   * Reload every config module reachable from `id`, starting from a clean slate.
   * Returns the module's exports.
   */
  async load(id: string): Promise<unknown> {
    const all = await this.source.listModules();
    const target = all.find((d) => d.id === id);
    if (!target) throw new ModuleNotFoundError(id);
    if (!target.isConfig) throw new NotAConfigModuleError(id);

    const configIds = new Set([...this.loaded.keys(), ...all.filter((d) => d.isConfig).map((d) => d.id)]);
    for (const configId of configIds) this.unload(configId);
    log.debug({ event: 'config-modules-reset', module: id, count: configIds.size });

    const index: ModuleIndex = {
      byId: new Map(all.map((d) => [d.id, d])),
      byPath: new Map(all.map((d) => [d.path, d])),
    };
    return this.evaluate(target, index);
  }

  private evaluate(descriptor: ModuleDescriptor, index: ModuleIndex): unknown {
    const cache = descriptor.isConfig ? this.loaded : this.libraries;
    const cached = cache.get(descriptor.id);
    if (cached) return cached.exports;

    const namespace = createNamespace(this.globals());
    const module: ScriptModule = { exports: {} };
    // Registered before evaluation so require cycles see the partial exports
    cache.set(descriptor.id, module);
    log.debug({ event: 'module-load', module: descriptor.id, namespace: namespace.name });

    try {
      evaluateModule(
        namespace,
        this.source.readSource(descriptor),
        `module:${descriptor.id}`,
        descriptor.path,
        module,
        (specifier) => this.require(descriptor, specifier, index)
      );
    } catch (err) {
      cache.delete(descriptor.id);
      throw err;
    }
    return module.exports;
  }

  private require(from: ModuleDescriptor, specifier: string, index: ModuleIndex): unknown {
    const byId = index.byId.get(specifier);
    if (byId) return this.evaluate(byId, index);

    if (specifier.startsWith('./') || specifier.startsWith('../')) {
      const base = path.resolve(path.dirname(from.path), specifier);
      const candidates = [
        base,
        ...MODULE_EXTENSIONS.map((ext) => base + ext),
        ...MODULE_EXTENSIONS.map((ext) => path.join(base, `index${ext}`)),
      ];
      for (const candidate of candidates) {
        const descriptor = index.byPath.get(candidate);
        if (descriptor) return this.evaluate(descriptor, index);
      }
    }

    return createRequire(from.path)(specifier);
  }
}
