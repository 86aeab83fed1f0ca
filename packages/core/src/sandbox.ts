/**
 * Evaluation namespaces
 *
 * Every script and config module runs in a fresh vm context with a unique
 * name, so repeated builds in one process never share evaluation state.
 */

import { randomUUID } from 'crypto';
import * as path from 'path';
import * as vm from 'vm';
import { SCRIPT_FILE_PREFIX } from './provenance.js';

export type ScriptGlobals = Record<string, unknown>;

export interface EvaluationNamespace {
  /** `config-script-<uuid>` */
  readonly name: string;
  readonly context: vm.Context;
}

/**
 * CommonJS-style module object handed to config modules
 */
export interface ScriptModule {
  exports: unknown;
}

export type ScriptRequire = (specifier: string) => unknown;

const MODULE_WRAPPER_HEAD = '(function (exports, require, module, __filename, __dirname) { ';
const MODULE_WRAPPER_TAIL = '\n})';

export function createNamespace(globals: ScriptGlobals): EvaluationNamespace {
  const name = `config-script-${randomUUID()}`;
  const context = vm.createContext({ ...globals }, { name });
  return { name, context };
}

/**
 * File name under which code from `origin` shows up in stack traces
 */
export function scriptFileName(origin: string): string {
  return `${SCRIPT_FILE_PREFIX}${origin}`;
}

/**
 * Run script source; returns its completion value
 */
export function evaluateScript(namespace: EvaluationNamespace, source: string, origin: string): unknown {
  const script = new vm.Script(source, { filename: scriptFileName(origin) });
  return script.runInContext(namespace.context);
}

/**
 * Run module source with CommonJS bindings; results land on `module.exports`
 */
export function evaluateModule(
  namespace: EvaluationNamespace,
  source: string,
  origin: string,
  filePath: string,
  module: ScriptModule,
  require: ScriptRequire
): void {
  const script = new vm.Script(MODULE_WRAPPER_HEAD + source + MODULE_WRAPPER_TAIL, {
    filename: scriptFileName(origin),
  });
  const factory: unknown = script.runInContext(namespace.context);
  if (typeof factory !== 'function') {
    throw new Error(`Module ${origin} did not evaluate to a module factory`);
  }
  Reflect.apply(factory, module.exports, [module.exports, require, module, filePath, path.dirname(filePath)]);
}
