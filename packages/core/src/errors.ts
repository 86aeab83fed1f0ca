/**
 * Error taxonomy
 *
 * Every error raised by the engine carries a code, a longer explanation,
 * remediation suggestions and the structured data it was raised with.
 */

import { types } from 'util';
import type { ZodError } from 'zod';
import type { ConfigGraph, EntityId } from './types.js';

export abstract class CfgScriptError<TData extends object = Record<string, unknown>> extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    readonly data: TData,
    readonly explanation: string,
    readonly suggestions: readonly string[]
  ) {
    super(message);
    this.name = new.target.name;
  }

  /**
   * Human-readable rendering: message, explanation, suggestions
   */
  explain(): string {
    const lines = [`${this.message} [${this.code}]`, '', this.explanation];
    if (this.suggestions.length) {
      lines.push('', 'Suggestions:');
      for (const s of this.suggestions) lines.push(`  - ${s}`);
    }
    return lines.join('\n');
  }
}

export class ScopeError extends CfgScriptError<Record<string, never>> {
  readonly code = 'scope/outside-script';

  constructor() {
    super(
      'Cannot reference context config in non-script context',
      {},
      'A script DSL form was used while no configuration is in context. DSL forms work by imperatively ' +
        'updating the configuration currently being built; calling them on their own, or after the build ' +
        'that owned them has finished, is not meaningful.',
      ['Use this DSL form only inside a config initializer (such as one passed to `ConfigEngine.build`).']
    );
  }
}

export interface UnresolvedReferenceData {
  /** The config as of this invocation */
  graph: ConfigGraph;
  /** The missing stable id */
  id: string;
  /** The DSL function that triggered the lookup */
  dslFunction: string;
}

export class UnresolvedReferenceError extends CfgScriptError<UnresolvedReferenceData> {
  readonly code = 'script/unresolved-id';

  constructor(data: UnresolvedReferenceData) {
    super(
      `Could not find entity identified by \`${data.id}\``,
      data,
      `An entity with the config id \`${data.id}\` was referenced from the \`${data.dslFunction}\` DSL form, ` +
        'but no entity with that id exists in the config yet. Entities must be defined in the context ' +
        'configuration before they are referenced.',
      [
        'Ensure that you have already created an entity with this config id earlier in your script.',
        'Make sure that the config ids match exactly, with no typos.',
      ]
    );
  }
}

export class ModuleNotFoundError extends CfgScriptError<{ module: string }> {
  readonly code = 'module/not-found';

  constructor(module: string) {
    super(
      `Could not find config module \`${module}\``,
      { module },
      `\`${module}\` was given as a configuration module, but no module with that identifier was found ` +
        'under the configured module roots.',
      [
        `Ensure that a module named \`${module}\` exists under one of the module roots.`,
        `Ensure that the declaration and the usages of \`${module}\` are all typo-free.`,
      ]
    );
  }
}

export class NotAConfigModuleError extends CfgScriptError<{ module: string }> {
  readonly code = 'module/not-config';

  constructor(module: string) {
    super(
      `\`${module}\` is not a config module`,
      { module },
      `\`${module}\` was given as a configuration module. Configuration modules are identified by a ` +
        "`'use config';` directive as their first statement, and this module does not have one.",
      [
        `Add \`'use config';\` at the top of \`${module}\` if it is intended to be a config module.`,
        'Use a different module that is actually a config module.',
      ]
    );
  }
}

export interface ArgumentValidationData {
  function: string;
  args: readonly unknown[];
  /** Formatted validation issues */
  issues: string;
}

export class ArgumentValidationError extends CfgScriptError<ArgumentValidationData> {
  readonly code = 'dsl/invalid-args';

  constructor(data: ArgumentValidationData) {
    super(
      `Invalid arguments to \`${data.function}\`: ${data.issues}`,
      data,
      `The arguments passed to \`${data.function}\` do not match its declared argument shape. ` +
        'The call was rejected before it touched the configuration.',
      [`Check the documentation of \`${data.function}\` for the expected arguments.`]
    );
  }
}

export class InitializerNotFoundError extends CfgScriptError<{ ref: string; reason: string }> {
  readonly code = 'initializer/not-found';

  constructor(ref: string, reason: string) {
    super(
      `Could not resolve initializer function \`${ref}\`: ${reason}`,
      { ref, reason },
      'A function initializer names either a function registered on the engine, or an export of a ' +
        'module written as `specifier#exportName`.',
      [
        'Register the function with `ConfigEngine.registerFunction` before building.',
        'Check that the module exists and exports a function under that name.',
      ]
    );
  }
}

export class InvalidInitializerError extends CfgScriptError<{ value: unknown; issues: string }> {
  readonly code = 'initializer/invalid';

  constructor(value: unknown, issues: string) {
    super(
      `Invalid initializer: ${issues}`,
      { value, issues },
      'An initializer must be one of `{ fn }`, `{ module }`, `{ file }`, `{ ops }`, `{ script }` or null.',
      ['Check the initializer list in your config file.']
    );
  }
}

export interface TransactionErrorData {
  reason: string;
  opIndex: number | null;
  entity?: EntityId | string;
}

export class TransactionError extends CfgScriptError<TransactionErrorData> {
  readonly code = 'graph/invalid-tx';

  constructor(data: TransactionErrorData) {
    super(
      data.opIndex === null ? `Invalid transaction: ${data.reason}` : `Invalid transaction op #${data.opIndex}: ${data.reason}`,
      data,
      'A transaction could not be applied to the configuration graph. No part of it was applied.',
      ['Check that every op is well-formed and that referenced entities and tempids exist.']
    );
  }
}

export function formatZodError(error: ZodError): string {
  const issues = error.issues ?? [];
  if (!issues.length) return error.message;
  return issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.map(String).join('.') : '';
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * True for errors from any realm; scripts throw errors of their own vm context
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error || types.isNativeError(value);
}

export function errorMessage(value: unknown): string {
  return isError(value) ? value.message : String(value);
}
