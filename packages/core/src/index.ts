/**
 * cfgscript - configuration-script evaluation engine
 *
 * Core concepts:
 * - A config is an immutable entity graph built by transactions
 * - Initializers (functions, modules, script files, op batches, inline scripts) build it
 * - DSL functions update the config currently in context, without threading it through
 */

export { ConfigEngine } from './engine.js';
export type { ConfigEngineOptions } from './engine.js';

export type {
  AttrValue,
  ConfigGraph,
  EntityAttrs,
  EntityId,
  EntityRef,
  Initializer,
  InitializerFn,
  LookupRef,
  ModuleDescriptor,
  ModuleSource,
  OpValue,
  Provenance,
  RefValue,
  StackFrame,
  TxOp,
  TxRecord,
} from './types.js';

export {
  DB_ID,
  ID_ATTR,
  emptyGraph,
  applyOps,
  resolveTempId,
  attr,
  findEntity,
  entityAttrs,
  graphToJSON,
  graphFingerprint,
  stableStringify,
  txOpSchema,
  opValueSchema,
} from './graph.js';
export type { GraphJSON } from './graph.js';

export { ContextScope, currentGraph, updateGraph, transact, withScope, hasScope } from './scope.js';
export type { ScopeResult } from './scope.js';

export { resolveId } from './resolve.js';

export { defineDsl, entity, ref, setAttr, BUILTIN_DSL } from './dsl.js';
export type { DslDefinition, DslFunction, AnyDslFunction } from './dsl.js';

export {
  SCRIPT_FILE_PREFIX,
  parseStack,
  filterStack,
  isScriptFrame,
  captureFrames,
  withProvenance,
  currentProvenance,
  currentDslFunction,
} from './provenance.js';
export type { FramePredicate, ProvenanceContext } from './provenance.js';

export { DirectoryModuleSource, ModuleLoader, isConfigSource, moduleIdFromPath } from './modules.js';

export { initializers, parseInitializer, initializerInputSchema, describeInitializer } from './initializer.js';
export type { InitializerInput } from './initializer.js';

export {
  CfgScriptError,
  ScopeError,
  UnresolvedReferenceError,
  ModuleNotFoundError,
  NotAConfigModuleError,
  ArgumentValidationError,
  InitializerNotFoundError,
  InvalidInitializerError,
  TransactionError,
  formatZodError,
  isError,
  errorMessage,
} from './errors.js';

export { log, setLogLevel, getLogLevel, setLogSink, resetLogSink, isLogLevel, formatFields, LOG_LEVELS } from './log.js';
export type { LogLevel, LogFields, LogSink } from './log.js';
