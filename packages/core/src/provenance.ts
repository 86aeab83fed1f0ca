/**
 * Provenance of DSL invocations and stack-frame diagnostics
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { Provenance, StackFrame } from './types.js';

/** File-name prefix of every piece of code the engine evaluates */
export const SCRIPT_FILE_PREFIX = 'cfgscript:';

export type FramePredicate = (frame: StackFrame) => boolean;

/**
 * Annotation of the DSL invocation currently running
 */
export interface ProvenanceContext {
  /** Qualified DSL function name */
  function: string;
  /** Literal argument list */
  args: readonly unknown[];
  stackFilter: FramePredicate;
  /** Frames of the call that pass `stackFilter` */
  frames: StackFrame[];
}

const storage = new AsyncLocalStorage<ProvenanceContext>();

const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/;

/**
 * Parse a V8 stack string into frames. Lines without a location are dropped.
 */
export function parseStack(stack: string): StackFrame[] {
  const frames: StackFrame[] = [];
  for (const line of stack.split('\n')) {
    const match = FRAME_PATTERN.exec(line);
    if (!match) continue;
    const [, fn, file, lineNo, column] = match;
    if (file === undefined || lineNo === undefined || column === undefined) continue;
    frames.push({ fn: fn ?? null, file, line: Number(lineNo), column: Number(column) });
  }
  return frames;
}

export function filterStack(frames: readonly StackFrame[], pred: FramePredicate): StackFrame[] {
  return frames.filter(pred);
}

/**
 * True for frames of scripts and config modules evaluated by the engine
 */
export function isScriptFrame(frame: StackFrame): boolean {
  return frame.file.startsWith(SCRIPT_FILE_PREFIX);
}

/**
 * Capture the caller's stack, keeping only frames that pass `pred`
 */
export function captureFrames(pred: FramePredicate): StackFrame[] {
  const stack = new Error().stack ?? '';
  return filterStack(parseStack(stack), pred);
}

/**
 * Run `body` annotated with `context`. An enclosing annotation wins, so nested
 * DSL calls are attributed to the outermost one the script made.
 */
export function withProvenance<T>(context: ProvenanceContext, body: () => T): T {
  if (storage.getStore()) return body();
  return storage.run(context, body);
}

export function currentProvenance(): ProvenanceContext | undefined {
  return storage.getStore();
}

export function currentDslFunction(): string | undefined {
  return storage.getStore()?.function;
}

/**
 * Provenance record stored on a transaction
 */
export function toProvenance(context: ProvenanceContext): Provenance {
  return { source: 'user', function: context.function, frames: context.frames };
}
