import { CfgScriptError, isError } from '@cfgscript/core';

/**
 * Text printed for a failed build
 */
export function renderError(error: unknown): string {
  if (error instanceof CfgScriptError) return error.explain();
  if (isError(error)) return `${error.name}: ${error.message}`;
  return 'Unknown error';
}
