import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { CfgScriptError, ModuleNotFoundError, ScopeError, TransactionError, formatZodError } from '../errors.js';

describe('CfgScriptError', () => {
  it('should carry name, code and data', () => {
    const err = new ModuleNotFoundError('app.x');

    expect(err).toBeInstanceOf(CfgScriptError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ModuleNotFoundError');
    expect(err.code).toBe('module/not-found');
    expect(err.data).toEqual({ module: 'app.x' });
    expect(err.message).toBe('Could not find config module `app.x`');
  });

  it('should explain itself with suggestions', () => {
    const lines = new ModuleNotFoundError('app.x').explain().split('\n');

    expect(lines[0]).toBe('Could not find config module `app.x` [module/not-found]');
    expect(lines[1]).toBe('');
    expect(lines.slice(3)).toEqual([
      '',
      'Suggestions:',
      '  - Ensure that a module named `app.x` exists under one of the module roots.',
      '  - Ensure that the declaration and the usages of `app.x` are all typo-free.',
    ]);
  });

  it('should number the failing op of a transaction', () => {
    expect(new TransactionError({ reason: 'bad', opIndex: 2 }).message).toBe('Invalid transaction op #2: bad');
    expect(new TransactionError({ reason: 'bad', opIndex: null }).message).toBe('Invalid transaction: bad');
  });

  it('should describe scope misuse', () => {
    expect(new ScopeError().explain().split('\n')[0]).toBe(
      'Cannot reference context config in non-script context [scope/outside-script]'
    );
  });
});

describe('formatZodError', () => {
  it('should prefix issues with their path', () => {
    const result = z.object({ a: z.object({ b: z.string() }) }).safeParse({ a: { b: 1 } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toMatch(/^a\.b: /);
    }
  });
});
