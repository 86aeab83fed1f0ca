import { describe, it, expect } from 'vitest';
import * as vm from 'vm';
import { ConfigEngine, ModuleNotFoundError, emptyGraph, initializers, resetLogSink, setLogSink } from '@cfgscript/core';
import { renderError } from '../report.js';

describe('renderError', () => {
  it('should explain engine errors', () => {
    const error = new ModuleNotFoundError('app.x');
    expect(renderError(error)).toBe(error.explain());
  });

  it('should render errors thrown by script code with name and message', async () => {
    const engine = new ConfigEngine();
    setLogSink(() => {});
    let caught: unknown;
    try {
      await engine.applyInitializer(emptyGraph(), initializers.script('missingFn();'));
    } catch (err) {
      caught = err;
    } finally {
      resetLogSink();
    }

    expect(renderError(caught)).toBe('ReferenceError: missingFn is not defined');
  });

  it('should render errors from any context', () => {
    expect(renderError(new Error('plain'))).toBe('Error: plain');
    expect(renderError(vm.runInNewContext("new RangeError('too far')"))).toBe('RangeError: too far');
  });

  it('should fall back for thrown non-errors', () => {
    expect(renderError('nope')).toBe('Unknown error');
  });
});
