import { describe, it, expect } from 'vitest';
import { InvalidInitializerError } from '../errors.js';
import { describeInitializer, initializers, parseInitializer } from '../initializer.js';

describe('parseInitializer', () => {
  it('should convert each serializable form', () => {
    expect(parseInitializer(null)).toEqual({ kind: 'none' });
    expect(parseInitializer({ fn: './seed.js#seed' })).toEqual({ kind: 'function', ref: './seed.js#seed' });
    expect(parseInitializer({ module: 'app.config' })).toEqual({ kind: 'module', id: 'app.config' });
    expect(parseInitializer({ file: 'base.cfg.js' })).toEqual({ kind: 'file', path: 'base.cfg.js' });
    expect(parseInitializer({ script: "entity('a');" })).toEqual({ kind: 'script', source: "entity('a');" });
    expect(parseInitializer({ ops: [{ op: 'create', attrs: { name: 'a' } }] })).toEqual({
      kind: 'ops',
      ops: [{ op: 'create', attrs: { name: 'a' } }],
    });
  });

  it('should reject unknown and ambiguous shapes', () => {
    expect(() => parseInitializer({ foo: 1 })).toThrow(InvalidInitializerError);
    expect(() => parseInitializer({ fn: 'a', file: 'b' })).toThrow(InvalidInitializerError);
    expect(() => parseInitializer('app.config')).toThrow(InvalidInitializerError);
    expect(() => parseInitializer({ ops: [{ op: 'drop' }] })).toThrow(InvalidInitializerError);
  });

  it('should keep the rejected value on the error', () => {
    try {
      parseInitializer({ module: '' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInitializerError);
      expect(err).toMatchObject({ code: 'initializer/invalid', data: { value: { module: '' } } });
    }
  });
});

describe('describeInitializer', () => {
  it('should describe every kind', () => {
    expect(
      [
        initializers.fn('seed'),
        initializers.module('app.config'),
        initializers.file('base.cfg.js'),
        initializers.ops([{ op: 'retract', entity: 1, attr: 'a' }]),
        initializers.script('1'),
        initializers.none(),
      ].map(describeInitializer)
    ).toEqual(['function seed', 'module app.config', 'file base.cfg.js', 'ops (1)', 'inline script', 'none']);
  });
});
