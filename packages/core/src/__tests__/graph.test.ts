/**
 * Entity store tests
 */

import { describe, it, expect } from 'vitest';
import {
  DB_ID,
  ID_ATTR,
  applyOps,
  attr,
  emptyGraph,
  entityAttrs,
  findEntity,
  graphFingerprint,
  graphToJSON,
  resolveTempId,
} from '../graph.js';
import { TransactionError } from '../errors.js';
import type { TxOp } from '../types.js';

describe('applyOps', () => {
  it('should create entity 1 in an empty graph', () => {
    const graph = applyOps(emptyGraph(), [{ op: 'create', attrs: { name: 'server' } }]);

    expect(attr(graph, 1, DB_ID)).toBe(1);
    expect(attr(graph, 1, 'name')).toBe('server');
    expect(graph.basisTx).toBe(1);
    expect(graph.transactions).toEqual([{ tx: 1, opCount: 1, provenance: null }]);
  });

  it('should not mutate the input graph', () => {
    const before = emptyGraph();
    applyOps(before, [{ op: 'create', attrs: { name: 'server' } }]);

    expect(before.entities.size).toBe(0);
    expect(before.transactions).toEqual([]);
  });

  it('should return the same graph for an empty batch', () => {
    const graph = emptyGraph();
    expect(applyOps(graph, [])).toBe(graph);
  });

  it('should bind tempids of the latest transaction only', () => {
    const first = applyOps(emptyGraph(), [{ op: 'create', tempId: 'a', attrs: { n: 1 } }]);
    const second = applyOps(first, [{ op: 'create', tempId: 'b', attrs: { n: 2 } }]);

    expect(resolveTempId(first, 'a')).toBe(1);
    expect(resolveTempId(second, 'a')).toBeUndefined();
    expect(resolveTempId(second, 'b')).toBe(2);
  });

  it('should upsert onto the entity with the same config id', () => {
    const first = applyOps(emptyGraph(), [{ op: 'create', attrs: { [ID_ATTR]: 'app/server', port: 80 } }]);
    const second = applyOps(first, [{ op: 'create', tempId: 's', attrs: { [ID_ATTR]: 'app/server', host: 'localhost' } }]);

    expect(second.entities.size).toBe(1);
    expect(second.nextId).toBe(2);
    expect(resolveTempId(second, 's')).toBe(1);
    expect(entityAttrs(second, { attr: ID_ATTR, value: 'app/server' })).toEqual({
      [ID_ATTR]: 'app/server',
      port: 80,
      host: 'localhost',
    });
  });

  it('should resolve refs to tempids bound later in the same batch', () => {
    const graph = applyOps(emptyGraph(), [
      { op: 'create', tempId: 'srv', attrs: { handler: { ref: 'h' } } },
      { op: 'create', tempId: 'h', attrs: { name: 'handler' } },
    ]);

    expect(resolveTempId(graph, 'srv')).toBe(1);
    expect(resolveTempId(graph, 'h')).toBe(2);
    expect(attr(graph, 1, 'handler')).toEqual({ ref: 2 });
  });

  it('should assert and retract attributes', () => {
    const first = applyOps(emptyGraph(), [{ op: 'create', attrs: { [ID_ATTR]: 'x', a: 1 } }]);
    const second = applyOps(first, [
      { op: 'assert', entity: { attr: ID_ATTR, value: 'x' }, attr: 'b', value: [1, 2] },
      { op: 'retract', entity: 1, attr: 'a' },
    ]);

    expect(entityAttrs(second, 1)).toEqual({ [ID_ATTR]: 'x', b: [1, 2] });
    expect(entityAttrs(first, 1)).toEqual({ [ID_ATTR]: 'x', a: 1 });
  });

  it('should reject references to missing entities', () => {
    expect(() => applyOps(emptyGraph(), [{ op: 'assert', entity: 5, attr: 'a', value: 1 }])).toThrow(
      'Invalid transaction op #0: entity 5 does not exist'
    );
  });

  it('should reject unbound tempids', () => {
    expect(() => applyOps(emptyGraph(), [{ op: 'assert', entity: 'nope', attr: 'a', value: 1 }])).toThrow(
      TransactionError
    );
  });

  it('should reject malformed ops', () => {
    const malformed: TxOp[] = JSON.parse('[{"op":"create"}]');
    expect(() => applyOps(emptyGraph(), malformed)).toThrow(TransactionError);
  });

  it('should reject asserting db/id', () => {
    expect(() => applyOps(emptyGraph(), [{ op: 'create', attrs: { [DB_ID]: 3 } }])).toThrow(
      'Invalid transaction op #0: `db/id` cannot be asserted'
    );
  });

  it('should keep config ids unique', () => {
    const graph = applyOps(emptyGraph(), [
      { op: 'create', attrs: { [ID_ATTR]: 'x' } },
      { op: 'create', attrs: { [ID_ATTR]: 'y' } },
    ]);

    expect(() => applyOps(graph, [{ op: 'assert', entity: 2, attr: ID_ATTR, value: 'x' }])).toThrow(
      'Invalid transaction op #0: `config/id` "x" already belongs to entity 1'
    );
  });
});

describe('attr', () => {
  it('should return undefined for unknown entities and attributes', () => {
    const graph = applyOps(emptyGraph(), [{ op: 'create', attrs: { [ID_ATTR]: 'x' } }]);

    expect(attr(graph, 9, DB_ID)).toBeUndefined();
    expect(attr(graph, 1, 'missing')).toBeUndefined();
    expect(attr(graph, { attr: ID_ATTR, value: 'y' }, DB_ID)).toBeUndefined();
    expect(findEntity(graph, ID_ATTR, 'x')).toBe(1);
  });
});

describe('graphToJSON / graphFingerprint', () => {
  const ops: TxOp[] = [{ op: 'create', attrs: { [ID_ATTR]: 'app/server', port: 80 } }];

  it('should list entities with their ids', () => {
    const json = graphToJSON(applyOps(emptyGraph(), ops));

    expect(json).toEqual({
      basisTx: 1,
      entities: [{ [DB_ID]: 1, [ID_ATTR]: 'app/server', port: 80 }],
      transactions: [{ tx: 1, opCount: 1, provenance: null }],
    });
  });

  it('should give equal graphs equal fingerprints', () => {
    const a = applyOps(emptyGraph(), ops);
    const b = applyOps(emptyGraph(), ops);
    const c = applyOps(a, [{ op: 'assert', entity: 1, attr: 'port', value: 81 }]);

    expect(graphFingerprint(a)).toBe(graphFingerprint(b));
    expect(graphFingerprint(c)).not.toBe(graphFingerprint(a));
  });
});
