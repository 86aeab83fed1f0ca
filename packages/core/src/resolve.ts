import { UnresolvedReferenceError } from './errors.js';
import { DB_ID, ID_ATTR, attr } from './graph.js';
import { currentDslFunction } from './provenance.js';
import { currentGraph } from './scope.js';
import type { EntityId } from './types.js';

/**
 * Return the id of the entity with the given config id in the context
 * config. Never modifies the config.
 */
export function resolveId(id: string): EntityId {
  const graph = currentGraph();
  const dslFunction = currentDslFunction() ?? '<unknown>';
  const eid = attr(graph, { attr: ID_ATTR, value: id }, DB_ID);
  if (typeof eid !== 'number') {
    throw new UnresolvedReferenceError({ graph, id, dslFunction });
  }
  return eid;
}
