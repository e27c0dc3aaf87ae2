import type { SqlEntity } from './types.js';
import type { ResultRow } from './store/result-row.js';
import { Projection } from './structure/projection.js';
import type { Structure } from './structure/structure.js';

export interface EntityDefinition<E> {
  structure: Structure;
  /** Defaults to every structure column projected as itself. */
  projection?: Projection;
  hydrate(row: ResultRow): E;
}

/**
 * Builds a SqlEntity, deriving the default projection from the structure
 * when none is given.
 *
 * @example
 * const contact = defineEntity({
 *   structure: new Structure([['contact_id', 'uuid'], ['name', 'text']]),
 *   hydrate: (row) => ({ contactId: row.getString('contact_id'), name: row.getString('name') }),
 * });
 */
export function defineEntity<E>(def: EntityDefinition<E>): SqlEntity<E> {
  const projection = def.projection ?? Projection.defaultFor(def.structure);
  return {
    structure: def.structure,
    projection,
    hydrate: (row) => def.hydrate(row),
  };
}
