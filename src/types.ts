import type { Projection } from './structure/projection.js';
import type { Structure } from './structure/structure.js';
import type { ResultRow } from './store/result-row.js';

/**
 * A value bound to a positional parameter. Anything the driver can serialize:
 * scalars, dates, byte arrays, arrays of those, and JSON-like objects.
 */
export type SqlParameter =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Uint8Array
  | null
  | readonly SqlParameter[]
  | { readonly [key: string]: unknown };

/** SQL text together with the parameters its positional markers bind. */
export interface CompiledQuery {
  sql: string;
  params: SqlParameter[];
}

/** One result row as the driver returns it, keyed by output column name. */
export type Row = Record<string, unknown>;

/**
 * Everything needed to read one entity type: the physical column shape, the
 * projection selecting it, and the row-to-entity mapping. The projection is
 * the one whose output columns `hydrate` reads.
 */
export interface SqlEntity<E> {
  readonly structure: Structure;
  readonly projection: Projection;
  hydrate(row: ResultRow): E;
}
