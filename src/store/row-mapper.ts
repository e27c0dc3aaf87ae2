import type { Row, SqlEntity } from '../types.js';
import { ResultRow } from './result-row.js';

export function mapRow<E>(entity: SqlEntity<E>, row: Row): E {
  return entity.hydrate(new ResultRow(row));
}

export function mapRows<E>(entity: SqlEntity<E>, rows: readonly Row[]): E[] {
  return rows.map((row) => mapRow(entity, row));
}
