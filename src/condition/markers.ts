import { ConditionError } from '../errors.js';
import type { CompiledQuery, SqlParameter } from '../types.js';

/** Placeholder written in fragments before positions are known. */
export const GENERIC_MARKER = '$?';

const POSITIONAL_MARKER = /\$(\d+)/g;

/** Renders the positional marker for a 1-based parameter position. */
export function positionalMarker(position: number): string {
  return `$${position}`;
}

export function countGenericMarkers(sql: string): number {
  return sql.split(GENERIC_MARKER).length - 1;
}

/**
 * Replaces every generic marker, left to right, with the next positional
 * marker. The first one becomes `$(offset + 1)`.
 */
export function numberGenericMarkers(sql: string, offset: number = 0): string {
  const parts = sql.split(GENERIC_MARKER);
  let out = parts[0] ?? '';
  for (let i = 1; i < parts.length; i++) {
    out += positionalMarker(offset + i) + (parts[i] ?? '');
  }
  return out;
}

/**
 * Same as numberGenericMarkers but the nth marker takes `positions[n]`.
 * Used for template markers whose parameters are not contiguous.
 */
export function assignGenericMarkers(sql: string, positions: readonly number[]): string {
  const parts = sql.split(GENERIC_MARKER);
  let out = parts[0] ?? '';
  for (let i = 1; i < parts.length; i++) {
    const position = positions[i - 1];
    if (position === undefined) {
      throw new RangeError(`No position for generic marker #${i}`);
    }
    out += positionalMarker(position) + (parts[i] ?? '');
  }
  return out;
}

/** Adds `offset` to every positional marker (`$1` becomes `$(1 + offset)`). */
export function shiftPositionalMarkers(sql: string, offset: number): string {
  if (offset === 0) return sql;
  return sql.replace(POSITIONAL_MARKER, (_match, digits: string) =>
    positionalMarker(Number(digits) + offset),
  );
}

/** Positions referenced by positional markers, in textual order. */
export function listPositionalMarkers(sql: string): number[] {
  return Array.from(sql.matchAll(POSITIONAL_MARKER), (m) => Number(m[1]));
}

/**
 * Validates a fragment written with generic markers against its parameters
 * and numbers it from `$1`.
 */
export function bindGenericMarkers(sql: string, params: readonly SqlParameter[]): CompiledQuery {
  const markers = countGenericMarkers(sql);
  if (markers !== params.length) {
    throw new ConditionError('parameter-count-mismatch', sql, markers, params.length);
  }
  return { sql: numberGenericMarkers(sql), params: [...params] };
}
