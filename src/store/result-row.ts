import type { Row } from '../types.js';
import type { Structure } from '../structure/structure.js';
import { HydrationError } from '../errors.js';
import { parseRecord } from './record-parser.js';

const INTEGER_TEXT = /^-?\d+$/;

/**
 * Read access to one result row for entity hydration. Getters throw
 * HydrationError when the column is absent or its value has the wrong type.
 *
 * Values read from a composite text literal are strings; the typed getters
 * accept the text forms PostgreSQL uses (`t`/`f`, numeric and timestamp
 * strings).
 */
export class ResultRow {
  constructor(private readonly row: Row) {}

  has(column: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.row, column);
  }

  columns(): string[] {
    return Object.keys(this.row);
  }

  get(column: string): unknown {
    if (!this.has(column)) {
      throw new HydrationError('missing-column', column);
    }
    return this.row[column];
  }

  getString(column: string): string {
    return this.required(column, this.getOptionalString(column));
  }

  getOptionalString(column: string): string | null {
    const value = this.get(column);
    if (value === null || value === undefined) return null;
    if (typeof value === 'string') return value;
    throw this.invalid(column, 'string', value);
  }

  getNumber(column: string): number {
    return this.required(column, this.getOptionalNumber(column));
  }

  getOptionalNumber(column: string): number | null {
    const value = this.get(column);
    if (value === null || value === undefined) return null;
    if (typeof value === 'number') return value;
    // pg returns int8 and numeric as strings
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
      const number = Number(value);
      if (INTEGER_TEXT.test(value.trim()) && !Number.isSafeInteger(number)) {
        throw new HydrationError(
          'invalid-data',
          column,
          `Column "${column}" holds ${value.trim()}, beyond the safe integer range; read it with getBigInt`,
        );
      }
      return number;
    }
    throw this.invalid(column, 'number', value);
  }

  getBigInt(column: string): bigint {
    return this.required(column, this.getOptionalBigInt(column));
  }

  getOptionalBigInt(column: string): bigint | null {
    const value = this.get(column);
    if (value === null || value === undefined) return null;
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
    if (typeof value === 'string' && INTEGER_TEXT.test(value.trim())) return BigInt(value.trim());
    throw this.invalid(column, 'bigint', value);
  }

  getBoolean(column: string): boolean {
    return this.required(column, this.getOptionalBoolean(column));
  }

  getOptionalBoolean(column: string): boolean | null {
    const value = this.get(column);
    if (value === null || value === undefined) return null;
    if (typeof value === 'boolean') return value;
    if (value === 't' || value === 'true') return true;
    if (value === 'f' || value === 'false') return false;
    throw this.invalid(column, 'boolean', value);
  }

  getDate(column: string): Date {
    return this.required(column, this.getOptionalDate(column));
  }

  getOptionalDate(column: string): Date | null {
    const value = this.get(column);
    if (value === null || value === undefined) return null;
    if (value instanceof Date) return value;
    if (typeof value === 'string') {
      const date = new Date(value);
      if (!Number.isNaN(date.getTime())) return date;
    }
    throw this.invalid(column, 'date', value);
  }

  /**
   * Row view over a composite-typed column. The value may already be an
   * object (a type parser is registered) or the composite text literal,
   * whose fields are matched to `structure` by position.
   */
  getComposite(column: string, structure: Structure): ResultRow | null {
    const value = this.get(column);
    if (value === null || value === undefined) return null;

    if (typeof value === 'string') {
      let fields: (string | null)[];
      try {
        fields = parseRecord(value);
      } catch (err) {
        throw new HydrationError('invalid-data', column, `Column "${column}": ${String(err)}`, err);
      }
      const names = structure.getNames();
      if (fields.length !== names.length) {
        throw new HydrationError(
          'invalid-data',
          column,
          `Column "${column}" has ${fields.length} composite field(s), structure declares ${names.length}`,
        );
      }
      const row: Row = {};
      names.forEach((name, i) => {
        row[name] = fields[i] ?? null;
      });
      return new ResultRow(row);
    }

    if (typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date)) {
      return new ResultRow(Object.fromEntries(Object.entries(value)));
    }

    throw this.invalid(column, 'composite', value);
  }

  private required<T>(column: string, value: T | null): T {
    if (value === null) {
      throw new HydrationError('invalid-data', column, `Column "${column}" is null`);
    }
    return value;
  }

  private invalid(column: string, expected: string, value: unknown): HydrationError {
    return new HydrationError(
      'invalid-data',
      column,
      `Column "${column}" expected ${expected}, got ${typeof value}`,
    );
  }
}
