import { StructureError } from '../errors.js';

/**
 * Declared type of a column: a plain SQL type, or a composite row type whose
 * own shape is another Structure.
 */
export type FieldType =
  | { kind: 'scalar'; sqlType: string }
  | { kind: 'nested'; sqlType: string; structure: Structure };

export interface StructureField {
  readonly name: string;
  readonly type: FieldType;
}

export type ColumnDeclaration = readonly [name: string, type: string | FieldType];

export function scalar(sqlType: string): FieldType {
  return { kind: 'scalar', sqlType };
}

export function nested(sqlType: string, structure: Structure): FieldType {
  return { kind: 'nested', sqlType, structure };
}

/** Ordered, immutable column shape of an entity or a table. */
export class Structure {
  private readonly fields: readonly StructureField[];
  private readonly byName: ReadonlyMap<string, StructureField>;

  constructor(columns: readonly ColumnDeclaration[] = []) {
    const fields: StructureField[] = [];
    const byName = new Map<string, StructureField>();
    for (const [name, type] of columns) {
      if (byName.has(name)) {
        throw new StructureError('duplicate-field', name);
      }
      const field: StructureField = {
        name,
        type: typeof type === 'string' ? scalar(type) : type,
      };
      fields.push(field);
      byName.set(name, field);
    }
    this.fields = fields;
    this.byName = byName;
  }

  get size(): number {
    return this.fields.length;
  }

  getFields(): readonly StructureField[] {
    return this.fields;
  }

  getNames(): string[] {
    return this.fields.map((f) => f.name);
  }

  getField(name: string): StructureField | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Comma-separated column names in structure order. When `names` is given
   * the list is restricted to them, still in structure order.
   */
  toColumnList(names?: Iterable<string>): string {
    return this.selectNames(names).join(', ');
  }

  /** `name type, …` column definitions. */
  toDefinition(): string {
    return this.fields.map((f) => `${f.name} ${f.type.sqlType}`).join(', ');
  }

  /**
   * Structure-ordered subset of column names. Throws StructureError for a
   * name the structure does not declare.
   */
  selectNames(names?: Iterable<string>): string[] {
    if (names === undefined) return this.getNames();
    const wanted = new Set(names);
    for (const name of wanted) {
      if (!this.byName.has(name)) {
        throw new StructureError('unknown-field', name);
      }
    }
    return this.getNames().filter((name) => wanted.has(name));
  }
}
