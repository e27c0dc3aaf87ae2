import { ProjectionError } from '../errors.js';
import type { SourceAliases } from './source-aliases.js';
import type { Structure } from './structure.js';

export interface ProjectionField {
  /** Output column name. */
  readonly alias: string;
  /** SQL producing the value: a column, a function call, a sub-select… */
  readonly definition: string;
}

/**
 * `strict`: setDefinition() only overrides aliases the projection already has.
 * `open`: an unknown alias is appended as a new output column.
 */
export type ProjectionPolicy = 'strict' | 'open';

export interface ProjectionOptions {
  /** Prefix for the default column definitions, e.g. `company` → `company.name`. */
  sourceAlias?: string;
  policy?: ProjectionPolicy;
}

export interface SetDefinitionOptions {
  /** Give the entry a new alias while keeping its position. */
  rename?: string;
}

/**
 * Ordered list of `definition as alias` output columns for one entity type.
 * Immutable; every modifier returns a new Projection.
 */
export class Projection {
  private constructor(
    private readonly fields: readonly ProjectionField[],
    private readonly policy: ProjectionPolicy,
    private readonly structure: Structure | null,
  ) {
    const seen = new Set<string>();
    for (const { alias } of fields) {
      if (seen.has(alias)) throw new ProjectionError('duplicate-alias', alias);
      seen.add(alias);
    }
  }

  /** Every structure column projected as itself, in structure order. */
  static defaultFor(structure: Structure, options: ProjectionOptions = {}): Projection {
    const prefix = options.sourceAlias !== undefined ? `${options.sourceAlias}.` : '';
    const fields = structure.getNames().map((name) => ({ alias: name, definition: `${prefix}${name}` }));
    return new Projection(fields, options.policy ?? 'strict', structure);
  }

  static fromFields(
    fields: ReadonlyArray<readonly [alias: string, definition: string]>,
    options: Pick<ProjectionOptions, 'policy'> = {},
  ): Projection {
    return new Projection(
      fields.map(([alias, definition]) => ({ alias, definition })),
      options.policy ?? 'strict',
      null,
    );
  }

  getFields(): readonly ProjectionField[] {
    return this.fields;
  }

  getAliases(): string[] {
    return this.fields.map((f) => f.alias);
  }

  getPolicy(): ProjectionPolicy {
    return this.policy;
  }

  /** The structure this projection was derived from, if any. */
  getStructure(): Structure | null {
    return this.structure;
  }

  has(alias: string): boolean {
    return this.fields.some((f) => f.alias === alias);
  }

  /**
   * Overrides the definition bound to `alias`, keeping its position. Unknown
   * aliases throw under the strict policy and are appended under the open one.
   */
  setDefinition(alias: string, definition: string, options: SetDefinitionOptions = {}): Projection {
    const index = this.fields.findIndex((f) => f.alias === alias);
    const newAlias = options.rename ?? alias;

    if (index === -1) {
      if (this.policy === 'strict') {
        throw new ProjectionError('unknown-alias', alias);
      }
      return this.with([...this.fields, { alias: newAlias, definition }]);
    }

    const fields = [...this.fields];
    fields[index] = { alias: newAlias, definition };
    return this.with(fields);
  }

  /** `definition as alias, …` in entry order. */
  render(aliases?: SourceAliases): string {
    const sql = this.fields.map((f) => `${f.definition} as ${f.alias}`).join(', ');
    return aliases ? aliases.apply(sql) : sql;
  }

  toString(): string {
    return this.render();
  }

  private with(fields: readonly ProjectionField[]): Projection {
    return new Projection(fields, this.policy, this.structure);
  }
}
