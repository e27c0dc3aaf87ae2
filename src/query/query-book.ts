import type { SqlEntity, SqlParameter } from '../types.js';
import type { SourceAliases } from '../structure/source-aliases.js';
import { WhereCondition } from '../condition/condition.js';
import { GENERIC_MARKER, bindGenericMarkers } from '../condition/markers.js';
import { StatementError } from '../errors.js';
import { SqlQuery } from './sql-query.js';

export const SELECT_TEMPLATE = 'select {:projection:} from {:source:} where {:condition:}';
export const DELETE_TEMPLATE = 'delete from {:source:} where {:condition:} returning {:projection:}';
export const INSERT_TEMPLATE =
  'insert into {:source:} ({:structure:}) values ({:values:}) returning {:projection:}';
export const INSERT_DEFAULTS_TEMPLATE =
  'insert into {:source:} default values returning {:projection:}';
export const UPDATE_TEMPLATE =
  'update {:source:} set {:updates:} where {:condition:} returning {:projection:}';

export interface QueryBookConfig<E> {
  /** Table, view, function call or sub-query the entity is read from. */
  source: string;
  entity: SqlEntity<E>;
  /** Resolves `{:name:}` slots in projection definitions and conditions. */
  aliases?: SourceAliases;
}

/**
 * Ready-made statements for one entity over one source. Each method returns
 * a new SqlQuery with `source` and `projection` already set.
 */
export class QueryBook<E> {
  readonly source: string;
  readonly entity: SqlEntity<E>;
  private readonly aliases: SourceAliases | undefined;

  constructor(config: QueryBookConfig<E>) {
    this.source = config.source;
    this.entity = config.entity;
    this.aliases = config.aliases;
  }

  /** A query on a custom template, preset with `projection` and `source`. */
  query(template: string): SqlQuery {
    return new SqlQuery(template).setVariables({
      projection: this.entity.projection.render(this.aliases),
      source: this.source,
    });
  }

  select(condition: WhereCondition = WhereCondition.default()): SqlQuery {
    return this.query(SELECT_TEMPLATE).setCondition(condition, 'condition', this.aliases);
  }

  fetchAll(): SqlQuery {
    return this.select(WhereCondition.default());
  }

  delete(condition: WhereCondition): SqlQuery {
    return this.query(DELETE_TEMPLATE).setCondition(condition, 'condition', this.aliases);
  }

  /**
   * Columns are written in structure order, whatever the key order of
   * `values`. An empty record inserts a row of column defaults.
   */
  insert(values: Readonly<Record<string, SqlParameter>>): SqlQuery {
    const columns = this.entity.structure.selectNames(Object.keys(values));
    if (columns.length === 0) {
      return this.query(INSERT_DEFAULTS_TEMPLATE);
    }
    const fragment = bindGenericMarkers(
      columns.map(() => GENERIC_MARKER).join(', '),
      columns.map((column) => values[column] ?? null),
    );
    return this.query(INSERT_TEMPLATE)
      .setVariable('structure', columns.join(', '))
      .setVariable('values', fragment.sql)
      .setParameters(fragment.params, 'values');
  }

  /** `set` parameters come first; the condition's markers follow them. */
  update(changes: Readonly<Record<string, SqlParameter>>, condition: WhereCondition): SqlQuery {
    const columns = this.entity.structure.selectNames(Object.keys(changes));
    if (columns.length === 0) {
      throw new StatementError('empty-update', this.source);
    }
    const fragment = bindGenericMarkers(
      columns.map((column) => `${column} = ${GENERIC_MARKER}`).join(', '),
      columns.map((column) => changes[column] ?? null),
    );
    return this.query(UPDATE_TEMPLATE)
      .setVariable('updates', fragment.sql)
      .setParameters(fragment.params, 'updates')
      .setCondition(condition, 'condition', this.aliases);
  }
}
