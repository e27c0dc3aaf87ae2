import type { CompiledQuery, SqlParameter } from '../types.js';
import type { SourceAliases } from '../structure/source-aliases.js';
import { ConditionError } from '../errors.js';
import { GENERIC_MARKER, countGenericMarkers, numberGenericMarkers } from './markers.js';
import { isComposite, type Combinator, type ConditionNode } from './types.js';

const NONE: ConditionNode = { kind: 'none' };

/**
 * Renders a node and appends its parameters in the same depth-first,
 * left-to-right order as the text is produced.
 */
function compileNode(
  node: ConditionNode,
  params: SqlParameter[],
  aliases: SourceAliases | undefined,
): string {
  if (node.kind === 'none') {
    return '';
  }

  if (node.kind === 'expression') {
    params.push(...node.params);
    return aliases ? aliases.apply(node.sql) : node.sql;
  }

  const left = compileChild(node.left, params, aliases);
  const right = compileChild(node.right, params, aliases);
  return `${left} ${node.kind} ${right}`;
}

function compileChild(
  node: ConditionNode,
  params: SqlParameter[],
  aliases: SourceAliases | undefined,
): string {
  const sql = compileNode(node, params, aliases);
  return isComposite(node) ? `(${sql})` : sql;
}

/**
 * Immutable boolean expression tree with bound parameters, written with `$?`
 * markers and numbered on expand().
 *
 * @example
 * WhereCondition.where('company_id = $?', [companyId])
 *   .andWhere(WhereCondition.whereIn('status', ['open', 'late']))
 *   .expand();
 * // { sql: 'company_id = $1 and status in ($2, $3)', params: [companyId, 'open', 'late'] }
 */
export class WhereCondition {
  private constructor(private readonly node: ConditionNode) {}

  /** The empty condition: contributes no text and no parameters. */
  static default(): WhereCondition {
    return new WhereCondition(NONE);
  }

  /** A leaf expression. Throws ConditionError when markers and parameters disagree. */
  static where(sql: string, params: readonly SqlParameter[] = []): WhereCondition {
    const markers = countGenericMarkers(sql);
    if (markers !== params.length) {
      throw new ConditionError('parameter-count-mismatch', sql, markers, params.length);
    }
    return new WhereCondition({ kind: 'expression', sql, params: [...params] });
  }

  /** `column in ($?, …)`; an empty list can match nothing and renders as `false`. */
  static whereIn(column: string, values: readonly SqlParameter[]): WhereCondition {
    if (values.length === 0) {
      return WhereCondition.where('false');
    }
    const markers = values.map(() => GENERIC_MARKER).join(', ');
    return WhereCondition.where(`${column} in (${markers})`, values);
  }

  isEmpty(): boolean {
    return this.node.kind === 'none';
  }

  andWhere(other: WhereCondition): WhereCondition {
    return this.combine('and', other);
  }

  orWhere(other: WhereCondition): WhereCondition {
    return this.combine('or', other);
  }

  /** Alias for andWhere. */
  and(other: WhereCondition): WhereCondition {
    return this.andWhere(other);
  }

  /** Alias for orWhere. */
  or(other: WhereCondition): WhereCondition {
    return this.orWhere(other);
  }

  /**
   * Renders the tree. Markers are numbered `$1..$n` in textual order and
   * `params[k - 1]` binds `$k`. `{:name:}` slots in leaves are resolved
   * through `aliases` when given.
   */
  expand(aliases?: SourceAliases): CompiledQuery {
    const params: SqlParameter[] = [];
    const sql = compileNode(this.node, params, aliases);
    return { sql: numberGenericMarkers(sql), params };
  }

  private combine(kind: Combinator, other: WhereCondition): WhereCondition {
    if (other.isEmpty()) return this;
    if (this.isEmpty()) return other;
    return new WhereCondition({ kind, left: this.node, right: other.node });
  }
}
