import type { CompiledQuery, SqlParameter } from '../types.js';
import type { WhereCondition } from '../condition/condition.js';
import type { SourceAliases } from '../structure/source-aliases.js';
import { TemplateError } from '../errors.js';
import {
  assignGenericMarkers,
  countGenericMarkers,
  listPositionalMarkers,
  numberGenericMarkers,
  positionalMarker,
  shiftPositionalMarkers,
} from '../condition/markers.js';
import { substituteSlots } from './template.js';

export interface SqlQueryOptions {
  /** Reject variables the template never references. */
  strict?: boolean;
}

type ParameterSegment =
  | { kind: 'explicit'; value: SqlParameter }
  | { kind: 'batch'; variable: string; values: readonly SqlParameter[] };

/**
 * A SQL template with `{:name:}` slots, the values for those slots, and the
 * parameters bound by the rendered text.
 *
 * Parameters come from two sources: explicit ones (addParameter), referenced
 * in the template as `$n` or `$?`, and batches (setParameters) tied to a
 * variable whose text is numbered from `$1` or written with `$?`. render()
 * places each batch's markers past every parameter that precedes it.
 */
export class SqlQuery {
  private readonly variables = new Map<string, string>();
  private readonly segments: ParameterSegment[] = [];
  private readonly strict: boolean;

  constructor(
    private readonly template: string,
    options: SqlQueryOptions = {},
  ) {
    this.strict = options.strict ?? false;
  }

  /** Sets the value of a slot. Setting it again overwrites the previous value. */
  setVariable(name: string, value: string): this {
    this.variables.set(name, value);
    return this;
  }

  setVariables(values: Record<string, string>): this {
    for (const [name, value] of Object.entries(values)) {
      this.setVariable(name, value);
    }
    return this;
  }

  addParameter(value: SqlParameter): this {
    this.segments.push({ kind: 'explicit', value });
    return this;
  }

  /**
   * Appends the parameters of the text held by `variable`. Calling it again
   * for the same variable replaces that batch where it stands.
   */
  setParameters(values: readonly SqlParameter[], variable: string = 'condition'): this {
    const batch: ParameterSegment = { kind: 'batch', variable, values: [...values] };
    const index = this.segments.findIndex((s) => s.kind === 'batch' && s.variable === variable);
    if (index === -1) {
      this.segments.push(batch);
    } else {
      this.segments[index] = batch;
    }
    return this;
  }

  /** Expands the condition into `variable` and binds its parameters. */
  setCondition(
    condition: WhereCondition,
    variable: string = 'condition',
    aliases?: SourceAliases,
  ): this {
    const { sql, params } = condition.expand(aliases);
    return this.setVariable(variable, sql).setParameters(params, variable);
  }

  getTemplate(): string {
    return this.template;
  }

  getVariables(): ReadonlyMap<string, string> {
    return new Map(this.variables);
  }

  getParameters(): SqlParameter[] {
    return this.layoutParameters().params;
  }

  /**
   * Resolves every slot and returns the final text with its parameters.
   * Never mutates the query: rendering twice gives the same result.
   */
  render(): CompiledQuery {
    const { params, explicitPositions, batchOffsets, batchSizes } = this.layoutParameters();

    const templateMarkers = countGenericMarkers(this.template);
    let template = this.template;
    if (templateMarkers > 0) {
      if (templateMarkers !== explicitPositions.length) {
        throw new TemplateError(
          'marker-count-mismatch',
          `${templateMarkers} marker(s) for ${explicitPositions.length} parameter(s)`,
        );
      }
      template = assignGenericMarkers(template, explicitPositions);
    }

    const { text, missing, used } = substituteSlots(
      template,
      (name) => {
        const value = this.variables.get(name);
        if (value === undefined) return undefined;
        return this.numberValue(name, value, batchOffsets.get(name), batchSizes.get(name) ?? 0);
      },
      { omitEmptyWhere: true },
    );

    const unresolved = missing[0];
    if (unresolved !== undefined) {
      throw new TemplateError('unresolved-variable', unresolved);
    }

    if (this.strict) {
      const referenced = new Set(used);
      for (const name of this.variables.keys()) {
        if (!referenced.has(name)) throw new TemplateError('unused-variable', name);
      }
    }

    for (const position of listPositionalMarkers(text)) {
      if (position < 1 || position > params.length) {
        throw new TemplateError('unbound-marker', positionalMarker(position));
      }
    }

    return { sql: text, params };
  }

  toString(): string {
    return this.render().sql;
  }

  /**
   * Places a variable's value at its batch: `$n` markers are shifted by the
   * batch offset and `$?` markers numbered after it. Generic markers must
   * match the batch size exactly.
   */
  private numberValue(
    name: string,
    value: string,
    offset: number | undefined,
    batchSize: number,
  ): string {
    const shifted = shiftPositionalMarkers(value, offset ?? 0);
    const markers = countGenericMarkers(shifted);
    if (markers === 0) return shifted;
    if (offset === undefined || markers !== batchSize) {
      throw new TemplateError(
        'marker-count-mismatch',
        `${markers} marker(s) in variable "${name}" for ${batchSize} parameter(s)`,
      );
    }
    return numberGenericMarkers(shifted, offset);
  }

  private layoutParameters(): {
    params: SqlParameter[];
    explicitPositions: number[];
    batchOffsets: Map<string, number>;
    batchSizes: Map<string, number>;
  } {
    const params: SqlParameter[] = [];
    const explicitPositions: number[] = [];
    const batchOffsets = new Map<string, number>();
    const batchSizes = new Map<string, number>();

    for (const segment of this.segments) {
      if (segment.kind === 'explicit') {
        params.push(segment.value);
        explicitPositions.push(params.length);
      } else {
        batchOffsets.set(segment.variable, params.length);
        batchSizes.set(segment.variable, segment.values.length);
        params.push(...segment.values);
      }
    }

    return { params, explicitPositions, batchOffsets, batchSizes };
  }
}
