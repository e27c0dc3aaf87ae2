import { describe, it, expect } from 'vitest';
import { v4 as uuidv4 } from 'uuid';
import { SqlQuery } from '../../src/query/sql-query.js';
import { WhereCondition } from '../../src/condition/condition.js';
import { SourceAliases } from '../../src/structure/source-aliases.js';
import { TemplateError } from '../../src/errors.js';

const SELECT = 'select {:projection:} from {:source:} where {:condition:}';

function expectTemplateError(fn: () => unknown, reason: string, subject: string): void {
  try {
    fn();
    expect.unreachable();
  } catch (err) {
    expect(err).toBeInstanceOf(TemplateError);
    expect((err as TemplateError).reason).toBe(reason);
    expect((err as TemplateError).subject).toBe(subject);
  }
}

describe('SqlQuery.render()', () => {
  it('renders the select scenario end to end', () => {
    const companyId = uuidv4();
    const query = new SqlQuery(SELECT)
      .setVariable('source', 'pommr.contact')
      .setVariable('projection', 'contact_id as contact_id, name as name')
      .setCondition(WhereCondition.where('company_id = $?', [companyId]));

    expect(query.render()).toEqual({
      sql: 'select contact_id as contact_id, name as name from pommr.contact where company_id = $1',
      params: [companyId],
    });
  });

  it('replaces every occurrence of a variable', () => {
    const query = new SqlQuery('{:t:} join {:t:} using (id)').setVariable('t', 'pommr.company');
    expect(query.toString()).toBe('pommr.company join pommr.company using (id)');
  });

  it('omits the where keyword for an empty condition', () => {
    const query = new SqlQuery(SELECT)
      .setVariables({ source: 'pommr.contact', projection: 'name as name' })
      .setCondition(WhereCondition.default());
    expect(query.render()).toEqual({ sql: 'select name as name from pommr.contact', params: [] });
  });

  it('renders twice with identical results', () => {
    const query = new SqlQuery(SELECT)
      .setVariables({ source: 's', projection: 'a as a' })
      .setCondition(WhereCondition.whereIn('a', [1, 2]));
    const first = query.render();
    const second = query.render();
    expect(second).toEqual(first);
    expect(query.getParameters()).toEqual(first.params);
  });

  it('lets the last setVariable win', () => {
    const query = new SqlQuery('select * from {:source:}')
      .setVariable('source', 'a')
      .setVariable('source', 'b');
    expect(query.toString()).toBe('select * from b');
  });
});

describe('SqlQuery variable errors', () => {
  it('throws unresolved-variable for a slot never set', () => {
    const query = new SqlQuery(SELECT).setVariable('source', 'pommr.contact').setCondition(WhereCondition.default());
    expectTemplateError(() => query.render(), 'unresolved-variable', 'projection');
  });

  it('ignores unused variables by default', () => {
    const query = new SqlQuery('select 1').setVariable('extra', 'x');
    expect(query.toString()).toBe('select 1');
  });

  it('throws unused-variable in strict mode', () => {
    const query = new SqlQuery('select 1', { strict: true }).setVariable('extra', 'x');
    expectTemplateError(() => query.render(), 'unused-variable', 'extra');
  });

  it('counts a variable emptied under where as used in strict mode', () => {
    const query = new SqlQuery('select * from t where {:condition:}', { strict: true })
      .setCondition(WhereCondition.default());
    expect(query.toString()).toBe('select * from t');
  });
});

describe('SqlQuery parameters', () => {
  it('keeps literal positional markers for explicit parameters', () => {
    const query = new SqlQuery('insert into t (a, b) values ($1, $2)').addParameter('x').addParameter(2);
    expect(query.render()).toEqual({ sql: 'insert into t (a, b) values ($1, $2)', params: ['x', 2] });
  });

  it('numbers generic markers in the template with explicit parameters', () => {
    const query = new SqlQuery('insert into t (a, b) values ($?, $?)').addParameter('x').addParameter(2);
    expect(query.render()).toEqual({ sql: 'insert into t (a, b) values ($1, $2)', params: ['x', 2] });
  });

  it('shifts a condition added after an explicit parameter', () => {
    const query = new SqlQuery('select * from t where a = $1 and ({:condition:})')
      .addParameter('x')
      .setCondition(WhereCondition.where('b = $?', [1]).or(WhereCondition.where('c = $?', [2])));
    expect(query.render()).toEqual({
      sql: 'select * from t where a = $1 and (b = $2 or c = $3)',
      params: ['x', 1, 2],
    });
  });

  it('gives template generic markers the positions of explicit parameters added after a batch', () => {
    const query = new SqlQuery('select * from t where {:condition:} limit $?')
      .setCondition(WhereCondition.where('a = $?', ['a']))
      .addParameter(10);
    expect(query.render()).toEqual({
      sql: 'select * from t where a = $1 limit $2',
      params: ['a', 10],
    });
  });

  it('numbers batches of several variables one after the other', () => {
    const query = new SqlQuery('select * from a join b on {:join:} where {:condition:}')
      .setCondition(WhereCondition.where('b.x = $?', [1]), 'join')
      .setCondition(WhereCondition.where('a.y = $?', [2]));
    expect(query.render()).toEqual({
      sql: 'select * from a join b on b.x = $1 where a.y = $2',
      params: [1, 2],
    });
  });

  it('replaces a batch where it stands when set again', () => {
    const query = new SqlQuery('select * from t where c = $1 and ({:condition:}) and d = $4')
      .addParameter('a')
      .setParameters([1], 'condition')
      .addParameter('b')
      .setVariable('condition', 'x = $1 or y = $2')
      .setParameters([7, 8], 'condition');
    expect(query.render()).toEqual({
      sql: 'select * from t where c = $1 and (x = $2 or y = $3) and d = $4',
      params: ['a', 7, 8, 'b'],
    });
  });

  it('numbers generic markers written in a variable after its batch offset', () => {
    const query = new SqlQuery('select * from t where c = $1 and ({:condition:})')
      .addParameter('a')
      .setVariable('condition', 'x = $? or y = $?')
      .setParameters([7, 8]);
    expect(query.render()).toEqual({
      sql: 'select * from t where c = $1 and (x = $2 or y = $3)',
      params: ['a', 7, 8],
    });
  });

  it('numbers a hand-written variable from $1 when nothing precedes it', () => {
    const query = new SqlQuery('select * from t where {:condition:}')
      .setVariable('condition', 'a = $?')
      .setParameters([1]);
    expect(query.render()).toEqual({ sql: 'select * from t where a = $1', params: [1] });
  });

  it('throws marker-count-mismatch for generic markers in a variable without a batch', () => {
    const query = new SqlQuery('select * from t where {:condition:}').setVariable('condition', 'a = $?');
    expectTemplateError(
      () => query.render(),
      'marker-count-mismatch',
      '1 marker(s) in variable "condition" for 0 parameter(s)',
    );
  });

  it('throws marker-count-mismatch when a variable batch is smaller than its markers', () => {
    const query = new SqlQuery('select * from t where {:condition:}')
      .setVariable('condition', 'a = $? and b = $?')
      .setParameters([1]);
    expectTemplateError(
      () => query.render(),
      'marker-count-mismatch',
      '2 marker(s) in variable "condition" for 1 parameter(s)',
    );
  });

  it('resolves source aliases in a condition', () => {
    const query = new SqlQuery('select * from t as st where {:condition:}')
      .setCondition(WhereCondition.where('{:t:}.id = $?', [3]), 'condition', new SourceAliases({ t: 'st' }));
    expect(query.toString()).toBe('select * from t as st where st.id = $1');
  });

  it('throws marker-count-mismatch when template markers and explicit parameters differ', () => {
    const query = new SqlQuery('values ($?, $?)').addParameter(1);
    expectTemplateError(() => query.render(), 'marker-count-mismatch', '2 marker(s) for 1 parameter(s)');
  });

  it('throws unbound-marker for a positional marker past the parameter list', () => {
    const query = new SqlQuery('select $3').addParameter(1);
    expectTemplateError(() => query.render(), 'unbound-marker', '$3');
  });
});

describe('SqlQuery introspection', () => {
  it('exposes the template and a copy of the variables', () => {
    const query = new SqlQuery(SELECT).setVariables({ source: 's', projection: 'p' });
    const variables = query.getVariables();
    query.setVariable('condition', 'true');
    expect(query.getTemplate()).toBe(SELECT);
    expect([...variables.entries()]).toEqual([
      ['source', 's'],
      ['projection', 'p'],
    ]);
    expect(query.getVariables().get('condition')).toBe('true');
  });

  it('returns parameters in final binding order', () => {
    const query = new SqlQuery('{:condition:} $?')
      .setCondition(WhereCondition.where('a = $?', ['first']))
      .addParameter('second');
    expect(query.getParameters()).toEqual(['first', 'second']);
  });
});
