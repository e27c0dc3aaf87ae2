import { describe, it, expect } from 'vitest';
import { Structure, nested, scalar } from '../../src/structure/structure.js';
import { StructureError } from '../../src/errors.js';

function makeStructure(): Structure {
  return new Structure([
    ['a_field', 'a_type'],
    ['another_field', 'another_type'],
  ]);
}

describe('Structure', () => {
  it('keeps fields in declaration order', () => {
    expect(makeStructure().getFields()).toEqual([
      { name: 'a_field', type: { kind: 'scalar', sqlType: 'a_type' } },
      { name: 'another_field', type: { kind: 'scalar', sqlType: 'another_type' } },
    ]);
  });

  it('lists names in order', () => {
    expect(makeStructure().getNames()).toEqual(['a_field', 'another_field']);
  });

  it('reports its size', () => {
    expect(makeStructure().size).toBe(2);
    expect(new Structure().size).toBe(0);
  });

  it('throws StructureError on a repeated name', () => {
    expect(() => new Structure([['id', 'int'], ['id', 'uuid']])).toThrow(StructureError);
  });

  it('looks fields up by name', () => {
    const structure = makeStructure();
    expect(structure.has('a_field')).toBe(true);
    expect(structure.has('missing')).toBe(false);
    expect(structure.getField('another_field')?.type).toEqual(scalar('another_type'));
    expect(structure.getField('missing')).toBeUndefined();
  });

  it('accepts nested field types', () => {
    const company = new Structure([['company_id', 'uuid'], ['name', 'text']]);
    const address = new Structure([
      ['address_id', 'uuid'],
      ['company', nested('pommr.company', company)],
    ]);
    const type = address.getField('company')?.type;
    if (type?.kind !== 'nested') throw new Error('expected a nested field type');
    expect(type.sqlType).toBe('pommr.company');
    expect(type.structure.getNames()).toEqual(['company_id', 'name']);
  });
});

describe('Structure.toColumnList()', () => {
  const structure = new Structure([
    ['contact_id', 'uuid'],
    ['name', 'text'],
    ['email', 'text'],
  ]);

  it('joins every column in order', () => {
    expect(structure.toColumnList()).toBe('contact_id, name, email');
  });

  it('restricts to the given names, in structure order', () => {
    expect(structure.toColumnList(['email', 'contact_id'])).toBe('contact_id, email');
  });

  it('throws StructureError for an unknown name', () => {
    expect(() => structure.toColumnList(['phone'])).toThrow(StructureError);
  });
});

describe('Structure.toDefinition()', () => {
  it('renders name and type pairs, nested types by their SQL name', () => {
    const company = new Structure([['company_id', 'uuid']]);
    const structure = new Structure([
      ['address_id', 'uuid'],
      ['company', nested('pommr.company', company)],
    ]);
    expect(structure.toDefinition()).toBe('address_id uuid, company pommr.company');
  });
});
