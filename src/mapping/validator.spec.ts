import { ValueType } from '../common/types';
import { isUnqualifiedStoreType } from './disallowed-names';
import { UnqualifiedStoreTypeError } from './errors';
import { NamedTypeRegistry } from './named-types';
import { createStringMapping } from './store-type-mapping';
import { TypeMappingEngine } from './type-mapping.engine';
import { validateMapping } from './validator';
import { createValueDescription } from './value-description';

describe('validateMapping', () => {
  const engine = new TypeMappingEngine(new NamedTypeRegistry());
  const resolveByName = (storeTypeName: string) => engine.resolve(createValueDescription({ storeTypeName }));

  it('should reject bare varchar resolved by name', () => {
    const mapping = resolveByName('varchar');
    expect(mapping?.storeType).toBe('varchar');
    if (mapping) {
      expect(() => validateMapping(mapping)).toThrow(UnqualifiedStoreTypeError);
    }
  });

  it('should accept varchar(max) resolved by name', () => {
    const mapping = resolveByName('varchar(max)');
    expect(mapping).toBeDefined();
    if (mapping) {
      expect(() => validateMapping(mapping)).not.toThrow();
    }
  });

  it.each([
    'binary', 'varbinary', 'binary varying', 'char', 'character', 'char varying', 'character varying',
    'nchar', 'national character', 'nvarchar', 'national char varying', 'national character varying',
  ])('should reject unqualified %s', storeTypeName => {
    const mapping = resolveByName(storeTypeName);
    expect(mapping).toBeDefined();
    if (mapping) {
      expect(() => validateMapping(mapping, 'customers.name')).toThrow(UnqualifiedStoreTypeError);
    }
  });

  it.each(['varchar(10)', 'nvarchar(max)', 'varchar (max)', 'varbinary(max)', 'ntext', 'text', 'image', 'rowversion', 'int'])(
    'should accept %s',
    storeTypeName => {
      const mapping = resolveByName(storeTypeName);
      expect(mapping).toBeDefined();
      if (mapping) {
        expect(() => validateMapping(mapping)).not.toThrow();
      }
    },
  );

  it('should accept synthesized unbounded text', () => {
    const mapping = engine.resolve(createValueDescription({ valueType: ValueType.String }));
    expect(mapping?.storeType).toBe('nvarchar(max)');
    if (mapping) {
      expect(() => validateMapping(mapping, 'documents.body')).not.toThrow();
    }
  });

  it('should compare names case-insensitively', () => {
    expect(isUnqualifiedStoreType('NVARCHAR')).toBe(true);
    expect(isUnqualifiedStoreType('National Char')).toBe(true);
    expect(isUnqualifiedStoreType('nvarchar(10)')).toBe(false);
  });

  describe('error', () => {
    it('should carry the store type and a general message without a property', () => {
      let error: unknown;
      try {
        validateMapping(createStringMapping());
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(UnqualifiedStoreTypeError);
      if (error instanceof UnqualifiedStoreTypeError) {
        expect(error.storeType).toBe('varchar');
        expect(error.propertyName).toBeUndefined();
        expect(error.name).toBe('UnqualifiedStoreTypeError');
        expect(error.message).toBe(
          "Data type 'varchar' is not supported in this form. Specify the length explicitly in the type name, for example 'varchar(16)', or leave the store type unset so it is inferred from the value type.",
        );
      }
    });

    it('should name the bound property', () => {
      expect(() => validateMapping(createStringMapping({ unicode: true }), 'customers.name')).toThrow(
        "Data type 'nvarchar' for property 'customers.name' is not supported in this form.",
      );
    });
  });
});
