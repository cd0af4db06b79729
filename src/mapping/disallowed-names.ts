import { normalizeStoreTypeName } from './catalog';

// Character and binary families are ambiguous unless a length is given in parentheses
const UNQUALIFIED_STORE_TYPES: ReadonlySet<string> = new Set([
  'binary',
  'binary varying',
  'varbinary',
  'char',
  'character',
  'char varying',
  'character varying',
  'varchar',
  'national char',
  'national character',
  'nchar',
  'national char varying',
  'national character varying',
  'nvarchar',
]);

export function isUnqualifiedStoreType(storeType: string): boolean {
  return UNQUALIFIED_STORE_TYPES.has(normalizeStoreTypeName(storeType));
}
