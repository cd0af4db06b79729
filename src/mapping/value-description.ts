import type { ValueTypeRef } from '../common/types';
import type { StoreTypeMapping } from './store-type-mapping';

/**
 * Everything the caller knows about a value that needs a store type
 * Immutable for the duration of a resolution call
 */
export interface ValueDescription {
  readonly valueType?: ValueTypeRef;
  readonly storeTypeName?: string;
  readonly storeTypeNameBase?: string;  // storeTypeName without parenthesized facets
  readonly size?: number;
  readonly precision?: number;
  readonly scale?: number;
  readonly isUnicode?: boolean;         // Unset means "no preference"
  readonly isFixedLength?: boolean;
  readonly isKeyOrIndex: boolean;       // Narrows default sizes to index key limits
  readonly isRowVersion: boolean;       // Concurrency token byte sequence
}

export type ValueDescriptionInput = Omit<ValueDescription, 'isKeyOrIndex' | 'isRowVersion'> & {
  isKeyOrIndex?: boolean;
  isRowVersion?: boolean;
};

export interface ParsedStoreTypeName {
  base: string;
  size?: number;
  precision?: number;
  scale?: number;
  isMax: boolean;
}

/**
 * Split a store type name such as "varchar(100)" or "decimal(10, 4)" into base and facets
 * Arguments that are not integers are ignored, the base is still returned
 */
export function parseStoreTypeName(storeTypeName: string): ParsedStoreTypeName {
  const name = storeTypeName.trim();
  const open = name.indexOf('(');
  const close = name.lastIndexOf(')');

  if (open <= 0 || close < open) {
    return { base: name, isMax: false };
  }

  const base = name.substring(0, open).trim();
  const args = name.substring(open + 1, close).split(',').map(arg => arg.trim());

  if (args.length === 1 && args[0].toLowerCase() === 'max') {
    return { base, isMax: true };
  }

  const numbers = args.map(parseFacet);
  if (numbers.some(n => n === undefined)) {
    return { base, isMax: false };
  }

  if (numbers.length === 1) {
    // A single argument is a length for text/binary and a precision for numerics
    return { base, size: numbers[0], precision: numbers[0], isMax: false };
  }
  if (numbers.length === 2) {
    return { base, precision: numbers[0], scale: numbers[1], isMax: false };
  }
  return { base, isMax: false };
}

function parseFacet(arg: string): number | undefined {
  return /^\d+$/.test(arg) ? parseInt(arg, 10) : undefined;
}

/**
 * Build a description, deriving the base name and any facet not given explicitly from storeTypeName
 */
export function createValueDescription(input: ValueDescriptionInput): ValueDescription {
  const parsed = input.storeTypeName !== undefined ? parseStoreTypeName(input.storeTypeName) : undefined;

  return Object.freeze({
    ...input,
    storeTypeNameBase: input.storeTypeNameBase ?? parsed?.base,
    size: input.size ?? parsed?.size,
    precision: input.precision ?? parsed?.precision,
    scale: input.scale ?? parsed?.scale,
    isKeyOrIndex: input.isKeyOrIndex ?? false,
    isRowVersion: input.isRowVersion ?? false,
  });
}

/**
 * The description that asks for an already resolved mapping again
 */
export function describeMapping(mapping: StoreTypeMapping): ValueDescription {
  return createValueDescription({
    valueType: mapping.valueType,
    storeTypeName: mapping.storeType,
    size: mapping.size,
    precision: mapping.precision,
    scale: mapping.scale,
    isUnicode: mapping.isUnicode,
    isFixedLength: mapping.isFixedLength,
  });
}
