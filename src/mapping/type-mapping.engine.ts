import { Injectable } from '@nestjs/common';
import { ValueType, isNamedValueType, sameValueType } from '../common/types';
import { MappingCatalog, normalizeStoreTypeName } from './catalog';
import { NamedTypeRegistry } from './named-types';
import {
  StoreTypeMapping,
  createBinaryMapping,
  createStringMapping,
} from './store-type-mapping';
import { parseStoreTypeName } from './value-description';
import type { ValueDescription } from './value-description';
import type { TypeMappingResolver } from './types';

// Largest finite lengths; anything bigger is either clamped or becomes (max)
const MAX_ANSI_SIZE = 8000;
const MAX_UNICODE_SIZE = 4000;
const MAX_BINARY_SIZE = 8000;

// Default lengths for key and index columns, bounded by the index key size
const ANSI_KEY_SIZE = 900;
const UNICODE_KEY_SIZE = 450;
const BINARY_KEY_SIZE = 900;

// Largest float(n) that is still single precision
const MAX_SINGLE_PRECISION_BITS = 24;

/**
 * Resolves value descriptions against the catalog
 * Pure and synchronous; the catalog is built once in the constructor
 */
@Injectable()
export class TypeMappingEngine implements TypeMappingResolver {
  readonly catalog = new MappingCatalog();

  constructor(private readonly namedTypes: NamedTypeRegistry) {}

  resolve(description: ValueDescription): StoreTypeMapping | undefined {
    const parsed = description.storeTypeName !== undefined
      ? parseStoreTypeName(description.storeTypeName)
      : undefined;
    const request: ValueDescription = {
      ...description,
      // varchar (max), NVARCHAR( MAX ) and the like all name the unbounded entry
      storeTypeName: parsed?.isMax ? `${normalizeStoreTypeName(parsed.base)}(max)` : description.storeTypeName?.trim(),
      storeTypeNameBase: description.storeTypeNameBase ?? parsed?.base,
      size: description.size ?? parsed?.size,
      precision: description.precision ?? parsed?.precision,
      scale: description.scale ?? parsed?.scale,
    };
    const { valueType, storeTypeName, storeTypeNameBase } = request;

    if (storeTypeNameBase !== undefined) {
      // float(n) with n <= 24 is a real column, even though plain float is double precision
      if (valueType === ValueType.Single
          && request.size !== undefined
          && request.size <= MAX_SINGLE_PRECISION_BITS
          && isDoublePrecisionName(storeTypeNameBase)) {
        return this.catalog.real;
      }

      const byName = this.findByName(storeTypeName, storeTypeNameBase);
      if (byName) {
        const { mapping, matchedName } = byName;
        if (valueType !== undefined && !sameValueType(valueType, mapping.valueType)) {
          return undefined;
        }
        // A name written with its facets is the column as asked for: decimal(10) has scale 0
        const nameHasFacets = storeTypeName !== undefined && storeTypeName.includes('(');
        return mapping.withFacets({
          storeTypeNameBase: isAlias(mapping, matchedName) ? matchedName : undefined,
          storeType: nameHasFacets ? storeTypeName : undefined,
          size: request.size,
          precision: request.precision,
          scale: request.scale ?? (parsed?.precision !== undefined ? 0 : undefined),
        });
      }
    }

    if (valueType === undefined) {
      return undefined;
    }

    const byValueType = this.catalog.findByValueType(valueType);
    if (byValueType) {
      return byValueType.withFacets({
        size: request.size,
        precision: request.precision,
        scale: request.scale,
      });
    }

    if (isNamedValueType(valueType)) {
      const factory = this.namedTypes.find(valueType.fullName);
      return factory ? factory(valueType) : undefined;
    }

    if (valueType === ValueType.String) {
      return this.resolveString(request);
    }

    if (valueType === ValueType.Bytes) {
      return this.resolveBinary(request);
    }

    return undefined;
  }

  private findByName(
    storeTypeName: string | undefined,
    storeTypeNameBase: string,
  ): { mapping: StoreTypeMapping; matchedName: string } | undefined {
    for (const name of [storeTypeName ?? storeTypeNameBase, storeTypeNameBase]) {
      const mapping = this.catalog.findByStoreTypeName(name);
      if (mapping) {
        return { mapping, matchedName: normalizeStoreTypeName(name) };
      }
    }
    return undefined;
  }

  private resolveString(description: ValueDescription): StoreTypeMapping {
    const isAnsi = description.isUnicode === false;
    const isFixedLength = description.isFixedLength === true;
    const maxSize = isAnsi ? MAX_ANSI_SIZE : MAX_UNICODE_SIZE;

    let size = description.size
      ?? (description.isKeyOrIndex ? (isAnsi ? ANSI_KEY_SIZE : UNICODE_KEY_SIZE) : undefined);
    if (size !== undefined && size > maxSize) {
      // Clamping a variable-length value would silently truncate data, so it becomes (max)
      size = isFixedLength ? maxSize : undefined;
    }

    if (size === undefined) {
      return isAnsi ? this.catalog.variableLengthMaxAnsiString : this.catalog.variableLengthMaxUnicodeString;
    }
    return createStringMapping({ unicode: !isAnsi, fixedLength: isFixedLength, size });
  }

  private resolveBinary(description: ValueDescription): StoreTypeMapping {
    if (description.isRowVersion) {
      return this.catalog.rowversion;
    }

    const isFixedLength = description.isFixedLength === true;

    let size = description.size ?? (description.isKeyOrIndex ? BINARY_KEY_SIZE : undefined);
    if (size !== undefined && size > MAX_BINARY_SIZE) {
      size = isFixedLength ? MAX_BINARY_SIZE : undefined;
    }

    if (size === undefined) {
      return this.catalog.variableLengthMaxBinary;
    }
    return createBinaryMapping({ fixedLength: isFixedLength, size });
  }
}

function isDoublePrecisionName(storeTypeNameBase: string): boolean {
  const name = normalizeStoreTypeName(storeTypeNameBase);
  return name === 'float' || name === 'double precision';
}

/**
 * A name that reaches an entry without being its own name (ntext, dec, national char varying)
 */
function isAlias(mapping: StoreTypeMapping, matchedName: string): boolean {
  return matchedName !== normalizeStoreTypeName(mapping.storeType)
    && matchedName !== normalizeStoreTypeName(mapping.storeTypeNameBase);
}
