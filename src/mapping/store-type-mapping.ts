import { ValueType } from '../common/types';
import type { NamedValueType, ValueTypeRef } from '../common/types';
import { bytesComparer } from './value-comparer';
import type { ValueComparer } from './value-comparer';

/**
 * How facets are rendered into the store type name
 */
export enum PostfixStyle {
  None,              // Facets are implied by the name (int, varchar(max), rowversion)
  Size,              // varchar(100)
  PrecisionAndScale, // decimal(18,2)
}

export interface StoreTypeFacets {
  size?: number;
  precision?: number;
  scale?: number;
}

export interface StoreTypeMappingOptions extends StoreTypeFacets {
  storeTypeNameBase: string;
  storeType?: string;  // Full name as written, e.g. varchar(max) or decimal(10); rendered from the facets when unset
  valueType?: ValueTypeRef;
  postfixStyle?: PostfixStyle;
  isUnicode?: boolean;
  isFixedLength?: boolean;
  comparer?: ValueComparer<Uint8Array>;
}

/**
 * Overrides accepted by withFacets
 * Only the facets the postfix style renders are applied
 */
export interface FacetOverrides extends StoreTypeFacets {
  storeTypeNameBase?: string;
  storeType?: string;
}

/**
 * One concrete storage representation
 * Instances are immutable; catalog entries act as templates for withFacets
 */
export class StoreTypeMapping {
  readonly storeType: string;
  readonly storeTypeNameBase: string;
  readonly valueType?: ValueTypeRef;
  readonly postfixStyle: PostfixStyle;
  readonly size?: number;
  readonly precision?: number;
  readonly scale?: number;
  readonly isUnicode: boolean;
  readonly isFixedLength: boolean;
  readonly comparer?: ValueComparer<Uint8Array>;

  constructor(options: StoreTypeMappingOptions) {
    const base = options.storeTypeNameBase.trim();
    if (!base) {
      throw new Error('Store type name cannot be empty');
    }
    for (const facet of ['size', 'precision', 'scale'] as const) {
      const value = options[facet];
      if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
        throw new Error(`Invalid ${facet} '${value}' for store type '${base}'`);
      }
    }

    const postfixStyle = options.postfixStyle ?? PostfixStyle.None;
    if (postfixStyle === PostfixStyle.PrecisionAndScale
        && (options.precision === undefined || options.scale === undefined)) {
      throw new Error(`Store type '${base}' requires both precision and scale`);
    }

    this.storeTypeNameBase = base;
    this.valueType = options.valueType;
    this.postfixStyle = postfixStyle;
    this.size = options.size;
    this.precision = options.precision;
    this.scale = options.scale;
    this.isUnicode = options.isUnicode ?? false;
    this.isFixedLength = options.isFixedLength ?? false;
    this.comparer = options.comparer;
    this.storeType = options.storeType?.trim() || renderStoreType(base, postfixStyle, options);

    Object.freeze(this);
  }

  /**
   * Clone with facet substitution
   * An explicit storeType is kept as written; otherwise the name is rendered from base and facets.
   * Returns this instance when the overrides change nothing
   */
  withFacets(overrides: FacetOverrides): StoreTypeMapping {
    const base = overrides.storeTypeNameBase ?? this.storeTypeNameBase;
    let { size, precision, scale } = this;

    if (this.postfixStyle === PostfixStyle.Size) {
      size = overrides.size ?? size;
    } else if (this.postfixStyle === PostfixStyle.PrecisionAndScale) {
      precision = overrides.precision ?? precision;
      scale = overrides.scale ?? scale;
    }

    const storeType = overrides.storeType?.trim();

    if (base === this.storeTypeNameBase
        && (storeType === undefined || storeType === this.storeType)
        && size === this.size
        && precision === this.precision
        && scale === this.scale) {
      return this;
    }

    return new StoreTypeMapping({
      storeTypeNameBase: base,
      storeType,
      valueType: this.valueType,
      postfixStyle: this.postfixStyle,
      size,
      precision,
      scale,
      isUnicode: this.isUnicode,
      isFixedLength: this.isFixedLength,
      comparer: this.comparer,
    });
  }

  toString(): string {
    return this.storeType;
  }
}

function renderStoreType(base: string, postfixStyle: PostfixStyle, facets: StoreTypeFacets): string {
  switch (postfixStyle) {
    case PostfixStyle.Size:
      return facets.size === undefined ? base : `${base}(${facets.size})`;
    case PostfixStyle.PrecisionAndScale:
      return `${base}(${facets.precision},${facets.scale})`;
    case PostfixStyle.None:
      return base;
  }
}

/**
 * Text mapping whose base name follows from its encoding flags
 * nchar / nvarchar for Unicode, char / varchar for ANSI
 */
export function createStringMapping(options: {
  unicode?: boolean;
  fixedLength?: boolean;
  size?: number;
} = {}): StoreTypeMapping {
  const unicode = options.unicode ?? false;
  const fixedLength = options.fixedLength ?? false;
  const base = (unicode ? 'n' : '') + (fixedLength ? 'char' : 'varchar');

  return new StoreTypeMapping({
    storeTypeNameBase: base,
    valueType: ValueType.String,
    postfixStyle: PostfixStyle.Size,
    size: options.size,
    isUnicode: unicode,
    isFixedLength: fixedLength,
  });
}

/**
 * Binary mapping: binary when fixed-length, varbinary otherwise
 */
export function createBinaryMapping(options: {
  fixedLength?: boolean;
  size?: number;
} = {}): StoreTypeMapping {
  const fixedLength = options.fixedLength ?? false;

  return new StoreTypeMapping({
    storeTypeNameBase: fixedLength ? 'binary' : 'varbinary',
    valueType: ValueType.Bytes,
    postfixStyle: PostfixStyle.Size,
    size: options.size,
    isFixedLength: fixedLength,
    comparer: bytesComparer,
  });
}

export function createSpatialMapping(type: NamedValueType, storeType: 'geography' | 'geometry'): StoreTypeMapping {
  return new StoreTypeMapping({ storeTypeNameBase: storeType, valueType: type });
}

export function createHierarchyIdMapping(type: NamedValueType): StoreTypeMapping {
  return new StoreTypeMapping({ storeTypeNameBase: 'hierarchyid', valueType: type });
}
