import { ValueType } from '../common/types';
import type { ValueTypeRef } from '../common/types';
import {
  PostfixStyle,
  StoreTypeMapping,
  createBinaryMapping,
  createStringMapping,
} from './store-type-mapping';
import { bytesComparer } from './value-comparer';

/**
 * Build a mapping whose name carries no facets
 */
function simple(storeType: string, valueType?: ValueTypeRef): StoreTypeMapping {
  return new StoreTypeMapping({ storeTypeNameBase: storeType, valueType });
}

/**
 * The fixed set of store type mappings plus two read-only indices over them
 * Built once per instance; nothing is added or replaced afterwards
 */
export class MappingCatalog {
  readonly sqlVariant = simple('sql_variant', ValueType.Object);
  readonly real = simple('real', ValueType.Single);
  readonly byte = simple('tinyint', ValueType.Byte);
  readonly short = simple('smallint', ValueType.Int16);
  readonly int = simple('int', ValueType.Int32);
  readonly long = simple('bigint', ValueType.Int64);
  readonly bool = simple('bit', ValueType.Boolean);
  readonly double = simple('float', ValueType.Double);
  readonly date = simple('date', ValueType.DateTime);
  readonly datetime = simple('datetime', ValueType.DateTime);
  readonly datetime2 = simple('datetime2', ValueType.DateTime);
  readonly datetimeoffset = simple('datetimeoffset', ValueType.DateTimeOffset);
  readonly time = simple('time', ValueType.TimeSpan);
  readonly uniqueidentifier = simple('uniqueidentifier', ValueType.Guid);
  readonly money = simple('money', ValueType.Decimal);

  readonly decimal = new StoreTypeMapping({
    storeTypeNameBase: 'decimal',
    valueType: ValueType.Decimal,
    postfixStyle: PostfixStyle.PrecisionAndScale,
    precision: 18,
    scale: 2,
  });

  // Concurrency token: always 8 bytes
  readonly rowversion = new StoreTypeMapping({
    storeTypeNameBase: 'rowversion',
    valueType: ValueType.Bytes,
    size: 8,
    comparer: bytesComparer,
  });

  readonly fixedLengthUnicodeString = createStringMapping({ unicode: true, fixedLength: true });
  readonly variableLengthUnicodeString = createStringMapping({ unicode: true });
  readonly variableLengthMaxUnicodeString = new StoreTypeMapping({
    storeTypeNameBase: 'nvarchar',
    storeType: 'nvarchar(max)',
    valueType: ValueType.String,
    isUnicode: true,
  });

  readonly fixedLengthAnsiString = createStringMapping({ fixedLength: true });
  readonly variableLengthAnsiString = createStringMapping();
  readonly variableLengthMaxAnsiString = new StoreTypeMapping({
    storeTypeNameBase: 'varchar',
    storeType: 'varchar(max)',
    valueType: ValueType.String,
  });

  readonly xml = new StoreTypeMapping({
    storeTypeNameBase: 'xml',
    valueType: ValueType.String,
    isUnicode: true,
  });

  readonly fixedLengthBinary = createBinaryMapping({ fixedLength: true });
  readonly variableLengthBinary = createBinaryMapping();
  readonly variableLengthMaxBinary = new StoreTypeMapping({
    storeTypeNameBase: 'varbinary',
    storeType: 'varbinary(max)',
    valueType: ValueType.Bytes,
    comparer: bytesComparer,
  });

  private readonly valueTypeMappings: ReadonlyMap<ValueType, StoreTypeMapping>;
  private readonly storeTypeMappings: ReadonlyMap<string, StoreTypeMapping>;

  constructor() {
    this.valueTypeMappings = new Map<ValueType, StoreTypeMapping>([
      [ValueType.Int32, this.int],
      [ValueType.Int64, this.long],
      [ValueType.DateTime, this.datetime2],
      [ValueType.Guid, this.uniqueidentifier],
      [ValueType.Boolean, this.bool],
      [ValueType.Byte, this.byte],
      [ValueType.Double, this.double],
      [ValueType.DateTimeOffset, this.datetimeoffset],
      [ValueType.Int16, this.short],
      [ValueType.Single, this.real],
      [ValueType.Decimal, this.decimal],
      [ValueType.TimeSpan, this.time],
    ]);

    // Keys are lower-case; lookups normalize the requested name
    this.storeTypeMappings = new Map<string, StoreTypeMapping>([
      ['bigint', this.long],
      ['binary varying', this.variableLengthBinary],
      ['binary', this.fixedLengthBinary],
      ['bit', this.bool],
      ['char varying', this.variableLengthAnsiString],
      ['char', this.fixedLengthAnsiString],
      ['character varying', this.variableLengthAnsiString],
      ['character', this.fixedLengthAnsiString],
      ['date', this.date],
      ['datetime', this.datetime],
      ['datetime2', this.datetime2],
      ['datetimeoffset', this.datetimeoffset],
      ['dec', this.decimal],
      ['decimal', this.decimal],
      ['double precision', this.double],
      ['float', this.double],
      ['image', this.variableLengthBinary],
      ['int', this.int],
      ['money', this.money],
      ['national char varying', this.variableLengthUnicodeString],
      ['national character varying', this.variableLengthUnicodeString],
      ['national character', this.fixedLengthUnicodeString],
      ['nchar', this.fixedLengthUnicodeString],
      ['ntext', this.variableLengthUnicodeString],
      ['numeric', this.decimal],
      ['nvarchar', this.variableLengthUnicodeString],
      ['nvarchar(max)', this.variableLengthMaxUnicodeString],
      ['real', this.real],
      ['rowversion', this.rowversion],
      ['smalldatetime', this.datetime],
      ['smallint', this.short],
      ['smallmoney', this.money],
      ['sql_variant', this.sqlVariant],
      ['text', this.variableLengthAnsiString],
      ['time', this.time],
      ['timestamp', this.rowversion],
      ['tinyint', this.byte],
      ['uniqueidentifier', this.uniqueidentifier],
      ['varbinary', this.variableLengthBinary],
      ['varbinary(max)', this.variableLengthMaxBinary],
      ['varchar', this.variableLengthAnsiString],
      ['varchar(max)', this.variableLengthMaxAnsiString],
      ['xml', this.xml],
    ]);
  }

  findByStoreTypeName(storeTypeName: string): StoreTypeMapping | undefined {
    return this.storeTypeMappings.get(normalizeStoreTypeName(storeTypeName));
  }

  findByValueType(valueType: ValueTypeRef): StoreTypeMapping | undefined {
    // Named types never live in the core catalog
    return typeof valueType === 'string' ? this.valueTypeMappings.get(valueType) : undefined;
  }

  storeTypeNames(): IterableIterator<[string, StoreTypeMapping]> {
    return this.storeTypeMappings.entries();
  }

  valueTypes(): IterableIterator<[ValueType, StoreTypeMapping]> {
    return this.valueTypeMappings.entries();
  }
}

export function normalizeStoreTypeName(storeTypeName: string): string {
  return storeTypeName.trim().toLowerCase();
}
