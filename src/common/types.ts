/**
 * Language-level value types understood by the type mapping layer
 * These are the "what" side of a mapping; store types are the "how"
 */

/**
 * Value types with a distinguished mapping
 * String values so they can be named directly in schema files
 */
export enum ValueType {
  // Integer types
  Byte = 'Byte',
  Int16 = 'Int16',
  Int32 = 'Int32',
  Int64 = 'Int64',

  // Floating point and exact numerics
  Single = 'Single',
  Double = 'Double',
  Decimal = 'Decimal',

  // Temporal types
  DateTime = 'DateTime',
  DateTimeOffset = 'DateTimeOffset',
  TimeSpan = 'TimeSpan',

  // Other types
  Boolean = 'Boolean',
  Guid = 'Guid',
  String = 'String',
  Bytes = 'Bytes',     // Opaque byte sequence
  Object = 'Object',   // Untyped values (sql_variant)
}

/**
 * A value type defined outside the core catalog (spatial, hierarchy, ...)
 * Identified only by its fully-qualified name
 */
export interface NamedValueType {
  readonly fullName: string;
}

export type ValueTypeRef = ValueType | NamedValueType;

export function isNamedValueType(type: ValueTypeRef): type is NamedValueType {
  return typeof type === 'object';
}

/**
 * Parse a type name from configuration
 * Dotted names are external type identifiers, anything else must be a ValueType
 */
export function parseValueType(typeName: string): ValueTypeRef {
  const valueType = Object.values(ValueType).find(v => v === typeName);
  if (valueType) {
    return valueType;
  }
  if (typeName.includes('.')) {
    return { fullName: typeName };
  }
  throw new Error(`Unknown value type: ${typeName}. Valid types are: ${Object.values(ValueType).join(', ')}, or a fully-qualified external type name`);
}

export function sameValueType(a: ValueTypeRef | undefined, b: ValueTypeRef | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  if (isNamedValueType(a) || isNamedValueType(b)) {
    return isNamedValueType(a) && isNamedValueType(b) && a.fullName === b.fullName;
  }
  return a === b;
}

export function valueTypeName(type: ValueTypeRef | undefined): string {
  if (type === undefined) {
    return '(none)';
  }
  return isNamedValueType(type) ? type.fullName : type;
}
