/**
 * A character or binary store type was resolved without any length
 * Raised at model-build time; the fix is configuration, so it is never retried
 */
export class UnqualifiedStoreTypeError extends Error {
  constructor(
    readonly storeType: string,
    readonly propertyName?: string,
  ) {
    super(propertyName === undefined
      ? `Data type '${storeType}' is not supported in this form. Specify the length explicitly in the type name, for example '${storeType}(16)', or leave the store type unset so it is inferred from the value type.`
      : `Data type '${storeType}' for property '${propertyName}' is not supported in this form. Specify the length explicitly in the type name, for example '${storeType}(16)', or leave the store type unset so it is inferred from the value type.`);
    this.name = UnqualifiedStoreTypeError.name;
  }
}
