import { isUnqualifiedStoreType } from './disallowed-names';
import { UnqualifiedStoreTypeError } from './errors';
import type { StoreTypeMapping } from './store-type-mapping';

/**
 * Reject mappings whose store type is a bare character/binary family name
 * Only literal unqualified names fail; synthesized (max) mappings always carry their postfix
 */
export function validateMapping(mapping: StoreTypeMapping, propertyName?: string): void {
  if (isUnqualifiedStoreType(mapping.storeType)) {
    throw new UnqualifiedStoreTypeError(mapping.storeType, propertyName);
  }
}
