import type { StoreTypeMapping } from './store-type-mapping';
import type { ValueDescription } from './value-description';

/**
 * Anything that can turn a value description into a store type mapping
 * undefined means "no answer here", not an error
 */
export interface TypeMappingResolver {
  resolve(description: ValueDescription): StoreTypeMapping | undefined;
}

/**
 * Injection token for the generic resolver consulted when the engine has no answer
 */
export const FALLBACK_TYPE_MAPPING_RESOLVER = Symbol('FALLBACK_TYPE_MAPPING_RESOLVER');
