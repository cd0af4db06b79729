import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { valueTypeName } from '../common/types';
import { truncateForLog } from '../common/logging.utils';
import { TypeMappingEngine } from './type-mapping.engine';
import { validateMapping } from './validator';
import { FALLBACK_TYPE_MAPPING_RESOLVER } from './types';
import type { TypeMappingResolver } from './types';
import type { StoreTypeMapping } from './store-type-mapping';
import type { ValueDescription } from './value-description';

/**
 * Entry point for the rest of the application
 * Asks the engine first, then the fallback resolver when one is registered
 */
@Injectable()
export class TypeMappingService {
  private readonly logger = new Logger(TypeMappingService.name);

  constructor(
    private readonly engine: TypeMappingEngine,
    @Optional()
    @Inject(FALLBACK_TYPE_MAPPING_RESOLVER)
    private readonly fallback?: TypeMappingResolver,
  ) {}

  findMapping(description: ValueDescription): StoreTypeMapping | undefined {
    const mapping = this.engine.resolve(description);
    if (mapping) {
      this.logger.debug(`Resolved ${describeRequest(description)} -> ${mapping.storeType}`);
      return mapping;
    }

    if (!this.fallback) {
      this.logger.debug(`No mapping for ${describeRequest(description)}`);
      return undefined;
    }

    const fallbackMapping = this.fallback.resolve(description);
    this.logger.debug(`Fallback resolved ${describeRequest(description)} -> ${fallbackMapping?.storeType ?? '(none)'}`);
    return fallbackMapping;
  }

  /**
   * Resolve a mapping for a named property and reject ambiguous store types
   * Throws UnqualifiedStoreTypeError for bare varchar/nvarchar/binary... names
   */
  findMappingForProperty(propertyName: string, description: ValueDescription): StoreTypeMapping | undefined {
    const mapping = this.findMapping(description);
    if (mapping) {
      validateMapping(mapping, propertyName);
    }
    return mapping;
  }
}

function describeRequest(description: ValueDescription): string {
  const { valueType, ...facets } = description;
  return `${valueTypeName(valueType)} ${truncateForLog(facets)}`;
}
