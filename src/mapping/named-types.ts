import { Injectable, Logger } from '@nestjs/common';
import type { NamedValueType } from '../common/types';
import {
  StoreTypeMapping,
  createHierarchyIdMapping,
  createSpatialMapping,
} from './store-type-mapping';

export type NamedMappingFactory = (type: NamedValueType) => StoreTypeMapping;

/**
 * Factories for value types that live outside the core catalog
 * Keyed by fully-qualified type name (exact match)
 */
@Injectable()
export class NamedTypeRegistry {
  private readonly logger = new Logger(NamedTypeRegistry.name);
  private readonly factories = new Map<string, NamedMappingFactory>([
    ['Microsoft.SqlServer.Types.SqlHierarchyId', type => createHierarchyIdMapping(type)],
    ['Microsoft.SqlServer.Types.SqlGeography', type => createSpatialMapping(type, 'geography')],
    ['Microsoft.SqlServer.Types.SqlGeometry', type => createSpatialMapping(type, 'geometry')],
  ]);

  /**
   * Register a factory for an external type
   * Expected during bootstrap, before anything is resolved
   */
  register(fullName: string, factory: NamedMappingFactory): void {
    if (this.factories.has(fullName)) {
      throw new Error(`A mapping factory is already registered for type '${fullName}'`);
    }
    this.factories.set(fullName, factory);
    this.logger.debug(`Registered mapping factory for ${fullName}`);
  }

  find(fullName: string): NamedMappingFactory | undefined {
    return this.factories.get(fullName);
  }

  has(fullName: string): boolean {
    return this.factories.has(fullName);
  }
}
