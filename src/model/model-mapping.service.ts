import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { valueTypeName } from '../common/types';
import { TypeMappingService } from '../mapping/type-mapping.service';
import type { StoreTypeMapping } from '../mapping/store-type-mapping';
import type { EntityDefinition } from '../config/schema.types';

/**
 * Resolved column of an entity
 */
export interface PropertyMapping {
  entityName: string;
  propertyName: string;
  mapping: StoreTypeMapping;
}

/**
 * Resolves a store type for every property in the loaded schema
 * Runs at startup so configuration mistakes surface before anything else happens
 */
@Injectable()
export class ModelMappingService implements OnModuleInit {
  private readonly logger = new Logger(ModelMappingService.name);
  private readonly entityMappings = new Map<string, Map<string, PropertyMapping>>();

  constructor(
    private readonly configService: ConfigService,
    private readonly typeMappingService: TypeMappingService,
  ) {}

  onModuleInit(): void {
    const entities = this.configService.get<Map<string, EntityDefinition>>('schema');
    if (!entities) {
      this.logger.warn('No entity definitions loaded');
      return;
    }

    for (const entity of entities.values()) {
      this.entityMappings.set(entity.name, this.mapEntity(entity));
    }

    this.logger.log(`Resolved store types for ${this.entityMappings.size} entities`);
  }

  getMapping(entityName: string, propertyName: string): StoreTypeMapping {
    const mapping = this.getEntity(entityName).get(propertyName);
    if (!mapping) {
      throw new Error(`Unknown property '${propertyName}' on entity '${entityName}'`);
    }
    return mapping.mapping;
  }

  getEntityMappings(entityName: string): PropertyMapping[] {
    return Array.from(this.getEntity(entityName).values());
  }

  getEntityNames(): string[] {
    return Array.from(this.entityMappings.keys());
  }

  private getEntity(entityName: string): Map<string, PropertyMapping> {
    const entity = this.entityMappings.get(entityName);
    if (!entity) {
      throw new Error(`Unknown entity '${entityName}'. Available entities: ${this.getEntityNames().join(', ')}`);
    }
    return entity;
  }

  private mapEntity(entity: EntityDefinition): Map<string, PropertyMapping> {
    const properties = new Map<string, PropertyMapping>();

    for (const { name, description } of entity.properties) {
      const qualifiedName = `${entity.name}.${name}`;
      const mapping = this.typeMappingService.findMappingForProperty(qualifiedName, description);
      if (!mapping) {
        throw new Error(`No store type mapping found for property '${qualifiedName}' of type ${valueTypeName(description.valueType)}${description.storeTypeName ? ` with store type '${description.storeTypeName}'` : ''}`);
      }

      properties.set(name, { entityName: entity.name, propertyName: name, mapping });
    }

    return properties;
  }
}
