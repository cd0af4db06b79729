import { registerAs } from '@nestjs/config';
import { readFileSync } from 'fs';
import { load } from 'js-yaml';
import { Logger } from '@nestjs/common';
import { parseValueType } from '../common/types';
import type { ValueTypeRef } from '../common/types';
import { createValueDescription } from '../mapping/value-description';
import type { ValueDescription } from '../mapping/value-description';
import { validateConfig } from './config-validation';
import { PropertyDefinitionDto } from './schema.types';
import type { EntityDefinition, PropertyDefinition } from './schema.types';

const logger = new Logger('SchemaConfig');

/**
 * Loads entity definitions from the YAML schema file
 * Every property is validated and turned into a ValueDescription at config load time
 */
export default registerAs('schema', (): Map<string, EntityDefinition> => {
  const entities = new Map<string, EntityDefinition>();

  // Get schema file path from environment or use default
  const schemaPath = process.env.SCHEMA_PATH || './schema.yaml';

  try {
    logger.log(`Loading entity definitions from: ${schemaPath}`);

    const yamlData = load(readFileSync(schemaPath, 'utf-8'));

    if (!isRecord(yamlData) || !isRecord(yamlData.entities)) {
      throw new Error('Invalid schema file: must contain an "entities" section');
    }

    for (const [entityName, entityConfig] of Object.entries(yamlData.entities)) {
      if (!isRecord(entityConfig) || !isRecord(entityConfig.properties)
          || Object.keys(entityConfig.properties).length === 0) {
        throw new Error(`Entity '${entityName}' must have at least one property defined`);
      }

      const properties: PropertyDefinition[] = Object.entries(entityConfig.properties)
        .map(([name, propertyConfig]) => ({
          name,
          description: parseProperty(entityName, name, propertyConfig),
        }));

      entities.set(entityName, { name: entityName, properties });
    }

    // Fail if no entities were loaded
    if (entities.size === 0) {
      throw new Error('No entity definitions found in schema file. At least one entity must be defined.');
    }

    logger.log(`Loaded ${entities.size} entity definitions: ${Array.from(entities.keys()).join(', ')}`);

  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      logger.error(`Schema file not found at ${schemaPath}`);
      throw new Error(`Schema file not found: ${schemaPath}. Please ensure the file exists or set SCHEMA_PATH environment variable.`);
    }
    logger.error('Failed to load entity definitions');
    throw error;
  }

  return entities;
});

/**
 * Convert one YAML property (a type name, or a full definition) into a ValueDescription
 */
function parseProperty(entityName: string, propertyName: string, config: unknown): ValueDescription {
  const location = `property '${propertyName}' in entity '${entityName}'`;
  const raw = typeof config === 'string' ? { type: config } : config;
  if (!isRecord(raw)) {
    throw new Error(`Invalid definition for ${location}: expected a type name or a mapping`);
  }

  // Misspelled keys would otherwise be dropped silently
  const dto = validateConfig(raw, location, PropertyDefinitionDto, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });

  return createValueDescription({
    valueType: toValueType(dto.type, location),
    storeTypeName: dto.store_type,
    size: dto.max_length,
    precision: dto.precision,
    scale: dto.scale,
    isUnicode: dto.unicode,
    isFixedLength: dto.fixed_length,
    isKeyOrIndex: dto.key === true || dto.index === true,
    isRowVersion: dto.row_version,
  });
}

function toValueType(typeName: string, location: string): ValueTypeRef {
  try {
    return parseValueType(typeName);
  } catch (error) {
    // Provide better error context
    throw new Error(`Invalid type '${typeName}' for ${location}: ${errorMessage(error)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
