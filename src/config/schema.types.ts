// Types for entity definitions loaded from YAML

import { IsBoolean, IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';
import type { ValueDescription } from '../mapping/value-description';

/**
 * A single property of an entity, ready for type mapping
 */
export interface PropertyDefinition {
  name: string;
  description: ValueDescription;
}

/**
 * An entity (table) and its properties (columns)
 */
export interface EntityDefinition {
  name: string;
  properties: PropertyDefinition[];
}

/**
 * One property in the YAML file
 * Validated with class-validator before it becomes a ValueDescription
 */
export class PropertyDefinitionDto {
  @IsString()
  @IsNotEmpty()
  type!: string;                  // ValueType name or fully-qualified external type

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  store_type?: string;            // e.g. "varchar(100)"

  @IsOptional()
  @IsInt()
  @Min(0)
  max_length?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  precision?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  scale?: number;

  @IsOptional()
  @IsBoolean()
  unicode?: boolean;

  @IsOptional()
  @IsBoolean()
  fixed_length?: boolean;

  @IsOptional()
  @IsBoolean()
  key?: boolean;

  @IsOptional()
  @IsBoolean()
  index?: boolean;

  @IsOptional()
  @IsBoolean()
  row_version?: boolean;
}
