import { Module } from '@nestjs/common';
import { NamedTypeRegistry } from './named-types';
import { TypeMappingEngine } from './type-mapping.engine';
import { TypeMappingService } from './type-mapping.service';

/**
 * Type mapping module resolves value descriptions to store types
 * NamedTypeRegistry is exported so plugins can register external types at bootstrap
 */
@Module({
  providers: [
    NamedTypeRegistry,
    TypeMappingEngine,
    TypeMappingService,
  ],
  exports: [
    NamedTypeRegistry,
    TypeMappingService,
  ],
})
export class MappingModule {}
