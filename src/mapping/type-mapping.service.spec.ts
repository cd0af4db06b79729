import { Test, TestingModule } from '@nestjs/testing';
import { ValueType } from '../common/types';
import { UnqualifiedStoreTypeError } from './errors';
import { NamedTypeRegistry } from './named-types';
import { StoreTypeMapping } from './store-type-mapping';
import { TypeMappingEngine } from './type-mapping.engine';
import { TypeMappingService } from './type-mapping.service';
import { FALLBACK_TYPE_MAPPING_RESOLVER } from './types';
import type { TypeMappingResolver } from './types';
import { createValueDescription } from './value-description';

describe('TypeMappingService', () => {
  const jsonMapping = new StoreTypeMapping({ storeTypeNameBase: 'json', valueType: ValueType.Object });

  describe('with a fallback resolver', () => {
    let service: TypeMappingService;
    let fallback: jest.Mocked<TypeMappingResolver>;

    beforeEach(async () => {
      fallback = {
        resolve: jest.fn().mockReturnValue(jsonMapping),
      };

      const module: TestingModule = await Test.createTestingModule({
        providers: [
          NamedTypeRegistry,
          TypeMappingEngine,
          TypeMappingService,
          { provide: FALLBACK_TYPE_MAPPING_RESOLVER, useValue: fallback },
        ],
      }).compile();

      service = module.get<TypeMappingService>(TypeMappingService);
    });

    it('should not consult the fallback when the engine resolves', () => {
      const mapping = service.findMapping(createValueDescription({ valueType: ValueType.Int32 }));

      expect(mapping?.storeType).toBe('int');
      expect(fallback.resolve).not.toHaveBeenCalled();
    });

    it('should consult the fallback when the engine has no answer', () => {
      const description = createValueDescription({ storeTypeName: 'json' });
      const mapping = service.findMapping(description);

      expect(mapping).toBe(jsonMapping);
      expect(fallback.resolve).toHaveBeenCalledWith(description);
    });

    it('should consult the fallback for conflicting name and value type', () => {
      const description = createValueDescription({ storeTypeName: 'bigint', valueType: ValueType.Boolean });
      fallback.resolve.mockReturnValue(undefined);

      expect(service.findMapping(description)).toBeUndefined();
      expect(fallback.resolve).toHaveBeenCalledTimes(1);
    });
  });

  describe('without a fallback resolver', () => {
    let service: TypeMappingService;

    beforeEach(async () => {
      const module: TestingModule = await Test.createTestingModule({
        providers: [NamedTypeRegistry, TypeMappingEngine, TypeMappingService],
      }).compile();

      service = module.get<TypeMappingService>(TypeMappingService);
    });

    it('should return undefined when nothing resolves', () => {
      expect(service.findMapping(createValueDescription({ storeTypeName: 'json' }))).toBeUndefined();
    });

    it('should validate mappings bound to a property', () => {
      const description = createValueDescription({ valueType: ValueType.String, storeTypeName: 'nvarchar' });

      expect(() => service.findMappingForProperty('customers.name', description)).toThrow(UnqualifiedStoreTypeError);
      expect(() => service.findMappingForProperty('customers.name', description))
        .toThrow("Data type 'nvarchar' for property 'customers.name'");
    });

    it('should return valid mappings for a property', () => {
      const description = createValueDescription({ valueType: ValueType.String, storeTypeName: 'nvarchar(64)' });

      expect(service.findMappingForProperty('customers.name', description)?.storeType).toBe('nvarchar(64)');
    });

    it('should return undefined for a property nothing resolves', () => {
      const description = createValueDescription({ valueType: ValueType.Object });

      expect(service.findMappingForProperty('customers.extra', description)).toBeUndefined();
    });
  });
});
