import { Module } from '@nestjs/common';
import { MappingModule } from '../mapping/mapping.module';
import { ModelMappingService } from './model-mapping.service';

/**
 * Model module maps the configured entities to store types
 */
@Module({
  imports: [MappingModule],
  providers: [ModelMappingService],
  exports: [ModelMappingService],
})
export class ModelModule {}
