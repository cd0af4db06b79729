import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import appConfig from './config/app.config';
import schemaConfig from './config/schema.config';
import { MappingModule } from './mapping/mapping.module';
import { ModelModule } from './model/model.module';

/**
 * Root module: configuration first, then type mapping, then the model built on it
 */
@Module({
  imports: [
    // Configuration - loaded first, available globally
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [appConfig, schemaConfig],
    }),

    MappingModule,   // Store type resolution
    ModelModule,     // Entity/property mappings from the schema file
  ],
})
export class AppModule {}
