/**
 * Entry point - resolves store types for every property in the schema file
 * Loads configuration, validates each mapping and prints the resulting columns
 */
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import appConfig from './config/app.config';
import { getLogLevels } from './common/logging.utils';
import { ModelMappingService } from './model/model-mapping.service';

/**
 * Bootstrap a standalone application context and report the resolved columns
 */
async function bootstrap() {
  const logger = new Logger('StoreTypeMapper');

  try {
    const { logLevel } = appConfig();
    const app = await NestFactory.createApplicationContext(AppModule, {
      logger: getLogLevels(logLevel),
    });

    const model = app.get(ModelMappingService);
    for (const entityName of model.getEntityNames()) {
      logger.log(`${entityName}:`);
      for (const { propertyName, mapping } of model.getEntityMappings(entityName)) {
        logger.log(`  ${propertyName} ${mapping.storeType}`);
      }
    }

    await app.close();
  } catch (error) {
    logger.error('Failed to resolve store types');
    console.error(error); // Log full error to console before exit
    process.exit(1);
  }
}

void bootstrap();
