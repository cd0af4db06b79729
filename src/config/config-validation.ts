import { validateSync } from 'class-validator';
import type { ValidationError, ValidatorOptions } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { Logger } from '@nestjs/common';

const logger = new Logger('ConfigValidation');

/**
 * Convert a plain config object into a validated instance of validationClass
 * Throws with every constraint message when validation fails
 * Pass whitelist options to reject keys the class does not declare
 */
export function validateConfig<T extends object>(
  config: Record<string, unknown>,
  configKey: string,
  validationClass: new () => T,
  options: ValidatorOptions = {},
): T {
  const validatedConfig = plainToInstance(validationClass, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
    forbidUnknownValues: true,
    ...options,
  });

  if (errors.length > 0) {
    logger.error(`Configuration validation failed for ${configKey}`);
    throw new Error(`Invalid configuration for ${configKey}: ${formatValidationErrors(errors)}`);
  }

  return validatedConfig;
}

export function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map(error => Object.values(error.constraints || {}).join(', '))
    .join('; ');
}
