import { registerAs } from '@nestjs/config';
import { IsIn } from 'class-validator';
import { LOG_LEVELS } from '../common/logging.utils';
import { validateConfig } from './config-validation';

// App-wide configuration
export class AppConfig {
  @IsIn(LOG_LEVELS)
  logLevel!: string;
}

export default registerAs('app', (): AppConfig => {
  const rawConfig = {
    logLevel: process.env.LOG_LEVEL || 'log',
  };

  return validateConfig(rawConfig, 'app', AppConfig);
});
