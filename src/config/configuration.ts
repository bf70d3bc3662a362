import { ConfigModuleOptions } from '@nestjs/config';
import { validateEnvironment } from './environment.validation';

export const configModuleOptions: ConfigModuleOptions = {
  isGlobal: true,
  envFilePath: '.env',
  validate: validateEnvironment,
};
