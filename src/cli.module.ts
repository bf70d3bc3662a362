import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { configModuleOptions } from './config/configuration';
import { WorkflowModule } from './modules/workflow/workflow.module';

/**
 * One-shot mode: a single workflow run, no HTTP server and no scheduler
 */
@Module({
  imports: [ConfigModule.forRoot(configModuleOptions), WorkflowModule],
})
export class CliModule {}
