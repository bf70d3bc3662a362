import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { configModuleOptions } from './config/configuration';
import { StatusModule } from './modules/status/status.module';
import { WorkflowSchedulerModule } from './modules/workflow/workflow-scheduler.module';

/**
 * Long-running mode: daily scheduled workflow plus the HTTP status endpoint
 */
@Module({
  imports: [
    ConfigModule.forRoot(configModuleOptions),
    ScheduleModule.forRoot(),
    StatusModule,
    WorkflowSchedulerModule,
  ],
})
export class AppModule {}
