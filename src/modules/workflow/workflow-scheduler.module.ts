import { Module } from '@nestjs/common';
import { ForecastWorkflowScheduler } from './forecast-workflow.scheduler';
import { WorkflowModule } from './workflow.module';

@Module({
  imports: [WorkflowModule],
  providers: [ForecastWorkflowScheduler],
  exports: [ForecastWorkflowScheduler],
})
export class WorkflowSchedulerModule {}
