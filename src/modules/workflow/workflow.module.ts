import { Module } from '@nestjs/common';
import { DownloadModule } from '../download/download.module';
import { EmailModule } from '../email/email.module';
import { ForecastModule } from '../forecast/forecast.module';
import { RenderModule } from '../render/render.module';
import { ForecastWorkflowService } from './forecast-workflow.service';

@Module({
  imports: [DownloadModule, ForecastModule, RenderModule, EmailModule],
  providers: [ForecastWorkflowService],
  exports: [ForecastWorkflowService],
})
export class WorkflowModule {}
