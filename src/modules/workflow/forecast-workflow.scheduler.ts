import { Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { ForecastWorkflowService } from './forecast-workflow.service';
import { describeError } from '../utils/errors';

@Injectable()
export class ForecastWorkflowScheduler {
  private readonly logger = new Logger(ForecastWorkflowScheduler.name);
  private isRunning = false;

  constructor(private readonly workflow: ForecastWorkflowService) {}

  @Cron('0 6 * * *', { name: 'daily-forecast', timeZone: 'Asia/Jerusalem' })
  async runDaily(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('Forecast workflow already running, skipping...');
      return;
    }

    this.isRunning = true;
    try {
      const result = await this.workflow.run();
      if (!result.success) {
        this.logger.error(`Scheduled run failed: ${result.error ?? 'unknown error'}`);
      }
    } catch (error) {
      this.logger.error(
        `Scheduled run crashed: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    } finally {
      this.isRunning = false;
    }
  }

  getStatus(): { isRunning: boolean } {
    return { isRunning: this.isRunning };
  }
}
