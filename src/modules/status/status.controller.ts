import { Controller, Get } from '@nestjs/common';
import { StatusResponse, StatusService } from './status.service';
import { WorkflowRunResult } from '../workflow/workflow.types';

@Controller('status')
export class StatusController {
  constructor(private readonly statusService: StatusService) {}

  @Get()
  getStatus(): StatusResponse {
    return this.statusService.getStatus();
  }

  @Get('last-run')
  getLastRun(): WorkflowRunResult | null {
    return this.statusService.getLastRun();
  }
}
