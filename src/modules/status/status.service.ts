import { Injectable } from '@nestjs/common';
import { readFileSync } from 'fs';
import { join } from 'path';
import { ForecastWorkflowService } from '../workflow/forecast-workflow.service';
import { WorkflowRunResult } from '../workflow/workflow.types';

export interface StatusResponse {
  status: string;
  version: string;
  timestamp: string;
}

function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(
      readFileSync(join(process.cwd(), 'package.json'), 'utf8'),
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    return 'unknown';
  }
  return 'unknown';
}

@Injectable()
export class StatusService {
  private readonly version = readVersion();

  constructor(private readonly workflow: ForecastWorkflowService) {}

  getStatus(): StatusResponse {
    return {
      status: 'OK',
      version: this.version,
      timestamp: new Date().toISOString(),
    };
  }

  getLastRun(): WorkflowRunResult | null {
    return this.workflow.getLastRun();
  }
}
