import { ValidationWarning } from '../utils/errors';

export const GRADIENT_TEST_MODES = ['today', 'tomorrow', 'random'] as const;
export type GradientTestMode = (typeof GRADIENT_TEST_MODES)[number];

export interface WorkflowRunOptions {
  dryRun?: boolean;
  /** YYYY-MM-DD; defaults to today in FORECAST_TIMEZONE */
  targetDate?: string;
  /** Overrides targetDate */
  gradientTest?: GradientTestMode;
}

export type WorkflowStepName = 'download' | 'extract' | 'render' | 'email';
export type WorkflowStepStatus = 'success' | 'failed' | 'skipped';

export interface WorkflowStepResult {
  name: WorkflowStepName;
  status: WorkflowStepStatus;
  durationMs: number;
  message?: string;
}

export interface WorkflowRunResult {
  success: boolean;
  dryRun: boolean;
  targetDate: string;
  effectiveDate?: string;
  usedFallback?: boolean;
  cityCount?: number;
  warnings: ValidationWarning[];
  outputPath?: string;
  palette?: string;
  seed?: number;
  steps: WorkflowStepResult[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  error?: string;
}
