import { LogLevel, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { parseArgs } from 'util';
import { AppModule } from './app.module';
import { CliModule } from './cli.module';
import { ForecastWorkflowService } from './modules/workflow/forecast-workflow.service';
import {
  GRADIENT_TEST_MODES,
  WorkflowRunOptions,
} from './modules/workflow/workflow.types';
import { describeError } from './modules/utils/errors';

const USAGE = `Usage: daily-forecast-image [options]

  --date YYYY-MM-DD        Forecast date to render (default: today)
  --dry-run                Download and extract only; validate email settings without sending
  --gradient-test MODE     today | tomorrow | random (random picks a date from the data); overrides --date
  --verbose                Debug logging
  --serve                  Run the daily scheduler and the HTTP status endpoint
  -h, --help               Show this help`;

function logLevels(verbose: boolean): LogLevel[] {
  const logLevel = verbose ? 'debug' : process.env.LOG_LEVEL || 'log';
  return logLevel === 'debug'
    ? ['log', 'error', 'warn', 'debug', 'verbose']
    : ['log', 'error', 'warn'];
}

async function serve(verbose: boolean): Promise<void> {
  const app = await NestFactory.create(AppModule, { logger: logLevels(verbose) });
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('PORT', 3000);
  await app.listen(port);
  new Logger('Bootstrap').log(`Status endpoint listening on port ${port}`);
}

async function runOnce(options: WorkflowRunOptions, verbose: boolean): Promise<number> {
  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: logLevels(verbose),
  });
  try {
    const result = await app.get(ForecastWorkflowService).run(options);
    return result.success ? 0 : 1;
  } finally {
    await app.close();
  }
}

function parseCli() {
  return parseArgs({
    options: {
      date: { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      'gradient-test': { type: 'string' },
      verbose: { type: 'boolean', default: false },
      serve: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

async function bootstrap(): Promise<number> {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli();
  } catch (error) {
    console.error(`${describeError(error)}\n\n${USAGE}`);
    return 2;
  }
  const { values } = parsed;
  const verbose = values.verbose === true;

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const gradientTestArg = values['gradient-test'];
  const gradientTest = GRADIENT_TEST_MODES.find((mode) => mode === gradientTestArg);
  if (gradientTestArg !== undefined && gradientTest === undefined) {
    console.error(`Invalid --gradient-test '${gradientTestArg}'\n\n${USAGE}`);
    return 2;
  }

  if (values.serve) {
    await serve(verbose);
    return 0;
  }

  return runOnce(
    {
      dryRun: values['dry-run'] === true,
      targetDate: values.date,
      gradientTest,
    },
    verbose,
  );
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    new Logger('Bootstrap').error(
      `Fatal: ${describeError(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    process.exitCode = 1;
  });
