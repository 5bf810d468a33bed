#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CliCommand, CliUsageError, USAGE, parseCliArgs } from './cli/cli-args';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runExitCode } from './cli/exit-codes';
import { SetupError, errorMessage } from './common/errors';
import { WinstonLoggerService } from './common/logger';
import { ROW_STATUSES } from './common/interfaces/status.interface';
import { AuditLogService } from './pipeline/audit-log.service';
import { RunControllerService } from './pipeline/run-controller.service';
import { countByStatus } from './pipeline/status-record';
import { SegmentCutterService } from './segments/segment-cutter.service';


const logger = new Logger('Bootstrap');

async function runPipeline(app: INestApplicationContext): Promise<number> {
  const runController = app.get(RunControllerService);
  const stop = new AbortController();
  const abort = new AbortController();

  // First signal: finish the rows in progress. Second: kill them too.
  const onSignal = (signal: NodeJS.Signals) => {
    if (!stop.signal.aborted) {
      logger.warn(`${signal} received, finishing rows in progress (repeat to abort them)`);
      stop.abort();
    } else if (!abort.signal.aborted) {
      logger.warn(`${signal} received again, aborting rows in progress`);
      abort.abort();
    }
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const summary = await runController.run({ stopSignal: stop.signal, abortSignal: abort.signal });
    return runExitCode(summary);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

async function cutSegments(
  app: INestApplicationContext,
  command: Extract<CliCommand, { command: 'segments' }>,
): Promise<number> {
  const report = await app.get(SegmentCutterService).cutSegments(command.url, command.segments, command.outputBase, {
    keepSource: command.keepSource,
  });
  if (report.downloadError) {
    return EXIT_FAILURE;
  }

  for (const segment of report.segments) {
    if (segment.status === 'cut') {
      process.stdout.write(`segment ${segment.index}: ${segment.outputPath}\n`);
    } else if (segment.status === 'skipped') {
      process.stdout.write(`segment ${segment.index}: skipped (${segment.reason})\n`);
    } else {
      process.stdout.write(`segment ${segment.index}: failed (${segment.error}: ${segment.message})\n`);
    }
  }
  return report.segments.every((segment) => segment.status === 'cut') ? EXIT_OK : EXIT_FAILURE;
}

async function printSummary(app: INestApplicationContext): Promise<number> {
  const auditLog = app.get(AuditLogService);
  const latest = await auditLog.readLatest();
  const counts = countByStatus(latest.values());

  process.stdout.write(`${auditLog.logPath}: ${latest.size} rows\n`);
  for (const status of ROW_STATUSES) {
    process.stdout.write(`  ${status.padEnd(20)} ${counts[status]}\n`);
  }
  return EXIT_OK;
}

async function bootstrap(argv: string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (command.command === 'help') {
    process.stdout.write(USAGE);
    return EXIT_OK;
  }

  const app = await NestFactory.createApplicationContext(AppModule.forRoot(command.overrides), {
    bufferLogs: true,
    abortOnError: false,
  });
  app.useLogger(app.get(WinstonLoggerService));

  try {
    switch (command.command) {
      case 'run':
        return await runPipeline(app);
      case 'segments':
        return await cutSegments(app, command);
      case 'summary':
        return await printSummary(app);
    }
  } catch (error) {
    if (error instanceof SetupError) {
      logger.error(`Setup failed: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  } finally {
    await app.close();
  }
}

bootstrap(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error(`Fatal error: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
    process.exitCode = EXIT_FAILURE;
  },
);
