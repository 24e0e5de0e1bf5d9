#!/usr/bin/env node
import { loadRunConfiguration } from './config';
import { formatDiagnostic } from './errors';
import { OrchestratorService, logger, registerSecret } from './services';

const startTask = async () => {
  try {
    const runConfig = loadRunConfiguration();
    registerSecret(runConfig.password);
    registerSecret(runConfig.advanced.clientSecret);

    const summary = await new OrchestratorService().run(runConfig);
    process.exitCode = summary.exitCode;
  } catch (error) {
    logger.system.error('Task failed before the test run could start', error);
    logger.system.block('error', formatDiagnostic(error));
    process.exitCode = 1;
  }
};

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.system.error('Uncaught Exception', error);
  process.exit(1);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.system.error('Unhandled Rejection', reason);
  process.exit(1);
});

void startTask();
