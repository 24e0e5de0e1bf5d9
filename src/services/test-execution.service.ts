/**
 * Test Execution Service
 *
 * Stages the caller's spec files into the framework and runs Playwright once
 * for the configured browser. The process exit code is the result.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SECRET_ENVIRONMENT_KEYS, buildTestEnvironment, config } from '../config';
import { TestExecutionError } from '../errors';
import type { BrowserName, RunConfiguration, TestRunResult, TraceMode } from '../models/run.model';
import { copyDirectory } from './artifact.service';
import { Logger, logger as rootLogger, registerSecret } from './logger.service';
import { processRunner as defaultRunner, type ProcessRunner } from './process-runner.service';

export function buildTestArguments(browser: BrowserName, trace: TraceMode): string[] {
  const args = [
    'playwright',
    'test',
    `--project=${browser}`,
    `--workers=${config.execution.workers}`,
    `--max-failures=${config.execution.maxFailures}`,
  ];
  if (trace !== 'off') {
    args.push(`--trace=${trace}`);
  }
  return args;
}

export class TestExecutionService {
  private log: Logger;

  constructor(private runner: ProcessRunner = defaultRunner, options: { logger?: Logger } = {}) {
    this.log = options.logger ?? rootLogger.testExecution;
  }

  /**
   * Copies every file under sourceDir into the framework's tests folder.
   * A missing source folder is created empty and nothing is copied.
   */
  stageTests(sourceDir: string, frameworkTestsDir: string): number {
    if (!fs.existsSync(sourceDir)) {
      fs.mkdirSync(sourceDir, { recursive: true });
      this.log.warn(`Test source folder ${sourceDir} did not exist; created it empty, no tests staged`);
      return 0;
    }

    fs.mkdirSync(frameworkTestsDir, { recursive: true });
    const count = copyDirectory(sourceDir, frameworkTestsDir);
    this.log.info(`Staged ${count} test file(s) into ${path.basename(frameworkTestsDir)}`);
    return count;
  }

  async runTests(frameworkDir: string, runConfig: RunConfiguration): Promise<TestRunResult> {
    const args = buildTestArguments(runConfig.browser, runConfig.trace);
    registerSecret(runConfig.password);

    this.log.info(`Running: npx ${args.join(' ')}`);
    let exitCode: number;
    try {
      const result = await this.runner.run('npx', args, {
        cwd: frameworkDir,
        env: buildTestEnvironment(runConfig),
        omitEnv: SECRET_ENVIRONMENT_KEYS,
      });
      exitCode = result.exitCode;
    } catch (error) {
      throw new TestExecutionError('Could not start the Playwright test runner', {
        cause: error,
        remediation: ['Check that npx is on PATH and the framework dependencies installed.'],
      });
    }

    if (exitCode === 0) {
      this.log.info('All tests passed');
    } else {
      this.log.warn(`Playwright exited with code ${exitCode}`);
    }
    return { exitCode };
  }
}
