import dotenv from 'dotenv';
import * as path from 'path';
import { ConfigurationError } from '../errors';
import {
  RunConfiguration,
  SUPPORTED_BROWSERS,
  TRACE_MODES,
  type BrowserName,
  type TraceMode,
} from '../models/run.model';

dotenv.config();

export type EnvironmentRecord = Record<string, string | undefined>;

// Playwright harness cloned into the agent's working directory for every run.
export const DEFAULT_FRAMEWORK_REPOSITORY =
  'https://github.com/mightora/PowerPlatform-Playwright-Framework.git';
export const FRAMEWORK_DIRECTORY = 'playwright-framework';
export const PINNED_NODE_MAJOR = 20;

export const config = {
  logLevel: process.env.LOG_LEVEL || 'info',

  execution: {
    workers: 2,
    maxFailures: 5,
  },

  analysis: {
    maxEntriesPerCategory: 5,
    maxExcerptLength: 2000,
  },

  dataverse: {
    apiVersion: 'v9.2',
    tokenRefreshMarginMs: 5 * 60 * 1000,
  },
};

/**
 * Look an input up by its pipeline task-input name first, then by the plain
 * environment name used in local .env files.
 */
function readInput(env: EnvironmentRecord, name: string, fallbackName: string): string {
  const fromTask = env[`INPUT_${name.toUpperCase()}`];
  if (fromTask !== undefined && fromTask.trim() !== '') return fromTask.trim();
  return (env[fallbackName] ?? '').trim();
}

function readBoolean(env: EnvironmentRecord, name: string, fallbackName: string): boolean {
  const raw = readInput(env, name, fallbackName).toLowerCase();
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function readChoice<T extends string>(
  value: string,
  allowed: readonly T[],
  fallback: T,
  label: string
): T {
  if (value === '') return fallback;
  const match = allowed.find((option) => option === value.toLowerCase());
  if (!match) {
    throw new ConfigurationError(`Unsupported ${label} '${value}'`, {
      remediation: [`Use one of: ${allowed.join(', ')}`],
    });
  }
  return match;
}

export function loadRunConfiguration(
  env: EnvironmentRecord = process.env,
  cwd: string = process.cwd()
): RunConfiguration {
  const workingDirectory = readInput(env, 'workingDirectory', 'WORKING_DIRECTORY') || cwd;
  const resolve = (value: string) => path.resolve(workingDirectory, value);

  const browser: BrowserName = readChoice(
    readInput(env, 'browser', 'BROWSER'),
    SUPPORTED_BROWSERS,
    'chromium',
    'browser'
  );
  const trace: TraceMode = readChoice(readInput(env, 'trace', 'TRACE'), TRACE_MODES, 'off', 'trace mode');

  return Object.freeze({
    workingDirectory,
    testSourcePath: resolve(readInput(env, 'testSourcePath', 'TEST_SOURCE_PATH') || 'tests'),
    browser,
    trace,
    outputPath: resolve(readInput(env, 'outputPath', 'OUTPUT_PATH') || 'playwright-output'),
    appUrl: readInput(env, 'appUrl', 'APP_URL'),
    appName: readInput(env, 'appName', 'APP_NAME'),
    username: readInput(env, 'username', 'O365_USERNAME'),
    password: readInput(env, 'password', 'O365_PASSWORD'),
    repositoryUrl: readInput(env, 'repositoryUrl', 'FRAMEWORK_REPOSITORY_URL') || DEFAULT_FRAMEWORK_REPOSITORY,
    repositoryRef: readInput(env, 'repositoryRef', 'FRAMEWORK_REPOSITORY_REF'),
    advanced: Object.freeze({
      tenantId: readInput(env, 'tenantId', 'TENANT_ID'),
      dynamicsUrl: readInput(env, 'dynamicsUrl', 'DYNAMICS_URL'),
      clientId: readInput(env, 'clientId', 'CLIENT_ID'),
      clientSecret: readInput(env, 'clientSecret', 'CLIENT_SECRET'),
      securityRole: readInput(env, 'securityRole', 'SECURITY_ROLE'),
      teamName: readInput(env, 'teamName', 'TEAM_NAME'),
      businessUnit: readInput(env, 'businessUnit', 'BUSINESS_UNIT'),
      removeExistingRoles: readBoolean(env, 'removeExistingRoles', 'REMOVE_EXISTING_ROLES'),
      revertTeamMembership: readBoolean(env, 'revertTeamMembership', 'REVERT_TEAM_MEMBERSHIP'),
    }),
  });
}

/** Provisioning activates only when every one of these is non-empty. */
export function isAdvancedConfigured(runConfig: RunConfiguration): boolean {
  const { tenantId, dynamicsUrl, clientId, clientSecret } = runConfig.advanced;
  return [tenantId, dynamicsUrl, clientId, clientSecret, runConfig.username].every(
    (value) => value.trim() !== ''
  );
}

/**
 * Environment handed to the test subprocess. Built at the launch boundary;
 * the client secret never goes in.
 */
export function buildTestEnvironment(runConfig: RunConfiguration): Record<string, string> {
  const entries: Array<[string, string]> = [
    ['APP_URL', runConfig.appUrl],
    ['APP_NAME', runConfig.appName],
    ['O365_USERNAME', runConfig.username],
    ['O365_PASSWORD', runConfig.password],
  ];

  if (isAdvancedConfigured(runConfig)) {
    const advanced = runConfig.advanced;
    entries.push(
      ['TENANT_ID', advanced.tenantId],
      ['DYNAMICS_URL', advanced.dynamicsUrl],
      ['CLIENT_ID', advanced.clientId],
      ['SECURITY_ROLE', advanced.securityRole],
      ['TEAM_NAME', advanced.teamName],
      ['BUSINESS_UNIT', advanced.businessUnit]
    );
  }

  return Object.fromEntries(entries.filter(([, value]) => value !== ''));
}

export const TEST_ENVIRONMENT_KEYS = [
  'APP_URL',
  'APP_NAME',
  'O365_USERNAME',
  'O365_PASSWORD',
  'TENANT_ID',
  'DYNAMICS_URL',
  'CLIENT_ID',
  'SECURITY_ROLE',
  'TEAM_NAME',
  'BUSINESS_UNIT',
] as const;

/** Where the client secret can sit in the agent's environment; never passed to child processes. */
export const SECRET_ENVIRONMENT_KEYS = ['INPUT_CLIENTSECRET', 'CLIENT_SECRET'] as const;
