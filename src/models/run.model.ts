export const SUPPORTED_BROWSERS = ['chromium', 'firefox', 'webkit'] as const;
export type BrowserName = (typeof SUPPORTED_BROWSERS)[number];

export const TRACE_MODES = ['off', 'on', 'retain-on-failure', 'on-first-retry'] as const;
export type TraceMode = (typeof TRACE_MODES)[number];

export interface AdvancedConfig {
  tenantId: string;
  dynamicsUrl: string;
  clientId: string;
  clientSecret: string;
  securityRole: string;
  teamName: string;
  businessUnit: string;
  removeExistingRoles: boolean;
  revertTeamMembership: boolean;
}

export interface RunConfiguration {
  workingDirectory: string;
  testSourcePath: string;
  browser: BrowserName;
  trace: TraceMode;
  outputPath: string;
  appUrl: string;
  appName: string;
  username: string;
  password: string;
  repositoryUrl: string;
  repositoryRef: string;
  advanced: AdvancedConfig;
}

export interface TestRunResult {
  exitCode: number;
  failureReport?: FailureReport;
}

export type ArtifactCategory = 'resultFiles' | 'traces' | 'screenshots' | 'videos' | 'logs';

export interface ArtifactExcerpt {
  path: string;
  content: string;
  truncated: boolean;
}

export interface FailureReport {
  artifacts: Record<ArtifactCategory, string[]>;
  excerpts: ArtifactExcerpt[];
  environmentHints: Record<string, 'set' | 'missing'>;
}

export type RunPhase =
  | 'init'
  | 'provision'
  | 'bootstrap'
  | 'stage'
  | 'execute'
  | 'collect'
  | 'cleanup'
  | 'done';
