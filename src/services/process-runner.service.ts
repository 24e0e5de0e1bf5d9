import { spawn } from 'child_process';

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Inherited variables the child must not see; matched case-insensitively. */
  omitEnv?: readonly string[];
  /** Collect stdout/stderr instead of streaming them to the task log. */
  capture?: boolean;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ProcessRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<ProcessResult>;
}

export function childEnvironment(base: NodeJS.ProcessEnv, options: RunOptions = {}): NodeJS.ProcessEnv {
  const omitted = new Set((options.omitEnv ?? []).map((key) => key.toUpperCase()));
  const env: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(base)) {
    if (!omitted.has(key.toUpperCase())) env[key] = value;
  }
  return { ...env, ...options.env };
}

/**
 * Spawns a child process and resolves with its exit code. Rejects only when
 * the process could not be started at all.
 */
export class SpawnProcessRunner implements ProcessRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: childEnvironment(process.env, options),
        shell: process.platform === 'win32',
        stdio: options.capture ? ['ignore', 'pipe', 'pipe'] : 'inherit',
      });

      let stdout = '';
      let stderr = '';
      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', reject);
      child.on('close', (code, signal) => {
        resolve({ exitCode: code ?? (signal ? 1 : 0), stdout, stderr });
      });
    });
  }
}

export const processRunner = new SpawnProcessRunner();
