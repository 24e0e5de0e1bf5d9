/**
 * Environment Bootstrap Service
 *
 * Gets the agent ready to run the Playwright framework: Node.js on PATH,
 * a fresh clone of the framework repository, its npm dependencies and the
 * one browser this run targets.
 */

import * as fs from 'fs';
import { PINNED_NODE_MAJOR } from '../config';
import { BootstrapError, toError } from '../errors';
import type { BrowserName } from '../models/run.model';
import { Logger, logger as rootLogger } from './logger.service';
import { processRunner as defaultRunner, type ProcessRunner } from './process-runner.service';

const PINNED_NODE_VERSION = `${PINNED_NODE_MAJOR}.17.0`;
const COMMIT_SHA_PATTERN = /^[0-9a-f]{7,40}$/i;

interface InstallCommand {
  command: string;
  args: string[];
}

export function runtimeInstallCommand(platform: NodeJS.Platform, arch: string): InstallCommand {
  switch (platform) {
    case 'win32':
      return {
        command: 'choco',
        args: ['install', 'nodejs', `--version=${PINNED_NODE_VERSION}`, '-y', ...(arch === 'ia32' ? ['--x86'] : [])],
      };
    case 'darwin':
      return { command: 'brew', args: ['install', `node@${PINNED_NODE_MAJOR}`] };
    case 'linux':
      return {
        command: 'bash',
        args: [
          '-c',
          `curl -fsSL https://deb.nodesource.com/setup_${PINNED_NODE_MAJOR}.x | sudo -E bash - && sudo apt-get install -y nodejs`,
        ],
      };
    default:
      throw new BootstrapError(`No Node.js install method for platform ${platform}/${arch}`, {
        remediation: ['Use an agent image that already has Node.js on PATH.'],
      });
  }
}

export class EnvironmentBootstrapService {
  private log: Logger;
  private platform: NodeJS.Platform;
  private arch: string;

  constructor(
    private runner: ProcessRunner = defaultRunner,
    options: { logger?: Logger; platform?: NodeJS.Platform; arch?: string } = {}
  ) {
    this.log = options.logger ?? rootLogger.bootstrap;
    this.platform = options.platform ?? process.platform;
    this.arch = options.arch ?? process.arch;
  }

  private async nodeVersion(): Promise<string | undefined> {
    try {
      const result = await this.runner.run('node', ['--version'], { capture: true });
      const version = result.stdout.trim();
      return result.exitCode === 0 && version !== '' ? version : undefined;
    } catch {
      return undefined;
    }
  }

  async ensureRuntimeInstalled(): Promise<string> {
    const existing = await this.nodeVersion();
    if (existing) {
      this.log.info(`Node.js ${existing} already installed`);
      return existing;
    }

    const install = runtimeInstallCommand(this.platform, this.arch);
    this.log.info(`Node.js not found; installing ${PINNED_NODE_VERSION} for ${this.platform}/${this.arch}`);
    try {
      const result = await this.runner.run(install.command, install.args);
      if (result.exitCode !== 0) {
        this.log.warn(`Node.js installer exited with code ${result.exitCode}`);
      }
    } catch (error) {
      this.log.warn(`Node.js installer could not start: ${toError(error).message}`);
    }

    const installed = await this.nodeVersion();
    if (!installed) {
      throw new BootstrapError('Node.js is not available after installation', {
        remediation: [
          `Install Node.js ${PINNED_NODE_MAJOR} on the agent, or add a Node tool installer step before this task.`,
        ],
      });
    }
    this.log.info(`Node.js ${installed} installed`);
    return installed;
  }

  async fetchTestFramework(repositoryUrl: string, ref: string, targetDir: string): Promise<void> {
    if (fs.existsSync(targetDir)) {
      this.log.info(`Removing previous framework copy at ${targetDir}`);
      fs.rmSync(targetDir, { recursive: true, force: true });
    }

    let gitAvailable = false;
    try {
      gitAvailable = (await this.runner.run('git', ['--version'], { capture: true })).exitCode === 0;
    } catch {
      gitAvailable = false;
    }
    if (!gitAvailable) {
      throw new BootstrapError('git is not available on this agent', {
        remediation: ['Install git on the agent or use a hosted image that includes it.'],
      });
    }

    const trimmedRef = ref.trim();
    const isCommit = COMMIT_SHA_PATTERN.test(trimmedRef);
    const cloneArgs =
      trimmedRef === ''
        ? ['clone', '--depth', '1', repositoryUrl, targetDir]
        : isCommit
          ? ['clone', repositoryUrl, targetDir]
          : ['clone', '--depth', '1', '--branch', trimmedRef, repositoryUrl, targetDir];

    this.log.info(`Cloning ${repositoryUrl}${trimmedRef ? ` at ${trimmedRef}` : ''}`);
    const clone = await this.runner.run('git', cloneArgs);
    if (clone.exitCode !== 0) {
      throw new BootstrapError(`git clone exited with code ${clone.exitCode}`, {
        url: repositoryUrl,
        remediation: ['Check the repository URL and that the ref exists.', 'Private repositories need credentials on the agent.'],
      });
    }

    if (isCommit) {
      const checkout = await this.runner.run('git', ['checkout', trimmedRef], { cwd: targetDir });
      if (checkout.exitCode !== 0) {
        throw new BootstrapError(`git checkout ${trimmedRef} exited with code ${checkout.exitCode}`, {
          url: repositoryUrl,
          remediation: ['Check that the commit exists in the repository.'],
        });
      }
    }
  }

  async installFrameworkDependencies(frameworkDir: string, browser: BrowserName): Promise<void> {
    this.log.info('Installing framework dependencies (npm ci)');
    const ci = await this.runner.run('npm', ['ci'], { cwd: frameworkDir });
    if (ci.exitCode !== 0) {
      this.log.warn(`npm ci exited with code ${ci.exitCode}; falling back to npm install`);
      const install = await this.runner.run('npm', ['install'], { cwd: frameworkDir });
      if (install.exitCode !== 0) {
        throw new BootstrapError(`npm install exited with code ${install.exitCode}`, {
          remediation: ['Check the framework package.json and the agent\'s access to the npm registry.'],
        });
      }
    }

    this.log.info(`Installing Playwright browser: ${browser}`);
    const browsers = await this.runner.run('npx', ['playwright', 'install', browser], { cwd: frameworkDir });
    if (browsers.exitCode !== 0) {
      throw new BootstrapError(`playwright install ${browser} exited with code ${browsers.exitCode}`, {
        remediation: ['Check the agent can reach the Playwright browser CDN.'],
      });
    }

    const deps = await this.runner.run('npx', ['playwright', 'install-deps', browser], { cwd: frameworkDir });
    if (deps.exitCode !== 0) {
      this.log.warn(`playwright install-deps ${browser} exited with code ${deps.exitCode}; continuing`);
    }
  }
}
