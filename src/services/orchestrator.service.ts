/**
 * Task Orchestrator
 *
 * init → provision (or skip) → bootstrap → stage → execute → collect → cleanup → done
 *
 * Provisioning acquires reversible changes on the test user; cleanup releases
 * them on every exit path and can never change the task's exit code.
 */

import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { FRAMEWORK_DIRECTORY, buildTestEnvironment, isAdvancedConfigured } from '../config';
import { formatDiagnostic } from '../errors';
import type { ProvisioningState } from '../models/dataverse.model';
import type { RunConfiguration, RunPhase, TestRunResult } from '../models/run.model';
import { collectArtifacts, type CollectedArtifacts } from './artifact.service';
import { DataverseSession, type DataverseCredentials } from './dataverse-client.service';
import { DirectoryLookupService } from './directory-lookup.service';
import { EnvironmentBootstrapService } from './environment-bootstrap.service';
import { FailureAnalysisService } from './failure-analysis.service';
import { Logger, logger as rootLogger } from './logger.service';
import { runOperation, type ProvisioningOperation } from './operation-policy';
import { TestExecutionService } from './test-execution.service';
import { UserProvisioningService } from './user-provisioning.service';

export interface OrchestratorDependencies {
  bootstrap: EnvironmentBootstrapService;
  testExecution: TestExecutionService;
  failureAnalysis: FailureAnalysisService;
  createSession: (credentials: DataverseCredentials) => DataverseSession;
}

interface ProvisioningLease {
  state: ProvisioningState;
  session?: DataverseSession;
  users?: UserProvisioningService;
}

export interface RunSummary {
  runId: string;
  exitCode: number;
  provisioning: ProvisioningState;
  testResult?: TestRunResult;
  artifacts?: CollectedArtifacts;
}

const GENERIC_FAILURE_EXIT_CODE = 1;

export class OrchestratorService {
  private deps: OrchestratorDependencies;
  private log: Logger = rootLogger.orchestrator;
  private phase: RunPhase = 'init';

  constructor(deps: Partial<OrchestratorDependencies> = {}) {
    this.deps = {
      bootstrap: deps.bootstrap ?? new EnvironmentBootstrapService(),
      testExecution: deps.testExecution ?? new TestExecutionService(),
      failureAnalysis: deps.failureAnalysis ?? new FailureAnalysisService(),
      createSession: deps.createSession ?? ((credentials) => new DataverseSession(credentials)),
    };
  }

  get currentPhase(): RunPhase {
    return this.phase;
  }

  async run(runConfig: RunConfiguration): Promise<RunSummary> {
    const runId = uuidv4();
    this.log = rootLogger.orchestrator.child({ runId });
    this.phase = 'init';
    this.log.info('Starting Power Platform test run', {
      browser: runConfig.browser,
      trace: runConfig.trace,
      outputPath: runConfig.outputPath,
    });

    const summary: RunSummary = {
      runId,
      exitCode: GENERIC_FAILURE_EXIT_CODE,
      provisioning: { configured: false, removedRoleIds: [] },
    };

    await this.withProvisioning(runConfig, summary, async () => {
      await this.execute(runConfig, summary);
    });

    this.phase = 'done';
    this.log.info(`Run finished with exit code ${summary.exitCode}`);
    return summary;
  }

  /** Acquire provisioning, run the body, release on every path. */
  private async withProvisioning(
    runConfig: RunConfiguration,
    summary: RunSummary,
    body: () => Promise<void>
  ): Promise<void> {
    const lease = await this.provision(runConfig);
    summary.provisioning = lease.state;
    try {
      await body();
    } finally {
      await this.release(lease, runConfig);
    }
  }

  private async execute(runConfig: RunConfiguration, summary: RunSummary): Promise<void> {
    const { bootstrap, testExecution, failureAnalysis } = this.deps;
    const frameworkDir = path.join(runConfig.workingDirectory, FRAMEWORK_DIRECTORY);

    try {
      this.phase = 'bootstrap';
      await bootstrap.ensureRuntimeInstalled();
      await bootstrap.fetchTestFramework(runConfig.repositoryUrl, runConfig.repositoryRef, frameworkDir);
      await bootstrap.installFrameworkDependencies(frameworkDir, runConfig.browser);

      this.phase = 'stage';
      testExecution.stageTests(runConfig.testSourcePath, path.join(frameworkDir, 'tests'));

      this.phase = 'execute';
      const result = await testExecution.runTests(frameworkDir, runConfig);
      if (result.exitCode !== 0) {
        result.failureReport = failureAnalysis.analyzeFailure(frameworkDir, buildTestEnvironment(runConfig));
        this.log.block('warn', failureAnalysis.formatReport(result.failureReport));
      }
      summary.testResult = result;
      summary.exitCode = result.exitCode;
    } catch (error) {
      this.log.error(`Run failed during ${this.phase}`, error);
      this.log.block('error', formatDiagnostic(error));
      summary.exitCode = GENERIC_FAILURE_EXIT_CODE;
      return;
    }

    this.phase = 'collect';
    try {
      summary.artifacts = collectArtifacts(frameworkDir, runConfig.outputPath);
    } catch (error) {
      this.log.error('Could not copy test artifacts to the output path', error);
    }
  }

  /**
   * Runs one provisioning operation under the failure policy: fatal failures
   * are thrown, recoverable ones logged and answered with undefined.
   */
  private async step<T>(operation: ProvisioningOperation, action: () => Promise<T>): Promise<T | undefined> {
    const result = await runOperation(operation, action);
    if (result.ok) return result.value;
    if (result.severity === 'fatal') throw result.error;
    this.log.warn(`${operation} failed; continuing`, { error: result.error.message });
    return undefined;
  }

  private async requiredStep<T>(operation: ProvisioningOperation, action: () => Promise<T>): Promise<T> {
    const value = await this.step(operation, action);
    if (value === undefined) {
      throw new Error(`${operation} produced no result`);
    }
    return value;
  }

  private async provision(runConfig: RunConfiguration): Promise<ProvisioningLease> {
    this.phase = 'provision';
    const state: ProvisioningState = { configured: false, removedRoleIds: [] };

    if (!isAdvancedConfigured(runConfig)) {
      this.log.info('Advanced configuration incomplete; skipping user provisioning');
      return { state };
    }

    const { tenantId, clientId, clientSecret, dynamicsUrl } = runConfig.advanced;
    const session = this.deps.createSession({ tenantId, clientId, clientSecret, resourceUrl: dynamicsUrl });
    const directory = new DirectoryLookupService(session);
    const users = new UserProvisioningService(session, directory);

    try {
      await this.applyProvisioning(runConfig, session, directory, users, state);
      state.configured = true;
      this.log.info('User provisioning complete');
    } catch (error) {
      state.configured = false;
      this.log.error('User provisioning failed; continuing without it', error);
      this.log.block('error', formatDiagnostic(error));
    }

    return { state, session, users };
  }

  private async applyProvisioning(
    runConfig: RunConfiguration,
    session: DataverseSession,
    directory: DirectoryLookupService,
    users: UserProvisioningService,
    state: ProvisioningState
  ): Promise<void> {
    const { securityRole, teamName, businessUnit, removeExistingRoles } = runConfig.advanced;

    await this.requiredStep('acquireToken', () => session.getToken());
    const user = await this.requiredStep('resolveUser', () => directory.resolveUserId(runConfig.username));
    state.userId = user.id;
    this.log.info(`Resolved test user ${user.name}`, { userId: user.id });

    // Business unit first: a role from another business unit is rejected.
    if (businessUnit) {
      const unit = await this.requiredStep('resolveBusinessUnit', () => directory.resolveBusinessUnitId(businessUnit));
      await this.step('updateBusinessUnit', () => users.updateBusinessUnit(user.id, unit.id));
      state.changedBusinessUnitId = unit.id;
    }

    if (securityRole) {
      const role = await this.requiredStep('resolveRole', () => directory.resolveRoleId(securityRole));
      if (removeExistingRoles) {
        const removal = await this.step('removeAllRoles', () => users.removeAllSecurityRoles(user.id));
        state.removedRoleIds = removal?.removed ?? [];
      }
      const outcome = await this.requiredStep('assignRole', async () => {
        if (await users.hasRole(user.id, role.id)) {
          return { method: 'existing assignment', alreadyAssigned: true };
        }
        return users.assignSecurityRole(user.id, role);
      });
      if (outcome.alreadyAssigned) {
        this.log.info(`Role '${role.name}' was already assigned; cleanup will leave it in place`);
      } else {
        state.assignedRoleId = role.id;
      }
    }

    if (teamName) {
      const team = await this.requiredStep('resolveTeam', () => directory.resolveTeamId(teamName));
      const joined = await this.requiredStep('addToTeam', async () => {
        if (await users.isTeamMember(user.id, team.id)) return false;
        await users.addUserToTeam(user.id, team.id);
        return true;
      });
      if (joined) {
        state.joinedTeamId = team.id;
      } else {
        this.log.info(`User is already a member of team '${team.name}'`);
      }
    }
  }

  private async release(lease: ProvisioningLease, runConfig: RunConfiguration): Promise<void> {
    this.phase = 'cleanup';
    const { state, session, users } = lease;
    const userId = state.userId;

    if (!state.configured || !session || !users || !userId || !session.hasToken()) {
      this.log.info('No provisioning changes to revert');
      return;
    }

    if (state.assignedRoleId) {
      const roleId = state.assignedRoleId;
      await this.step('removeRole', () => users.removeSecurityRole(userId, roleId));
    }

    if (state.joinedTeamId) {
      const teamId = state.joinedTeamId;
      if (runConfig.advanced.revertTeamMembership) {
        await this.step('removeFromTeam', () => users.removeUserFromTeam(userId, teamId));
      } else {
        this.log.info('Team membership added during this run is left in place', { teamId });
      }
    }

    if (state.changedBusinessUnitId) {
      this.log.info('Business unit change is not reverted', { businessUnitId: state.changedBusinessUnitId });
    }

    if (state.removedRoleIds.length > 0) {
      this.log.info(`${state.removedRoleIds.length} role(s) removed before the run are not restored`);
    }
  }
}
