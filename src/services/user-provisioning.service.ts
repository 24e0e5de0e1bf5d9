/**
 * User Provisioning Service
 *
 * Changes the test user's security roles, business unit and team membership
 * through the Dataverse Web API.
 */

import { ApiError, BusinessUnitUpdateError, RoleAssignmentError, toError } from '../errors';
import type { DataverseEntityRef } from '../models/dataverse.model';
import type { DataverseSession } from './dataverse-client.service';
import type { DirectoryLookupService } from './directory-lookup.service';
import { Logger, logger as rootLogger } from './logger.service';
import {
  ROLE_ASSIGNMENT_STRATEGIES,
  isDuplicateAssociation,
  type RoleAssignmentStrategy,
} from './role-assignment.strategies';

export interface RoleRemovalSummary {
  removed: string[];
  failed: string[];
}

export interface RoleAssignmentOutcome {
  method: string;
  alreadyAssigned: boolean;
}

export class UserProvisioningService {
  private log: Logger;
  private strategies: readonly RoleAssignmentStrategy[];

  constructor(
    private session: DataverseSession,
    private directory: DirectoryLookupService,
    options: { logger?: Logger; strategies?: readonly RoleAssignmentStrategy[] } = {}
  ) {
    this.log = options.logger ?? rootLogger.provisioning;
    this.strategies = options.strategies ?? ROLE_ASSIGNMENT_STRATEGIES;
  }

  async hasRole(userId: string, roleId: string): Promise<boolean> {
    const roles = await this.directory.listUserRoles(userId);
    return roles.some((role) => role.roleid === roleId);
  }

  async isTeamMember(userId: string, teamId: string): Promise<boolean> {
    const teams = await this.directory.listUserTeams(userId);
    return teams.some((team) => team.teamid === teamId);
  }

  async removeSecurityRole(userId: string, roleId: string): Promise<void> {
    await this.session.call('DELETE', `systemusers(${userId})/systemuserroles_association(${roleId})/$ref`);
  }

  /**
   * Deletes every role association the user has. Individual failures are
   * logged and skipped; the summary says what was and wasn't removed.
   */
  async removeAllSecurityRoles(userId: string): Promise<RoleRemovalSummary> {
    const roles = await this.directory.listUserRoles(userId);
    const summary: RoleRemovalSummary = { removed: [], failed: [] };

    for (const role of roles) {
      try {
        await this.removeSecurityRole(userId, role.roleid);
        summary.removed.push(role.roleid);
        this.log.info(`Removed security role ${role.name ?? role.roleid}`);
      } catch (error) {
        summary.failed.push(role.roleid);
        this.log.warn(`Could not remove security role ${role.name ?? role.roleid}`, {
          error: toError(error).message,
        });
      }
    }

    this.log.info(`Role removal finished: ${summary.removed.length} removed, ${summary.failed.length} failed`);
    return summary;
  }

  /**
   * Warns when user and role sit in different business units. Never blocks:
   * any failure here is logged and assignment goes ahead.
   */
  async checkBusinessUnitCompatibility(userId: string, roleId: string): Promise<boolean> {
    try {
      const user = await this.directory.getUser(userId);
      const role = await this.directory.getRole(roleId);
      const userUnit = user?._businessunitid_value;
      const roleUnit = role?._businessunitid_value;
      if (userUnit && roleUnit && userUnit !== roleUnit) {
        this.log.warn('User and role belong to different business units; assignment may be rejected', {
          userBusinessUnit: userUnit,
          roleBusinessUnit: roleUnit,
        });
        return false;
      }
      return true;
    } catch (error) {
      this.log.warn('Business unit compatibility check failed; continuing with assignment', {
        error: toError(error).message,
      });
      return true;
    }
  }

  async assignSecurityRole(userId: string, role: DataverseEntityRef): Promise<RoleAssignmentOutcome> {
    await this.checkBusinessUnitCompatibility(userId, role.id);

    const failures: ApiError[] = [];
    for (const [index, strategy] of this.strategies.entries()) {
      this.log.info(`Assigning role '${role.name}' via ${strategy.name} (${index + 1}/${this.strategies.length})`);
      const result = await strategy.attempt(userId, role.id, this.session);
      if (result.ok) {
        this.log.info(`Role '${role.name}' assigned via ${strategy.name}`);
        return { method: strategy.name, alreadyAssigned: false };
      }

      failures.push(result.error);
      this.log.warn(`${strategy.name} failed with status ${result.error.status}`);

      if (index === 0 && isDuplicateAssociation(result.error) && (await this.confirmRolePresent(userId, role.id))) {
        this.log.info(`Role '${role.name}' is already assigned`);
        return { method: strategy.name, alreadyAssigned: true };
      }
    }

    throw new RoleAssignmentError(role.name, failures);
  }

  private async confirmRolePresent(userId: string, roleId: string): Promise<boolean> {
    try {
      return await this.hasRole(userId, roleId);
    } catch (error) {
      this.log.warn('Could not re-query role associations', { error: toError(error).message });
      return false;
    }
  }

  async updateBusinessUnit(userId: string, businessUnitId: string): Promise<void> {
    try {
      await this.session.call('PATCH', `systemusers(${userId})`, {
        'businessunitid@odata.bind': `/businessunits(${businessUnitId})`,
      });
    } catch (error) {
      if (error instanceof ApiError) {
        throw new BusinessUnitUpdateError(error);
      }
      throw error;
    }
    this.log.info('Business unit updated', { businessUnitId });
  }

  async addUserToTeam(userId: string, teamId: string): Promise<void> {
    await this.session.call('POST', `teams(${teamId})/teammembership_association/$ref`, {
      '@odata.id': this.session.entityUrl('systemusers', userId),
    });
    this.log.info('User added to team', { teamId });
  }

  /** Best effort: failures (404 included) are logged, never thrown. */
  async removeUserFromTeam(userId: string, teamId: string): Promise<boolean> {
    try {
      await this.session.call('DELETE', `teams(${teamId})/teammembership_association(${userId})/$ref`);
      this.log.info('User removed from team', { teamId });
      return true;
    } catch (error) {
      const status = error instanceof ApiError ? error.status : undefined;
      this.log.warn(
        status === 404 ? 'User was not a member of the team' : 'Could not remove user from team',
        { teamId, status, error: toError(error).message }
      );
      return false;
    }
  }
}
