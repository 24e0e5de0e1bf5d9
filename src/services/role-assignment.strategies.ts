/**
 * Role assignment methods, tried in order until one succeeds.
 *
 * Environments differ in which association routes they accept for
 * systemuserroles_association, so each shape is its own strategy. Adding or
 * dropping a method is an edit to ROLE_ASSIGNMENT_STRATEGIES only.
 */

import { ApiError, toError } from '../errors';
import type { DataverseSession } from './dataverse-client.service';

export type StrategyResult = { ok: true } | { ok: false; error: ApiError };

export interface RoleAssignmentStrategy {
  name: string;
  attempt(userId: string, roleId: string, session: DataverseSession): Promise<StrategyResult>;
}

async function settle(call: () => Promise<unknown>): Promise<StrategyResult> {
  try {
    await call();
    return { ok: true };
  } catch (error) {
    if (error instanceof ApiError) {
      return { ok: false, error };
    }
    const err = toError(error);
    return { ok: false, error: new ApiError(err.message, 0, '', { cause: err }) };
  }
}

function strategy(
  name: string,
  call: (userId: string, roleId: string, session: DataverseSession) => Promise<unknown>
): RoleAssignmentStrategy {
  return {
    name,
    attempt: (userId, roleId, session) => settle(() => call(userId, roleId, session)),
  };
}

const userToRoleReference = (
  userId: string,
  roleId: string,
  session: DataverseSession,
  headers: Record<string, string> = {}
) =>
  session.call(
    'POST',
    `systemusers(${userId})/systemuserroles_association/$ref`,
    { '@odata.id': session.entityUrl('roles', roleId) },
    headers
  );

export const ROLE_ASSIGNMENT_STRATEGIES: readonly RoleAssignmentStrategy[] = [
  strategy('user-to-role $ref', (userId, roleId, session) => userToRoleReference(userId, roleId, session)),

  strategy('role-to-user $ref', (userId, roleId, session) =>
    session.call('POST', `roles(${roleId})/systemuserroles_association/$ref`, {
      '@odata.id': session.entityUrl('systemusers', userId),
    })
  ),

  strategy('Associate action', (userId, roleId, session) =>
    session.call('POST', 'Associate', {
      Target: { '@odata.type': 'Microsoft.Dynamics.CRM.systemuser', systemuserid: userId },
      Relationship: { SchemaName: 'systemuserroles_association' },
      RelatedEntities: [{ '@odata.type': 'Microsoft.Dynamics.CRM.role', roleid: roleId }],
    })
  ),

  strategy('systemuserroles collection', (userId, roleId, session) =>
    session.call('POST', 'systemuserroles', { systemuserid: userId, roleid: roleId })
  ),

  strategy('AddUserToRole action', (userId, roleId, session) =>
    session.call('POST', 'AddUserToRole', { UserId: userId, RoleId: roleId })
  ),

  strategy('user-to-role $ref (If-None-Match)', (userId, roleId, session) =>
    userToRoleReference(userId, roleId, session, { 'If-None-Match': 'null' })
  ),
];

const DUPLICATE_PATTERN = /duplicate|already exists|0x80040237/i;

export function isDuplicateAssociation(error: ApiError): boolean {
  return error.status === 409 || DUPLICATE_PATTERN.test(error.body) || DUPLICATE_PATTERN.test(error.message);
}
