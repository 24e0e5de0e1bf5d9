import { describe, expect, it } from 'vitest';
import { BusinessUnitUpdateError, RoleAssignmentError } from '../errors';
import type { DataverseEntityRef } from '../models/dataverse.model';
import { FakeDataverse, fakeCredentials } from '../testing/fake-dataverse';
import { DataverseSession } from './dataverse-client.service';
import { DirectoryLookupService } from './directory-lookup.service';
import { UserProvisioningService } from './user-provisioning.service';

const TESTER_ROLE: DataverseEntityRef = { kind: 'role', id: 'role-tester', name: 'Tester' };

function setup(fake: FakeDataverse) {
  const session = new DataverseSession(fakeCredentials(), { fetchImpl: fake.fetch });
  return new UserProvisioningService(session, new DirectoryLookupService(session));
}

function baseDirectory(): FakeDataverse {
  return new FakeDataverse().addUser('user-1', 'alice@example.com').addRole('role-tester', 'Tester');
}

describe('removeAllSecurityRoles', () => {
  it('should attempt every deletion and keep going past a failure', async () => {
    const fake = baseDirectory()
      .grantRole('user-1', 'role-1')
      .grantRole('user-1', 'role-2')
      .grantRole('user-1', 'role-3')
      .fail('DELETE', /systemuserroles_association\(role-2\)/, 500, 'locked');

    const summary = await setup(fake).removeAllSecurityRoles('user-1');

    expect(summary).toEqual({ removed: ['role-1', 'role-3'], failed: ['role-2'] });
    expect(fake.callsTo('DELETE')).toHaveLength(3);
    expect(fake.rolesOf('user-1')).toEqual(['role-2']);
  });

  it('should do nothing for a user without roles', async () => {
    const fake = baseDirectory();

    const summary = await setup(fake).removeAllSecurityRoles('user-1');

    expect(summary).toEqual({ removed: [], failed: [] });
    expect(fake.callsTo('DELETE')).toHaveLength(0);
  });
});

describe('assignSecurityRole', () => {
  it('should assign with the first method when it succeeds', async () => {
    const fake = baseDirectory();

    const outcome = await setup(fake).assignSecurityRole('user-1', TESTER_ROLE);

    expect(outcome).toEqual({ method: 'user-to-role $ref', alreadyAssigned: false });
    expect(fake.rolesOf('user-1')).toEqual(['role-tester']);
    expect(fake.callsTo('POST')[0].body).toEqual({
      '@odata.id': 'https://contoso-test.crm.dynamics.com/api/data/v9.2/roles(role-tester)',
    });
  });

  it('should stop after a duplicate signal when the role is confirmed present', async () => {
    const fake = baseDirectory().grantRole('user-1', 'role-tester');

    const outcome = await setup(fake).assignSecurityRole('user-1', TESTER_ROLE);

    expect(outcome).toEqual({ method: 'user-to-role $ref', alreadyAssigned: true });
    expect(fake.callsTo('POST')).toHaveLength(1);
  });

  it('should fall back to the inverse association when the first method fails', async () => {
    const fake = baseDirectory().fail('POST', /^systemusers\(user-1\)\/systemuserroles_association\/\$ref$/, 404, '', 1);

    const outcome = await setup(fake).assignSecurityRole('user-1', TESTER_ROLE);

    expect(outcome).toEqual({ method: 'role-to-user $ref', alreadyAssigned: false });
    expect(fake.callsTo('POST').map((call) => call.path)).toEqual([
      'systemusers(user-1)/systemuserroles_association/$ref',
      'roles(role-tester)/systemuserroles_association/$ref',
    ]);
  });

  it('should try all six methods in order and report the last status', async () => {
    const fake = baseDirectory().fail('POST', /.*/, 403, 'missing privilege');

    const error = await setup(fake)
      .assignSecurityRole('user-1', TESTER_ROLE)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RoleAssignmentError);
    const assignmentError = error instanceof RoleAssignmentError ? error : undefined;
    expect(assignmentError?.attempts).toHaveLength(6);
    expect(assignmentError?.statusCode).toBe(403);
    expect(assignmentError?.remediation[0]).toContain('lacks the privilege to assign roles');
    expect(fake.callsTo('POST').map((call) => call.path)).toEqual([
      'systemusers(user-1)/systemuserroles_association/$ref',
      'roles(role-tester)/systemuserroles_association/$ref',
      'Associate',
      'systemuserroles',
      'AddUserToRole',
      'systemusers(user-1)/systemuserroles_association/$ref',
    ]);
    expect(fake.callsTo('POST')[5].headers['if-none-match']).toBe('null');
  });

  it('should still assign when user and role are in different business units', async () => {
    const fake = new FakeDataverse()
      .addUser('user-1', 'alice@example.com', 'bu-root')
      .addRole('role-tester', 'Tester', 'bu-sales');
    const users = setup(fake);

    expect(await users.checkBusinessUnitCompatibility('user-1', 'role-tester')).toBe(false);
    const outcome = await users.assignSecurityRole('user-1', TESTER_ROLE);

    expect(outcome.alreadyAssigned).toBe(false);
    expect(fake.rolesOf('user-1')).toEqual(['role-tester']);
  });

  it('should not let a failing compatibility check block assignment', async () => {
    const fake = baseDirectory().fail('GET', /^roles\(role-tester\)/, 500);

    const outcome = await setup(fake).assignSecurityRole('user-1', TESTER_ROLE);

    expect(outcome.method).toBe('user-to-role $ref');
  });
});

describe('updateBusinessUnit', () => {
  it('should bind the new business unit', async () => {
    const fake = baseDirectory();

    await setup(fake).updateBusinessUnit('user-1', 'bu-sales');

    const patch = fake.callsTo('PATCH')[0];
    expect(patch.path).toBe('systemusers(user-1)');
    expect(patch.body).toEqual({ 'businessunitid@odata.bind': '/businessunits(bu-sales)' });
    expect(fake.users[0]._businessunitid_value).toBe('bu-sales');
  });

  it('should map 403 to the privilege remediation', async () => {
    const fake = baseDirectory().fail('PATCH', /^systemusers/, 403, 'denied');

    const error = await setup(fake)
      .updateBusinessUnit('user-1', 'bu-sales')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BusinessUnitUpdateError);
    const updateError = error instanceof BusinessUnitUpdateError ? error : undefined;
    expect(updateError?.status).toBe(403);
    expect(updateError?.remediation).toEqual([
      "The application user lacks the privilege to change a user's business unit.",
    ]);
  });

  it('should map 400 to the invalid id remediation', async () => {
    const fake = baseDirectory().fail('PATCH', /^systemusers/, 400, 'bad id');

    await expect(setup(fake).updateBusinessUnit('user-1', 'bu-sales')).rejects.toMatchObject({
      remediation: ['The user id or business unit id is invalid.'],
    });
  });
});

describe('team membership', () => {
  it('should add and then remove a member', async () => {
    const fake = baseDirectory().addTeam('team-1', 'Testers');
    const users = setup(fake);

    await users.addUserToTeam('user-1', 'team-1');
    expect(await users.isTeamMember('user-1', 'team-1')).toBe(true);

    expect(await users.removeUserFromTeam('user-1', 'team-1')).toBe(true);
    expect(fake.teamMembers.get('team-1')).toEqual([]);
  });

  it('should swallow a 404 when the user was not a member', async () => {
    const fake = baseDirectory().addTeam('team-1', 'Testers');

    await expect(setup(fake).removeUserFromTeam('user-1', 'team-1')).resolves.toBe(false);
  });

  it('should swallow any other removal failure', async () => {
    const fake = baseDirectory().addTeam('team-1', 'Testers').fail('DELETE', /^teams/, 500);

    await expect(setup(fake).removeUserFromTeam('user-1', 'team-1')).resolves.toBe(false);
  });
});
