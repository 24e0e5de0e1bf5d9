/**
 * Directory lookups: exact-match name → Dataverse id.
 * First match wins, in the order the API returns them.
 */

import { NotFoundError } from '../errors';
import type {
  DataverseEntityKind,
  DataverseEntityRef,
  ODataCollection,
  RoleRecord,
  SystemUserRecord,
  TeamRecord,
} from '../models/dataverse.model';
import type { DataverseSession } from './dataverse-client.service';

interface LookupSpec {
  entitySet: string;
  idField: string;
  nameField: string;
}

const LOOKUPS: Record<DataverseEntityKind, LookupSpec> = {
  user: { entitySet: 'systemusers', idField: 'systemuserid', nameField: 'domainname' },
  role: { entitySet: 'roles', idField: 'roleid', nameField: 'name' },
  team: { entitySet: 'teams', idField: 'teamid', nameField: 'name' },
  businessUnit: { entitySet: 'businessunits', idField: 'businessunitid', nameField: 'name' },
};

/** OData string literals escape a single quote by doubling it. */
export function odataString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export class DirectoryLookupService {
  constructor(private session: DataverseSession) {}

  private async resolve(kind: DataverseEntityKind, name: string): Promise<DataverseEntityRef> {
    const { entitySet, idField, nameField } = LOOKUPS[kind];
    const filter = encodeURIComponent(`${nameField} eq ${odataString(name)}`);
    const path = `${entitySet}?$select=${idField}&$filter=${filter}`;

    const result = await this.session.call<ODataCollection<Record<string, unknown>>>('GET', path);
    const first = result?.value?.[0];
    const id = first?.[idField];
    if (typeof id !== 'string' || id === '') {
      throw new NotFoundError(kind, name, `${this.session.baseUrl}/${path}`);
    }
    return { kind, id, name };
  }

  resolveUserId(username: string): Promise<DataverseEntityRef> {
    return this.resolve('user', username);
  }

  resolveRoleId(roleName: string): Promise<DataverseEntityRef> {
    return this.resolve('role', roleName);
  }

  resolveTeamId(teamName: string): Promise<DataverseEntityRef> {
    return this.resolve('team', teamName);
  }

  resolveBusinessUnitId(businessUnitName: string): Promise<DataverseEntityRef> {
    return this.resolve('businessUnit', businessUnitName);
  }

  async getUser(userId: string): Promise<SystemUserRecord | undefined> {
    return this.session.call<SystemUserRecord>(
      'GET',
      `systemusers(${userId})?$select=systemuserid,domainname,_businessunitid_value`
    );
  }

  async getRole(roleId: string): Promise<RoleRecord | undefined> {
    return this.session.call<RoleRecord>('GET', `roles(${roleId})?$select=roleid,name,_businessunitid_value`);
  }

  async listUserRoles(userId: string): Promise<RoleRecord[]> {
    const result = await this.session.call<ODataCollection<RoleRecord>>(
      'GET',
      `systemusers(${userId})/systemuserroles_association?$select=roleid,name`
    );
    return result?.value ?? [];
  }

  async listUserTeams(userId: string): Promise<TeamRecord[]> {
    const result = await this.session.call<ODataCollection<TeamRecord>>(
      'GET',
      `systemusers(${userId})/teammembership_association?$select=teamid,name`
    );
    return result?.value ?? [];
  }
}
