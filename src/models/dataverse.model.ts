export interface AccessToken {
  value: string;
  expiresAt: number;
}

export type DataverseEntityKind = 'user' | 'role' | 'team' | 'businessUnit';

export interface DataverseEntityRef {
  kind: DataverseEntityKind;
  id: string;
  name: string;
}

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/**
 * What this run changed on the target user, and what cleanup needs to undo it.
 * Only changes made by this run are recorded; pre-existing assignments stay out.
 */
export interface ProvisioningState {
  configured: boolean;
  userId?: string;
  assignedRoleId?: string;
  joinedTeamId?: string;
  changedBusinessUnitId?: string;
  removedRoleIds: string[];
}

export interface ODataCollection<T> {
  value: T[];
}

export interface SystemUserRecord {
  systemuserid: string;
  domainname?: string;
  _businessunitid_value?: string;
}

export interface RoleRecord {
  roleid: string;
  name?: string;
  _businessunitid_value?: string;
}

export interface TeamRecord {
  teamid: string;
  name?: string;
}
