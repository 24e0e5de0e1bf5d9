/**
 * In-process stand-in for the token endpoint and the Dataverse Web API,
 * used as the fetch implementation in tests.
 */

import type { HttpMethod } from '../models/dataverse.model';

export const FAKE_RESOURCE_URL = 'https://contoso-test.crm.dynamics.com';
const API_ROOT = `${FAKE_RESOURCE_URL}/api/data/v9.2/`;

export interface RecordedCall {
  method: string;
  path: string;
  body?: unknown;
  headers: Record<string, string>;
}

interface FailureRule {
  method: HttpMethod;
  pattern: RegExp;
  status: number;
  body: string;
  remaining: number;
}

interface FakeUser {
  systemuserid: string;
  domainname: string;
  _businessunitid_value: string;
}

interface FakeNamed {
  id: string;
  name: string;
  businessUnitId?: string;
}

function json(status: number, value: unknown): Response {
  return new Response(JSON.stringify(value), { status, headers: { 'Content-Type': 'application/json' } });
}

function noContent(): Response {
  return new Response(null, { status: 204 });
}

function idFromODataRef(body: unknown): string | undefined {
  if (body && typeof body === 'object' && '@odata.id' in body) {
    const ref = body['@odata.id'];
    const match = typeof ref === 'string' ? /\(([^)]+)\)$/.exec(ref) : null;
    return match?.[1];
  }
  return undefined;
}

function filterValue(query: string): string | undefined {
  const params = new URLSearchParams(query);
  const filter = params.get('$filter');
  const match = filter ? / eq '(.*)'$/.exec(filter) : null;
  return match?.[1].replace(/''/g, "'");
}

export class FakeDataverse {
  readonly calls: RecordedCall[] = [];
  users: FakeUser[] = [];
  roles: FakeNamed[] = [];
  teams: FakeNamed[] = [];
  businessUnits: FakeNamed[] = [];
  userRoles = new Map<string, string[]>();
  teamMembers = new Map<string, string[]>();
  tokenResponse: { status: number; body: unknown } = {
    status: 200,
    body: { access_token: 'test-token', expires_in: 3600 },
  };
  private failures: FailureRule[] = [];

  addUser(id: string, domainname: string, businessUnitId = 'bu-root'): this {
    this.users.push({ systemuserid: id, domainname, _businessunitid_value: businessUnitId });
    return this;
  }

  addRole(id: string, name: string, businessUnitId = 'bu-root'): this {
    this.roles.push({ id, name, businessUnitId });
    return this;
  }

  addTeam(id: string, name: string): this {
    this.teams.push({ id, name });
    return this;
  }

  addBusinessUnit(id: string, name: string): this {
    this.businessUnits.push({ id, name });
    return this;
  }

  grantRole(userId: string, roleId: string): this {
    this.userRoles.set(userId, [...(this.userRoles.get(userId) ?? []), roleId]);
    return this;
  }

  /** Make matching calls fail with the given status; `times` defaults to every call. */
  fail(method: HttpMethod, pattern: RegExp, status: number, body = '', times = Infinity): this {
    this.failures.push({ method, pattern, status, body, remaining: times });
    return this;
  }

  callsTo(method: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  dataverseCalls(): RecordedCall[] {
    return this.calls.filter((call) => !call.path.startsWith('token:'));
  }

  rolesOf(userId: string): string[] {
    return this.userRoles.get(userId) ?? [];
  }

  fetch = async (input: string, init: RequestInit = {}): Promise<Response> => {
    const method = (init.method ?? 'GET').toUpperCase();
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });

    if (input.startsWith('https://login.microsoftonline.com/')) {
      this.calls.push({ method, path: `token:${input}`, body: init.body, headers });
      return json(this.tokenResponse.status, this.tokenResponse.body);
    }

    const path = input.startsWith(API_ROOT) ? input.slice(API_ROOT.length) : input;
    const body = typeof init.body === 'string' && init.body !== '' ? JSON.parse(init.body) : undefined;
    this.calls.push({ method, path, body, headers });

    const failure = this.failures.find(
      (rule) => rule.method === method && rule.remaining > 0 && rule.pattern.test(decodeURIComponent(path))
    );
    if (failure) {
      failure.remaining -= 1;
      return new Response(failure.body, { status: failure.status });
    }

    return this.route(method, path, body);
  };

  private route(method: string, path: string, body: unknown): Response {
    const [resource, query = ''] = path.split('?');
    let match: RegExpExecArray | null;

    if (method === 'GET') {
      const lookup = this.lookup(resource, query);
      if (lookup) return json(200, { value: lookup });

      if ((match = /^systemusers\(([^)]+)\)\/systemuserroles_association$/.exec(resource))) {
        const roleIds = this.rolesOf(match[1]);
        return json(200, {
          value: roleIds.map((roleid) => ({ roleid, name: this.roles.find((role) => role.id === roleid)?.name })),
        });
      }
      if ((match = /^systemusers\(([^)]+)\)\/teammembership_association$/.exec(resource))) {
        const userId = match[1];
        const teams = this.teams.filter((team) => (this.teamMembers.get(team.id) ?? []).includes(userId));
        return json(200, { value: teams.map((team) => ({ teamid: team.id, name: team.name })) });
      }
      if ((match = /^systemusers\(([^)]+)\)$/.exec(resource))) {
        const user = this.users.find((candidate) => candidate.systemuserid === match?.[1]);
        return user ? json(200, user) : json(404, { error: { message: 'Not found' } });
      }
      if ((match = /^roles\(([^)]+)\)$/.exec(resource))) {
        const role = this.roles.find((candidate) => candidate.id === match?.[1]);
        return role
          ? json(200, { roleid: role.id, name: role.name, _businessunitid_value: role.businessUnitId })
          : json(404, { error: { message: 'Not found' } });
      }
    }

    if (method === 'POST') {
      if ((match = /^systemusers\(([^)]+)\)\/systemuserroles_association\/\$ref$/.exec(resource))) {
        return this.associateRole(match[1], idFromODataRef(body));
      }
      if ((match = /^roles\(([^)]+)\)\/systemuserroles_association\/\$ref$/.exec(resource))) {
        return this.associateRole(idFromODataRef(body), match[1]);
      }
      if ((match = /^teams\(([^)]+)\)\/teammembership_association\/\$ref$/.exec(resource))) {
        const teamId = match[1];
        const userId = idFromODataRef(body);
        if (!userId) return json(400, { error: { message: 'Bad reference' } });
        this.teamMembers.set(teamId, [...(this.teamMembers.get(teamId) ?? []), userId]);
        return noContent();
      }
      return json(404, { error: { message: `Resource not found for the segment '${resource}'` } });
    }

    if (method === 'DELETE') {
      if ((match = /^systemusers\(([^)]+)\)\/systemuserroles_association\(([^)]+)\)\/\$ref$/.exec(resource))) {
        const [, userId, roleId] = match;
        this.userRoles.set(userId, this.rolesOf(userId).filter((id) => id !== roleId));
        return noContent();
      }
      if ((match = /^teams\(([^)]+)\)\/teammembership_association\(([^)]+)\)\/\$ref$/.exec(resource))) {
        const [, teamId, userId] = match;
        const members = this.teamMembers.get(teamId) ?? [];
        if (!members.includes(userId)) return json(404, { error: { message: 'Not a member' } });
        this.teamMembers.set(teamId, members.filter((id) => id !== userId));
        return noContent();
      }
    }

    if (method === 'PATCH' && (match = /^systemusers\(([^)]+)\)$/.exec(resource))) {
      const user = this.users.find((candidate) => candidate.systemuserid === match?.[1]);
      const bind = body && typeof body === 'object' && 'businessunitid@odata.bind' in body
        ? body['businessunitid@odata.bind']
        : undefined;
      const unitId = typeof bind === 'string' ? /\(([^)]+)\)$/.exec(bind)?.[1] : undefined;
      if (!user || !unitId) return json(400, { error: { message: 'Bad request' } });
      user._businessunitid_value = unitId;
      return noContent();
    }

    return json(404, { error: { message: `No route for ${method} ${resource}` } });
  }

  private lookup(resource: string, query: string): Array<Record<string, string>> | undefined {
    const value = filterValue(query);
    if (value === undefined) return undefined;
    switch (resource) {
      case 'systemusers':
        return this.users.filter((user) => user.domainname === value).map((user) => ({ systemuserid: user.systemuserid }));
      case 'roles':
        return this.roles.filter((role) => role.name === value).map((role) => ({ roleid: role.id }));
      case 'teams':
        return this.teams.filter((team) => team.name === value).map((team) => ({ teamid: team.id }));
      case 'businessunits':
        return this.businessUnits
          .filter((unit) => unit.name === value)
          .map((unit) => ({ businessunitid: unit.id }));
      default:
        return undefined;
    }
  }

  private associateRole(userId: string | undefined, roleId: string | undefined): Response {
    if (!userId || !roleId) return json(400, { error: { message: 'Bad reference' } });
    if (this.rolesOf(userId).includes(roleId)) {
      return json(400, { error: { code: '0x80040237', message: 'Cannot insert duplicate key.' } });
    }
    this.grantRole(userId, roleId);
    return noContent();
  }
}

export function fakeCredentials() {
  return {
    tenantId: 'tenant-1',
    clientId: 'client-1',
    clientSecret: 'test-secret',
    resourceUrl: FAKE_RESOURCE_URL,
  };
}
