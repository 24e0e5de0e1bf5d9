/**
 * Error taxonomy for the task.
 *
 * Every error carries a remediation checklist so the top level can print one
 * structured diagnostic block regardless of where the failure happened.
 */

import type { DataverseEntityKind } from '../models/dataverse.model';

export interface TaskErrorDetails {
  statusCode?: number;
  url?: string;
  remediation?: string[];
  cause?: unknown;
}

export class TaskError extends Error {
  readonly statusCode?: number;
  readonly url?: string;
  readonly remediation: string[];

  constructor(message: string, details: TaskErrorDetails = {}) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = new.target.name;
    this.statusCode = details.statusCode;
    this.url = details.url;
    this.remediation = details.remediation ?? [];
  }
}

export class ConfigurationError extends TaskError {}

const OAUTH_REMEDIATION: Record<string, string[]> = {
  invalid_scope: [
    'Check that the Dataverse URL points at the environment root (https://<org>.crm.dynamics.com).',
    'Make sure the URL has no path segments after the host.',
  ],
  invalid_client: [
    'Verify the client id matches the app registration.',
    'Verify the client secret has not expired and was copied without surrounding whitespace.',
  ],
  invalid_request: [
    'Check that the tenant id is the directory (tenant) id of the app registration.',
    'Confirm the app registration allows the client credentials flow.',
  ],
};

export class AuthError extends TaskError {
  readonly oauthError?: string;

  constructor(message: string, details: TaskErrorDetails & { oauthError?: string } = {}) {
    super(message, {
      ...details,
      remediation:
        details.remediation ??
        (details.oauthError ? OAUTH_REMEDIATION[details.oauthError] : undefined) ?? [
          'Verify tenant id, client id and client secret.',
        ],
    });
    this.oauthError = details.oauthError;
  }
}

export class ApiError extends TaskError {
  readonly status: number;
  readonly body: string;

  constructor(message: string, status: number, body: string, details: TaskErrorDetails = {}) {
    super(message, { ...details, statusCode: status });
    this.status = status;
    this.body = body;
  }
}

/** The 401 kind of ApiError: the app is not registered in the environment or lacks consent. */
export class DataverseAccessError extends ApiError {
  constructor(url: string, body: string) {
    super(`Dataverse rejected the access token (401) for ${url}`, 401, body, {
      url,
      remediation: [
        'Register the app as an application user in the Power Platform admin center.',
        'Assign the application user a security role in the target environment.',
        'Grant admin consent for the Dynamics CRM user_impersonation permission.',
      ],
    });
  }
}

export class NotFoundError extends TaskError {
  readonly entityKind: DataverseEntityKind;
  readonly entityName: string;

  constructor(entityKind: DataverseEntityKind, entityName: string, url?: string) {
    super(`No ${entityKind} found matching '${entityName}'`, {
      url,
      remediation: [`Check the ${entityKind} name for typos; the lookup is an exact match.`],
    });
    this.entityKind = entityKind;
    this.entityName = entityName;
  }
}

export const ROLE_ASSIGNMENT_REMEDIATION: Record<number, string[]> = {
  400: [
    'The user or role id is malformed, or the role belongs to a different business unit than the user.',
    'Set the business unit input so the user moves to the role\'s business unit first.',
  ],
  401: [
    'The application user has not been granted access; register it and grant admin consent.',
  ],
  403: [
    'The application user lacks the privilege to assign roles; give it System Administrator or a role with Assign privileges.',
  ],
  404: [
    'The association route is not supported by this environment, or the user/role was deleted mid-run.',
  ],
};

export class RoleAssignmentError extends TaskError {
  readonly attempts: ApiError[];

  constructor(roleName: string, attempts: ApiError[]) {
    const last = attempts[attempts.length - 1];
    const status = last?.status;
    super(`All ${attempts.length} role assignment methods failed for role '${roleName}'`, {
      statusCode: status,
      url: last?.url,
      remediation: (status !== undefined ? ROLE_ASSIGNMENT_REMEDIATION[status] : undefined) ?? [
        'Assign the role manually once to confirm the application user can do it.',
      ],
    });
    this.attempts = attempts;
  }
}

export class BusinessUnitUpdateError extends ApiError {
  constructor(source: ApiError) {
    super(`Business unit update failed (${source.status})`, source.status, source.body, {
      url: source.url,
      cause: source,
      remediation:
        source.status === 403
          ? ['The application user lacks the privilege to change a user\'s business unit.']
          : source.status === 400
            ? ['The user id or business unit id is invalid.']
            : source.remediation,
    });
  }
}

export class BootstrapError extends TaskError {}

export class TestExecutionError extends TaskError {}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function formatDiagnostic(error: unknown): string {
  const err = toError(error);
  const lines = [`=== ${err.name} ===`, `Message: ${err.message}`];
  if (err instanceof TaskError) {
    if (err.statusCode !== undefined) lines.push(`Status: ${err.statusCode}`);
    if (err.url) lines.push(`URL: ${err.url}`);
    if (err.remediation.length > 0) {
      lines.push('Remediation:');
      for (const step of err.remediation) {
        lines.push(`  - ${step}`);
      }
    }
  }
  return lines.join('\n');
}
