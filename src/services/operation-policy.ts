import { toError } from '../errors';

export type ProvisioningOperation =
  | 'acquireToken'
  | 'resolveUser'
  | 'resolveRole'
  | 'resolveTeam'
  | 'resolveBusinessUnit'
  | 'updateBusinessUnit'
  | 'removeAllRoles'
  | 'assignRole'
  | 'addToTeam'
  | 'removeRole'
  | 'removeFromTeam';

export type FailureSeverity = 'fatal' | 'recoverable';

/**
 * Fatal failures end the provisioning phase (the test run still goes ahead);
 * recoverable ones are logged and the phase carries on.
 */
export const FAILURE_POLICY: Readonly<Record<ProvisioningOperation, FailureSeverity>> = {
  acquireToken: 'fatal',
  resolveUser: 'fatal',
  resolveRole: 'fatal',
  resolveTeam: 'fatal',
  resolveBusinessUnit: 'fatal',
  updateBusinessUnit: 'fatal',
  removeAllRoles: 'recoverable',
  assignRole: 'fatal',
  addToTeam: 'fatal',
  removeRole: 'recoverable',
  removeFromTeam: 'recoverable',
};

export type OperationResult<T> =
  | { ok: true; operation: ProvisioningOperation; value: T }
  | { ok: false; operation: ProvisioningOperation; severity: FailureSeverity; error: Error };

export async function runOperation<T>(
  operation: ProvisioningOperation,
  action: () => Promise<T>
): Promise<OperationResult<T>> {
  try {
    return { ok: true, operation, value: await action() };
  } catch (error) {
    return { ok: false, operation, severity: FAILURE_POLICY[operation], error: toError(error) };
  }
}
