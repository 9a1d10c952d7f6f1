/**
 * Principal domain model.
 *
 * A principal is a directory identity (user or service account) that risk is
 * assessed for and that mitigation actions are applied to.
 */

export enum PrincipalStatus {
  Active = 'active',
  Disabled = 'disabled',
  Terminated = 'terminated',
}

/** A single access grant held by a principal. */
export interface AccessGrant {
  resourceId: string;
  accessLevel: string;
}

export interface Principal {
  id: string;
  displayName: string;
  email?: string;
  department?: string;
  /** Principal id of the accountable manager. */
  managerId?: string;
  status: PrincipalStatus;
  roles: string[];
  accessGrants: AccessGrant[];
}

/** Filter accepted by directory principal listings. */
export interface PrincipalFilter {
  status?: PrincipalStatus;
  department?: string;
}
