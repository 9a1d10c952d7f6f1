/**
 * Directory capability.
 *
 * The single seam through which the engine and the group reconciler mutate
 * identities and groups. Implementations throw `DirectoryError` on failure;
 * callers convert those into typed results where the call is made.
 *
 * The strategy (in-memory, or a client for a real directory service) is
 * chosen once by the composition root and injected everywhere.
 */

import { GroupFilter, GroupRecord } from '../domain/group';
import { Principal, PrincipalFilter } from '../domain/principal';

/**
 * `NOT_FOUND` covers principals, elevation requests and absent members;
 * `GROUP_NOT_FOUND` is reserved for a group id the directory does not know.
 */
export type DirectoryErrorCode = 'NOT_FOUND' | 'GROUP_NOT_FOUND' | 'CONFLICT' | 'UNSUPPORTED' | 'TRANSPORT';

export class DirectoryError extends Error {
  constructor(
    public readonly code: DirectoryErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'DirectoryError';
  }
}

export function isDirectoryError(err: unknown, code?: DirectoryErrorCode): err is DirectoryError {
  return err instanceof DirectoryError && (code === undefined || err.code === code);
}

export interface Directory {
  getPrincipal(principalId: string): Promise<Principal | null>;
  listPrincipals(filter?: PrincipalFilter): Promise<Principal[]>;

  /** Disable sign-in for the principal. Returns a human-readable confirmation. */
  disablePrincipal(principalId: string, reason: string): Promise<string>;
  /** Re-enable a principal previously disabled. */
  enablePrincipal(principalId: string): Promise<string>;
  /**
   * Apply a conditional-access policy denying authentication to the principal.
   * `policyTemplateId` selects the policy shape when the directory supports several.
   */
  conditionalAccessBlock(principalId: string, reason: string, policyTemplateId?: string): Promise<string>;
  removeConditionalAccessBlock(principalId: string): Promise<string>;

  listGroups(filter?: GroupFilter): Promise<GroupRecord[]>;
  /** Create a group. Throws CONFLICT when the display name is already taken. */
  createGroup(displayName: string): Promise<GroupRecord>;
  /** Throws CONFLICT when any of the principals is already a member, GROUP_NOT_FOUND for an unknown group. */
  addGroupMembers(groupId: string, principalIds: string[]): Promise<void>;
  /** Throws NOT_FOUND when any of the principals is not a member, GROUP_NOT_FOUND for an unknown group. */
  removeGroupMembers(groupId: string, principalIds: string[]): Promise<void>;

  approveElevationRequest(requestId: string): Promise<string>;
  rejectElevationRequest(requestId: string, justification: string): Promise<string>;
}
