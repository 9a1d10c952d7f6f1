/**
 * In-memory directory.
 *
 * Development and test strategy for the Directory capability. It answers
 * like a strict directory service does: adding an existing member is a
 * CONFLICT and removing an absent one is NOT_FOUND, so idempotence has to be
 * provided by the callers.
 */

import { v4 as uuid } from 'uuid';
import { GroupFilter, GroupRecord } from '../domain/group';
import { Principal, PrincipalFilter, PrincipalStatus } from '../domain/principal';
import { Directory, DirectoryError } from './directory';

export interface MemoryDirectoryOptions {
  principals?: Principal[];
  groups?: GroupRecord[];
  /** Pending privileged elevation request ids. */
  elevationRequests?: string[];
  /** When false, conditional-access calls fail with UNSUPPORTED. Default: true. */
  supportsConditionalAccess?: boolean;
}

export interface ConditionalAccessBlock {
  principalId: string;
  policyId: string;
  reason: string;
  templateId?: string;
}

export type ElevationRequestStatus = 'pending' | 'approved' | 'rejected';

/** One recorded directory call, in call order. */
export interface DirectoryCall {
  operation: keyof Directory;
  args: unknown[];
}

export class MemoryDirectory implements Directory {
  private principals = new Map<string, Principal>();
  private groups = new Map<string, GroupRecord>();
  private blocks = new Map<string, ConditionalAccessBlock>();
  private elevationRequests = new Map<string, ElevationRequestStatus>();
  private supportsConditionalAccess: boolean;
  /** Log of mutating calls, for assertions in tests. */
  readonly calls: DirectoryCall[] = [];

  constructor(options: MemoryDirectoryOptions = {}) {
    for (const principal of options.principals ?? []) {
      this.principals.set(principal.id, structuredClone(principal));
    }
    for (const group of options.groups ?? []) {
      this.groups.set(group.id, structuredClone(group));
    }
    for (const requestId of options.elevationRequests ?? []) {
      this.elevationRequests.set(requestId, 'pending');
    }
    this.supportsConditionalAccess = options.supportsConditionalAccess ?? true;
  }

  async getPrincipal(principalId: string): Promise<Principal | null> {
    const principal = this.principals.get(principalId);
    return principal ? structuredClone(principal) : null;
  }

  async listPrincipals(filter?: PrincipalFilter): Promise<Principal[]> {
    let items = [...this.principals.values()];
    if (filter?.status) items = items.filter((p) => p.status === filter.status);
    if (filter?.department) items = items.filter((p) => p.department === filter.department);
    return items.map((p) => structuredClone(p));
  }

  async disablePrincipal(principalId: string, reason: string): Promise<string> {
    this.calls.push({ operation: 'disablePrincipal', args: [principalId, reason] });
    const principal = this.requirePrincipal(principalId);
    principal.status = PrincipalStatus.Disabled;
    return `Principal ${principalId} disabled. Reason: ${reason}`;
  }

  async enablePrincipal(principalId: string): Promise<string> {
    this.calls.push({ operation: 'enablePrincipal', args: [principalId] });
    const principal = this.requirePrincipal(principalId);
    principal.status = PrincipalStatus.Active;
    return `Principal ${principalId} re-enabled.`;
  }

  async conditionalAccessBlock(principalId: string, reason: string, policyTemplateId?: string): Promise<string> {
    this.calls.push({ operation: 'conditionalAccessBlock', args: [principalId, reason, policyTemplateId] });
    if (!this.supportsConditionalAccess) {
      throw new DirectoryError('UNSUPPORTED', 'Conditional access is not available for this directory');
    }
    this.requirePrincipal(principalId);
    const policyId = `ca-block-${principalId}`;
    this.blocks.set(principalId, { principalId, policyId, reason, templateId: policyTemplateId });
    return `Conditional access block applied. Policy ID: ${policyId}`;
  }

  async removeConditionalAccessBlock(principalId: string): Promise<string> {
    this.calls.push({ operation: 'removeConditionalAccessBlock', args: [principalId] });
    if (!this.supportsConditionalAccess) {
      throw new DirectoryError('UNSUPPORTED', 'Conditional access is not available for this directory');
    }
    const removed = this.blocks.delete(principalId) ? 1 : 0;
    return `Conditional access block removed for ${principalId}. Policies deleted: ${removed}`;
  }

  async listGroups(filter?: GroupFilter): Promise<GroupRecord[]> {
    let items = [...this.groups.values()];
    if (filter?.displayName !== undefined) items = items.filter((g) => g.displayName === filter.displayName);
    if (filter?.memberId !== undefined) {
      const memberId = filter.memberId;
      items = items.filter((g) => g.members.includes(memberId));
    }
    return items.map((g) => structuredClone(g));
  }

  async createGroup(displayName: string): Promise<GroupRecord> {
    this.calls.push({ operation: 'createGroup', args: [displayName] });
    for (const group of this.groups.values()) {
      if (group.displayName === displayName) {
        throw new DirectoryError('CONFLICT', `A group named "${displayName}" already exists`);
      }
    }
    const group: GroupRecord = { id: `grp_${uuid()}`, displayName, members: [] };
    this.groups.set(group.id, group);
    return structuredClone(group);
  }

  async addGroupMembers(groupId: string, principalIds: string[]): Promise<void> {
    this.calls.push({ operation: 'addGroupMembers', args: [groupId, [...principalIds]] });
    const group = this.requireGroup(groupId);
    const existing = principalIds.filter((id) => group.members.includes(id));
    if (existing.length > 0) {
      throw new DirectoryError('CONFLICT', `Already members of ${groupId}: ${existing.join(', ')}`);
    }
    group.members.push(...principalIds);
  }

  async removeGroupMembers(groupId: string, principalIds: string[]): Promise<void> {
    this.calls.push({ operation: 'removeGroupMembers', args: [groupId, [...principalIds]] });
    const group = this.requireGroup(groupId);
    const absent = principalIds.filter((id) => !group.members.includes(id));
    if (absent.length > 0) {
      throw new DirectoryError('NOT_FOUND', `Not members of ${groupId}: ${absent.join(', ')}`);
    }
    group.members = group.members.filter((id) => !principalIds.includes(id));
  }

  async approveElevationRequest(requestId: string): Promise<string> {
    this.calls.push({ operation: 'approveElevationRequest', args: [requestId] });
    this.decideElevation(requestId, 'approved');
    return `Elevation request ${requestId} approved`;
  }

  async rejectElevationRequest(requestId: string, justification: string): Promise<string> {
    this.calls.push({ operation: 'rejectElevationRequest', args: [requestId, justification] });
    this.decideElevation(requestId, 'rejected');
    return `Elevation request ${requestId} rejected`;
  }

  // --- Inspection helpers for development and tests ---

  getBlock(principalId: string): ConditionalAccessBlock | undefined {
    return this.blocks.get(principalId);
  }

  getElevationStatus(requestId: string): ElevationRequestStatus | undefined {
    return this.elevationRequests.get(requestId);
  }

  callCount(operation: keyof Directory): number {
    return this.calls.filter((c) => c.operation === operation).length;
  }

  private requirePrincipal(principalId: string): Principal {
    const principal = this.principals.get(principalId);
    if (!principal) throw new DirectoryError('NOT_FOUND', `Principal not found: ${principalId}`);
    return principal;
  }

  private requireGroup(groupId: string): GroupRecord {
    const group = this.groups.get(groupId);
    if (!group) throw new DirectoryError('GROUP_NOT_FOUND', `Group not found: ${groupId}`);
    return group;
  }

  private decideElevation(requestId: string, status: ElevationRequestStatus): void {
    const current = this.elevationRequests.get(requestId);
    if (current === undefined) {
      throw new DirectoryError('NOT_FOUND', `Elevation request not found: ${requestId}`);
    }
    if (current !== 'pending') {
      throw new DirectoryError('CONFLICT', `Elevation request ${requestId} already ${current}`);
    }
    this.elevationRequests.set(requestId, status);
  }
}
