import { AuditService } from '../../src/audit/audit-service';
import { MemoryDirectory } from '../../src/directory/memory-directory';
import { LifecycleEventType } from '../../src/domain/group';
import { LifecycleSync, parseLifecycleEvent } from '../../src/groups/lifecycle-sync';
import { GroupReconciler } from '../../src/groups/reconciler';
import { createMemoryStore } from '../../src/storage/memory-store';

const ROLE_TO_GROUP = {
  analyst: 'Analysts',
  engineer: 'Engineers',
  'pii-warehouse': 'PII Readers',
};

function setup(directory = new MemoryDirectory(), roleToGroup: Record<string, string> = ROLE_TO_GROUP) {
  const reconciler = new GroupReconciler(directory, new AuditService(createMemoryStore()));
  return { directory, sync: new LifecycleSync(reconciler, roleToGroup) };
}

async function membersOf(directory: MemoryDirectory, displayName: string): Promise<string[] | undefined> {
  const [group] = await directory.listGroups({ displayName });
  return group?.members;
}

describe('parseLifecycleEvent', () => {
  test('accepts a joiner event', () => {
    expect(parseLifecycleEvent({ type: 'joiner', principalId: 'u1', role: 'analyst' })).toEqual({
      success: true,
      value: { type: LifecycleEventType.Joiner, principalId: 'u1', role: 'analyst' },
    });
  });

  test.each([
    ['a non-object', 'joiner', 'Lifecycle event must be a JSON object'],
    ['an unknown type', { type: 'promotion', principalId: 'u1' }, '"type" must be one of: joiner, mover, leaver, access_granted'],
    ['a missing principal', { type: 'leaver' }, '"principalId" is required'],
    ['a blank principal', { type: 'leaver', principalId: '  ' }, '"principalId" is required'],
    ['a joiner without a role', { type: 'joiner', principalId: 'u1' }, '"role" is required for joiner events'],
    ['a mover without a role', { type: 'mover', principalId: 'u1' }, '"role" is required for mover events'],
    ['a numeric previous role', { type: 'mover', principalId: 'u1', role: 'a', previousRole: 7 }, '"previousRole" must be a string'],
    ['a grant without a resource', { type: 'access_granted', principalId: 'u1' }, '"resourceId" is required for access_granted events'],
  ])('rejects %s', (_name, body, message) => {
    const result = parseLifecycleEvent(body);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('VALIDATION.LIFECYCLE_EVENT');
    expect(result.error.message).toBe(message);
  });
});

describe('LifecycleSync', () => {
  test('a joiner is added to the group mapped for the role', async () => {
    const { directory, sync } = setup();

    const result = await sync.handle({ type: LifecycleEventType.Joiner, principalId: 'u1', role: 'analyst' });

    expect(result.steps).toHaveLength(1);
    expect(result.steps[0]).toMatchObject({ status: 'member_added', displayName: 'Analysts' });
    expect(result.steps[0].detail).toBeUndefined();
    expect(await membersOf(directory, 'Analysts')).toEqual(['u1']);
  });

  test('a repeated joiner event is already satisfied', async () => {
    const { directory, sync } = setup();
    const event = { type: LifecycleEventType.Joiner, principalId: 'u1', role: 'analyst' } as const;

    await sync.handle(event);
    const again = await sync.handle(event);

    expect(again.steps[0]).toMatchObject({ status: 'member_added', detail: 'Already a member' });
    expect(await membersOf(directory, 'Analysts')).toEqual(['u1']);
    expect(directory.callCount('createGroup')).toBe(1);
  });

  test('an unmapped role is skipped', async () => {
    const { directory, sync } = setup();

    const result = await sync.handle({ type: LifecycleEventType.Joiner, principalId: 'u1', role: 'intern' });

    expect(result.steps).toEqual([{ status: 'skipped', detail: 'No group mapped for "intern"' }]);
    expect(directory.calls).toEqual([]);
  });

  test('inherited object keys are not treated as mapped roles', async () => {
    const { sync } = setup();

    const result = await sync.handle({ type: LifecycleEventType.Joiner, principalId: 'u1', role: 'constructor' });

    expect(result.steps[0].status).toBe('skipped');
  });

  test('a mover joins the new group and leaves the old one', async () => {
    const { directory, sync } = setup();
    await sync.handle({ type: LifecycleEventType.Joiner, principalId: 'u1', role: 'analyst' });

    const result = await sync.handle({
      type: LifecycleEventType.Mover,
      principalId: 'u1',
      role: 'engineer',
      previousRole: 'analyst',
    });

    expect(result.steps.map((s) => [s.status, s.displayName])).toEqual([
      ['member_added', 'Engineers'],
      ['member_removed', 'Analysts'],
    ]);
    expect(await membersOf(directory, 'Engineers')).toEqual(['u1']);
    expect(await membersOf(directory, 'Analysts')).toEqual([]);
  });

  test('a mover between roles sharing a group stays a member', async () => {
    const { directory, sync } = setup(new MemoryDirectory(), { dev: 'Engineering', senior_dev: 'Engineering' });
    await sync.handle({ type: LifecycleEventType.Joiner, principalId: 'u1', role: 'dev' });

    const result = await sync.handle({
      type: LifecycleEventType.Mover,
      principalId: 'u1',
      role: 'senior_dev',
      previousRole: 'dev',
    });

    expect(result.steps.map((s) => s.status)).toEqual(['member_added', 'skipped']);
    expect(result.steps[1].detail).toBe('"dev" and "senior_dev" share a group');
    expect(await membersOf(directory, 'Engineering')).toEqual(['u1']);
    expect(directory.callCount('removeGroupMembers')).toBe(0);
  });

  test('a mover whose previous group does not exist leaves nothing behind', async () => {
    const { directory, sync } = setup();

    const result = await sync.handle({
      type: LifecycleEventType.Mover,
      principalId: 'u1',
      role: 'engineer',
      previousRole: 'analyst',
    });

    expect(result.steps[1]).toEqual({ status: 'skipped', displayName: 'Analysts', detail: 'Group does not exist' });
    expect(directory.callCount('createGroup')).toBe(1);
  });

  test('a leaver is purged from every group', async () => {
    const { directory, sync } = setup();
    await sync.handle({ type: LifecycleEventType.Joiner, principalId: 'u1', role: 'analyst' });
    await sync.handle({ type: LifecycleEventType.Joiner, principalId: 'u1', role: 'engineer' });

    const result = await sync.handle({ type: LifecycleEventType.Leaver, principalId: 'u1' });

    expect(result.steps).toEqual([{ status: 'purged', detail: 'Removed from 2 groups' }]);
    expect(result.purge?.removedCount).toBe(2);
    expect(await directory.listGroups({ memberId: 'u1' })).toEqual([]);
  });

  test('an access grant joins the group mapped for the resource', async () => {
    const { directory, sync } = setup();

    const result = await sync.handle({
      type: LifecycleEventType.AccessGranted,
      principalId: 'u2',
      resourceId: 'pii-warehouse',
    });

    expect(result.steps[0]).toMatchObject({ status: 'member_added', displayName: 'PII Readers' });
    expect(await membersOf(directory, 'PII Readers')).toEqual(['u2']);
  });
});
