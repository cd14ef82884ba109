// Properties that hold across the checker and the gateway together

import { describe, it, expect } from 'vitest';
import { PrivilegeLevel, isAtLeast, type User } from '@custody/protocol';
import { AuthorizationError } from '../errors.js';
import { createTestWorld, type TestWorld } from '../testing/world.js';

const { OWNER, CHANGE, VIEW, NONE } = PrivilegeLevel;

const NAMES = ['alice', 'bob', 'carol', 'dave', 'root'] as const;
const LEVELS = [OWNER, CHANGE, VIEW] as const;

type Name = (typeof NAMES)[number];

/**
 * alice owns r1 and g1; carol holds r1 at CHANGE; bob holds r1 at VIEW from
 * both alice and carol and is a VIEW member of g1, which holds r1 at VIEW;
 * dave is inactive; root is a superuser.
 */
async function seed(): Promise<{ world: TestWorld; users: Record<Name, User> }> {
  const world = createTestWorld();
  const users: Record<Name, User> = {
    alice: await world.user('alice'),
    bob: await world.user('bob'),
    carol: await world.user('carol'),
    dave: await world.user('dave', { isActive: false }),
    root: await world.user('root', { isSuperuser: true }),
  };
  const { alice, carol } = users;

  await world.gateway.createGroup(alice, { id: 'g1', name: 'Hydrology' });
  await world.gateway.createResource(alice, { id: 'r1', title: 'Survey' });
  await world.gateway.shareResourceWithUser(alice, 'r1', 'carol', CHANGE);
  await world.gateway.shareResourceWithUser(alice, 'r1', 'bob', VIEW);
  await world.gateway.shareResourceWithUser(carol, 'r1', 'bob', VIEW);
  await world.gateway.shareGroupWithUser(alice, 'g1', 'bob', VIEW);
  await world.gateway.shareResourceWithGroup(alice, 'r1', 'g1', VIEW);

  return { world, users };
}

/** Whether the action completed; false when it was refused */
async function completes(action: () => Promise<unknown>): Promise<boolean> {
  try {
    await action();
    return true;
  } catch (error) {
    if (error instanceof AuthorizationError) return false;
    throw error;
  }
}

describe('predicate and action agree', () => {
  it('for sharing a resource with a user', async () => {
    for (const p of NAMES) {
      for (const s of NAMES) {
        for (const level of LEVELS) {
          const { world, users } = await seed();
          const predicted = await world.checker.canShareResourceWithUser(users[p], 'r1', s, level);
          const actual = await completes(() =>
            world.gateway.shareResourceWithUser(users[p], 'r1', s, level)
          );
          expect(actual, `${p} shares r1 with ${s} at ${level}`).toBe(predicted);
        }
      }
    }
  });

  it('for sharing a group with a user', async () => {
    for (const p of NAMES) {
      for (const s of NAMES) {
        for (const level of LEVELS) {
          const { world, users } = await seed();
          const predicted = await world.checker.canShareGroupWithUser(users[p], 'g1', s, level);
          const actual = await completes(() =>
            world.gateway.shareGroupWithUser(users[p], 'g1', s, level)
          );
          expect(actual, `${p} shares g1 with ${s} at ${level}`).toBe(predicted);
        }
      }
    }
  });

  it('for sharing a resource with a group', async () => {
    for (const p of NAMES) {
      for (const level of [CHANGE, VIEW]) {
        const { world, users } = await seed();
        const predicted = await world.checker.canShareResourceWithGroup(users[p], 'r1', 'g1', level);
        const actual = await completes(() =>
          world.gateway.shareResourceWithGroup(users[p], 'r1', 'g1', level)
        );
        expect(actual, `${p} shares r1 with g1 at ${level}`).toBe(predicted);
      }
    }
  });

  it('for unsharing and undoing', async () => {
    for (const p of NAMES) {
      for (const s of NAMES) {
        const cases = [
          {
            label: 'unshare r1',
            predicate: (w: TestWorld, u: User) => w.checker.canUnshareResourceWithUser(u, 'r1', s),
            action: (w: TestWorld, u: User) => w.gateway.unshareResourceWithUser(u, 'r1', s),
          },
          {
            label: 'undo r1',
            predicate: (w: TestWorld, u: User) => w.checker.canUndoShareResourceWithUser(u, 'r1', s),
            action: (w: TestWorld, u: User) => w.gateway.undoShareResourceWithUser(u, 'r1', s),
          },
          {
            label: 'undo r1 as alice',
            predicate: (w: TestWorld, u: User) =>
              w.checker.canUndoShareResourceWithUserAs(u, 'r1', s, 'alice'),
            action: (w: TestWorld, u: User) =>
              w.gateway.undoShareResourceWithUserAs(u, 'r1', s, 'alice'),
          },
          {
            label: 'unshare g1',
            predicate: (w: TestWorld, u: User) => w.checker.canUnshareGroupWithUser(u, 'g1', s),
            action: (w: TestWorld, u: User) => w.gateway.unshareGroupWithUser(u, 'g1', s),
          },
          {
            label: 'undo g1',
            predicate: (w: TestWorld, u: User) => w.checker.canUndoShareGroupWithUser(u, 'g1', s),
            action: (w: TestWorld, u: User) => w.gateway.undoShareGroupWithUser(u, 'g1', s),
          },
        ];

        for (const { label, predicate, action } of cases) {
          const { world, users } = await seed();
          const predicted = await predicate(world, users[p]);
          const actual = await completes(() => action(world, users[p]));
          expect(actual, `${p}: ${label} for ${s}`).toBe(predicted);
        }
      }
    }
  });

  it('for group grants, flags and deletion', async () => {
    for (const p of NAMES) {
      const cases = [
        {
          label: 'unshare r1 from g1',
          predicate: (w: TestWorld, u: User) => w.checker.canUnshareResourceWithGroup(u, 'r1', 'g1'),
          action: (w: TestWorld, u: User) => w.gateway.unshareResourceWithGroup(u, 'r1', 'g1'),
        },
        {
          label: 'undo r1 to g1',
          predicate: (w: TestWorld, u: User) => w.checker.canUndoShareResourceWithGroup(u, 'r1', 'g1'),
          action: (w: TestWorld, u: User) => w.gateway.undoShareResourceWithGroup(u, 'r1', 'g1'),
        },
        {
          label: 'set r1 flags',
          predicate: (w: TestWorld, u: User) => w.checker.canChangeResourceFlags(u, 'r1'),
          action: (w: TestWorld, u: User) => w.gateway.setResourceFlags(u, 'r1', { public: true }),
        },
        {
          label: 'set g1 flags',
          predicate: (w: TestWorld, u: User) => w.checker.canChangeGroupFlags(u, 'g1'),
          action: (w: TestWorld, u: User) => w.gateway.setGroupFlags(u, 'g1', { public: false }),
        },
        {
          label: 'delete r1',
          predicate: (w: TestWorld, u: User) => w.checker.canDeleteResource(u, 'r1'),
          action: (w: TestWorld, u: User) => w.gateway.deleteResource(u, 'r1'),
        },
        {
          label: 'delete g1',
          predicate: (w: TestWorld, u: User) => w.checker.canDeleteGroup(u, 'g1'),
          action: (w: TestWorld, u: User) => w.gateway.deleteGroup(u, 'g1'),
        },
        {
          label: 'create a resource',
          predicate: (w: TestWorld, u: User) => w.checker.canCreateResource(u),
          action: (w: TestWorld, u: User) => w.gateway.createResource(u, { title: 'Notes' }),
        },
      ];

      for (const { label, predicate, action } of cases) {
        const { world, users } = await seed();
        const predicted = await predicate(world, users[p]);
        const actual = await completes(() => action(world, users[p]));
        expect(actual, `${p}: ${label}`).toBe(predicted);
      }
    }
  });
});

describe('owner floor', () => {
  it('refuses every removal or demotion of the only OWNER record', async () => {
    const { world, users } = await seed();
    const { alice, root } = users;

    const attempts = [
      () => world.gateway.unshareResourceWithUser(alice, 'r1', 'alice'),
      () => world.gateway.unshareResourceWithUser(root, 'r1', 'alice'),
      () => world.gateway.undoShareResourceWithUser(alice, 'r1', 'alice'),
      () => world.gateway.undoShareResourceWithUserAs(root, 'r1', 'alice', 'alice'),
      () => world.gateway.shareResourceWithUser(alice, 'r1', 'alice', CHANGE),
      () => world.gateway.unshareGroupWithUser(alice, 'g1', 'alice'),
    ];

    for (const attempt of attempts) {
      await expect(attempt()).rejects.toMatchObject({ reason: 'sole_owner' });
    }
    expect(await world.checker.ownsResource(alice, 'r1')).toBe(true);
    expect(await world.checker.ownsGroup(alice, 'g1')).toBe(true);
  });
});

describe('owner override', () => {
  it('leaves no grant weaker than the owner’s share', async () => {
    const { world, users } = await seed();
    await world.gateway.shareResourceWithUser(users.bob, 'r1', 'bob', VIEW);

    await world.gateway.shareResourceWithUser(users.alice, 'r1', 'bob', CHANGE);

    const remaining = await world.repos.userResourceGrants.query({ subjectId: 'bob', objectId: 'r1' });
    expect(remaining.map((g) => [g.grantorId, g.privilege])).toEqual([['alice', CHANGE]]);
    expect(remaining.every((g) => isAtLeast(g.privilege, CHANGE))).toBe(true);
  });
});

describe('effective privilege bounds', () => {
  it('is VIEW when immutable and public, and combined when neither', async () => {
    const { world, users } = await seed();
    const holders = [users.alice, users.carol, users.bob, users.dave];

    const combined = await Promise.all(holders.map((u) => world.checker.combinedPrivilege(u, 'r1')));
    expect(combined).toEqual([OWNER, CHANGE, VIEW, NONE]);

    const plain = await Promise.all(holders.map((u) => world.checker.effectivePrivilege(u, 'r1')));
    expect(plain).toEqual(combined);

    await world.gateway.setResourceFlags(users.root, 'r1', { immutable: true, public: true });
    const bounded = await Promise.all(holders.map((u) => world.checker.effectivePrivilege(u, 'r1')));
    expect(bounded).toEqual([VIEW, VIEW, VIEW, VIEW]);
  });
});

describe('undo', () => {
  it('succeeds once, then has nothing to undo', async () => {
    const { world, users } = await seed();

    await world.gateway.undoShareResourceWithUser(users.carol, 'r1', 'bob');
    await expect(
      world.gateway.undoShareResourceWithUser(users.carol, 'r1', 'bob')
    ).rejects.toMatchObject({ reason: 'nothing_to_undo' });
  });
});

describe('scenarios', () => {
  it('a new owner shares at VIEW', async () => {
    const world = createTestWorld();
    const u1 = await world.user('u1');
    const u2 = await world.user('u2');

    const resource = await world.gateway.createResource(u1, { title: 'Survey' });
    expect(await world.checker.canShareResource(u1, resource.id, VIEW)).toBe(true);

    await world.gateway.shareResourceWithUser(u1, resource.id, u2.id, VIEW);
    expect(await world.checker.combinedPrivilege(u2, resource.id)).toBe(VIEW);
  });

  it('an owner leaves once a second owner exists', async () => {
    const world = createTestWorld();
    const u1 = await world.user('u1');
    await world.user('u2');
    const resource = await world.gateway.createResource(u1, { title: 'Survey' });

    await world.gateway.shareResourceWithUser(u1, resource.id, 'u2', OWNER);
    await world.gateway.unshareResourceWithUser(u1, resource.id, 'u1');

    expect(await world.checker.combinedPrivilege(u1, resource.id)).toBe(NONE);
  });

  it('the sole owner cannot leave', async () => {
    const world = createTestWorld();
    const u1 = await world.user('u1');
    const resource = await world.gateway.createResource(u1, { title: 'Survey' });

    const attempt = world.gateway.unshareResourceWithUser(u1, resource.id, 'u1');
    await expect(attempt).rejects.toBeInstanceOf(AuthorizationError);
    await expect(attempt).rejects.toThrow('sole owner');
  });

  it('a member shares a group only while it is shareable', async () => {
    const world = createTestWorld();
    const u1 = await world.user('u1');
    const u2 = await world.user('u2');
    await world.user('u3');
    const group = await world.gateway.createGroup(u1, { name: 'Hydrology' });
    await world.gateway.shareGroupWithUser(u1, group.id, 'u2', VIEW);

    await world.gateway.shareGroupWithUser(u2, group.id, 'u3', VIEW);

    await world.gateway.setGroupFlags(u1, group.id, { shareable: false });
    await expect(
      world.gateway.shareGroupWithUser(u2, group.id, 'u3', VIEW)
    ).rejects.toBeInstanceOf(AuthorizationError);
  });

  it('a public resource is viewable but not changeable by strangers', async () => {
    const world = createTestWorld();
    const u1 = await world.user('u1');
    const u4 = await world.user('u4');
    const resource = await world.gateway.createResource(u1, {
      title: 'Survey',
      flags: { public: true },
    });

    expect(await world.checker.effectivePrivilege(u4, resource.id)).toBe(VIEW);
    expect(await world.checker.canViewResource(u4, resource.id)).toBe(true);
    expect(await world.checker.canChangeResource(u4, resource.id)).toBe(false);
  });
});
