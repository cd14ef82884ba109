import { describe, it, expect, beforeEach } from 'vitest';
import { PrivilegeLevel, type User } from '@custody/protocol';
import { createTestWorld, type TestWorld } from '../testing/world.js';

const { OWNER, CHANGE, VIEW } = PrivilegeLevel;

const ids = (items: readonly { id: string }[]) => items.map((i) => i.id);

describe('Holdings', () => {
  let world: TestWorld;
  let alice: User;
  let root: User;

  beforeEach(async () => {
    world = createTestWorld();
    alice = await world.user('alice');
    await world.user('bob');
    await world.user('carol');
    root = await world.user('root', { isSuperuser: true });

    await world.gateway.createGroup(alice, { id: 'g1', name: 'Hydrology' });
    await world.gateway.createResource(alice, { id: 'r1', title: 'Survey' });
    await world.gateway.createResource(alice, { id: 'r2', title: 'Gauges' });

    await world.gateway.shareGroupWithUser(alice, 'g1', 'bob', CHANGE);
    await world.gateway.shareResourceWithGroup(alice, 'r1', 'g1', VIEW);
    await world.gateway.shareResourceWithUser(alice, 'r1', 'carol', CHANGE);
    await world.gateway.shareResourceWithUser(alice, 'r2', 'bob', VIEW);
  });

  describe('a user', () => {
    it('lists held, owned and editable groups', async () => {
      expect(ids(await world.holdings.heldGroups('bob'))).toEqual(['g1']);
      expect(ids(await world.holdings.ownedGroups('bob'))).toEqual([]);
      expect(ids(await world.holdings.ownedGroups('alice'))).toEqual(['g1']);
      expect(ids(await world.holdings.editableGroups('bob'))).toEqual(['g1']);
    });

    it('drops inactive groups from the editable list', async () => {
      await world.gateway.setGroupFlags(alice, 'g1', { active: false });

      expect(ids(await world.holdings.editableGroups('bob'))).toEqual([]);
      expect(ids(await world.holdings.heldGroups('bob'))).toEqual(['g1']);
    });

    it('combines direct and group-mediated resource privileges', async () => {
      const privileges = await world.holdings.resourcePrivileges('bob');

      expect(privileges.get('r1')).toBe(VIEW);
      expect(privileges.get('r2')).toBe(VIEW);
      expect(ids(await world.holdings.heldResources('bob'))).toEqual(['r2', 'r1']);
    });

    it('excludes immutable resources from the editable list', async () => {
      expect(ids(await world.holdings.editableResources('carol'))).toEqual(['r1']);

      await world.gateway.setResourceFlags(alice, 'r1', { immutable: true });
      expect(ids(await world.holdings.editableResources('carol'))).toEqual([]);
    });

    it('lists resources by exact direct privilege', async () => {
      expect(ids(await world.holdings.resourcesWithExplicitAccess('carol', CHANGE))).toEqual(['r1']);
      expect(ids(await world.holdings.resourcesWithExplicitAccess('carol', VIEW))).toEqual([]);
      expect(ids(await world.holdings.ownedResources('alice'))).toEqual(['r1', 'r2']);
    });
  });

  describe('a group', () => {
    it('derives members and owners from grants', async () => {
      expect(ids(await world.holdings.groupMembers('g1'))).toEqual(['alice', 'bob']);
      expect(ids(await world.holdings.groupOwners('g1'))).toEqual(['alice']);
      expect(await world.holdings.groupMemberCount('g1')).toBe(2);
      expect(await world.holdings.groupUserPrivilege('g1', 'bob')).toBe(CHANGE);
    });

    it('counts owners by user and by record', async () => {
      await world.gateway.shareGroupWithUser(root, 'g1', 'alice', OWNER);

      expect(await world.holdings.groupOwnerCount('g1')).toBe(1);
      expect(await world.holdings.groupOwnerRecordCount('g1')).toBe(2);

      await world.gateway.shareGroupWithUser(alice, 'g1', 'bob', OWNER);
      expect(await world.holdings.groupOwnerCount('g1')).toBe(2);
      expect(await world.holdings.groupOwnerRecordCount('g1')).toBe(3);
    });

    it('lists the resources it holds', async () => {
      expect(ids(await world.holdings.groupHeldResources('g1'))).toEqual(['r1']);
      expect(ids(await world.holdings.groupEditableResources('g1'))).toEqual([]);

      await world.gateway.shareResourceWithGroup(alice, 'r1', 'g1', CHANGE);
      expect(ids(await world.holdings.groupEditableResources('g1'))).toEqual(['r1']);
    });
  });

  describe('a resource', () => {
    it('lists direct users, groups and owners', async () => {
      expect(ids(await world.holdings.resourceUsers('r1'))).toEqual(['alice', 'carol']);
      expect(ids(await world.holdings.resourceGroups('r1'))).toEqual(['g1']);
      expect(ids(await world.holdings.resourceOwners('r1'))).toEqual(['alice']);
      expect(await world.holdings.resourceOwnerCount('r1')).toBe(1);
      expect(await world.holdings.resourceOwnerRecordCount('r1')).toBe(1);
    });

    it('expands holders through active groups', async () => {
      expect(ids(await world.holdings.resourceHolders('r1'))).toEqual(['alice', 'carol', 'bob']);
      expect(ids(await world.holdings.resourceHolders('r1', CHANGE))).toEqual(['alice', 'carol']);
    });

    it('leaves out inactive users and members of inactive groups', async () => {
      await world.repos.users.update('carol', { isActive: false });
      await world.gateway.setGroupFlags(alice, 'g1', { active: false });

      expect(ids(await world.holdings.resourceHolders('r1'))).toEqual(['alice']);
    });
  });
});
