// Tests for the privilege scale

import { describe, it, expect } from 'vitest';
import {
  PrivilegeLevel,
  GRANTABLE_PRIVILEGES,
  privilegeName,
  isPrivilegeLevel,
  isGrantablePrivilege,
  isAtLeast,
  isStrongerThan,
  isWeakerThan,
  strongest,
  weakest,
} from './privileges.js';

describe('PrivilegeLevel', () => {
  it('orders owner before change before view before none', () => {
    expect(PrivilegeLevel.OWNER).toBeLessThan(PrivilegeLevel.CHANGE);
    expect(PrivilegeLevel.CHANGE).toBeLessThan(PrivilegeLevel.VIEW);
    expect(PrivilegeLevel.VIEW).toBeLessThan(PrivilegeLevel.NONE);
  });

  it('excludes none from grantable levels', () => {
    expect(GRANTABLE_PRIVILEGES).toEqual([1, 2, 3]);
  });

  it('names each level', () => {
    expect(privilegeName(PrivilegeLevel.OWNER)).toBe('owner');
    expect(privilegeName(PrivilegeLevel.CHANGE)).toBe('change');
    expect(privilegeName(PrivilegeLevel.VIEW)).toBe('view');
    expect(privilegeName(PrivilegeLevel.NONE)).toBe('none');
  });
});

describe('type guards', () => {
  it('accepts only the four levels', () => {
    expect(isPrivilegeLevel(4)).toBe(true);
    expect(isPrivilegeLevel(0)).toBe(false);
    expect(isPrivilegeLevel('1')).toBe(false);
  });

  it('rejects none as grantable', () => {
    expect(isGrantablePrivilege(3)).toBe(true);
    expect(isGrantablePrivilege(4)).toBe(false);
  });
});

describe('comparisons', () => {
  it('treats lower values as stronger', () => {
    expect(isAtLeast(PrivilegeLevel.OWNER, PrivilegeLevel.VIEW)).toBe(true);
    expect(isAtLeast(PrivilegeLevel.VIEW, PrivilegeLevel.VIEW)).toBe(true);
    expect(isAtLeast(PrivilegeLevel.NONE, PrivilegeLevel.VIEW)).toBe(false);
    expect(isStrongerThan(PrivilegeLevel.CHANGE, PrivilegeLevel.VIEW)).toBe(true);
    expect(isStrongerThan(PrivilegeLevel.VIEW, PrivilegeLevel.VIEW)).toBe(false);
    expect(isWeakerThan(PrivilegeLevel.VIEW, PrivilegeLevel.CHANGE)).toBe(true);
  });

  it('picks the strongest level, defaulting to none', () => {
    expect(strongest([3, 2, 3])).toBe(PrivilegeLevel.CHANGE);
    expect(strongest([])).toBe(PrivilegeLevel.NONE);
  });

  it('picks the weakest of two levels', () => {
    expect(weakest(PrivilegeLevel.OWNER, PrivilegeLevel.VIEW)).toBe(PrivilegeLevel.VIEW);
    expect(weakest(PrivilegeLevel.NONE, PrivilegeLevel.VIEW)).toBe(PrivilegeLevel.NONE);
  });
});
