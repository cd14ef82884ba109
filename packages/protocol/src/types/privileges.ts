// Privilege scale
//
// Privileges are small integers where a LOWER value is a STRONGER privilege.
// Every comparison in the system goes through the helpers below so that the
// inverted ordering is spelled out in exactly one place.

/**
 * The four privilege levels.
 *
 * NONE is a valid query result (absence of any grant) but is never stored.
 */
export const PrivilegeLevel = {
  OWNER: 1,
  CHANGE: 2,
  VIEW: 3,
  NONE: 4,
} as const;

export type PrivilegeLevel = (typeof PrivilegeLevel)[keyof typeof PrivilegeLevel];

/**
 * Levels that may appear on a stored grant record.
 */
export type GrantablePrivilege = Exclude<PrivilegeLevel, typeof PrivilegeLevel.NONE>;

export const GRANTABLE_PRIVILEGES: readonly GrantablePrivilege[] = [
  PrivilegeLevel.OWNER,
  PrivilegeLevel.CHANGE,
  PrivilegeLevel.VIEW,
];

const PRIVILEGE_NAMES: Record<PrivilegeLevel, string> = {
  1: 'owner',
  2: 'change',
  3: 'view',
  4: 'none',
};

export function privilegeName(level: PrivilegeLevel): string {
  return PRIVILEGE_NAMES[level];
}

export function isPrivilegeLevel(value: unknown): value is PrivilegeLevel {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

export function isGrantablePrivilege(value: unknown): value is GrantablePrivilege {
  return value === 1 || value === 2 || value === 3;
}

/**
 * True when `level` is at least as strong as `threshold`.
 */
export function isAtLeast(level: PrivilegeLevel, threshold: PrivilegeLevel): boolean {
  return level <= threshold;
}

/**
 * True when `level` is strictly stronger than `other`.
 */
export function isStrongerThan(level: PrivilegeLevel, other: PrivilegeLevel): boolean {
  return level < other;
}

/**
 * True when `level` is strictly weaker than `other`.
 */
export function isWeakerThan(level: PrivilegeLevel, other: PrivilegeLevel): boolean {
  return level > other;
}

/**
 * The strongest of the given levels; NONE for an empty list.
 */
export function strongest(levels: Iterable<PrivilegeLevel>): PrivilegeLevel {
  let result: PrivilegeLevel = PrivilegeLevel.NONE;
  for (const level of levels) {
    if (level < result) {
      result = level;
    }
  }
  return result;
}

/**
 * The weakest of two levels.
 */
export function weakest(a: PrivilegeLevel, b: PrivilegeLevel): PrivilegeLevel {
  return a > b ? a : b;
}
