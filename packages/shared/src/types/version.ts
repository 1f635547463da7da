/**
 * Semantic version helpers used to order release tags
 * @module @prepuller/shared/types/version
 */

/**
 * Parsed semantic version
 */
export interface SemVer {
  major: number;
  minor: number;
  patch: number;
  prerelease?: string;
}

/**
 * Parse a semantic version string such as `21.0.1` or `22.0.0-rc1`
 */
export function parseSemVer(version: string): SemVer | null {
  const match = version.match(/^(\d+)\.(\d+)\.(\d+)(?:-(.+))?$/);
  if (!match) {
    return null;
  }
  const major = match[1];
  const minor = match[2];
  const patch = match[3];
  const prerelease = match[4];

  if (major === undefined || minor === undefined || patch === undefined) {
    return null;
  }

  return {
    major: parseInt(major, 10),
    minor: parseInt(minor, 10),
    patch: parseInt(patch, 10),
    ...(prerelease !== undefined && { prerelease }),
  };
}

/**
 * Render a version as `major.minor.patch[-prerelease]`
 */
export function formatSemVer(version: SemVer): string {
  const core = `${version.major}.${version.minor}.${version.patch}`;
  return version.prerelease ? `${core}-${version.prerelease}` : core;
}

/**
 * Compare two parsed versions
 * @returns negative if a < b, 0 if equal, positive if a > b
 */
export function compareSemVer(a: SemVer, b: SemVer): number {
  if (a.major !== b.major) {
    return a.major - b.major;
  }
  if (a.minor !== b.minor) {
    return a.minor - b.minor;
  }
  if (a.patch !== b.patch) {
    return a.patch - b.patch;
  }

  // Prerelease versions are less than release versions
  if (a.prerelease && !b.prerelease) {
    return -1;
  }
  if (!a.prerelease && b.prerelease) {
    return 1;
  }
  if (a.prerelease && b.prerelease) {
    return a.prerelease.localeCompare(b.prerelease, undefined, { numeric: true });
  }

  return 0;
}
