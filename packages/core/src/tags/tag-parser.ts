/**
 * Tag grammar for lab image repositories
 * @module @prepuller/core/tags/tag-parser
 *
 * Recognised forms (all lower case):
 * - release            r21_0_1, r21_0_1_c0020.001, r21_0_1_20210527, obsolete r170
 * - release candidate  r22_0_0_rc1[...]
 * - weekly             w_2021_22[_c0020.001][_rest]
 * - daily              d_2021_05_27[_c0020.001][_rest]
 * - experimental       exp_<anything>
 */

import { compareSemVer, formatSemVer, type SemVer } from '@prepuller/shared';

/**
 * Tag type as parsed from the tag text
 */
export type TagType =
  | 'release'
  | 'release-candidate'
  | 'weekly'
  | 'daily'
  | 'experimental'
  | 'alias'
  | 'unknown';

/**
 * Enumeration class used when picking images from a repository.
 * Candidates and experimentals never get enumerated.
 */
export type TagClass = 'release' | 'weekly' | 'daily' | 'alias' | 'unrecognized';

/**
 * Everything extracted from one tag
 */
export interface ParsedTag {
  tag: string;
  type: TagType;
  displayName: string;
  /** Ordering key within a type; null for alias, experimental and unknown */
  version: SemVer | null;
  /** Build metadata made of the cycle and rest parts, dot separated */
  build: string | null;
  /** Cycle number, `c0020.001` gives 20 */
  cycle: number | null;
}

/**
 * Docker's tag when none is given
 */
export const DEFAULT_TAG = 'latest';

const PART = {
  release: String.raw`r(?<major>\d+)_(?<minor>\d+)_(?<patch>\d+)`,
  rc: String.raw`r(?<major>\d+)_(?<minor>\d+)_(?<patch>\d+)_rc(?<pre>\d+)`,
  weekly: String.raw`w_(?<year>\d+)_(?<week>\d+)`,
  daily: String.raw`d_(?<year>\d+)_(?<month>\d+)_(?<day>\d+)`,
  experimental: String.raw`exp_(?<rest>.*)`,
  cycle: String.raw`_(?<ctag>c|csal)(?<cycle>\d+\.\d+)`,
  rest: String.raw`_(?<rest>.*)`,
} as const;

type PatternType = Exclude<TagType, 'alias' | 'unknown'>;

const pattern = (type: PatternType, ...parts: string[]): [PatternType, RegExp] =>
  [type, new RegExp(`^${parts.join('')}$`)];

/**
 * Matched top to bottom. Candidates precede releases since a candidate
 * would otherwise read as a release with a rest part.
 */
const TAG_PATTERNS: ReadonlyArray<[PatternType, RegExp]> = [
  pattern('release-candidate', PART.rc, PART.cycle, PART.rest),
  pattern('release-candidate', PART.rc, PART.cycle),
  pattern('release-candidate', PART.rc, PART.rest),
  pattern('release-candidate', PART.rc),
  pattern('release', PART.release, PART.cycle, PART.rest),
  pattern('release', PART.release, PART.cycle),
  pattern('release', PART.release, PART.rest),
  pattern('release', PART.release),
  pattern('release', String.raw`r(?<major>\d\d)(?<minor>\d)`),
  pattern('weekly', PART.weekly, PART.cycle, PART.rest),
  pattern('weekly', PART.weekly, PART.cycle),
  pattern('weekly', PART.weekly, PART.rest),
  pattern('weekly', PART.weekly),
  pattern('daily', PART.daily, PART.cycle, PART.rest),
  pattern('daily', PART.daily, PART.cycle),
  pattern('daily', PART.daily, PART.rest),
  pattern('daily', PART.daily),
  pattern('experimental', PART.experimental),
];

const TYPE_NAMES: Record<'release' | 'release-candidate' | 'weekly' | 'daily', string> = {
  release: 'Release',
  'release-candidate': 'Release Candidate',
  weekly: 'Weekly',
  daily: 'Daily',
};

/**
 * Title-case a tag: underscores become spaces, each word capitalised.
 * `latest_weekly` becomes `Latest Weekly`.
 */
export function titleCase(tag: string): string {
  return tag
    .replace(/_/g, ' ')
    .replace(/[a-zA-Z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Parse a numeric tag component; cycles such as `0020.001` truncate to 20
 */
function toInt(value: string | undefined): number | null {
  if (value === undefined) {
    return null;
  }
  const parsed = Math.trunc(parseFloat(value));
  return Number.isNaN(parsed) ? null : parsed;
}

function toBuild(cycle: string | undefined, ctag: string | undefined, rest: string | undefined): string | null {
  let build = rest;
  if (cycle) {
    build = rest ? `${ctag ?? 'c'}${cycle}_${rest}` : `${ctag ?? 'c'}${cycle}`;
  }
  if (!build) {
    return null;
  }
  const cleaned = build.replace(/_/g, '.').replace(/[^\w|.]+/g, '');
  return cleaned === '' ? null : cleaned;
}

function unknownTag(tag: string): ParsedTag {
  return { tag, type: 'unknown', displayName: tag, version: null, build: null, cycle: null };
}

function describeMatch(tag: string, type: PatternType, groups: Record<string, string | undefined>): ParsedTag {
  if (type === 'experimental') {
    const inner = parseTag(groups.rest ?? '');
    return {
      tag,
      type,
      displayName: `Experimental ${inner.displayName}`,
      version: null,
      build: null,
      cycle: null,
    };
  }

  const { cycle, ctag, rest } = groups;
  let version: SemVer | null = null;
  let label: string;

  if (type === 'release' || type === 'release-candidate') {
    const major = toInt(groups.major);
    const minor = toInt(groups.minor);
    const patch = toInt(groups.patch) ?? 0;
    const pre = groups.pre !== undefined ? `rc${groups.pre}` : undefined;
    if (major !== null && minor !== null) {
      version = { major, minor, patch, ...(pre !== undefined && { prerelease: pre }) };
    }
    label = `r${major ?? '?'}.${minor ?? '?'}.${patch}${pre !== undefined ? `-${pre}` : ''}`;
  } else if (type === 'weekly') {
    const year = toInt(groups.year);
    const week = toInt(groups.week);
    if (year !== null && week !== null) {
      version = { major: year, minor: week, patch: 0 };
    }
    label = `${groups.year ?? ''}_${groups.week ?? ''}`;
  } else {
    const year = toInt(groups.year);
    const month = toInt(groups.month);
    const day = toInt(groups.day);
    if (year !== null && month !== null && day !== null) {
      version = { major: year, minor: month, patch: day };
    }
    label = `${groups.year ?? ''}_${groups.month ?? ''}_${groups.day ?? ''}`;
  }

  let displayName = `${TYPE_NAMES[type]} ${label}`;
  if (cycle) {
    displayName += `_${ctag ?? 'c'}${cycle}`;
  }
  if (rest) {
    displayName += `_${rest}`;
  }

  return {
    tag,
    type,
    displayName,
    version,
    build: toBuild(cycle, ctag, rest),
    cycle: toInt(cycle),
  };
}

/**
 * Parse a tag into its type, display name, version and cycle
 *
 * @param aliasTags - Tags that name another image (`recommended`, `latest_weekly`)
 */
export function parseTag(tag: string, aliasTags: readonly string[] = []): ParsedTag {
  const value = tag === '' ? DEFAULT_TAG : tag;

  if (value !== value.toLowerCase()) {
    return unknownTag(value);
  }

  if (aliasTags.includes(value)) {
    return { tag: value, type: 'alias', displayName: titleCase(value), version: null, build: null, cycle: null };
  }

  for (const [type, regexp] of TAG_PATTERNS) {
    const match = regexp.exec(value);
    if (match) {
      return describeMatch(value, type, match.groups ?? {});
    }
  }

  return unknownTag(value);
}

/**
 * Enumeration class of a parsed tag
 */
export function classOf(parsed: ParsedTag): TagClass {
  switch (parsed.type) {
    case 'release':
    case 'weekly':
    case 'daily':
    case 'alias':
      return parsed.type;
    default:
      return 'unrecognized';
  }
}

/**
 * Parse and classify in one step
 */
export function classifyTag(tag: string, aliasTags: readonly string[] = []): TagClass {
  return classOf(parseTag(tag, aliasTags));
}

/**
 * Order two tags of the same type, newest first.
 * Tags without a version sort after those with one, then by tag text.
 */
export function compareTagsDescending(a: ParsedTag, b: ParsedTag): number {
  if (a.version && b.version) {
    const byVersion = compareSemVer(b.version, a.version);
    if (byVersion !== 0) {
      return byVersion;
    }
  } else if (a.version) {
    return -1;
  } else if (b.version) {
    return 1;
  }
  return b.tag.localeCompare(a.tag);
}

/**
 * Semantic version string of a parsed tag, with build metadata when present
 */
export function versionString(parsed: ParsedTag): string | null {
  if (!parsed.version) {
    return null;
  }
  const base = formatSemVer(parsed.version);
  return parsed.build ? `${base}+${parsed.build}` : base;
}
