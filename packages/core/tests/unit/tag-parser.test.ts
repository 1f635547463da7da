/**
 * Unit tests for the tag grammar
 */

import { describe, it, expect } from 'vitest';

import {
  parseTag,
  classifyTag,
  compareTagsDescending,
  versionString,
  titleCase,
} from '../../src/tags/tag-parser';

describe('Tag parser', () => {
  describe('parseTag', () => {
    it('should parse a release', () => {
      const parsed = parseTag('r21_0_1');
      expect(parsed.type).toBe('release');
      expect(parsed.displayName).toBe('Release r21.0.1');
      expect(parsed.version).toEqual({ major: 21, minor: 0, patch: 1 });
      expect(parsed.cycle).toBeNull();
      expect(parsed.build).toBeNull();
    });

    it('should parse a release candidate before a release', () => {
      const parsed = parseTag('r22_0_0_rc1');
      expect(parsed.type).toBe('release-candidate');
      expect(parsed.displayName).toBe('Release Candidate r22.0.0-rc1');
      expect(parsed.version).toEqual({ major: 22, minor: 0, patch: 0, prerelease: 'rc1' });
    });

    it('should parse an obsolete three digit release', () => {
      const parsed = parseTag('r170');
      expect(parsed.type).toBe('release');
      expect(parsed.displayName).toBe('Release r17.0.0');
    });

    it('should parse a weekly', () => {
      const parsed = parseTag('w_2021_22');
      expect(parsed.type).toBe('weekly');
      expect(parsed.displayName).toBe('Weekly 2021_22');
      expect(parsed.version).toEqual({ major: 2021, minor: 22, patch: 0 });
    });

    it('should parse a daily', () => {
      const parsed = parseTag('d_2021_05_27');
      expect(parsed.type).toBe('daily');
      expect(parsed.displayName).toBe('Daily 2021_05_27');
      expect(parsed.version).toEqual({ major: 2021, minor: 5, patch: 27 });
    });

    it('should extract the cycle as an integer', () => {
      const parsed = parseTag('w_2021_22_c0020.001');
      expect(parsed.type).toBe('weekly');
      expect(parsed.cycle).toBe(20);
      expect(parsed.build).toBe('c0020.001');
      expect(parsed.displayName).toBe('Weekly 2021_22_c0020.001');
    });

    it('should keep a trailing rest part', () => {
      const parsed = parseTag('r21_0_1_c0020.001_20210527');
      expect(parsed.type).toBe('release');
      expect(parsed.cycle).toBe(20);
      expect(parsed.displayName).toBe('Release r21.0.1_c0020.001_20210527');
    });

    it('should describe experimentals through their inner tag', () => {
      expect(parseTag('exp_w_2021_22').displayName).toBe('Experimental Weekly 2021_22');
      expect(parseTag('exp_random').displayName).toBe('Experimental random');
      expect(parseTag('exp_random').type).toBe('experimental');
    });

    it('should title-case aliases', () => {
      const parsed = parseTag('latest_weekly', ['latest_weekly']);
      expect(parsed.type).toBe('alias');
      expect(parsed.displayName).toBe('Latest Weekly');
    });

    it('should treat an unmatched tag as unknown', () => {
      const parsed = parseTag('nightly');
      expect(parsed.type).toBe('unknown');
      expect(parsed.displayName).toBe('nightly');
      expect(parsed.version).toBeNull();
    });

    it('should treat tags with upper case letters as unknown', () => {
      expect(parseTag('W_2021_22').type).toBe('unknown');
    });

    it('should read an empty tag as latest', () => {
      expect(parseTag('').tag).toBe('latest');
    });
  });

  describe('classifyTag', () => {
    it('should put candidates and experimentals in the unrecognized class', () => {
      expect(classifyTag('r22_0_0_rc1')).toBe('unrecognized');
      expect(classifyTag('exp_w_2021_22')).toBe('unrecognized');
      expect(classifyTag('whatever')).toBe('unrecognized');
    });

    it('should classify the enumerated types', () => {
      expect(classifyTag('r21_0_1')).toBe('release');
      expect(classifyTag('w_2021_22')).toBe('weekly');
      expect(classifyTag('d_2021_05_27')).toBe('daily');
      expect(classifyTag('recommended', ['recommended'])).toBe('alias');
    });
  });

  describe('compareTagsDescending', () => {
    it('should order releases newest first by numeric version', () => {
      const tags = ['r21_0_1', 'r170', 'r21_0_10'].map((tag) => parseTag(tag));
      expect(tags.sort(compareTagsDescending).map((parsed) => parsed.tag)).toEqual(['r21_0_10', 'r21_0_1', 'r170']);
    });

    it('should order weeklies numerically, not lexically', () => {
      const tags = ['w_2021_9', 'w_2021_22', 'w_2020_50'].map((tag) => parseTag(tag));
      expect(tags.sort(compareTagsDescending).map((parsed) => parsed.tag)).toEqual(['w_2021_22', 'w_2021_9', 'w_2020_50']);
    });

    it('should put versionless tags last', () => {
      const tags = [parseTag('nightly'), parseTag('w_2021_22')];
      expect(tags.sort(compareTagsDescending).map((parsed) => parsed.tag)).toEqual(['w_2021_22', 'nightly']);
    });
  });

  describe('versionString', () => {
    it('should join cycle and rest as build metadata', () => {
      expect(versionString(parseTag('r21_0_1_c0020.001_20210527'))).toBe('21.0.1+c0020.001.20210527');
    });

    it('should return a plain version without build data', () => {
      expect(versionString(parseTag('d_2021_05_27'))).toBe('2021.5.27');
    });

    it('should return null for tags without a version', () => {
      expect(versionString(parseTag('exp_random'))).toBeNull();
    });
  });

  describe('titleCase', () => {
    it('should capitalise each word', () => {
      expect(titleCase('latest_daily')).toBe('Latest Daily');
      expect(titleCase('recommended')).toBe('Recommended');
    });
  });
});
