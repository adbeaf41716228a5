import { describe, it, expect } from 'vitest';
import {
  createPublicationToken,
  createSiteCode,
  createTableName,
  isSidecarCategory,
  isTableType,
  isValidPublicationToken,
  isValidSiteCode,
  isValidTableName,
} from '@domain/types';
import {
  ClassificationError,
  ConfigurationError,
  MergeError,
  isStackError,
} from '@domain/errors';

describe('Domain Types', () => {
  describe('TableName branded type', () => {
    it('should accept table tokens with underscores and digits', () => {
      expect(createTableName('brd_perpoint')).toBe('brd_perpoint');
      expect(createTableName('2DWSD_2min')).toBe('2DWSD_2min');
    });

    it('should reject names with dots or spaces', () => {
      expect(() => createTableName('brd.perpoint')).toThrow(
        'Invalid TableName format'
      );
      expect(() => createTableName('brd perpoint')).toThrow(
        'Invalid TableName format'
      );
      expect(isValidTableName('')).toBe(false);
      expect(isValidTableName('_leading')).toBe(false);
    });
  });

  describe('SiteCode branded type', () => {
    it('should accept four-letter site codes', () => {
      expect(createSiteCode('HARV')).toBe('HARV');
      expect(isValidSiteCode('BART')).toBe(true);
    });

    it('should reject empty or punctuated codes', () => {
      expect(() => createSiteCode('')).toThrow('Invalid SiteCode format');
      expect(isValidSiteCode('HA-RV')).toBe(false);
    });
  });

  describe('PublicationToken branded type', () => {
    it('should accept date and timestamp tokens', () => {
      expect(isValidPublicationToken('20200101')).toBe(true);
      expect(isValidPublicationToken('20200101T000000Z')).toBe(true);
      expect(createPublicationToken('20171128T162302Z')).toBe(
        '20171128T162302Z'
      );
    });

    it('should reject other date shapes', () => {
      expect(isValidPublicationToken('2020-01-01')).toBe(false);
      expect(isValidPublicationToken('20200101T0000Z')).toBe(false);
      expect(() => createPublicationToken('latest')).toThrow(
        'Invalid PublicationToken format'
      );
    });

    it('should sort chronologically as plain strings', () => {
      const tokens = ['20200615', '20190101', '20181231'].sort();
      expect(tokens).toEqual(['20181231', '20190101', '20200615']);
    });
  });

  describe('tagged unions', () => {
    it('should recognise every table type and nothing else', () => {
      for (const t of ['site-date', 'site-all', 'lab-current', 'lab-all', 'other']) {
        expect(isTableType(t)).toBe(true);
      }
      expect(isTableType('site')).toBe(false);
    });

    it('should recognise sidecar categories', () => {
      expect(isSidecarCategory('variables')).toBe(true);
      expect(isSidecarCategory('sensor_positions')).toBe(true);
      expect(isSidecarCategory('readme')).toBe(false);
    });
  });

  describe('errors', () => {
    it('should carry a kind discriminant and class name', () => {
      const config = new ConfigurationError('too many cores');
      const classification = new ClassificationError('unknown', 'a.csv');
      const merge = new MergeError('bad', 'brd_perpoint');

      expect(config.kind).toBe('configuration');
      expect(config.name).toBe('ConfigurationError');
      expect(classification.kind).toBe('classification');
      expect(classification.fileName).toBe('a.csv');
      expect(merge.kind).toBe('merge');
      expect(merge.tableName).toBe('brd_perpoint');
      expect(isStackError(merge)).toBe(true);
      expect(isStackError(new Error('x'))).toBe(false);
    });
  });
});
