import { describe, it, expect } from 'vitest';
import {
  lookbackStart,
  parseFieldList,
  parseSize,
  parseTagExpression,
  parseTagExpressions,
  parseTimeExpression,
} from '@core/filterInput';
import { ConfigurationError } from '@shared/errors';

describe('filterInput', () => {
  describe('parseSize', () => {
    it('should parse units as 1024 multiples, case-insensitively', () => {
      expect(parseSize('1KB')).toBe(1024);
      expect(parseSize('1.5mb')).toBe(1572864);
      expect(parseSize('2GB')).toBe(2147483648);
      expect(parseSize('1TB')).toBe(1099511627776);
      expect(parseSize('10B')).toBe(10);
    });

    it('should take a bare integer as bytes', () => {
      expect(parseSize('4096')).toBe(4096);
    });

    it('should reject anything else', () => {
      expect(() => parseSize('lots')).toThrow(ConfigurationError);
      expect(() => parseSize('MB')).toThrow("Invalid size 'MB'");
    });
  });

  describe('parseTimeExpression', () => {
    const now = new Date('2024-03-10T12:00:00Z');

    it('should resolve relative expressions against now', () => {
      expect(parseTimeExpression('2 days ago', now).toISOString()).toBe('2024-03-08T12:00:00.000Z');
      expect(parseTimeExpression('1 week ago', now).toISOString()).toBe('2024-03-03T12:00:00.000Z');
      expect(parseTimeExpression('30 minutes ago', now).toISOString()).toBe('2024-03-10T11:30:00.000Z');
      expect(parseTimeExpression('1 Hour ago', now).toISOString()).toBe('2024-03-10T11:00:00.000Z');
    });

    it('should read a date as UTC midnight', () => {
      expect(parseTimeExpression('2024-01-31').toISOString()).toBe('2024-01-31T00:00:00.000Z');
    });

    it('should accept date-times with a zone designator', () => {
      expect(parseTimeExpression('2024-01-31T12:00:00Z').toISOString()).toBe('2024-01-31T12:00:00.000Z');
      expect(parseTimeExpression('2024-01-31T12:00:00+02:00').toISOString()).toBe('2024-01-31T10:00:00.000Z');
    });

    it('should reject date-times without a zone', () => {
      expect(() => parseTimeExpression('2024-01-31T12:00:00')).toThrow('has no timezone');
    });

    it('should reject unparseable input', () => {
      expect(() => parseTimeExpression('yesterday')).toThrow("Invalid time 'yesterday'");
      expect(() => parseTimeExpression('2024-13-45')).toThrow("Invalid date '2024-13-45'");
    });
  });

  describe('lookbackStart', () => {
    const now = new Date('2024-03-10T12:00:00Z');

    it('should subtract whole days', () => {
      expect(lookbackStart(7, now).toISOString()).toBe('2024-03-03T12:00:00.000Z');
    });

    it('should reject days that are not a positive integer', () => {
      expect(() => lookbackStart(0, now)).toThrow(ConfigurationError);
      expect(() => lookbackStart(1.5, now)).toThrow('Invalid days 1.5. Expected a positive integer');
    });
  });

  describe('parseTagExpression', () => {
    it('should split on the first equals sign', () => {
      expect(parseTagExpression('team=data')).toEqual(['team', 'data']);
      expect(parseTagExpression('query=a=b')).toEqual(['query', 'a=b']);
      expect(parseTagExpression('empty=')).toEqual(['empty', '']);
    });

    it('should reject a missing separator or key', () => {
      expect(() => parseTagExpression('team')).toThrow("Malformed tag 'team'. Expected format: Key=Value");
      expect(() => parseTagExpression('=data')).toThrow(ConfigurationError);
    });

    it('should build a map with later keys winning', () => {
      expect(parseTagExpressions(['env=dev', 'team=data', 'env=prod'])).toEqual({ env: 'prod', team: 'data' });
    });
  });

  describe('parseFieldList', () => {
    it('should trim and drop blanks', () => {
      expect(parseFieldList(' name, ,size,')).toEqual(['name', 'size']);
    });
  });
});
