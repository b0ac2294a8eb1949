import { describe, it, expect } from 'vitest';
import { RangeHeaderParser } from './RangeHeaderParser';

describe('RangeHeaderParser', () => {
  describe('parse', () => {
    it('should parse start and end as numbers', () => {
      expect(RangeHeaderParser.parse('10-20')).toEqual([10, 20]);
    });

    it('should parse a zero start', () => {
      expect(RangeHeaderParser.parse('0-9')).toEqual([0, 9]);
    });

    it('should keep non-numeric tokens verbatim', () => {
      expect(RangeHeaderParser.parse('a-z')).toEqual(['a', 'z']);
    });

    it('should keep leading zeros as strings', () => {
      expect(RangeHeaderParser.parse('010-020')).toEqual(['010', '020']);
    });

    it('should keep padded tokens as strings', () => {
      expect(RangeHeaderParser.parse(' 1-2 ')).toEqual([' 1', '2 ']);
    });

    it('should keep integers beyond the safe range as strings', () => {
      expect(RangeHeaderParser.parse('0-9007199254740993')).toEqual([0, '9007199254740993']);
    });

    it('should use an empty end when there is no separator', () => {
      expect(RangeHeaderParser.parse('15')).toEqual([15, '']);
    });

    it('should use an empty end for an open range', () => {
      expect(RangeHeaderParser.parse('15-')).toEqual([15, '']);
    });

    it('should split negative values on every dash', () => {
      expect(RangeHeaderParser.parse('-5--1')).toEqual(['', 5]);
    });

    it('should keep only the first two segments', () => {
      expect(RangeHeaderParser.parse('1-2-3')).toEqual([1, 2]);
    });

    it('should parse an empty value', () => {
      expect(RangeHeaderParser.parse('')).toEqual(['', '']);
    });
  });

  describe('format', () => {
    it('should join the pair with a dash', () => {
      expect(RangeHeaderParser.format([0, 9])).toBe('0-9');
    });

    it('should format string bounds as they are', () => {
      expect(RangeHeaderParser.format(['010', 'x'])).toBe('010-x');
    });

    it('should give back the original text for a parsed value', () => {
      expect(RangeHeaderParser.format(RangeHeaderParser.parse('007-12'))).toBe('007-12');
    });
  });

  describe('toInteger', () => {
    it('should accept numbers and canonical digit strings', () => {
      expect(RangeHeaderParser.toInteger(42)).toBe(42);
      expect(RangeHeaderParser.toInteger('42')).toBe(42);
      expect(RangeHeaderParser.toInteger('0')).toBe(0);
    });

    it('should reject anything else', () => {
      expect(RangeHeaderParser.toInteger('')).toBeNull();
      expect(RangeHeaderParser.toInteger('-1')).toBeNull();
      expect(RangeHeaderParser.toInteger('1.5')).toBeNull();
      expect(RangeHeaderParser.toInteger('07')).toBeNull();
      expect(RangeHeaderParser.toInteger(1.5)).toBeNull();
    });
  });
});
