import { describe, it, expect } from '@jest/globals';
import {
  Severity,
  SEVERITY_ORDER,
  parseSeverity,
  parseSeverityList,
  severityRank,
} from '../../../src/tail/Severity.js';

describe('Severity', () => {
  describe('parseSeverity', () => {
    it('should map Monolog level names', () => {
      expect(parseSeverity('ERROR')).toBe(Severity.ERROR);
      expect(parseSeverity('warning')).toBe(Severity.WARNING);
      expect(parseSeverity('Emergency')).toBe(Severity.EMERGENCY);
    });

    it('should accept short aliases', () => {
      expect(parseSeverity('crit')).toBe(Severity.CRITICAL);
      expect(parseSeverity('warn')).toBe(Severity.WARNING);
      expect(parseSeverity('emerg')).toBe(Severity.EMERGENCY);
    });

    it('should return unknown for anything else', () => {
      expect(parseSeverity('VERBOSE')).toBe(Severity.UNKNOWN);
      expect(parseSeverity('')).toBe(Severity.UNKNOWN);
    });
  });

  describe('parseSeverityList', () => {
    it('should split, dedupe and report invalid names', () => {
      expect(parseSeverityList('error, warning,,ERROR,loud')).toEqual({
        severities: [Severity.ERROR, Severity.WARNING],
        invalid: ['loud'],
      });
    });

    it('should reject unknown as a name', () => {
      expect(parseSeverityList('unknown').invalid).toEqual(['unknown']);
    });
  });

  describe('severityRank', () => {
    it('should rank most severe first and unknown last', () => {
      expect(severityRank(Severity.EMERGENCY)).toBe(0);
      expect(severityRank(Severity.DEBUG)).toBe(7);
      expect(severityRank(Severity.UNKNOWN)).toBe(8);
    });

    it('should list eight known severities', () => {
      expect(SEVERITY_ORDER).toHaveLength(8);
      expect(SEVERITY_ORDER).not.toContain(Severity.UNKNOWN);
    });
  });
});
