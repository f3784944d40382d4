import { describe, it, expect } from '@jest/globals';
import { clampIndex, followSelection, getRowWindow } from '../../../../src/cli/ui/state.js';

describe('viewer state', () => {
  describe('clampIndex', () => {
    it('should keep the index inside the list', () => {
      expect(clampIndex(-3, 5)).toBe(0);
      expect(clampIndex(9, 5)).toBe(4);
      expect(clampIndex(2, 0)).toBe(0);
    });
  });

  describe('getRowWindow', () => {
    it('should show everything when it fits', () => {
      expect(getRowWindow(5, 3, 10)).toEqual({ start: 0, end: 5 });
    });

    it('should keep the selection as the bottom row', () => {
      expect(getRowWindow(100, 50, 10)).toEqual({ start: 41, end: 51 });
    });

    it('should start at the top for early rows', () => {
      expect(getRowWindow(100, 3, 10)).toEqual({ start: 0, end: 10 });
    });

    it('should clamp a selection past the end', () => {
      expect(getRowWindow(100, 500, 10)).toEqual({ start: 90, end: 100 });
    });
  });

  describe('followSelection', () => {
    it('should follow new rows from the last row', () => {
      expect(followSelection(4, 5, 7)).toBe(6);
      expect(followSelection(0, 0, 3)).toBe(2);
    });

    it('should stay put when the user scrolled up', () => {
      expect(followSelection(1, 5, 7)).toBe(1);
    });

    it('should clamp when rows disappear', () => {
      expect(followSelection(3, 5, 2)).toBe(1);
      expect(followSelection(3, 5, 0)).toBe(0);
    });
  });
});
