import { describe, it, expect, jest } from '@jest/globals';
import { accept, allSeverities, FilterState, SeverityFilter } from '../../../src/tail/SeverityFilter.js';
import { Severity, SEVERITY_ORDER } from '../../../src/tail/Severity.js';

describe('SeverityFilter', () => {
  it('should enable every known severity by default', () => {
    const filter = new SeverityFilter();
    for (const severity of SEVERITY_ORDER) {
      expect(filter.isEnabled(severity)).toBe(true);
    }
  });

  it('should always pass unknown severity', () => {
    const filter = new SeverityFilter([]);
    expect(filter.accepts({ severity: Severity.UNKNOWN })).toBe(true);
    expect(filter.accepts({ severity: Severity.ERROR })).toBe(false);

    filter.setEnabled(Severity.UNKNOWN, false);
    expect(filter.accepts({ severity: Severity.UNKNOWN })).toBe(true);
  });

  it('should never change a snapshot already handed out', () => {
    const filter = new SeverityFilter();
    const before = filter.snapshot();

    filter.setEnabled(Severity.INFO, false);

    expect(before.has(Severity.INFO)).toBe(true);
    expect(filter.snapshot().has(Severity.INFO)).toBe(false);
  });

  it('should emit change with the new snapshot', () => {
    const filter = new SeverityFilter();
    const listener = jest.fn<(state: FilterState) => void>();
    filter.on('change', listener);

    filter.toggle(Severity.DEBUG);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0]?.[0]).toBe(filter.snapshot());
  });

  it('should not emit when nothing changes', () => {
    const filter = new SeverityFilter();
    const listener = jest.fn();
    filter.on('change', listener);

    filter.setEnabled(Severity.ERROR, true);

    expect(listener).not.toHaveBeenCalled();
  });

  it('should give the same state whatever order toggles arrive in', () => {
    const a = new SeverityFilter();
    a.toggle(Severity.INFO);
    a.toggle(Severity.DEBUG);

    const b = new SeverityFilter();
    b.toggle(Severity.DEBUG);
    b.toggle(Severity.INFO);

    expect([...a.snapshot()].sort()).toEqual([...b.snapshot()].sort());
  });

  it('should enable or disable all at once', () => {
    const filter = new SeverityFilter();
    filter.setAll(false);
    expect(filter.snapshot().size).toBe(0);

    filter.setAll(true);
    expect(filter.snapshot()).toEqual(allSeverities());
  });

  it('should replace the state and drop unknown', () => {
    const filter = new SeverityFilter();
    filter.replace([Severity.ERROR, Severity.UNKNOWN]);
    expect([...filter.snapshot()]).toEqual([Severity.ERROR]);
  });

  describe('accept', () => {
    it('should be a pure lookup', () => {
      const state: FilterState = new Set([Severity.ERROR]);
      expect(accept({ severity: Severity.ERROR }, state)).toBe(true);
      expect(accept({ severity: Severity.INFO }, state)).toBe(false);
    });
  });
});
