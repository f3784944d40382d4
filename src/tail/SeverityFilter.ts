/**
 * Severity Filter
 *
 * The filter state is an immutable snapshot. Writers build a new set and
 * swap the reference; the poll loop reads the reference once per record,
 * so a record is always judged against one consistent state.
 */

import { EventEmitter } from 'events';
import type { LogRecord } from './LogRecord.js';
import { SEVERITY_ORDER, Severity } from './Severity.js';

export type FilterState = ReadonlySet<Severity>;

/**
 * Every known severity enabled.
 */
export function allSeverities(): FilterState {
  return Object.freeze(new Set(SEVERITY_ORDER));
}

/**
 * Pure predicate. Unknown severities always pass: an entry that could not
 * be classified must not be silently dropped.
 */
export function accept(record: Pick<LogRecord, 'severity'>, state: FilterState): boolean {
  return record.severity === Severity.UNKNOWN || state.has(record.severity);
}

/**
 * Holder of the live filter state. Emits 'change' with each new snapshot.
 */
export class SeverityFilter extends EventEmitter {
  private state: FilterState;

  constructor(enabled: Iterable<Severity> = SEVERITY_ORDER) {
    super();
    this.state = freezeState(enabled);
  }

  /**
   * Current snapshot. Never mutated after it is handed out.
   */
  snapshot(): FilterState {
    return this.state;
  }

  isEnabled(severity: Severity): boolean {
    return accept({ severity }, this.state);
  }

  accepts(record: Pick<LogRecord, 'severity'>): boolean {
    return accept(record, this.state);
  }

  setEnabled(severity: Severity, enabled: boolean): void {
    if (severity === Severity.UNKNOWN || this.state.has(severity) === enabled) {
      return;
    }
    const next = new Set(this.state);
    if (enabled) {
      next.add(severity);
    } else {
      next.delete(severity);
    }
    this.swap(next);
  }

  toggle(severity: Severity): void {
    this.setEnabled(severity, !this.state.has(severity));
  }

  setAll(enabled: boolean): void {
    this.swap(enabled ? SEVERITY_ORDER : []);
  }

  /**
   * Replace the whole state at once.
   */
  replace(enabled: Iterable<Severity>): void {
    this.swap(enabled);
  }

  private swap(enabled: Iterable<Severity>): void {
    this.state = freezeState(enabled);
    this.emit('change', this.state);
  }
}

function freezeState(enabled: Iterable<Severity>): FilterState {
  const set = new Set<Severity>();
  for (const severity of enabled) {
    if (severity !== Severity.UNKNOWN) {
      set.add(severity);
    }
  }
  return Object.freeze(set);
}
