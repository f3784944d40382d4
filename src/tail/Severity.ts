/**
 * Severity
 *
 * The eight RFC 5424 levels Monolog writes, most severe first,
 * plus a sentinel for tokens that match none of them.
 */

export enum Severity {
  EMERGENCY = 'emergency',
  ALERT = 'alert',
  CRITICAL = 'critical',
  ERROR = 'error',
  WARNING = 'warning',
  NOTICE = 'notice',
  INFO = 'info',
  DEBUG = 'debug',
  UNKNOWN = 'unknown',
}

/**
 * Known severities in descending order. UNKNOWN is deliberately absent.
 */
export const SEVERITY_ORDER: readonly Severity[] = [
  Severity.EMERGENCY,
  Severity.ALERT,
  Severity.CRITICAL,
  Severity.ERROR,
  Severity.WARNING,
  Severity.NOTICE,
  Severity.INFO,
  Severity.DEBUG,
];

/**
 * Map a level token from a log header to a Severity.
 * Case-insensitive; a few common aliases are accepted.
 */
export function parseSeverity(token: string): Severity {
  switch (token.trim().toLowerCase()) {
    case 'emergency':
    case 'emerg':
      return Severity.EMERGENCY;
    case 'alert':
      return Severity.ALERT;
    case 'critical':
    case 'crit':
      return Severity.CRITICAL;
    case 'error':
    case 'err':
      return Severity.ERROR;
    case 'warning':
    case 'warn':
      return Severity.WARNING;
    case 'notice':
      return Severity.NOTICE;
    case 'info':
    case 'information':
      return Severity.INFO;
    case 'debug':
      return Severity.DEBUG;
    default:
      return Severity.UNKNOWN;
  }
}

/**
 * Parse a comma separated list such as "error,warning".
 * Unrecognised names are returned separately so callers can report them.
 */
export function parseSeverityList(value: string): { severities: Severity[]; invalid: string[] } {
  const severities: Severity[] = [];
  const invalid: string[] = [];

  for (const part of value.split(',')) {
    const name = part.trim();
    if (name === '') continue;
    const severity = parseSeverity(name);
    if (severity === Severity.UNKNOWN) {
      invalid.push(name);
    } else if (!severities.includes(severity)) {
      severities.push(severity);
    }
  }

  return { severities, invalid };
}

/**
 * Rank of a severity: 0 for emergency, 7 for debug, 8 for unknown.
 */
export function severityRank(severity: Severity): number {
  const index = SEVERITY_ORDER.indexOf(severity);
  return index === -1 ? SEVERITY_ORDER.length : index;
}
