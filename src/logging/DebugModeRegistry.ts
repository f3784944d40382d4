/**
 * Debug Mode Registry
 *
 * Per-component log level overrides. Module-scoped state with a reset
 * function for tests.
 *
 * Components register at module load (e.g. "tail-session", "log-watcher")
 * so DEBUG or TRACE output can be enabled for one of them without
 * flooding the rest.
 */

import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Register a loggable component. Keeps an existing override.
 */
export function registerComponent(name: string, description: string): void {
  const existing = registry.get(name);
  registry.set(name, { name, description, levelOverride: existing?.levelOverride });
}

/**
 * Override the global level for one component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = level;
  } else {
    registry.set(name, { name, description: name, levelOverride: level });
  }
}

export function clearComponentLevel(name: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = undefined;
  }
}

/**
 * The component's override, or the global level. A child logger
 * ("log-watcher.session") inherits its parent's override.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  let current: string | null = name;
  while (current !== null) {
    const override = registry.get(current)?.levelOverride;
    if (override) {
      return override;
    }
    const dot = current.lastIndexOf('.');
    current = dot > 0 ? current.substring(0, dot) : null;
  }
  return globalLevel;
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return shouldDisplayLogLevel(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * All registered components with their effective levels, sorted by name.
 */
export function getRegisteredComponents(globalLevel: LogLevel): Array<{
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}> {
  return [...registry.values()]
    .map((reg) => ({
      name: reg.name,
      description: reg.description,
      effectiveLevel: reg.levelOverride ?? globalLevel,
      hasOverride: reg.levelOverride !== undefined,
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Apply entries like ["tail-session", "log-watcher:TRACE"].
 * Entries without a level suffix get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  registry.clear();
}
