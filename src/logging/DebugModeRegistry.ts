/**
 * Debug Mode Registry
 *
 * Per-component log level override management. Module-scoped state,
 * exported functions, reset for testing.
 *
 * Components register themselves at module load (e.g. "x12-engine", "x12-tokenizer").
 * Operators can then selectively enable DEBUG/TRACE logging for specific components
 * without flooding the whole log output.
 */

import { LogLevel, shouldDisplayLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

export interface RegisteredComponent {
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Register a loggable component.
 * Re-registering keeps an override that was set before registration.
 */
export function registerComponent(name: string, description: string, defaultLevel?: LogLevel): void {
  const existing = registry.get(name);
  registry.set(name, {
    name,
    description,
    levelOverride: existing?.levelOverride ?? defaultLevel,
  });
}

/**
 * Set a log level override for a specific component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = level;
  } else {
    registry.set(name, { name, description: name, levelOverride: level });
  }
}

/**
 * Clear a component's level override, reverting to global level.
 */
export function clearComponentLevel(name: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = undefined;
  }
}

/**
 * Get the effective log level for a component.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  return registry.get(name)?.levelOverride ?? globalLevel;
}

/**
 * Check if a log message at the given level should be emitted for a component.
 */
export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return shouldDisplayLogLevel(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * Get all registered components with their effective levels, sorted by name.
 */
export function getRegisteredComponents(globalLevel: LogLevel): RegisteredComponent[] {
  const result: RegisteredComponent[] = [];

  for (const [, reg] of registry) {
    result.push({
      name: reg.name,
      description: reg.description,
      effectiveLevel: reg.levelOverride ?? globalLevel,
      hasOverride: reg.levelOverride !== undefined,
    });
  }

  return result.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Initialize component debug overrides from environment config.
 * Parses entries like: ["x12-engine", "x12-tokenizer:TRACE"].
 * Components without a level suffix, or with an unknown one, get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      const name = entry.substring(0, colonIndex);
      setComponentLevel(name, parseLevelSuffix(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

function parseLevelSuffix(str: string): LogLevel {
  switch (str.toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.DEBUG;
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  registry.clear();
}
