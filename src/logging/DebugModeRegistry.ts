/**
 * Debug Mode Registry
 *
 * Per-component log level override management.
 * Module-scoped state, exported functions, reset for testing.
 *
 * Components register themselves when first used (e.g. "deploy", "fetch.git").
 * Operators can then selectively enable DEBUG/TRACE logging for specific
 * components without flooding the whole deploy log.
 */

import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

const registry = new Map<string, ComponentRegistration>();

/**
 * Register a loggable component.
 * An existing override set from the environment survives re-registration.
 */
export function registerComponent(name: string, description: string, defaultLevel?: LogLevel): void {
  const existing = registry.get(name);
  registry.set(name, {
    name,
    description,
    levelOverride: defaultLevel ?? existing?.levelOverride,
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

export interface ComponentLevelInfo {
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}

/**
 * Get all registered components with their effective levels, sorted by name.
 */
export function getRegisteredComponents(globalLevel: LogLevel): ComponentLevelInfo[] {
  const result: ComponentLevelInfo[] = [];
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
 * Initialize component overrides from environment config.
 * Entries look like: ["deploy", "fetch.git:TRACE", "actions:DEBUG"].
 * Components without a level suffix get DEBUG.
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
