import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  getEffectiveLevel,
  shouldLog,
  getRegisteredComponents,
  initFromEnv,
  resetDebugRegistry,
} from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';

describe('DebugModeRegistry', () => {
  beforeEach(() => {
    resetDebugRegistry();
  });

  describe('registerComponent', () => {
    it('should register a component', () => {
      registerComponent('x12-tokenizer', 'X12 segment tokenizer');

      expect(getRegisteredComponents(LogLevel.INFO)).toEqual([
        { name: 'x12-tokenizer', description: 'X12 segment tokenizer', effectiveLevel: LogLevel.INFO, hasOverride: false },
      ]);
    });

    it('should register with a default level override', () => {
      registerComponent('x12-walker', 'Loop detection', LogLevel.DEBUG);

      expect(getRegisteredComponents(LogLevel.INFO)).toEqual([
        { name: 'x12-walker', description: 'Loop detection', effectiveLevel: LogLevel.DEBUG, hasOverride: true },
      ]);
    });

    it('should overwrite the description of an existing registration', () => {
      registerComponent('x12-engine', 'Old desc');
      registerComponent('x12-engine', 'New desc');

      const components = getRegisteredComponents(LogLevel.INFO);
      expect(components.map((c) => c.description)).toEqual(['New desc']);
    });

    it('should keep an override set before the component registered', () => {
      setComponentLevel('x12-engine', LogLevel.TRACE);
      registerComponent('x12-engine', 'X12 claim extraction pipeline');

      expect(getEffectiveLevel('x12-engine', LogLevel.INFO)).toBe(LogLevel.TRACE);
    });
  });

  describe('setComponentLevel / clearComponentLevel', () => {
    it('should auto-register an unknown component', () => {
      setComponentLevel('new-component', LogLevel.DEBUG);

      expect(getRegisteredComponents(LogLevel.INFO)).toEqual([
        { name: 'new-component', description: 'new-component', effectiveLevel: LogLevel.DEBUG, hasOverride: true },
      ]);
    });

    it('should revert to the global level when cleared', () => {
      registerComponent('x12-cli', 'CLI');
      setComponentLevel('x12-cli', LogLevel.TRACE);
      clearComponentLevel('x12-cli');

      expect(getEffectiveLevel('x12-cli', LogLevel.WARN)).toBe(LogLevel.WARN);
    });

    it('should ignore clearing an unregistered component', () => {
      clearComponentLevel('missing');

      expect(getRegisteredComponents(LogLevel.INFO)).toEqual([]);
    });
  });

  describe('getEffectiveLevel', () => {
    it('should return the global level without an override', () => {
      registerComponent('x12-engine', 'Engine');

      expect(getEffectiveLevel('x12-engine', LogLevel.WARN)).toBe(LogLevel.WARN);
      expect(getEffectiveLevel('unregistered', LogLevel.ERROR)).toBe(LogLevel.ERROR);
    });
  });

  describe('shouldLog', () => {
    it('should compare against the global level', () => {
      expect(shouldLog('x12-engine', LogLevel.ERROR, LogLevel.INFO)).toBe(true);
      expect(shouldLog('x12-engine', LogLevel.INFO, LogLevel.INFO)).toBe(true);
      expect(shouldLog('x12-engine', LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
      expect(shouldLog('x12-engine', LogLevel.TRACE, LogLevel.INFO)).toBe(false);
    });

    it('should compare against a component override', () => {
      setComponentLevel('x12-walker', LogLevel.TRACE);
      setComponentLevel('x12-cli', LogLevel.WARN);

      expect(shouldLog('x12-walker', LogLevel.TRACE, LogLevel.INFO)).toBe(true);
      expect(shouldLog('x12-cli', LogLevel.INFO, LogLevel.DEBUG)).toBe(false);
    });
  });

  describe('getRegisteredComponents', () => {
    it('should sort components by name', () => {
      registerComponent('x12-walker', 'W');
      registerComponent('x12-cli', 'C');
      registerComponent('x12-engine', 'E');

      expect(getRegisteredComponents(LogLevel.INFO).map((c) => c.name)).toEqual([
        'x12-cli',
        'x12-engine',
        'x12-walker',
      ]);
    });

    it('should reflect the global level for components without an override', () => {
      registerComponent('x12-engine', 'E');

      expect(getRegisteredComponents(LogLevel.WARN).map((c) => c.effectiveLevel)).toEqual([LogLevel.WARN]);
      expect(getRegisteredComponents(LogLevel.DEBUG).map((c) => c.effectiveLevel)).toEqual([LogLevel.DEBUG]);
    });
  });

  describe('initFromEnv', () => {
    it('should set DEBUG for a component without a level suffix', () => {
      initFromEnv(['x12-engine']);

      expect(getEffectiveLevel('x12-engine', LogLevel.INFO)).toBe(LogLevel.DEBUG);
    });

    it('should parse component:LEVEL entries', () => {
      initFromEnv(['x12-walker:TRACE', 'x12-cli:warn', 'x12-tokenizer:ERROR']);

      expect(getEffectiveLevel('x12-walker', LogLevel.INFO)).toBe(LogLevel.TRACE);
      expect(getEffectiveLevel('x12-cli', LogLevel.INFO)).toBe(LogLevel.WARN);
      expect(getEffectiveLevel('x12-tokenizer', LogLevel.INFO)).toBe(LogLevel.ERROR);
    });

    it('should default to DEBUG for an unknown level suffix', () => {
      initFromEnv(['x12-engine:LOUD']);

      expect(getEffectiveLevel('x12-engine', LogLevel.ERROR)).toBe(LogLevel.DEBUG);
    });

    it('should do nothing for an empty list', () => {
      initFromEnv([]);

      expect(getRegisteredComponents(LogLevel.INFO)).toEqual([]);
    });
  });
});
