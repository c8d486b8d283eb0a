import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];

  beforeEach(() => {
    capturedOutput = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function getOutput(index: number): string {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return output;
  }

  function parseOutput(index: number): Record<string, unknown> {
    const parsed: unknown = JSON.parse(getOutput(index).trim());
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('Expected a JSON object');
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  describe('unserializable data', () => {
    it('should handle circular references without throwing', () => {
      const logger = new Logger({ component: 'TypeRegistry' });

      const circularObj: Record<string, unknown> = { name: 'test' };
      circularObj.self = circularObj;

      expect(() => {
        logger.info('circular_test', circularObj);
      }).not.toThrow();

      expect(capturedOutput.length).toBe(1);
      const parsed = parseOutput(0);

      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('TypeRegistry');
      expect(parsed.event).toBe('circular_test');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
      expect(parsed.data).toBeUndefined();
    });

    it('should handle BigInt values without throwing', () => {
      const logger = new Logger({ component: 'TypeRegistry' });

      logger.info('bigint_test', { value: BigInt(9007199254740991) });

      expect(capturedOutput.length).toBe(1);
      const parsed = parseOutput(0);

      expect(parsed.event).toBe('bigint_test');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should output single JSON line even when serialization fails', () => {
      const logger = new Logger({ component: 'TypeRegistry' });

      const circularObj: Record<string, unknown> = { name: 'test' };
      circularObj.self = circularObj;

      logger.error('error_with_circular', circularObj);

      const output = getOutput(0);
      expect(output.endsWith('\n')).toBe(true);
      expect(output.trim().split('\n').length).toBe(1);
    });

    it('should include timestamp, level, component, and event in fallback entry', () => {
      const logger = new Logger({ component: 'FallbackTest' });

      const circularObj: Record<string, unknown> = {};
      circularObj.ref = circularObj;

      logger.warn('fallback_fields', circularObj);

      const parsed = parseOutput(0);

      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
      expect(parsed.level).toBe('warn');
      expect(parsed.component).toBe('FallbackTest');
      expect(parsed.event).toBe('fallback_fields');
    });

    it('should always write one parseable line (property-based)', () => {
      const logger = new Logger({ component: 'PropertyTest' });

      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.anything()), (arbitraryData) => {
          capturedOutput = [];

          logger.info('fuzz_test', arbitraryData);

          expect(capturedOutput.length).toBe(1);
          const parsed = parseOutput(0);
          expect(parsed.level).toBe('info');
          expect(parsed.component).toBe('PropertyTest');
          expect(parsed.event).toBe('fuzz_test');

          if (parsed.serializationError !== undefined) {
            expect(parsed.originalData).toBe('[unserializable]');
          }
        })
      );
    });
  });

  describe('normal logging', () => {
    it('should log info messages correctly', () => {
      const logger = new Logger({ component: 'ClosureCollector' });

      logger.info('closure_collected', { roots: ['User'], declarationCount: 2 });

      expect(capturedOutput.length).toBe(1);
      const parsed = parseOutput(0);

      expect(parsed.level).toBe('info');
      expect(parsed.event).toBe('closure_collected');
      expect(parsed.data).toEqual({ roots: ['User'], declarationCount: 2 });
    });

    it('should omit data when none is given', () => {
      const logger = new Logger({ component: 'TypeRegistry' });

      logger.info('registry_frozen');

      expect(parseOutput(0)).not.toHaveProperty('data');
    });

    it('should not log debug messages when debugMode is false', () => {
      const logger = new Logger({ component: 'TypeRegistry', debugMode: false });

      logger.debug('binding_registered', { typeId: 'User' });

      expect(capturedOutput.length).toBe(0);
    });

    it('should log debug messages when debugMode is true', () => {
      const logger = new Logger({ component: 'TypeRegistry', debugMode: true });

      logger.debug('binding_registered', { typeId: 'User' });

      expect(capturedOutput.length).toBe(1);
      expect(parseOutput(0).level).toBe('debug');
    });

    it('should log warn and error levels', () => {
      const logger = new Logger({ component: 'TypeRegistry' });

      logger.warn('binding_replaced', { typeId: 'User' });
      logger.error('generation_failed', { reason: 'test' });

      expect(parseOutput(0).level).toBe('warn');
      expect(parseOutput(1).level).toBe('error');
      expect(parseOutput(1).data).toEqual({ reason: 'test' });
    });
  });

  describe('child', () => {
    it('should use the new component name', () => {
      const logger = new Logger({ component: 'tsbind' }).child('Generator');

      logger.info('generation_started');

      expect(parseOutput(0).component).toBe('Generator');
    });

    it('should inherit debug mode', () => {
      new Logger({ component: 'tsbind', debugMode: true }).child('Generator').debug('traced');
      new Logger({ component: 'tsbind', debugMode: false }).child('Generator').debug('hidden');

      expect(capturedOutput.length).toBe(1);
      expect(parseOutput(0).event).toBe('traced');
    });
  });
});
