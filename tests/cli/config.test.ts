import { describe, it, expect } from 'vitest';
import { resolveConfig, UsageError } from '../../src/cli/config.js';

describe('resolveConfig', () => {
  it('should return defaults for no arguments', () => {
    expect(resolveConfig([], {})).toEqual({
      expressions: [],
      patterns: [],
      dotPath: null,
      printTree: false,
      debug: false,
      help: false,
      version: false,
    });
  });

  it('should collect inline expressions in order', () => {
    const config = resolveConfig(['-e', '1 ^ 0', '--expr', '~p', '--expr=p => q'], {});

    expect(config.expressions).toEqual(['1 ^ 0', '~p', 'p => q']);
  });

  it('should collect positional patterns', () => {
    const config = resolveConfig(['a.logic', 'statements/*.logic'], {});

    expect(config.patterns).toEqual(['a.logic', 'statements/*.logic']);
  });

  it('should treat everything after "--" as patterns', () => {
    const config = resolveConfig(['--', '--tree', 'x.logic'], {});

    expect(config.patterns).toEqual(['--tree', 'x.logic']);
    expect(config.printTree).toBe(false);
  });

  it('should read the dot path in both forms', () => {
    expect(resolveConfig(['--dot', 'out.dot'], {}).dotPath).toBe('out.dot');
    expect(resolveConfig(['--dot=out.dot'], {}).dotPath).toBe('out.dot');
  });

  it('should read boolean flags', () => {
    const config = resolveConfig(['--tree', '--debug', '-h', '--version'], {});

    expect(config.printTree).toBe(true);
    expect(config.debug).toBe(true);
    expect(config.help).toBe(true);
    expect(config.version).toBe(true);
  });

  describe('environment', () => {
    it('should enable debug from PROPLOGIC_DEBUG', () => {
      expect(resolveConfig([], { PROPLOGIC_DEBUG: '1' }).debug).toBe(true);
      expect(resolveConfig([], { PROPLOGIC_DEBUG: 'true' }).debug).toBe(true);
    });

    it('should ignore other values', () => {
      expect(resolveConfig([], { PROPLOGIC_DEBUG: 'yes' }).debug).toBe(false);
      expect(resolveConfig([], { PROPLOGIC_DEBUG: '0' }).debug).toBe(false);
    });
  });

  describe('errors', () => {
    it('should reject unknown options', () => {
      expect(() => resolveConfig(['--nope'], {})).toThrow(UsageError);
      expect(() => resolveConfig(['--nope'], {})).toThrow('Unknown option "--nope"');
    });

    it('should reject options missing their value', () => {
      expect(() => resolveConfig(['--dot'], {})).toThrow('Option "--dot" requires a value');
      expect(() => resolveConfig(['-e'], {})).toThrow('Option "-e" requires a value');
    });
  });
});
