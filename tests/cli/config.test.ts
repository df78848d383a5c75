import { describe, it, expect } from 'vitest';
import { envBool, envDefaults, resolveCliOptions } from '../../apps/cli/src/config.js';

describe('envBool', () => {
  it('should accept true and 1 only', () => {
    expect(envBool('FLAG', false, { FLAG: 'true' })).toBe(true);
    expect(envBool('FLAG', false, { FLAG: '1' })).toBe(true);
    expect(envBool('FLAG', true, { FLAG: 'yes' })).toBe(false);
  });

  it('should fall back to the default when unset or empty', () => {
    expect(envBool('FLAG', true, {})).toBe(true);
    expect(envBool('FLAG', false, { FLAG: '' })).toBe(false);
  });
});

describe('envDefaults', () => {
  it('should read every LEDGERSCAN_ variable', () => {
    expect(
      envDefaults({
        LEDGERSCAN_INPUT_DIR: './statements',
        LEDGERSCAN_OUT: 'out.csv',
        LEDGERSCAN_FORMAT: 'csv',
        LEDGERSCAN_VARIANT: 'rbc-visa',
        LEDGERSCAN_SCHEMA_VERSION: 'v1',
        LEDGERSCAN_VERBOSE: 'true',
        LEDGERSCAN_PRETTY: '0',
        LEDGERSCAN_RECURSIVE: '1',
      }),
    ).toEqual({
      inputDir: './statements',
      out: 'out.csv',
      format: 'csv',
      variant: 'rbc-visa',
      schemaVersion: 'v1',
      verbose: true,
      pretty: false,
      recursive: true,
    });
  });

  it('should default to pretty JSON', () => {
    expect(envDefaults({})).toEqual({
      inputDir: undefined,
      out: undefined,
      format: 'json',
      variant: undefined,
      schemaVersion: undefined,
      verbose: false,
      pretty: true,
      recursive: false,
    });
  });
});

describe('resolveCliOptions', () => {
  it('should fill in defaults', () => {
    expect(resolveCliOptions({})).toEqual({ recursive: false, format: 'json', verbose: false, pretty: true });
  });

  it('should accept a known layout', () => {
    expect(resolveCliOptions({ variant: 'bmo-chequing', format: 'table' })).toMatchObject({
      variant: 'bmo-chequing',
      format: 'table',
    });
  });

  it('should report every invalid option', () => {
    let message = '';
    try {
      resolveCliOptions({ format: 'xml', variant: 'td-visa' });
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }

    const lines = message.split('\n');
    expect(lines[0]).toBe('Invalid options:');
    expect(lines.slice(1).map((l) => l.split(':')[0])).toEqual(['  - format', '  - variant']);
  });

  it('should reject unknown options', () => {
    expect(() => resolveCliOptions({ colour: true })).toThrow('  - (options): Unrecognized key(s) in object');
  });
});
