/**
 * Tests for command-line parsing
 */

import { describe, it, expect } from 'vitest';
import { parseArgs } from '../../src/lib/args';
import { ConfigError } from '../../src/lib/errors';

describe('parseArgs', () => {
  it('should apply defaults and join positional words into the topic', () => {
    expect(parseArgs(['Claude', 'Code'])).toEqual({
      topic: 'Claude Code',
      mock: false,
      emit: 'compact',
      sources: 'auto',
      depth: 'default',
      dailydev: false,
      youtube: false,
      days: 30,
      outDir: null,
      debug: false,
    });
  });

  it('should read flags and valued options', () => {
    const options = parseArgs([
      'Bun runtime',
      '--mock',
      '--emit=json',
      '--sources=x',
      '--deep',
      '--dailydev',
      '--youtube',
      '--days=7',
      '--out=/tmp/pulse30-out',
      '--debug',
    ]);

    expect(options.topic).toBe('Bun runtime');
    expect(options.mock).toBe(true);
    expect(options.emit).toBe('json');
    expect(options.sources).toBe('x');
    expect(options.depth).toBe('deep');
    expect(options.dailydev).toBe(true);
    expect(options.youtube).toBe(true);
    expect(options.days).toBe(7);
    expect(options.outDir).toBe('/tmp/pulse30-out');
    expect(options.debug).toBe(true);
  });

  it('should reject --quick with --deep', () => {
    expect(() => parseArgs(['topic', '--quick', '--deep'])).toThrow('Cannot use both --quick and --deep');
  });

  it('should reject invalid values and unknown options', () => {
    expect(() => parseArgs(['topic', '--emit=pdf'])).toThrow(ConfigError);
    expect(() => parseArgs(['topic', '--sources=web'])).toThrow(ConfigError);
    expect(() => parseArgs(['topic', '--days=0'])).toThrow(ConfigError);
    expect(() => parseArgs(['topic', '--verbose'])).toThrow('Unknown option: --verbose');
  });

  it('should require a topic', () => {
    expect(() => parseArgs(['--mock'])).toThrow('Please provide a topic to research.');
  });
});
