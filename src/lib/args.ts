/**
 * Pulse30 — Command-line Arguments
 */

import type { Depth } from '../types';
import { isSourceRequest, type SourceRequest } from './config';
import { ConfigError } from './errors';

export type EmitFormat = 'compact' | 'json' | 'md' | 'context' | 'path';

const EMIT_FORMATS: readonly EmitFormat[] = ['compact', 'json', 'md', 'context', 'path'];

function isEmitFormat(value: string): value is EmitFormat {
  return EMIT_FORMATS.some(format => format === value);
}

export interface CliOptions {
  topic: string;
  mock: boolean;
  emit: EmitFormat;
  sources: SourceRequest;
  depth: Depth;
  dailydev: boolean;
  youtube: boolean;
  days: number;
  outDir: string | null;
  debug: boolean;
}

export const USAGE = `Usage: npm run research -- <topic> [options]

Options:
  --mock                  Use canned fixtures instead of live APIs
  --emit=FORMAT           compact | json | md | context | path (default: compact)
  --sources=MODE          auto | reddit | x | both (default: auto)
  --quick                 Fewer results, faster
  --deep                  More results, slower
  --dailydev              Include daily.dev articles (on whenever DAILYDEV_API_KEY is set)
  --youtube               Include YouTube videos (TubeLab credits)
  --days=N                Window length in days (default: 30)
  --out=DIR               Output directory
  --debug                 Verbose logging`;

/**
 * Parse argv (without node and script). Positional words form the topic.
 *
 * @throws ConfigError on unknown options, invalid values or --quick with --deep
 */
export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    topic: '',
    mock: false,
    emit: 'compact',
    sources: 'auto',
    depth: 'default',
    dailydev: false,
    youtube: false,
    days: 30,
    outDir: null,
    debug: false,
  };

  const words: string[] = [];
  let quick = false;
  let deep = false;

  for (const arg of argv) {
    if (!arg.startsWith('--')) {
      words.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const value = eq === -1 ? null : arg.slice(eq + 1);

    switch (name) {
      case 'mock':
        options.mock = true;
        break;
      case 'quick':
        quick = true;
        break;
      case 'deep':
        deep = true;
        break;
      case 'dailydev':
        options.dailydev = true;
        break;
      case 'youtube':
        options.youtube = true;
        break;
      case 'debug':
        options.debug = true;
        break;
      case 'emit':
        if (value === null || !isEmitFormat(value)) {
          throw new ConfigError(`Invalid --emit value: ${value ?? ''}. Expected one of ${EMIT_FORMATS.join(', ')}`);
        }
        options.emit = value;
        break;
      case 'sources':
        if (value === null || !isSourceRequest(value)) {
          throw new ConfigError(`Invalid --sources value: ${value ?? ''}. Expected auto, reddit, x or both`);
        }
        options.sources = value;
        break;
      case 'days': {
        const days = Number(value);
        if (value === null || !Number.isInteger(days) || days < 1) {
          throw new ConfigError(`Invalid --days value: ${value ?? ''}. Expected a positive integer`);
        }
        options.days = days;
        break;
      }
      case 'out':
        if (!value) throw new ConfigError('--out needs a directory');
        options.outDir = value;
        break;
      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  if (quick && deep) {
    throw new ConfigError('Cannot use both --quick and --deep');
  }
  options.depth = quick ? 'quick' : deep ? 'deep' : 'default';

  options.topic = words.join(' ').trim();
  if (!options.topic) {
    throw new ConfigError('Please provide a topic to research.');
  }

  return options;
}
