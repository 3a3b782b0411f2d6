/**
 * Pulse30 — Research Script
 *
 * Researches a topic across the configured sources for the last N days,
 * writes every output format to disk and prints one of them.
 *
 * Usage:
 *   npm run research -- "Claude Code"                  # Keys from ~/.config/pulse30/.env
 *   npm run research -- "Claude Code" --mock           # Canned fixtures, no network
 *   npm run research -- "Claude Code" --deep --dailydev --emit=md
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { runResearch, type MockResponses } from '../src/feeds';
import { renderCompact, renderFullReport, reportToJson, writeOutputs } from '../src/delivery';
import { parseArgs, USAGE, type CliOptions } from '../src/lib/args';
import { loadConfig, resolveSources } from '../src/lib/config';
import { ConfigError } from '../src/lib/errors';
import { loadFixture, MOCK_NOW } from '../src/lib/fixtures';
import { errorMessage, logger, setLogLevel } from '../src/lib/logger';
import { selectOpenAIModel } from '../src/lib/models';
import type { ResearchRun } from '../src/types';

const DEFAULT_OUT_DIR = join(homedir(), '.local', 'share', 'pulse30', 'out');

// ============================================================
// STAGES
// ============================================================

function loadMockResponses(): MockResponses {
  return {
    reddit: loadFixture('reddit'),
    x: loadFixture('x'),
    dailydev: loadFixture('dailydev'),
    youtube: loadFixture('youtube'),
    redditThread: loadFixture('redditThread'),
  };
}

function emit(run: ResearchRun, options: CliOptions, outDir: string): string {
  switch (options.emit) {
    case 'compact':
      return renderCompact(run.report);
    case 'json':
      return reportToJson(run.report);
    case 'md':
      return renderFullReport(run.report);
    case 'context':
      return run.report.contextSnippet;
    case 'path':
      return outDir;
  }
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    process.stderr.write(`Error: ${errorMessage(error)}\n\n${USAGE}\n`);
    process.exit(1);
  }

  if (options.debug) setLogLevel('debug');

  const startTime = Date.now();

  try {
    const config = loadConfig();
    const selection = resolveSources(
      {
        sources: options.sources,
        dailydev: options.dailydev,
        youtube: options.youtube,
        mock: options.mock,
      },
      config
    );

    const openaiModel = selection.selected.includes('reddit')
      ? await selectOpenAIModel(config, {
          mockModels: options.mock ? loadFixture('models') : undefined,
        })
      : null;

    const run = await runResearch({
      topic: options.topic,
      selection: selection.selected,
      credentials: selection.credentials,
      depth: options.depth,
      days: options.days,
      now: options.mock ? MOCK_NOW : undefined,
      mode: selection.mode,
      models: { openai: openaiModel },
      mock: options.mock ? loadMockResponses() : undefined,
    });

    const outDir = options.outDir ?? DEFAULT_OUT_DIR;
    await writeOutputs(run, outDir);

    process.stdout.write(`${emit(run, options, outDir)}\n`);

    logger.info('Research finished', {
      durationMs: Date.now() - startTime,
      outDir,
      enrichmentErrors: run.enrichmentErrors.length,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(`Error: ${error.message}\n`);
    } else {
      logger.error('Research failed', { error: errorMessage(error) });
    }
    process.exit(1);
  }
}

main().catch(error => {
  logger.error('Unexpected failure', { error: errorMessage(error) });
  process.exit(1);
});
