/**
 * Pulse30 — Output Files
 *
 * Writes a run's report in every format plus the raw backend responses,
 * for audit and for callers that read files instead of stdout.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ResearchRun } from '../types';
import { SOURCE_ORDER } from '../types';
import { logger } from '../lib/logger';
import { renderFullReport, reportToJson } from './render';

export interface ExportResult {
  dir: string;
  /** Written paths, in write order */
  files: string[];
}

/**
 * Write report.json, report.md, context.md and raw_<source>.json for every
 * source that returned a response. Creates the directory if needed.
 */
export async function writeOutputs(run: ResearchRun, dir: string): Promise<ExportResult> {
  await mkdir(dir, { recursive: true });

  const outputs: [string, string][] = [
    ['report.json', reportToJson(run.report)],
    ['report.md', renderFullReport(run.report)],
    ['context.md', run.report.contextSnippet],
  ];

  for (const source of SOURCE_ORDER) {
    const raw = run.raw[source];
    if (raw === null || raw === undefined) continue;
    outputs.push([`raw_${source}.json`, JSON.stringify(raw, null, 2)]);
  }

  if (run.redditEnriched.length > 0) {
    outputs.push(['reddit_enriched.json', JSON.stringify(run.redditEnriched, null, 2)]);
  }

  const files: string[] = [];
  for (const [name, content] of outputs) {
    const path = join(dir, name);
    await writeFile(path, content, 'utf-8');
    files.push(path);
  }

  logger.debug('Outputs written', { dir, files: files.length });

  return { dir, files };
}
