/**
 * Pulse30 — Delivery
 *
 * Report renderers and file output.
 */

export {
  renderCompact,
  renderFullReport,
  renderContextSnippet,
  reportToJson,
  formatEngagement,
  formatItemDate,
  formatDuration,
  SOURCE_TITLES,
} from './render';
export { writeOutputs, type ExportResult } from './export';
