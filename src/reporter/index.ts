/**
 * Report renderers
 */

export { writeJsonReport, serializeReport } from './json.js';
export { formatSummary, type SummaryOptions } from './summary.js';
