export { summarize, formatOutcomeLine } from './ResultAggregator.js';
export { formatReport, formatHeadline } from './formatter.js';
export type { Report } from './types.js';
