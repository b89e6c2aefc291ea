import type { EnrichedRecord } from '../enrich/record.js';

export function renderJson(records: readonly EnrichedRecord[]): string {
  return `${JSON.stringify(records, null, 2)}\n`;
}
