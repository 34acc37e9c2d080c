import { z } from 'zod';
import { outcomeRecordSchema, recordToResult } from '../reporter.js';
import { summarize as summarizeResults, summaryToRecord } from '../scoring/index.js';

// Tool: qa_summarize - recompute batch statistics from saved records
export const summarizeSchema = z.object({
  results: z.array(outcomeRecordSchema).describe('Records as written to qa_results.json'),
});

export type SummarizeInput = z.infer<typeof summarizeSchema>;

export function summarize(input: SummarizeInput): Record<string, unknown> {
  return summaryToRecord(summarizeResults(input.results.map(recordToResult)));
}
