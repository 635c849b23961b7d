import { z } from 'zod';
import { OptimizationRunSummary } from './optimize-intervals.dto';

export const ListRunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type ListRunsQuery = z.infer<typeof ListRunsQuerySchema>;

export interface ListRunsResponse {
  runs: OptimizationRunSummary[];
}
