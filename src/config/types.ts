import { z } from 'zod';

export const DEFAULT_CSV_PATH = 'pod-disruptions.csv';

export const ReportConfigSchema = z
  .object({
    csvPath: z.string().min(1).default(DEFAULT_CSV_PATH),
    kubectl: z.string().min(1).default('kubectl'),
    context: z.string().min(1).optional(),
  })
  .strict();

export type ReportConfig = z.infer<typeof ReportConfigSchema>;

export interface ConfigOverrides {
  csvPath?: string;
  context?: string;
}
