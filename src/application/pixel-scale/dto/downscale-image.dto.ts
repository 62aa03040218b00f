import { z } from 'zod';

export const downscaleImageCommandSchema = z.object({
  id: z.string().min(1),
  input: z.string().min(1),
  output: z.string().min(1).optional(),
  inPlace: z.boolean().default(false),
  onlyAnalyzeFirst: z.boolean().default(false),
  analyzeOnly: z.boolean().default(false),
});

export type DownscaleImagePayload = z.input<typeof downscaleImageCommandSchema>;

export type ValidatedDownscaleImagePayload = z.output<typeof downscaleImageCommandSchema>;
