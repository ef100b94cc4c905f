import { z } from 'zod';

export const PriorityTierSchema = z.preprocess(
  v => (typeof v === 'string' ? v.trim().toUpperCase().charAt(0) : v),
  z.enum(['A', 'B', 'C']).catch('C')
);

export const ProspectRecordSchema = z.object({
  name: z.string().trim().min(1),
  segment: z.string().trim(),
  region: z.string().trim(),
  justification: z.string().trim(),
  website: z.string().trim().optional().default(''),
  priority: PriorityTierSchema
});

export const SeedSegmentSchema = z.object({
  title: z.string().min(1),
  description: z.string()
});

export const SeedSegmentListSchema = z.array(SeedSegmentSchema).min(1);
