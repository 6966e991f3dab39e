/**
 * Schema definition for plan tool
 */

import { z } from 'zod';

export const planSchema = z.object({
  recipePath: z.string().optional().describe('Recipe file (YAML or JSON)'),
  baseImage: z.string().optional().describe('Override the base image reference'),
});

export type PlanParams = z.infer<typeof planSchema>;
