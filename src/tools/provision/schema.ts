/**
 * Schema definition for provision tool
 */

import { z } from 'zod';

export const provisionSchema = z.object({
  recipePath: z.string().optional().describe('Recipe file (YAML or JSON)'),
  dryRun: z.boolean().optional().describe('Report the plan without running anything'),
});

export type ProvisionParams = z.infer<typeof provisionSchema>;
