/**
 * Schema definition for validate-recipe tool
 */

import { z } from 'zod';

export const validateRecipeSchema = z.object({
  recipePath: z.string().optional().describe('Recipe file (YAML or JSON)'),
  baseImage: z.string().optional().describe('Override the base image reference'),
});

export type ValidateRecipeParams = z.infer<typeof validateRecipeSchema>;
