/**
 * Schema definition for build-image tool
 */

import { z } from 'zod';

export const buildImageSchema = z.object({
  recipePath: z.string().optional().describe('Recipe file (YAML or JSON)'),
  baseImage: z.string().optional().describe('Override the base image reference'),
  tag: z.string().optional().describe('Tag applied to the resulting image'),
  pull: z.boolean().optional().describe('Always attempt to pull a newer base image'),
  noCache: z.boolean().optional().describe('Do not use the layer cache'),
});

export type BuildImageParams = z.infer<typeof buildImageSchema>;
