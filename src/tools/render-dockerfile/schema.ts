/**
 * Schema definition for render-dockerfile tool
 */

import { z } from 'zod';

export const renderDockerfileSchema = z.object({
  recipePath: z.string().optional().describe('Recipe file (YAML or JSON)'),
  baseImage: z.string().optional().describe('Override the base image reference'),
  output: z.string().optional().describe('Write the Dockerfile to this path'),
});

export type RenderDockerfileParams = z.infer<typeof renderDockerfileSchema>;
