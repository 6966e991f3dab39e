/**
 * Schema definition for verify-image tool
 */

import { z } from 'zod';

export const verifyImageSchema = z.object({
  image: z.string().min(1).describe('Built image to check (tag or ID)'),
  baseImage: z
    .string()
    .optional()
    .describe('Image to compare the installer version against; the recipe base image by default'),
  recipePath: z.string().optional().describe('Recipe the image was built from'),
});

export type VerifyImageParams = z.infer<typeof verifyImageSchema>;
