/**
 * Schema definition for compare-images tool
 */

import { z } from 'zod';

export const compareImagesSchema = z.object({
  imageA: z.string().min(1).describe('First image (tag or ID)'),
  imageB: z.string().min(1).describe('Second image (tag or ID)'),
});

export type CompareImagesParams = z.infer<typeof compareImagesSchema>;
