/**
 * Compare Images Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { compareImages } from './tool';
export { compareImagesSchema, type CompareImagesParams } from './schema';
export type { CompareImagesResult } from './tool';
