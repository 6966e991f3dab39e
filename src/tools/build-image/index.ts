/**
 * Build Image Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { buildImage } from './tool';
export { buildImageSchema, type BuildImageParams } from './schema';
