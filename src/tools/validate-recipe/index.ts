/**
 * Validate Recipe Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { validateRecipeFile } from './tool';
export { validateRecipeSchema, type ValidateRecipeParams } from './schema';
export type { ValidateRecipeResult } from './tool';
