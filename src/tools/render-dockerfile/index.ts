/**
 * Render Dockerfile Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { renderDockerfileFromRecipe } from './tool';
export { renderDockerfileSchema, type RenderDockerfileParams } from './schema';
export type { RenderDockerfileResult } from './tool';
