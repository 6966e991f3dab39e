/**
 * Provision Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { provision, createLocalRunner } from './tool';
export { provisionSchema, type ProvisionParams } from './schema';
export type { ProvisionResult } from './tool';
