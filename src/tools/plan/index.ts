/**
 * Plan Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { planRecipe, buildPlan } from './tool';
export { planSchema, type PlanParams } from './schema';
export type { PlanEntry, PlanResult } from './tool';
