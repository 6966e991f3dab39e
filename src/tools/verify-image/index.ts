/**
 * Verify Image Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { verifyImage } from './tool';
export { verifyImageSchema, type VerifyImageParams } from './schema';
export type { VerificationCheck, VerificationReport } from './tool';
