/**
 * Plain-text renderings of tool results for the terminal
 */

import type { ProvisionReport } from '../domain/types';
import type { ValidateRecipeResult } from '../tools/validate-recipe';
import type { PlanResult } from '../tools/plan';
import type { VerificationReport } from '../tools/verify-image';
import type { CompareImagesResult } from '../tools/compare-images';
import type { InventoryDiff } from '../lib/package-inventory';

export function formatValidation(result: ValidateRecipeResult): string {
  const lines = [`${result.recipe}: ${result.valid ? 'valid' : 'invalid'} (${result.steps} steps)`];
  for (const issue of result.errors) {
    lines.push(`  error   ${issue.stepId ?? '-'}  ${issue.code}  ${issue.message}`);
  }
  for (const issue of result.warnings) {
    lines.push(`  warning ${issue.stepId ?? '-'}  ${issue.code}  ${issue.message}`);
  }
  return lines.join('\n');
}

export function formatPlan(plan: PlanResult): string {
  const lines = [`${plan.recipe} from ${plan.baseImage}`];
  for (const step of plan.steps) {
    lines.push(`${step.index + 1}. ${step.id} [${step.kind}] ${step.description}`);
    for (const command of step.commands) lines.push(`     $ ${command}`);
  }
  return lines.join('\n');
}

export function formatReport(report: ProvisionReport): string {
  const lines = [`${report.recipe} (${report.backend}) ${report.status} in ${report.durationMs}ms`];
  for (const step of report.steps) {
    const exit = step.exitCode === undefined ? '' : ` exit ${step.exitCode}`;
    lines.push(`  ${step.status.padEnd(9)} ${step.id}${exit}`);
  }
  if (report.status === 'failed' && report.failedStep) {
    const failed = report.steps.find((step) => step.id === report.failedStep);
    if (failed?.output) lines.push('', failed.output);
  }
  if (report.imageId) {
    lines.push(report.tag ? `image ${report.tag} ${report.imageId}` : `image ${report.imageId}`);
  }
  return lines.join('\n');
}

export function formatVerification(report: VerificationReport): string {
  const lines = [`${report.image}: ${report.passed ? 'all checks passed' : 'checks failed'}`];
  for (const check of report.checks) {
    lines.push(`  ${check.passed ? 'ok  ' : 'FAIL'} ${check.name}  ${check.detail}`);
  }
  return lines.join('\n');
}

function formatDiff(label: string, diff: InventoryDiff, result: CompareImagesResult): string[] {
  const lines: string[] = [];
  for (const name of diff.onlyInFirst) lines.push(`  ${label} only in ${result.imageA}: ${name}`);
  for (const name of diff.onlyInSecond) lines.push(`  ${label} only in ${result.imageB}: ${name}`);
  for (const entry of diff.versionMismatch) lines.push(`  ${label} version differs: ${entry}`);
  return lines;
}

export function formatComparison(result: CompareImagesResult): string {
  return [
    `${result.imageA} vs ${result.imageB}: ${result.identical ? 'identical' : 'different'}`,
    ...formatDiff('python', result.python, result),
    ...formatDiff('system', result.system, result),
  ].join('\n');
}
