/**
 * Fail-fast sequential step runner.
 *
 * Steps run strictly one after another; within a step, invocations run one after another.
 * The first invocation that does not exit with its expected status fails its step, every later
 * step is reported as skipped and never started.
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { StepFailureError } from '../errors';
import type {
  Backend,
  BuildStep,
  CommandInvocation,
  ProvisionReport,
  StepOutcome,
} from '../domain/types';

export interface InvocationResult {
  exitCode: number;
  output?: string;
}

/**
 * Runs one invocation to completion. Rejections count as a failed invocation.
 */
export type InvocationRunner = (
  invocation: CommandInvocation,
  step: BuildStep,
) => Promise<InvocationResult>;

export interface SequenceOptions {
  recipe: string;
  backend: Backend;
  logger: Logger;
  runId?: string;
  onStepStart?: (step: BuildStep, index: number) => void;
  onStepEnd?: (outcome: StepOutcome) => void;
}

/** Exit status a shell reports for a command it cannot find */
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

function exitCodeForError(error: unknown): number {
  if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
    return COMMAND_NOT_FOUND_EXIT_CODE;
  }
  return 1;
}

export async function runSequence(
  steps: BuildStep[],
  runInvocation: InvocationRunner,
  options: SequenceOptions,
): Promise<ProvisionReport> {
  const { logger } = options;
  const runId = options.runId ?? nanoid(10);
  const startedAt = Date.now();
  const outcomes: StepOutcome[] = [];
  let failure: { stepId: string; exitCode: number } | undefined;

  for (const [index, step] of steps.entries()) {
    if (failure) {
      const skipped: StepOutcome = { index, id: step.id, status: 'skipped' };
      outcomes.push(skipped);
      options.onStepEnd?.(skipped);
      continue;
    }

    options.onStepStart?.(step, index);
    logger.info({ runId, step: step.id, index }, step.description);
    const stepStart = Date.now();

    let outcome: StepOutcome = { index, id: step.id, status: 'succeeded', exitCode: 0 };
    for (const invocation of step.run) {
      let result: InvocationResult;
      try {
        result = await runInvocation(invocation, step);
      } catch (error) {
        result = {
          exitCode: exitCodeForError(error),
          output: error instanceof Error ? error.message : String(error),
        };
      }

      if (result.exitCode !== invocation.expectedExitCode) {
        // an unexpected 0 still fails the run
        const exitCode = result.exitCode === 0 ? 1 : result.exitCode;
        outcome = { index, id: step.id, status: 'failed', exitCode };
        if (result.output !== undefined) outcome.output = result.output;
        logger.error(
          {
            runId,
            step: step.id,
            command: invocation.command,
            exitCode: result.exitCode,
            expectedExitCode: invocation.expectedExitCode,
          },
          'Build step failed',
        );
        failure = { stepId: step.id, exitCode };
        break;
      }
    }

    outcome.durationMs = Date.now() - stepStart;
    outcomes.push(outcome);
    options.onStepEnd?.(outcome);
  }

  const report: ProvisionReport = {
    runId,
    recipe: options.recipe,
    backend: options.backend,
    status: failure ? 'failed' : 'succeeded',
    steps: outcomes,
    exitCode: failure ? failure.exitCode : 0,
    durationMs: Date.now() - startedAt,
  };
  if (failure) report.failedStep = failure.stepId;
  return report;
}

/**
 * Throw a StepFailureError for a failed report.
 */
export function assertSucceeded(report: ProvisionReport): void {
  if (report.status === 'succeeded') return;

  const failed = report.steps.find((step) => step.status === 'failed');
  const stepId = report.failedStep ?? failed?.id ?? 'unknown';
  throw new StepFailureError(
    `Step ${stepId} failed with exit code ${report.exitCode}`,
    stepId,
    failed?.index ?? -1,
    report.exitCode,
    { runId: report.runId, recipe: report.recipe, backend: report.backend },
  );
}
