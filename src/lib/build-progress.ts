/**
 * Interpretation of Docker Engine build progress events.
 *
 * The classic builder announces each instruction as `Step N/M : <instruction>` and reports a
 * failing RUN as an `errorDetail` event. Instruction numbers map back to recipe steps through the
 * rendered Dockerfile.
 */

import type { RenderedDockerfile } from './dockerfile';
import type { BuildStep, StepOutcome } from '../domain/types';

export interface DockerBuildEvent {
  stream?: string;
  status?: string;
  error?: string;
  errorDetail?: { code?: number; message?: string };
  aux?: { ID?: string };
}

export interface BuildInterpretation {
  status: 'succeeded' | 'failed';
  steps: StepOutcome[];
  failedStep?: string;
  exitCode: number;
  imageId?: string;
  errorMessage?: string;
}

const STEP_LINE = /^Step (\d+)\/(\d+) : /;
const NON_ZERO_CODE = /returned a non-zero code: (\d+)/;

function exitCodeFromError(event: DockerBuildEvent): number {
  const code = event.errorDetail?.code;
  if (typeof code === 'number' && code > 0) return code;
  const message = event.errorDetail?.message ?? event.error ?? '';
  const [, reported] = NON_ZERO_CODE.exec(message) ?? [];
  return reported ? Number(reported) : 1;
}

export class BuildProgressTracker {
  private currentInstruction = 0;
  private readonly startTimes = new Map<number, number>();
  private readonly durations = new Map<number, number>();
  /** Output of the current instruction only, trimmed to its last `maxOutput` characters */
  private output = '';
  private error: { instruction: number; exitCode: number; message: string; output: string } | undefined;
  private imageId: string | undefined;

  constructor(
    private readonly rendered: RenderedDockerfile,
    private readonly steps: BuildStep[],
    private readonly onInstruction?: (number: number, stepId: string | undefined) => void,
    private readonly maxOutput = Number.POSITIVE_INFINITY,
  ) {}

  handle(event: DockerBuildEvent): void {
    if (event.aux?.ID) {
      this.imageId = event.aux.ID;
    }

    if (event.error !== undefined || event.errorDetail !== undefined) {
      const message = event.errorDetail?.message ?? event.error ?? 'Unknown build error';
      this.error ??= {
        instruction: this.currentInstruction,
        exitCode: exitCodeFromError(event),
        message,
        output: this.output,
      };
      return;
    }

    if (event.stream === undefined) return;

    for (const line of event.stream.split('\n')) {
      const [, instruction] = STEP_LINE.exec(line) ?? [];
      if (instruction) {
        this.enter(Number(instruction));
        continue;
      }
      if (line.trim() && this.currentInstruction > 0) {
        this.keep(line);
      }
    }
  }

  private keep(line: string): void {
    const combined = `${this.output}${line}\n`;
    this.output = combined.length > this.maxOutput ? combined.slice(combined.length - this.maxOutput) : combined;
  }

  private enter(instruction: number): void {
    this.closeCurrent();
    this.currentInstruction = instruction;
    this.output = '';
    this.startTimes.set(instruction, Date.now());
    const stepId = this.rendered.instructions.find((i) => i.number === instruction)?.stepId;
    this.onInstruction?.(instruction, stepId);
  }

  private closeCurrent(): void {
    const started = this.startTimes.get(this.currentInstruction);
    if (started !== undefined && !this.durations.has(this.currentInstruction)) {
      this.durations.set(this.currentInstruction, Date.now() - started);
    }
  }

  /**
   * Record a transport-level failure (the build stream itself broke).
   */
  fail(message: string): void {
    this.error ??= { instruction: this.currentInstruction, exitCode: 1, message, output: this.output };
  }

  finish(): BuildInterpretation {
    this.closeCurrent();

    const instructionOf = new Map<string, number>();
    for (const instruction of this.rendered.instructions) {
      if (instruction.stepId) instructionOf.set(instruction.stepId, instruction.number);
    }

    const failedInstruction = this.error?.instruction;
    const steps: StepOutcome[] = this.steps.map((step, index) => {
      const number = instructionOf.get(step.id) ?? Number.MAX_SAFE_INTEGER;
      const duration = this.durations.get(number);
      const withDuration = (outcome: StepOutcome): StepOutcome =>
        duration === undefined ? outcome : { ...outcome, durationMs: duration };

      if (failedInstruction === undefined) {
        return withDuration({ index, id: step.id, status: 'succeeded', exitCode: 0 });
      }
      if (number < failedInstruction) {
        return withDuration({ index, id: step.id, status: 'succeeded', exitCode: 0 });
      }
      if (number === failedInstruction && this.error) {
        return withDuration({
          index,
          id: step.id,
          status: 'failed',
          exitCode: this.error.exitCode,
          output: `${this.error.output}${this.error.message}`,
        });
      }
      return { index, id: step.id, status: 'skipped' };
    });

    if (!this.error) {
      const result: BuildInterpretation = { status: 'succeeded', steps, exitCode: 0 };
      if (this.imageId) result.imageId = this.imageId;
      return result;
    }

    const result: BuildInterpretation = {
      status: 'failed',
      steps,
      exitCode: this.error.exitCode,
      errorMessage: this.error.message,
    };
    const failed = steps.find((step) => step.status === 'failed');
    if (failed) result.failedStep = failed.id;
    return result;
  }
}
