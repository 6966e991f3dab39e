/**
 * Compare the installed package sets of two images. Building the same recipe twice from the same
 * base image should give an empty difference.
 */

import { createDockerClient } from '../../infrastructure/docker/client';
import {
  listPythonPackages,
  listSystemPackages,
  diffInventories,
  isEmptyDiff,
  type InventoryDiff,
} from '../../lib/package-inventory';
import { createTimer } from '../../lib/logger';
import { Success, Failure, type Result } from '../../domain/types';
import type { ToolContext } from '../types';
import type { CompareImagesParams } from './schema';

export interface CompareImagesResult {
  imageA: string;
  imageB: string;
  identical: boolean;
  python: InventoryDiff;
  system: InventoryDiff;
}

export async function compareImages(
  params: CompareImagesParams,
  context: ToolContext,
): Promise<Result<CompareImagesResult>> {
  const { logger, config } = context;
  const { imageA, imageB } = params;
  const timer = createTimer(logger, 'compare-images', { imageA, imageB });
  const prober = context.docker ?? createDockerClient(logger, { socketPath: config.docker.socketPath });

  const pythonA = await listPythonPackages(prober, imageA);
  if (!pythonA.ok) {
    timer.error(pythonA.error);
    return Failure(pythonA.error);
  }
  const pythonB = await listPythonPackages(prober, imageB);
  if (!pythonB.ok) {
    timer.error(pythonB.error);
    return Failure(pythonB.error);
  }
  const systemA = await listSystemPackages(prober, imageA);
  if (!systemA.ok) {
    timer.error(systemA.error);
    return Failure(systemA.error);
  }
  const systemB = await listSystemPackages(prober, imageB);
  if (!systemB.ok) {
    timer.error(systemB.error);
    return Failure(systemB.error);
  }

  const python = diffInventories(pythonA.value, pythonB.value);
  const system = diffInventories(systemA.value, systemB.value);
  const identical = isEmptyDiff(python) && isEmptyDiff(system);

  timer.end({ identical });
  return Success({ imageA, imageB, identical, python, system });
}
