/**
 * Installed-package inventories of built images, read through probes run inside the image.
 */

import { z } from 'zod';
import { normalizePythonName } from '../domain/package-spec';
import { Failure, Success, type Result } from '../domain/types';
import type { DockerClient } from '../infrastructure/docker/client';

export type ImageProber = Pick<DockerClient, 'runInImage'>;

/** name -> version */
export type Inventory = Map<string, string>;

const PipListSchema = z.array(z.object({ name: z.string(), version: z.string() }));

export const PIP_LIST_COMMAND = ['pip', 'list', '--format=json', '--disable-pip-version-check'];
export const DPKG_QUERY_COMMAND = ['dpkg-query', '-W', '-f=${Package} ${Version}\\n'];

/**
 * Parse `pip list --format=json`. Names are normalized.
 */
export function parsePipList(output: string): Result<Inventory> {
  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch {
    return Failure('pip list did not return JSON');
  }

  const parsed = PipListSchema.safeParse(raw);
  if (!parsed.success) {
    return Failure(`Unexpected pip list output: ${parsed.error.message}`);
  }

  return Success(new Map(parsed.data.map((entry) => [normalizePythonName(entry.name), entry.version])));
}

/**
 * Parse `dpkg-query -W -f='${Package} ${Version}\n'`.
 */
export function parseDpkgQuery(output: string): Inventory {
  const inventory: Inventory = new Map();
  for (const line of output.split('\n')) {
    const [name, version] = line.trim().split(/\s+/, 2);
    if (name) inventory.set(name, version ?? '');
  }
  return inventory;
}

async function runProbe(prober: ImageProber, image: string, cmd: string[]): Promise<Result<string>> {
  const result = await prober.runInImage(image, cmd);
  if (!result.ok) return result;
  if (result.value.exitCode !== 0) {
    return Failure(`${cmd.join(' ')} exited with ${result.value.exitCode}: ${result.value.stderr}`);
  }
  return Success(result.value.stdout);
}

export async function listPythonPackages(prober: ImageProber, image: string): Promise<Result<Inventory>> {
  const output = await runProbe(prober, image, PIP_LIST_COMMAND);
  if (!output.ok) return output;
  return parsePipList(output.value);
}

export async function listSystemPackages(prober: ImageProber, image: string): Promise<Result<Inventory>> {
  const output = await runProbe(prober, image, DPKG_QUERY_COMMAND);
  if (!output.ok) return output;
  return Success(parseDpkgQuery(output.value));
}

export interface InventoryDiff {
  onlyInFirst: string[];
  onlyInSecond: string[];
  /** `name: versionA != versionB` */
  versionMismatch: string[];
}

export function diffInventories(first: Inventory, second: Inventory): InventoryDiff {
  const diff: InventoryDiff = { onlyInFirst: [], onlyInSecond: [], versionMismatch: [] };
  for (const [name, version] of first) {
    const other = second.get(name);
    if (other === undefined) diff.onlyInFirst.push(name);
    else if (other !== version) diff.versionMismatch.push(`${name}: ${version} != ${other}`);
  }
  for (const name of second.keys()) {
    if (!first.has(name)) diff.onlyInSecond.push(name);
  }
  diff.onlyInFirst.sort();
  diff.onlyInSecond.sort();
  diff.versionMismatch.sort();
  return diff;
}

export function isEmptyDiff(diff: InventoryDiff): boolean {
  return diff.onlyInFirst.length === 0 && diff.onlyInSecond.length === 0 && diff.versionMismatch.length === 0;
}
