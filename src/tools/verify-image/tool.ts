/**
 * Check a built image against what its recipe says it should contain.
 *
 * Every probe runs in a throwaway container of the image. A probe that cannot run at all counts as
 * a failed check rather than aborting the verification; only an unreadable recipe or an image whose
 * package list cannot be read produce a Failure.
 */

import { projectPackageState, type PackageState } from '../../domain/package-state';
import { formatBaseImage } from '../../domain/base-image';
import { createDockerClient } from '../../infrastructure/docker/client';
import { listPythonPackages, type ImageProber, type Inventory } from '../../lib/package-inventory';
import { compareVersions, parsePipVersion } from '../../lib/versions';
import { createTimer } from '../../lib/logger';
import { Success, Failure, type Result, type Recipe } from '../../domain/types';
import { recipeFor } from '../shared';
import type { ToolContext } from '../types';
import type { VerifyImageParams } from './schema';

export interface VerificationCheck {
  name: string;
  passed: boolean;
  detail: string;
}

export interface VerificationReport {
  image: string;
  recipe: string;
  passed: boolean;
  checks: VerificationCheck[];
}

/** Engines the driver installer places under its own cache directory */
const PROBED_BROWSERS = new Set(['chromium', 'firefox', 'webkit']);

const SYSTEM_PACKAGE_PROBE = 'dpkg -s "$1" >/dev/null 2>&1 || command -v "$1" >/dev/null';

const BROWSER_PATH_SCRIPT = [
  'import sys',
  'from playwright.sync_api import sync_playwright',
  'with sync_playwright() as p:',
  '    print(getattr(p, sys.argv[1]).executable_path)',
].join('\n');

const BROWSER_PROBE = 'exe="$(python -c "$0" "$1")" && test -x "$exe" && echo "$exe"';

async function pipVersion(prober: ImageProber, image: string): Promise<Result<string>> {
  const result = await prober.runInImage(image, ['pip', '--version']);
  if (!result.ok) return result;
  const version = parsePipVersion(result.value.stdout);
  if (!version) {
    return Failure(`Cannot read pip version from ${image}: ${result.value.stdout || result.value.stderr}`);
  }
  return Success(version);
}

async function checkInstallerVersion(
  prober: ImageProber,
  image: string,
  baseImage: string,
): Promise<VerificationCheck> {
  const name = 'installer-version';
  const [after, before] = await Promise.all([pipVersion(prober, image), pipVersion(prober, baseImage)]);
  if (!after.ok) return { name, passed: false, detail: after.error };
  if (!before.ok) return { name, passed: false, detail: before.error };

  const passed = compareVersions(after.value, before.value) > 0;
  return {
    name,
    passed,
    detail: passed
      ? `pip ${after.value} is newer than ${before.value} in ${baseImage}`
      : `pip ${after.value} is not newer than ${before.value} in ${baseImage}`,
  };
}

function pythonChecks(state: PackageState, installed: Inventory): VerificationCheck[] {
  const checks: VerificationCheck[] = [];

  for (const [pkg, pinned] of state.python) {
    const version = installed.get(pkg);
    const name = `python:${pkg}`;
    if (version === undefined) {
      checks.push({ name, passed: false, detail: 'not installed' });
    } else if (pinned !== null && version !== pinned) {
      checks.push({ name, passed: false, detail: `installed ${version}, expected ${pinned}` });
    } else {
      checks.push({ name, passed: true, detail: version });
    }
  }

  for (const pkg of state.removed) {
    const version = installed.get(pkg);
    checks.push({
      name: `python-absent:${pkg}`,
      passed: version === undefined,
      detail: version === undefined ? 'absent' : `still installed (${version})`,
    });
  }

  return checks;
}

async function checkSystemPackage(prober: ImageProber, image: string, pkg: string): Promise<VerificationCheck> {
  const name = `system:${pkg}`;
  const result = await prober.runInImage(image, ['sh', '-c', SYSTEM_PACKAGE_PROBE, 'sh', pkg]);
  if (!result.ok) return { name, passed: false, detail: result.error };
  return result.value.exitCode === 0
    ? { name, passed: true, detail: 'installed' }
    : { name, passed: false, detail: 'not installed' };
}

async function checkBrowser(prober: ImageProber, image: string, engine: string): Promise<VerificationCheck> {
  const name = `browser:${engine}`;
  const result = await prober.runInImage(image, ['sh', '-c', BROWSER_PROBE, BROWSER_PATH_SCRIPT, engine]);
  if (!result.ok) return { name, passed: false, detail: result.error };
  return result.value.exitCode === 0
    ? { name, passed: true, detail: result.value.stdout }
    : { name, passed: false, detail: result.value.stderr || 'executable missing' };
}

async function checkTimezone(prober: ImageProber, image: string, zone: string): Promise<VerificationCheck> {
  const name = 'timezone';
  const result = await prober.runInImage(image, ['cat', '/etc/timezone']);
  if (!result.ok) return { name, passed: false, detail: result.error };
  const actual = result.value.stdout.trim();
  return actual === zone
    ? { name, passed: true, detail: zone }
    : { name, passed: false, detail: `found "${actual}", expected "${zone}"` };
}

async function runChecks(
  prober: ImageProber,
  image: string,
  baseImage: string,
  recipe: Recipe,
): Promise<Result<VerificationCheck[]>> {
  const state = projectPackageState(recipe);
  const checks: VerificationCheck[] = [];

  if (recipe.steps.some((step) => step.kind === 'pip-upgrade')) {
    checks.push(await checkInstallerVersion(prober, image, baseImage));
  }

  const installed = await listPythonPackages(prober, image);
  if (!installed.ok) return installed;
  checks.push(...pythonChecks(state, installed.value));

  for (const pkg of state.system.keys()) {
    checks.push(await checkSystemPackage(prober, image, pkg));
  }

  for (const engine of state.browsers) {
    if (PROBED_BROWSERS.has(engine)) {
      checks.push(await checkBrowser(prober, image, engine));
    }
  }

  if (state.timezone) {
    checks.push(await checkTimezone(prober, image, state.timezone));
  }

  return Success(checks);
}

export async function verifyImage(
  params: VerifyImageParams,
  context: ToolContext,
): Promise<Result<VerificationReport>> {
  const { logger, config } = context;
  const timer = createTimer(logger, 'verify-image', { image: params.image });

  const recipeResult = await recipeFor({ recipePath: params.recipePath }, context);
  if (!recipeResult.ok) {
    timer.error(recipeResult.error);
    return Failure(recipeResult.error);
  }
  const recipe = recipeResult.value;
  const baseImage = params.baseImage ?? formatBaseImage(recipe.baseImage);
  const prober = context.docker ?? createDockerClient(logger, { socketPath: config.docker.socketPath });

  const checks = await runChecks(prober, params.image, baseImage, recipe);
  if (!checks.ok) {
    timer.error(checks.error);
    return Failure(checks.error);
  }

  const failed = checks.value.filter((check) => !check.passed);
  for (const check of failed) {
    logger.warn({ check: check.name, detail: check.detail }, 'Verification check failed');
  }

  const report: VerificationReport = {
    image: params.image,
    recipe: recipe.name,
    passed: failed.length === 0,
    checks: checks.value,
  };
  timer.end({ passed: report.passed, checks: checks.value.length, failed: failed.length });
  return Success(report);
}
