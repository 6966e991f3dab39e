/**
 * Build step constructors.
 *
 * Every recipe, built in or loaded from a file, is assembled from these functions so that the
 * invocations, tool requirements and tool provisions of a step kind are defined in one place.
 */

import { parsePythonSpec, normalizePythonName } from './package-spec';
import type {
  AptInstallStep,
  CommandInvocation,
  PipInstallStep,
  PipUninstallStep,
  PipUpgradeStep,
  PlaywrightInstallStep,
  RunStep,
  TimezoneStep,
} from './types';

export interface StepOptions {
  description?: string;
}

export interface RunStepOptions extends StepOptions {
  expectedExitCode?: number;
  env?: Record<string, string>;
  stdoutTo?: string;
  /** Executables this command makes available */
  provides?: string[];
}

/**
 * Console scripts installed by Python distributions that later steps are known to call.
 */
const CONSOLE_SCRIPTS: Record<string, string[]> = {
  pip: ['pip', 'pip3'],
  playwright: ['playwright'],
  pytest: ['pytest', 'py.test'],
  markitdown: ['markitdown'],
  nltk: ['nltk'],
};

/**
 * Executables a Python distribution puts on PATH, as far as this provisioner knows.
 */
export function consoleScriptsFor(spec: string): string[] {
  const parsed = parsePythonSpec(spec);
  if (!parsed) return [];
  return CONSOLE_SCRIPTS[normalizePythonName(parsed.name)] ?? [];
}

function invocation(command: string, args: string[], extra: Partial<CommandInvocation> = {}): CommandInvocation {
  return { command, args, expectedExitCode: 0, ...extra };
}

/**
 * Refresh the package index, then install OS packages without prompting.
 */
export function aptInstall(id: string, packages: string[], options: StepOptions = {}): AptInstallStep {
  return {
    id,
    kind: 'apt-install',
    description: options.description ?? `Install OS packages: ${packages.join(', ')}`,
    packages: [...packages],
    run: [
      invocation('apt-get', ['update']),
      invocation('apt-get', ['install', '-y', ...packages], {
        env: { DEBIAN_FRONTEND: 'noninteractive' },
      }),
    ],
    requires: ['apt-get'],
    provides: [...packages],
  };
}

/**
 * Point /etc/localtime at the zone and record its name in /etc/timezone.
 */
export function setTimezone(id: string, zone: string, options: StepOptions = {}): TimezoneStep {
  return {
    id,
    kind: 'timezone',
    description: options.description ?? `Set the image timezone to ${zone}`,
    zone,
    run: [
      invocation('ln', ['-snf', `/usr/share/zoneinfo/${zone}`, '/etc/localtime']),
      invocation('echo', [zone], { stdoutTo: '/etc/timezone' }),
    ],
    requires: ['ln', 'echo'],
    provides: [],
  };
}

export function pipUpgrade(
  id: string,
  packages: string[] = ['pip'],
  options: StepOptions = {},
): PipUpgradeStep {
  return {
    id,
    kind: 'pip-upgrade',
    description: options.description ?? `Upgrade ${packages.join(', ')}`,
    packages: [...packages],
    run: [invocation('pip', ['install', '--upgrade', ...packages])],
    requires: ['pip'],
    provides: packages.flatMap(consoleScriptsFor),
  };
}

export function pipInstall(id: string, packages: string[], options: StepOptions = {}): PipInstallStep {
  return {
    id,
    kind: 'pip-install',
    description: options.description ?? `Install Python packages: ${packages.join(', ')}`,
    packages: [...packages],
    run: [invocation('pip', ['install', ...packages])],
    requires: ['pip'],
    provides: packages.flatMap(consoleScriptsFor),
  };
}

/**
 * Remove top-level distributions. Their dependencies stay installed.
 */
export function pipUninstall(id: string, packages: string[], options: StepOptions = {}): PipUninstallStep {
  return {
    id,
    kind: 'pip-uninstall',
    description: options.description ?? `Uninstall Python packages: ${packages.join(', ')}`,
    packages: [...packages],
    run: [invocation('pip', ['uninstall', '--yes', ...packages])],
    requires: ['pip'],
    provides: [],
  };
}

/**
 * Fetch browser engines through the Playwright driver installer.
 */
export function playwrightInstall(
  id: string,
  browsers: string[],
  options: StepOptions & { withDeps?: boolean } = {},
): PlaywrightInstallStep {
  const withDeps = options.withDeps ?? true;
  const args = withDeps ? ['install', '--with-deps', ...browsers] : ['install', ...browsers];
  return {
    id,
    kind: 'playwright-install',
    description:
      options.description ??
      `Fetch browser engines: ${browsers.join(', ')}${withDeps ? ' (with OS dependencies)' : ''}`,
    browsers: [...browsers],
    withDeps,
    run: [invocation('playwright', args)],
    requires: ['playwright'],
    provides: [],
  };
}

export function runCommand(
  id: string,
  command: string,
  args: string[] = [],
  options: RunStepOptions = {},
): RunStep {
  const extra: Partial<CommandInvocation> = {};
  if (options.expectedExitCode !== undefined) extra.expectedExitCode = options.expectedExitCode;
  if (options.env) extra.env = options.env;
  if (options.stdoutTo) extra.stdoutTo = options.stdoutTo;

  return {
    id,
    kind: 'run',
    description: options.description ?? `Run ${[command, ...args].join(' ')}`,
    run: [invocation(command, args, extra)],
    requires: [command],
    provides: options.provides ?? [],
  };
}
