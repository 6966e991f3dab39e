/**
 * Symbolic application of a recipe: what should be installed once every step has run.
 */

import { parseAptSpec, parsePythonSpec, normalizePythonName } from './package-spec';
import type { Recipe } from './types';

export interface PackageState {
  /** OS package name -> pinned version (null when unpinned) */
  system: Map<string, string | null>;
  /** Normalized Python distribution name -> pinned version (null when unpinned) */
  python: Map<string, string | null>;
  /** Browser engines fetched by the driver installer */
  browsers: Set<string>;
  /** Last timezone set, if any */
  timezone: string | null;
  /** Normalized names of Python distributions uninstalled and not reinstalled afterwards */
  removed: Set<string>;
}

export function projectPackageState(recipe: Recipe): PackageState {
  const state: PackageState = {
    system: new Map(),
    python: new Map(),
    browsers: new Set(),
    timezone: null,
    removed: new Set(),
  };

  for (const step of recipe.steps) {
    switch (step.kind) {
      case 'apt-install':
        for (const spec of step.packages) {
          const parsed = parseAptSpec(spec);
          if (parsed) state.system.set(parsed.name, parsed.version ?? null);
        }
        break;
      case 'timezone':
        state.timezone = step.zone;
        break;
      case 'pip-install':
      case 'pip-upgrade':
        for (const spec of step.packages) {
          const parsed = parsePythonSpec(spec);
          if (!parsed) continue;
          const name = normalizePythonName(parsed.name);
          state.python.set(name, parsed.version ?? null);
          state.removed.delete(name);
        }
        break;
      case 'pip-uninstall':
        for (const spec of step.packages) {
          const parsed = parsePythonSpec(spec);
          if (!parsed) continue;
          const name = normalizePythonName(parsed.name);
          state.python.delete(name);
          state.removed.add(name);
        }
        break;
      case 'playwright-install':
        for (const browser of step.browsers) state.browsers.add(browser);
        break;
      case 'run':
        break;
    }
  }

  return state;
}

/**
 * Sorted plain-object form, for comparison and printing.
 */
export function summarizePackageState(state: PackageState): {
  system: string[];
  python: string[];
  browsers: string[];
  timezone: string | null;
  removed: string[];
} {
  const withVersion = ([name, version]: [string, string | null]): string =>
    version ? `${name}==${version}` : name;
  return {
    system: [...state.system.entries()].map(withVersion).sort(),
    python: [...state.python.entries()].map(withVersion).sort(),
    browsers: [...state.browsers].sort(),
    timezone: state.timezone,
    removed: [...state.removed].sort(),
  };
}
