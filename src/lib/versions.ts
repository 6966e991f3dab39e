/**
 * Dotted version helpers for installer version checks.
 */

/**
 * Compare release versions such as `24.0` and `23.2.1` numerically, component by component.
 * Missing components count as 0; a non-numeric suffix (`rc1`, `.dev0`) is ignored.
 */
export function compareVersions(a: string, b: string): number {
  const parse = (version: string): number[] =>
    version.split('.').map((part) => {
      const digits = /^\d+/.exec(part);
      return digits ? Number(digits[0]) : 0;
    });

  const left = parse(a);
  const right = parse(b);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff > 0 ? 1 : -1;
  }
  return 0;
}

/**
 * Extract the version from `pip --version` output, e.g.
 * `pip 24.0 from /usr/local/lib/python3.11/site-packages/pip (python 3.11)`.
 */
export function parsePipVersion(output: string): string | null {
  const match = /^pip (\d+(?:\.\d+)*\S*)/m.exec(output.trim());
  return match?.[1] ?? null;
}
