/**
 * Package specifications as handed to the OS package manager and the Python installer.
 *
 * Python: `name[extras]` with an optional exact pin `==version`.
 * OS (apt): `name` with an optional exact pin `=version`.
 */

export interface PackageSpec {
  /** Name as written */
  name: string;
  /** Exact pinned version, if any */
  version?: string;
  /** Python extras, e.g. `[socks]` */
  extras?: string[];
}

const PYTHON_SPEC = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)(?:\[([A-Za-z0-9._,-]+)\])?(?:==([A-Za-z0-9._+!-]+))?$/;
const APT_SPEC = /^([a-z0-9][a-z0-9+.-]+)(?:=([A-Za-z0-9.+~:-]+))?$/;

export function parsePythonSpec(spec: string): PackageSpec | null {
  const [, name, extras, version] = PYTHON_SPEC.exec(spec) ?? [];
  if (!name) return null;

  const parsed: PackageSpec = { name };
  if (extras) parsed.extras = extras.split(',').filter(Boolean);
  if (version) parsed.version = version;
  return parsed;
}

export function parseAptSpec(spec: string): PackageSpec | null {
  const [, name, version] = APT_SPEC.exec(spec) ?? [];
  if (!name) return null;

  const parsed: PackageSpec = { name };
  if (version) parsed.version = version;
  return parsed;
}

/**
 * Normalize a Python distribution name (PEP 503): lowercase, runs of `-`, `_`, `.` become `-`.
 * `SpeechRecognition` and `speechrecognition`, `youtube_transcript_api` and
 * `youtube-transcript-api` compare equal after normalization.
 */
export function normalizePythonName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}
