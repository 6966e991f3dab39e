/**
 * Built-in recipe: the execution environment for agent benchmark runs.
 *
 * A Python development-container image with media tooling, a fixed timezone, the agent
 * framework's dependency tree preloaded (the framework itself removed again so each run installs
 * its own build), document/speech helpers, common data packages and a Playwright Chromium.
 */

import { parseBaseImage } from '../domain/base-image';
import {
  aptInstall,
  pipInstall,
  pipUninstall,
  pipUpgrade,
  playwrightInstall,
  setTimezone,
} from '../domain/steps';
import type { BaseImage, Recipe } from '../domain/types';

export const AGENT_BENCH_BASE_IMAGE = 'mcr.microsoft.com/devcontainers/python:3.11';

/** Executables present in Debian-based Python images before any step runs */
export const DEFAULT_BASE_TOOLS = ['sh', 'apt-get', 'ln', 'echo', 'python', 'python3', 'pip', 'pip3'];

export const AGENT_FRAMEWORK_PACKAGES = ['autogen-core', 'autogen-agentchat', 'autogen-ext'];

function baseImage(ref: string): BaseImage {
  const parsed = parseBaseImage(ref);
  // fallback keeps the raw ref so validation reports it
  return parsed.ok ? parsed.value : { ref, repository: ref };
}

export function createAgentBenchRecipe(options: { baseImage?: string; timezone?: string } = {}): Recipe {
  return {
    name: 'agent-bench',
    baseImage: baseImage(options.baseImage ?? AGENT_BENCH_BASE_IMAGE),
    baseTools: [...DEFAULT_BASE_TOOLS],
    labels: { maintainer: 'AutoGen' },
    steps: [
      aptInstall('media-tools', ['ffmpeg', 'exiftool'], {
        description: 'ffmpeg and exiftool are needed for document conversion',
      }),
      setTimezone('timezone', options.timezone ?? 'US/Pacific'),
      pipUpgrade('upgrade-pip', ['pip']),
      pipInstall('preload-framework', [...AGENT_FRAMEWORK_PACKAGES, 'pyyaml'], {
        description: 'Preload the agent framework to pull in its dependencies',
      }),
      pipUninstall('drop-framework', [...AGENT_FRAMEWORK_PACKAGES], {
        description: 'Uninstall the framework itself, leaving its dependencies in place',
      }),
      pipInstall(
        'document-tools',
        ['markitdown', 'SpeechRecognition', 'pydub', 'youtube_transcript_api==0.6.0'],
        { description: 'Optional document conversion dependencies' },
      ),
      pipInstall(
        'data-packages',
        [
          'numpy',
          'pandas',
          'matplotlib',
          'seaborn',
          'scikit-learn',
          'requests',
          'urllib3',
          'nltk',
          'pytest',
        ],
        { description: 'Preload popular data and testing packages' },
      ),
      pipInstall('playwright', ['playwright'], { description: 'Preload Playwright' }),
      playwrightInstall('chromium', ['chromium'], { withDeps: true }),
    ],
  };
}
