/**
 * Unit Tests: Build Image Tool
 * Tests the build tool against a mock Docker client
 */

import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { buildImage } from '../../../../src/tools/build-image';
import type { DockerBuildEvent } from '../../../../src/lib/build-progress';
import {
  createMockDockerClient,
  createSuccessResult,
  createFailureResult,
  createToolContext,
} from '../../../__support__/utilities/mock-infrastructure';

function header(n: number, text: string): DockerBuildEvent {
  return { stream: `Step ${n}/11 : ${text}\n` };
}

describe('buildImage', () => {
  let mockDockerClient: ReturnType<typeof createMockDockerClient>;
  let contexts: string[];
  let dockerfiles: string[];

  function respondWith(events: DockerBuildEvent[]): void {
    mockDockerClient.buildImage.mockImplementation(async (options, onEvent) => {
      contexts.push(options.context);
      dockerfiles.push(await fs.readFile(path.join(options.context, options.dockerfile ?? 'Dockerfile'), 'utf-8'));
      for (const event of events) onEvent?.(event);
      return createSuccessResult(events);
    });
  }

  beforeEach(() => {
    mockDockerClient = createMockDockerClient();
    contexts = [];
    dockerfiles = [];
  });

  describe('Successful Builds', () => {
    beforeEach(() => {
      respondWith([
        header(1, 'FROM mcr.microsoft.com/devcontainers/python:3.11'),
        header(2, 'LABEL maintainer="AutoGen"'),
        header(3, 'RUN apt-get update'),
        header(11, 'RUN playwright install --with-deps chromium'),
        { aux: { ID: 'sha256:built' } },
      ]);
    });

    it('should build the rendered Dockerfile and tag the image', async () => {
      const result = await buildImage({ tag: 'agent-bench:test' }, createToolContext({ docker: mockDockerClient }));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toMatchObject({
        recipe: 'agent-bench',
        backend: 'docker',
        status: 'succeeded',
        exitCode: 0,
        tag: 'agent-bench:test',
        imageId: 'sha256:built',
      });
      expect(result.value.steps.every((step) => step.status === 'succeeded')).toBe(true);

      expect(mockDockerClient.buildImage).toHaveBeenCalledWith(
        {
          context: contexts[0],
          dockerfile: 'Dockerfile',
          t: 'agent-bench:test',
          labels: { 'org.opencontainers.image.title': 'agent-bench' },
        },
        expect.any(Function),
      );
      expect(dockerfiles[0]?.startsWith('# Recipe: agent-bench\nFROM mcr.microsoft.com/devcontainers/python:3.11\n')).toBe(
        true,
      );
      expect(mockDockerClient.getImage).not.toHaveBeenCalled();
    });

    it('should use the configured tag and pass pull and cache options', async () => {
      await buildImage({ pull: true, noCache: true }, createToolContext({ docker: mockDockerClient }));

      expect(mockDockerClient.buildImage).toHaveBeenCalledWith(
        expect.objectContaining({ t: 'agent-bench:latest', pull: true, nocache: true }),
        expect.any(Function),
      );
    });

    it('should remove the build context afterwards', async () => {
      await buildImage({}, createToolContext({ docker: mockDockerClient }));

      const context = contexts[0] ?? '';
      await expect(fs.access(context)).rejects.toThrow();
    });

    it('should keep the build context when configured to', async () => {
      const context = createToolContext({ docker: mockDockerClient });
      context.config.provisioner.keepContext = true;

      await buildImage({}, context);

      const kept = contexts[0] ?? '';
      await expect(fs.access(path.join(kept, 'Dockerfile'))).resolves.toBeUndefined();
      await fs.rm(kept, { recursive: true, force: true });
    });
  });

  it('should look the image up by tag when the build reports no id', async () => {
    respondWith([header(1, 'FROM mcr.microsoft.com/devcontainers/python:3.11')]);
    mockDockerClient.getImage.mockResolvedValue(
      createSuccessResult({ Id: 'sha256:inspected', RepoTags: ['agent-bench:latest'], Size: 1, Created: '', Layers: 11 }),
    );

    const result = await buildImage({}, createToolContext({ docker: mockDockerClient }));

    expect(mockDockerClient.getImage).toHaveBeenCalledWith('agent-bench:latest');
    expect(result.ok && result.value.imageId).toBe('sha256:inspected');
  });

  describe('Failed Builds', () => {
    it('should report the failing step and its exit code without tagging', async () => {
      const message = "The command '/bin/sh -c apt-get update' returned a non-zero code: 100";
      respondWith([
        header(1, 'FROM mcr.microsoft.com/devcontainers/python:3.11'),
        header(2, 'LABEL maintainer="AutoGen"'),
        header(3, 'RUN apt-get update'),
        { stream: 'E: Unable to locate package ffmpeg\n' },
        { error: message, errorDetail: { code: 100, message } },
      ]);

      const result = await buildImage({}, createToolContext({ docker: mockDockerClient }));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.status).toBe('failed');
      expect(result.value.failedStep).toBe('media-tools');
      expect(result.value.exitCode).toBe(100);
      expect(result.value.tag).toBeUndefined();
      expect(result.value.imageId).toBeUndefined();
      expect(result.value.steps.filter((step) => step.status === 'skipped')).toHaveLength(8);
      expect(mockDockerClient.getImage).not.toHaveBeenCalled();
    });

    it('should return a failure when the daemon cannot be reached', async () => {
      mockDockerClient.buildImage.mockResolvedValue(
        createFailureResult('Build failed: connect ENOENT /var/run/docker.sock'),
      );

      const result = await buildImage({}, createToolContext({ docker: mockDockerClient }));

      expect(result).toEqual({ ok: false, error: 'Build failed: connect ENOENT /var/run/docker.sock' });
    });

    it('should refuse an invalid recipe before contacting Docker', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'build-test-'));
      const recipePath = path.join(dir, 'broken.yaml');
      await fs.writeFile(
        recipePath,
        'name: broken\nbaseImage: python:3.11\nsteps:\n  - id: browsers\n    kind: playwright-install\n    browsers: [chromium]\n',
      );

      try {
        const result = await buildImage({ recipePath }, createToolContext({ docker: mockDockerClient }));

        expect(result).toEqual({
          ok: false,
          error:
            'Recipe broken is invalid: Step browsers runs playwright, which neither the base image nor an earlier step provides',
        });
        expect(mockDockerClient.buildImage).not.toHaveBeenCalled();
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });
  });
});
