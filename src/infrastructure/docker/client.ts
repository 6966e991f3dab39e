/**
 * Docker client for provisioning operations
 */

import { PassThrough } from 'node:stream';
import Docker from 'dockerode';
import tar from 'tar-fs';
import type { Logger } from 'pino';
import { DockerError, errorMessage } from '../../errors';
import { Success, Failure, type Result } from '../../domain/types';
import type { DockerBuildEvent } from '../../lib/build-progress';

/**
 * Options for building a Docker image.
 */
export interface DockerBuildOptions {
  /** Build context directory */
  context: string;
  /** Path to Dockerfile relative to context */
  dockerfile?: string;
  /** Tag applied when the build succeeds */
  t?: string;
  labels?: Record<string, string>;
  /** Always attempt to pull a newer base image */
  pull?: boolean;
  nocache?: boolean;
}

/**
 * Information about a Docker image.
 */
export interface DockerImageInfo {
  /** Unique identifier of the image */
  Id: string;
  /** Repository tags associated with the image */
  RepoTags: string[];
  /** Size of the image in bytes */
  Size: number;
  /** ISO 8601 timestamp when the image was created */
  Created: string;
  /** Number of filesystem layers */
  Layers: number;
}

export interface ContainerRunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Docker client interface for provisioning.
 */
export interface DockerClient {
  /**
   * Builds an image and returns every progress event. Build errors reported by the daemon
   * (a failing RUN) arrive as events; only transport failures produce a Failure.
   * @param onEvent - Called for each progress event as it arrives
   */
  buildImage: (
    options: DockerBuildOptions,
    onEvent?: (event: DockerBuildEvent) => void,
  ) => Promise<Result<DockerBuildEvent[]>>;

  /**
   * Retrieves information about a Docker image.
   * @param id - Image ID or tag
   */
  getImage: (id: string) => Promise<Result<DockerImageInfo>>;

  /**
   * Runs a command in a throwaway container of the image and collects its output.
   */
  runInImage: (image: string, cmd: string[]) => Promise<Result<ContainerRunResult>>;
}

export interface DockerClientOptions {
  /** Docker daemon socket; dockerode's default when omitted */
  socketPath?: string;
}

function collect(stream: PassThrough): () => string {
  const chunks: Buffer[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk));
  return () => Buffer.concat(chunks).toString('utf-8').trim();
}

/**
 * Create a Docker client with core operations
 * @param logger - Logger instance for debug output
 */
export const createDockerClient = (logger: Logger, options: DockerClientOptions = {}): DockerClient => {
  const docker = options.socketPath ? new Docker({ socketPath: options.socketPath }) : new Docker();

  return {
    async buildImage(
      buildOptions: DockerBuildOptions,
      onEvent?: (event: DockerBuildEvent) => void,
    ): Promise<Result<DockerBuildEvent[]>> {
      try {
        logger.debug({ options: buildOptions }, 'Starting Docker build');

        const tarStream = tar.pack(buildOptions.context);

        const imageBuildOptions: Docker.ImageBuildOptions = {
          dockerfile: buildOptions.dockerfile ?? 'Dockerfile',
          rm: true,
          forcerm: true,
        };
        if (buildOptions.t) imageBuildOptions.t = buildOptions.t;
        if (buildOptions.labels) imageBuildOptions.labels = buildOptions.labels;
        if (buildOptions.pull) imageBuildOptions.pull = 'true';
        if (buildOptions.nocache) imageBuildOptions.nocache = true;

        const stream = await docker.buildImage(tarStream, imageBuildOptions);

        const events = await new Promise<DockerBuildEvent[]>((resolve, reject) => {
          docker.modem.followProgress(
            stream,
            (err: Error | null, res: DockerBuildEvent[]) => (err ? reject(err) : resolve(res)),
            (event: DockerBuildEvent) => {
              logger.trace(event, 'Docker build progress');
              onEvent?.(event);
            },
          );
        });

        logger.debug({ events: events.length }, 'Docker build stream finished');
        return Success(events);
      } catch (error) {
        const dockerError = new DockerError(
          `Build failed: ${errorMessage(error)}`,
          'DOCKER_BUILD_ERROR',
          'build',
          error instanceof Error ? error : undefined,
        );
        logger.error({ error: dockerError.message, options: buildOptions }, 'Docker build failed');
        return Failure(dockerError.message);
      }
    },

    async getImage(id: string): Promise<Result<DockerImageInfo>> {
      try {
        const inspect = await docker.getImage(id).inspect();

        return Success({
          Id: inspect.Id,
          RepoTags: inspect.RepoTags ?? [],
          Size: inspect.Size,
          Created: inspect.Created,
          Layers: inspect.RootFS?.Layers?.length ?? 0,
        });
      } catch (error) {
        return Failure(`Failed to get image: ${errorMessage(error)}`);
      }
    },

    async runInImage(image: string, cmd: string[]): Promise<Result<ContainerRunResult>> {
      try {
        logger.debug({ image, cmd }, 'Running command in image');

        const container = await docker.createContainer({
          Image: image,
          Cmd: cmd,
          Tty: false,
          AttachStdout: true,
          AttachStderr: true,
        });

        try {
          const stream = await container.attach({ stream: true, stdout: true, stderr: true });
          const stdout = new PassThrough();
          const stderr = new PassThrough();
          const readStdout = collect(stdout);
          const readStderr = collect(stderr);
          const ended = new Promise<void>((resolve) => {
            stream.on('end', () => resolve());
          });
          docker.modem.demuxStream(stream, stdout, stderr);

          await container.start();
          const status: { StatusCode: number } = await container.wait();
          await ended;

          return Success({ stdout: readStdout(), stderr: readStderr(), exitCode: status.StatusCode });
        } finally {
          await container.remove({ force: true });
        }
      } catch (error) {
        const dockerError = new DockerError(
          `Failed to run ${cmd.join(' ')} in ${image}: ${errorMessage(error)}`,
          'DOCKER_RUN_ERROR',
          'run',
        );
        return Failure(dockerError.message);
      }
    },
  };
};
