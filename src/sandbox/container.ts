import Docker from 'dockerode';
import * as path from 'path';
import * as fs from 'fs/promises';
import { Writable } from 'stream';
import pino from 'pino';
import { ContainerConfig, CommandResult } from '../types.js';
import { ExecutionTimeoutError, getErrorMessage } from '../errors.js';

/**
 * Type guard for Docker API errors which have a statusCode property
 */
function isDockerError(error: unknown): error is { statusCode: number; message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  );
}

export class ContainerManager {
  private docker: Docker;
  private container: Docker.Container | null = null;
  private log: pino.Logger;

  constructor(socketPath = '/var/run/docker.sock', logger?: pino.Logger) {
    this.docker = new Docker({ socketPath });
    this.log = logger ?? pino({ level: 'silent' });
  }

  get id(): string | null {
    return this.container?.id ?? null;
  }

  /**
   * Verify Docker daemon is running and accessible.
   *
   * @throws Error if Docker is not available
   */
  async checkHealth(): Promise<void> {
    try {
      await this.docker.ping();
    } catch {
      throw new Error(
        'Docker daemon is not running or not accessible. ' +
        'Please ensure Docker is installed and running.'
      );
    }
  }

  /**
   * Pull the image when it is not present locally (createContainer does not pull).
   */
  async ensureImage(image: string): Promise<void> {
    try {
      await this.docker.getImage(image).inspect();
      return;
    } catch (error: unknown) {
      if (!isDockerError(error) || error.statusCode !== 404) {
        throw new Error(`Failed to inspect image ${image}: ${getErrorMessage(error)}`);
      }
    }

    this.log.info({ image }, 'Pulling sandbox image');
    const stream = await this.docker.pull(image);
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => (err ? reject(err) : resolve()));
    });
    this.log.info({ image }, 'Sandbox image pulled');
  }

  async create(config: ContainerConfig): Promise<void> {
    await this.checkHealth();
    const absWorkspace = path.resolve(config.workspaceDir);

    try {
      await fs.access(absWorkspace);
    } catch {
      throw new Error(`Workspace directory does not exist: ${absWorkspace}`);
    }

    await this.ensureImage(config.image);

    const memoryBytes = (config.memoryMB ?? 1024) * 1024 * 1024;
    const nanoCpus = Math.round((config.cpuCount ?? 1) * 1e9);

    try {
      this.container = await this.docker.createContainer({
        Image: config.image,
        HostConfig: {
          // pip installs need the network; 'none' disables it entirely
          NetworkMode: config.networkMode ?? 'bridge',
          Memory: memoryBytes,
          NanoCpus: nanoCpus,
          PidsLimit: 256,
          Binds: [`${absWorkspace}:${config.mountPath}:rw`],
          SecurityOpt: ['no-new-privileges:true'],
        },
        WorkingDir: config.mountPath,
        Cmd: ['sleep', 'infinity'],
        Labels: { 'analyst-agent.sandbox': 'true' },
      });
      this.log.info({ containerId: this.container.id }, 'Container created');
    } catch (error) {
      throw new Error(`Failed to create container: ${getErrorMessage(error)}`);
    }
  }

  async start(): Promise<void> {
    if (!this.container) {
      throw new Error('Container not created. Call create() first.');
    }

    try {
      await this.container.start();
      this.log.info({ containerId: this.container.id }, 'Container started');
    } catch (error) {
      throw new Error(`Failed to start container: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Execute a command in the container with timeout protection
   *
   * @param command - Command and arguments to execute
   * @param timeoutMs - Maximum execution time in milliseconds (default: 30000)
   * @returns Tool result with stdout, stderr, and exit code
   * @throws ExecutionTimeoutError when the command outlives timeoutMs
   */
  async exec(command: string[], timeoutMs: number = 30000): Promise<CommandResult> {
    if (!this.container) {
      throw new Error('Container not created. Call create() first.');
    }

    try {
      const exec = await this.container.exec({
        Cmd: command,
        AttachStdout: true,
        AttachStderr: true,
      });

      const stream = await exec.start({ hijack: true, stdin: false });

      let stdout = '';
      let stderr = '';

      const stdoutStream = new Writable({
        write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void) {
          stdout += chunk.toString();
          callback();
        }
      });

      const stderrStream = new Writable({
        write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void) {
          stderr += chunk.toString();
          callback();
        }
      });

      let timeoutId: NodeJS.Timeout | undefined;
      const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
          stream.destroy();
          reject(new ExecutionTimeoutError(timeoutMs));
        }, timeoutMs);
      });

      try {
        await Promise.race([
          new Promise<void>((resolve, reject) => {
            this.docker.modem.demuxStream(stream, stdoutStream, stderrStream);
            stream.on('end', resolve);
            stream.on('error', reject);
          }),
          timeoutPromise
        ]);
      } finally {
        clearTimeout(timeoutId);
      }

      const inspection = await exec.inspect();
      return {
        stdout,
        stderr,
        exitCode: inspection.ExitCode ?? 0,
      };
    } catch (error) {
      if (error instanceof ExecutionTimeoutError) {
        throw error;
      }
      throw new Error(`Failed to execute command: ${getErrorMessage(error)}`);
    }
  }

  async stop(timeoutSeconds: number = 5): Promise<void> {
    if (!this.container) {
      return;
    }

    try {
      await this.container.stop({ t: timeoutSeconds });
      this.log.info('Container stopped gracefully');
    } catch (error: unknown) {
      if (isDockerError(error) && (error.statusCode === 304 || error.statusCode === 404)) {
        this.log.info('Container already stopped');
      } else {
        this.log.warn({ err: getErrorMessage(error) }, 'Failed to stop container gracefully, forcing kill');
        try {
          await this.container.kill({ signal: 'SIGKILL' });
          this.log.info('Container killed forcefully');
        } catch (killError) {
          this.log.warn({ err: getErrorMessage(killError) }, 'Failed to kill container');
        }
      }
    }
  }

  async remove(): Promise<void> {
    if (!this.container) {
      return;
    }

    try {
      await this.container.remove({ force: true });
      this.log.info('Container removed');
    } catch (error: unknown) {
      if (isDockerError(error) && error.statusCode === 404) {
        this.log.info('Container already removed');
      } else {
        this.log.warn({ err: getErrorMessage(error) }, 'Failed to remove container');
      }
    } finally {
      this.container = null;
    }
  }

  async cleanup(): Promise<void> {
    await this.stop();
    await this.remove();
  }
}
