import * as os from 'os';
import * as nodePath from 'path';
import * as fs from 'fs/promises';
import pino from 'pino';
import writeFileAtomic from 'write-file-atomic';
import { ContainerManager } from './container.js';
import { localModuleNames, resolveInstallPackages } from './imports.js';
import { ExecutionTimeoutError, SandboxProvisionError, getErrorMessage } from '../errors.js';
import type { ExecutionResult, FileManifest } from '../types.js';

export const SCRIPT_FILE = 'script.py';
export const TIMEOUT_MESSAGE = 'Execution timed out.';

export interface SandboxSessionConfig {
  image: string;
  socketPath?: string;
  networkMode?: string;
  memoryMB?: number;
  cpuCount?: number;
  mountPath?: string;          // default: /workspace
  execTimeoutMs?: number;      // default: 60000
  installTimeoutMs?: number;   // default: 60000
  logger?: pino.Logger;
}

export interface ExecuteOptions {
  keepSessionOpen?: boolean;   // default: false
}

/**
 * A disposable container + workspace pair that runs model-generated scripts.
 */
export interface ScriptRunner {
  readonly id: string;
  readonly isActive: boolean;
  execute(code: string | string[], manifest: FileManifest, options?: ExecuteOptions): Promise<ExecutionResult>;
  close(): Promise<void>;
}

/**
 * SandboxSession runs Python scripts in a container bound to a private workspace.
 *
 * Lifecycle: idle -> provisioning -> running -> idle (kept open) | terminated.
 * Provisioning happens lazily on the first execute(); closing stops and removes
 * the container and deletes the workspace. A closed session provisions afresh
 * on its next execute().
 */
export class SandboxSession implements ScriptRunner {
  readonly id: string;
  private config: SandboxSessionConfig;
  private log: pino.Logger;
  private container: ContainerManager | null = null;
  private workspaceDir: string | null = null;
  private localModules: string[] = [];

  constructor(id: string, config: SandboxSessionConfig) {
    this.id = id;
    this.config = config;
    this.log = (config.logger ?? pino({ level: 'silent' })).child({ sessionId: id });
  }

  get isActive(): boolean {
    return this.container !== null;
  }

  get workspace(): string | null {
    return this.workspaceDir;
  }

  /**
   * Run a script (fragments are joined in order, newest last).
   * Never throws: failures come back as an unsuccessful ExecutionResult.
   */
  async execute(
    code: string | string[],
    manifest: FileManifest,
    options: ExecuteOptions = {}
  ): Promise<ExecutionResult> {
    const keepSessionOpen = options.keepSessionOpen ?? false;

    try {
      if (!this.container || !this.workspaceDir) {
        await this.provision(manifest);
      }
      const container = this.requireContainer();
      const workspaceDir = this.requireWorkspace();

      const script = Array.isArray(code) ? code.join('\n\n') : code;
      await writeFileAtomic(nodePath.join(workspaceDir, SCRIPT_FILE), script, { encoding: 'utf-8' });
      this.log.debug({ chars: script.length }, 'Script written');

      await this.installDependencies(container, script);

      this.log.info('Executing script');
      const result = await container.exec(['python', SCRIPT_FILE], this.config.execTimeoutMs ?? 60000);

      if (!keepSessionOpen) {
        await this.close();
      }

      this.log.info({ exitCode: result.exitCode }, 'Script finished');
      return {
        success: result.exitCode === 0,
        stdout: result.stdout.trim(),
        stderr: result.stderr.trim(),
        exitCode: result.exitCode,
      };
    } catch (err) {
      // Always tear down on timeout or error, whatever keepSessionOpen says
      await this.close();

      if (err instanceof ExecutionTimeoutError) {
        this.log.error({ timeoutMs: this.config.execTimeoutMs }, 'Execution timed out');
        return { success: false, stdout: '', stderr: TIMEOUT_MESSAGE, exitCode: null };
      }
      this.log.error({ err }, 'Execution failed');
      return { success: false, stdout: '', stderr: getErrorMessage(err), exitCode: null };
    }
  }

  /**
   * Stop and remove the container, then delete the workspace.
   * Safe to call multiple times.
   */
  async close(): Promise<void> {
    const container = this.container;
    const workspaceDir = this.workspaceDir;
    this.container = null;
    this.workspaceDir = null;
    this.localModules = [];

    if (container) {
      await container.cleanup();
    }
    if (workspaceDir) {
      try {
        await fs.rm(workspaceDir, { recursive: true, force: true });
        this.log.info({ workspaceDir }, 'Workspace removed');
      } catch (error) {
        this.log.warn({ workspaceDir, err: getErrorMessage(error) }, 'Failed to remove workspace');
      }
    }
  }

  private async provision(manifest: FileManifest): Promise<void> {
    const workspaceDir = await fs.mkdtemp(nodePath.join(os.tmpdir(), 'sandbox-'));
    this.workspaceDir = workspaceDir;
    this.log.info({ workspaceDir }, 'Created workspace');

    try {
      const copied: string[] = [];
      for (const [name, sourcePath] of Object.entries(manifest)) {
        const fileName = nodePath.basename(name);
        if (fileName === SCRIPT_FILE) {
          this.log.warn({ name }, 'Skipping file that would be overwritten by the generated script');
          continue;
        }
        const target = nodePath.join(workspaceDir, fileName);
        await fs.copyFile(sourcePath, target);
        copied.push(fileName);
        this.log.debug({ name, target }, 'Copied file into workspace');
      }
      this.localModules = localModuleNames(copied);

      const container = new ContainerManager(this.config.socketPath, this.log);
      this.container = container;
      await container.create({
        image: this.config.image,
        workspaceDir,
        mountPath: this.config.mountPath ?? '/workspace',
        networkMode: this.config.networkMode,
        memoryMB: this.config.memoryMB,
        cpuCount: this.config.cpuCount,
      });
      await container.start();
      this.log.info({ containerId: container.id }, 'Sandbox session provisioned');
    } catch (error) {
      throw new SandboxProvisionError(getErrorMessage(error), { cause: error });
    }
  }

  private async installDependencies(container: ContainerManager, script: string): Promise<void> {
    const packages = resolveInstallPackages(script, this.localModules);
    if (packages.length === 0) {
      return;
    }

    this.log.info({ packages }, 'Installing script dependencies');
    try {
      const result = await container.exec(
        ['pip', 'install', '--no-cache-dir', '--disable-pip-version-check', ...packages],
        this.config.installTimeoutMs ?? 60000
      );
      if (result.exitCode !== 0) {
        this.log.warn({ packages, stderr: result.stderr.slice(-500) }, 'Dependency install failed');
      }
    } catch (error) {
      // The script itself will report the missing module
      this.log.warn({ packages, err: getErrorMessage(error) }, 'Dependency install failed');
    }
  }

  private requireContainer(): ContainerManager {
    if (!this.container) {
      throw new Error('Sandbox session not provisioned');
    }
    return this.container;
  }

  private requireWorkspace(): string {
    if (!this.workspaceDir) {
      throw new Error('Sandbox session not provisioned');
    }
    return this.workspaceDir;
  }
}
