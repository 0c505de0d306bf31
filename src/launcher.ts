import execa from 'execa';
import type { ChildProcess } from 'node:child_process';
import { v4 as uuidv4 } from 'uuid';
import { LaunchError } from './errors.js';
import { logger, Logger } from './logger.js';
import {
  ArgumentBinding,
  LaunchExit,
  LaunchHandle,
  ParameterValue,
  TargetSpec,
} from './types.js';

/**
 * Boundary to whatever actually starts a subsystem.
 * The binding is read-only from here on.
 */
export interface LaunchInvoker {
  invoke(target: TargetSpec, binding: ArgumentBinding): Promise<LaunchHandle>;
}

/**
 * Render a value the way launch arguments expect it
 * (an empty string becomes `""`, so the argument survives the command line)
 */
export function formatLaunchValue(value: ParameterValue): string {
  if (typeof value === 'string') {
    return value.length === 0 ? '""' : value;
  }
  return String(value);
}

/**
 * Build `name:=value` arguments in binding order
 */
export function buildLaunchArguments(binding: ArgumentBinding): string[] {
  return [...binding].map(([name, value]) => `${name}:=${formatLaunchValue(value)}`);
}

/**
 * Full command line for a target: its launch command followed by the arguments
 * @throws LaunchError if the target has no launch command
 */
export function buildLaunchCommand(target: TargetSpec, binding: ArgumentBinding): string[] {
  const command = target.launch?.command ?? [];
  if (command.length === 0) {
    throw new LaunchError(`Target '${target.name}' has no launch command`, target.name);
  }
  return [...command, ...buildLaunchArguments(binding)];
}

/**
 * Resolves once the child is running, rejects with the spawn error otherwise
 * (ENOENT, EACCES, bad cwd, ...)
 */
function waitForSpawn(child: ChildProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      child.off('spawn', onSpawn);
      reject(error);
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

/**
 * Starts each target as a child process sharing this process's stdio.
 * invoke() settles only after the process has started: a command that
 * cannot be spawned rejects with a LaunchError and yields no handle.
 */
export class ProcessLaunchInvoker implements LaunchInvoker {
  constructor(
    private readonly options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
  ) {}

  async invoke(target: TargetSpec, binding: ArgumentBinding): Promise<LaunchHandle> {
    const command = buildLaunchCommand(target, binding);
    const [executable, ...args] = command;
    if (!executable) {
      throw new LaunchError(`Target '${target.name}' has an empty launch command`, target.name);
    }

    const startFailed = (error: unknown) => new LaunchError(
      `Failed to start '${executable}': ${error instanceof Error ? error.message : String(error)}`,
      target.name
    );

    let child: execa.ExecaChildProcess;
    try {
      child = execa(executable, args, {
        cwd: this.options.cwd,
        env: this.options.env,
        stdio: 'inherit',
        reject: false,
      });
    } catch (error) {
      throw startFailed(error);
    }

    // With reject: false a spawn error only shows up as a failed result,
    // so wait for the child to actually start before handing out a handle
    try {
      await waitForSpawn(child);
    } catch (error) {
      await child;
      throw startFailed(error);
    }

    const exited: Promise<LaunchExit> = child.then(result => ({
      target: target.name,
      exitCode: result.exitCode ?? 1,
      success: !result.failed && result.exitCode === 0,
    }));

    return {
      id: uuidv4(),
      target: target.name,
      pid: child.pid,
      command,
      exited,
      stop: () => {
        // Already gone: nothing to signal
        if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) return;
        child.kill('SIGINT');
      },
    };
  }
}

/**
 * Logs the command line each target would run and starts nothing
 */
export class DryRunLaunchInvoker implements LaunchInvoker {
  readonly invocations: Array<{ target: string; command: string[] }> = [];

  constructor(private readonly log: Logger = logger) {}

  async invoke(target: TargetSpec, binding: ArgumentBinding): Promise<LaunchHandle> {
    const command = buildLaunchCommand(target, binding);
    this.invocations.push({ target: target.name, command });
    this.log.info(`[dry-run] ${target.name}: ${command.join(' ')}`);

    return {
      id: uuidv4(),
      target: target.name,
      command,
      exited: Promise.resolve({ target: target.name, exitCode: 0, success: true }),
      stop: () => undefined,
    };
  }
}
