import { isAbsolute, resolve } from 'node:path';
import { InvalidArgumentError, Option, type Command } from 'commander';
import type { ExecutionTargetInput, ToolchainConfig } from '@vkvideo-harness/schemas';

/** npm sets INIT_CWD to where the user ran `npm run`, not the workspace root. */
export function workspaceRoot(): string {
  return process.env.INIT_CWD ?? process.cwd();
}

/**
 * Local paths resolve against the invoking directory. Remote paths are
 * passed through untouched: they name files on the target host.
 */
export function resolvePath(path: string, remote = false): string {
  if (remote || isAbsolute(path)) return path;
  return resolve(workspaceRoot(), path);
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}".`);
  }
  return parsed;
}

export function buildExecutionTarget(options: {
  remote?: string;
  remoteUser?: string;
  connectTimeout?: number;
}): ExecutionTargetInput {
  if (!options.remote) return { mode: 'local' };

  const user = options.remoteUser || process.env.USER || process.env.USERNAME;
  if (!user) {
    throw new Error('Remote runs need a user: pass --remote-user <name> or set USER.');
  }
  return {
    mode: 'remote',
    host: options.remote,
    user,
    ...(options.connectTimeout !== undefined ? { connectTimeoutSeconds: options.connectTimeout } : {})
  };
}

export interface TargetCliOptions {
  local?: boolean;
  remote?: string;
  remoteUser?: string;
  connectTimeout?: number;
  samplesRoot?: string;
  buildDir?: string;
  buildType: string;
}

/** Options every program shares: where to run and which build to run. */
export function addTargetOptions(command: Command): Command {
  return command
    .addOption(new Option('--local', 'run on this machine (default)').conflicts('remote'))
    .option('--remote <host>', 'run on a remote host over ssh')
    .option('--remote-user <name>', 'remote user (default: $USER)')
    .option('--connect-timeout <seconds>', 'ssh connect timeout', parseInteger, 5)
    .option('--samples-root <path>', 'checkout containing the build directories (default: current directory)')
    .option('--build-dir <path>', 'build directory, overrides the one derived from --samples-root')
    .option('--build-type <type>', 'release | debug', 'release');
}

export function buildToolchainConfig(options: {
  samplesRoot?: string;
  buildDir?: string;
  buildType?: string;
}, remote: boolean): ToolchainConfig {
  const buildType = (options.buildType ?? 'release').toLowerCase();
  if (buildType !== 'release' && buildType !== 'debug') {
    throw new Error(`Unknown build type: ${options.buildType}. Valid values: release, debug`);
  }
  return {
    root: resolvePath(options.samplesRoot ?? '.', remote),
    variant: buildType,
    ...(options.buildDir ? { buildDir: resolvePath(options.buildDir, remote) } : {})
  };
}
