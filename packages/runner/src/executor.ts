import { spawn, type ChildProcess } from 'node:child_process';
import { createReadStream, createWriteStream } from 'node:fs';
import { mkdir, readdir, rm, stat } from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import {
  executionTargetSchema,
  type ExecutionTarget,
  type ExecutionTargetInput
} from '@vkvideo-harness/schemas';
import { isEnvName, singleQuote } from './shell.js';
import type { CommandRequest, FileStat, InvocationResult } from './types.js';

// Grace period between SIGTERM and SIGKILL for a timed-out child.
const KILL_GRACE_MS = 5000;
const PROBE_TIMEOUT_SECONDS = 30;
const CONNECTIVITY_TIMEOUT_SECONDS = 10;

type RemoteTarget = Extract<ExecutionTarget, { mode: 'remote' }>;

export interface CommandRunner {
  /** `localhost` or `user@host`. */
  readonly target: string;
  readonly remote: boolean;
  /** Runs one command. Never rejects: harness failures come back as results. */
  execute(request: CommandRequest): Promise<InvocationResult>;
  checkConnectivity(): Promise<boolean>;
  statFile(path: string): Promise<FileStat | undefined>;
  directoryExists(path: string): Promise<boolean>;
  /** Names of the regular files directly inside `directory`, sorted. */
  listFiles(directory: string): Promise<string[]>;
  makeDirectory(path: string): Promise<void>;
  removeFile(path: string): Promise<void>;
  /** Copies `length` bytes starting at `offset`; true when the copy is complete. */
  copyRange(source: string, destination: string, offset: number, length: number): Promise<boolean>;
}

// ─── Process spawning ─────────────────────────────────────────────────────────

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function elapsedSeconds(startedAt: number): number {
  return (Date.now() - startedAt) / 1000;
}

export function runProcess(
  argv: readonly string[],
  options: { env?: NodeJS.ProcessEnv; cwd?: string; timeoutSeconds: number },
  reportedCommand: readonly string[] = argv
): Promise<InvocationResult> {
  const startedAt = Date.now();
  const [file, ...args] = argv;

  const spawnFailure = (message: string): InvocationResult => ({
    command: reportedCommand,
    exitCode: -1,
    stdout: '',
    stderr: message,
    durationSeconds: elapsedSeconds(startedAt),
    harnessError: { kind: 'spawn', message }
  });

  if (file === undefined) {
    return Promise.resolve(spawnFailure('Empty command'));
  }

  return new Promise((resolve) => {
    let child: ChildProcess;
    try {
      child = spawn(file, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true
      });
    } catch (error) {
      resolve(spawnFailure(errorMessage(error)));
      return;
    }

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    let settled = false;
    const finish = (result: InvocationResult): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    const timer = setTimeout(() => {
      child.kill('SIGTERM');
      const killTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill('SIGKILL');
        }
      }, KILL_GRACE_MS);
      killTimer.unref();

      finish({
        command: reportedCommand,
        exitCode: -1,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: 'Timeout',
        durationSeconds: elapsedSeconds(startedAt),
        harnessError: {
          kind: 'timeout',
          message: `Timeout after ${options.timeoutSeconds}s`
        }
      });
    }, options.timeoutSeconds * 1000);

    child.once('error', (error) => finish(spawnFailure(error.message)));
    child.once('close', (code) => {
      finish({
        command: reportedCommand,
        exitCode: code ?? -1,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        durationSeconds: elapsedSeconds(startedAt)
      });
    });
  });
}

// ─── Local runner ─────────────────────────────────────────────────────────────

function isMissingPath(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

function makeLocalRunner(): CommandRunner {
  return {
    target: 'localhost',
    remote: false,
    execute(request) {
      return runProcess(request.command, {
        env: { ...process.env, ...request.env },
        cwd: request.cwd,
        timeoutSeconds: request.timeoutSeconds
      });
    },
    async checkConnectivity() {
      return true;
    },
    async statFile(path) {
      try {
        const info = await stat(path);
        return info.isFile() ? { size: info.size } : undefined;
      } catch (error) {
        if (isMissingPath(error)) return undefined;
        throw error;
      }
    },
    async directoryExists(path) {
      try {
        return (await stat(path)).isDirectory();
      } catch (error) {
        if (isMissingPath(error)) return false;
        throw error;
      }
    },
    async listFiles(directory) {
      try {
        const entries = await readdir(directory, { withFileTypes: true });
        return entries
          .filter((entry) => entry.isFile())
          .map((entry) => entry.name)
          .sort();
      } catch (error) {
        if (isMissingPath(error)) return [];
        throw error;
      }
    },
    async makeDirectory(path) {
      await mkdir(path, { recursive: true });
    },
    async removeFile(path) {
      await rm(path, { force: true });
    },
    async copyRange(source, destination, offset, length) {
      if (length <= 0) return false;
      try {
        await pipeline(
          createReadStream(source, { start: offset, end: offset + length - 1 }),
          createWriteStream(destination)
        );
      } catch (error) {
        if (isMissingPath(error)) return false;
        throw error;
      }
      const copied = await stat(destination);
      return copied.size === length;
    }
  };
}

// ─── Remote runner ────────────────────────────────────────────────────────────

/**
 * Builds the `ssh` argv for a command on the remote target. Remote shells do
 * not inherit the caller's environment, so overrides are passed inline, but
 * only those whose name starts with one of `target.envPrefixes`.
 */
export function buildRemoteCommand(target: RemoteTarget, request: CommandRequest): string[] {
  const forwarded = Object.entries(request.env ?? {})
    .filter(([name]) => isEnvName(name))
    .filter(([name]) => target.envPrefixes.some((prefix) => name.startsWith(prefix)))
    .map(([name, value]) => `${name}=${singleQuote(value)}`);

  const commandText = [...forwarded, ...request.command.map(singleQuote)].join(' ');
  const script = request.cwd ? `cd ${singleQuote(request.cwd)} && ${commandText}` : commandText;
  return sshArgv(target, script);
}

function sshArgv(target: RemoteTarget, script: string): string[] {
  return [
    'ssh',
    '-o',
    `ConnectTimeout=${target.connectTimeoutSeconds}`,
    '-o',
    'BatchMode=yes',
    `${target.user}@${target.host}`,
    script
  ];
}

function makeRemoteRunner(target: RemoteTarget): CommandRunner {
  const runScript = (script: string, timeoutSeconds = PROBE_TIMEOUT_SECONDS) =>
    runProcess(sshArgv(target, script), { env: process.env, timeoutSeconds });

  return {
    target: `${target.user}@${target.host}`,
    remote: true,
    execute(request) {
      // The reported command stays the tool's own argv; ssh is transport.
      return runProcess(
        buildRemoteCommand(target, request),
        { env: process.env, timeoutSeconds: request.timeoutSeconds },
        request.command
      );
    },
    async checkConnectivity() {
      const result = await runScript('echo OK', CONNECTIVITY_TIMEOUT_SECONDS);
      return result.exitCode === 0 && result.stdout.includes('OK');
    },
    async statFile(path) {
      const quoted = singleQuote(path);
      const result = await runScript(`test -f ${quoted} && stat -c %s ${quoted}`);
      if (result.exitCode !== 0) return undefined;
      const size = Number.parseInt(result.stdout.trim(), 10);
      return Number.isNaN(size) ? undefined : { size };
    },
    async directoryExists(path) {
      const result = await runScript(`test -d ${singleQuote(path)}`);
      return result.exitCode === 0;
    },
    async listFiles(directory) {
      const result = await runScript(
        `find ${singleQuote(directory)} -mindepth 1 -maxdepth 1 -type f -printf '%f\\n'`
      );
      if (result.exitCode !== 0) return [];
      return result.stdout
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .sort();
    },
    async makeDirectory(path) {
      const result = await runScript(`mkdir -p ${singleQuote(path)}`);
      if (result.exitCode !== 0) {
        throw new Error(`Cannot create ${path} on ${target.host}: ${result.stderr.trim()}`);
      }
    },
    async removeFile(path) {
      await runScript(`rm -f ${singleQuote(path)}`);
    },
    async copyRange(source, destination, offset, length) {
      if (length <= 0) return false;
      const copy = await runScript(
        `tail -c +${offset + 1} ${singleQuote(source)} | head -c ${length} > ${singleQuote(destination)}`,
        600
      );
      if (copy.exitCode !== 0) return false;
      const copied = await this.statFile(destination);
      return copied?.size === length;
    }
  };
}

// ─── Public API ───────────────────────────────────────────────────────────────

export function createCommandRunner(target: ExecutionTargetInput): CommandRunner {
  const parsed = executionTargetSchema.parse(target);
  if (parsed.mode === 'local') {
    return makeLocalRunner();
  }
  return makeRemoteRunner(parsed);
}
