import { posix } from 'node:path';
import type { CommandRunner } from '../src/executor.js';
import type { CommandRequest, InvocationResult } from '../src/types.js';

export interface FakeRunnerOptions {
  /** Path to size in bytes. */
  files?: Record<string, number>;
  directories?: string[];
  remote?: boolean;
  reachable?: boolean;
  /** Answers each execute call; may add files through `fs`. */
  respond?: (request: CommandRequest, fs: FakeFileSystem) => Partial<InvocationResult>;
}

export interface FakeFileSystem {
  files: Map<string, number>;
  directories: Set<string>;
}

export interface FakeRunner extends CommandRunner {
  readonly calls: CommandRequest[];
  readonly removed: string[];
  readonly fs: FakeFileSystem;
}

/** In-memory stand-in for a command runner; nothing touches the real filesystem. */
export function createFakeRunner(options: FakeRunnerOptions = {}): FakeRunner {
  const fs: FakeFileSystem = {
    files: new Map(Object.entries(options.files ?? {})),
    directories: new Set(options.directories ?? [])
  };
  const calls: CommandRequest[] = [];
  const removed: string[] = [];

  return {
    target: options.remote ? 'tester@gpu-box' : 'localhost',
    remote: options.remote ?? false,
    calls,
    removed,
    fs,
    async execute(request) {
      calls.push(request);
      const answer = options.respond?.(request, fs) ?? {};
      return {
        command: request.command,
        exitCode: 0,
        stdout: '',
        stderr: '',
        durationSeconds: 0.5,
        ...answer
      };
    },
    async checkConnectivity() {
      return options.reachable ?? true;
    },
    async statFile(path) {
      const size = fs.files.get(path);
      return size === undefined ? undefined : { size };
    },
    async directoryExists(path) {
      return fs.directories.has(path);
    },
    async listFiles(directory) {
      return [...fs.files.keys()]
        .filter((path) => posix.dirname(path) === directory)
        .map((path) => posix.basename(path))
        .sort();
    },
    async makeDirectory(path) {
      fs.directories.add(path);
    },
    async removeFile(path) {
      removed.push(path);
      fs.files.delete(path);
    },
    async copyRange(source, destination, _offset, length) {
      if (!fs.files.has(source) || length <= 0) return false;
      fs.files.set(destination, length);
      return true;
    }
  };
}

/** Value of the flag that follows `flag` in an argv. */
export function argAfter(command: readonly string[], flag: string): string | undefined {
  const index = command.indexOf(flag);
  return index === -1 ? undefined : command[index + 1];
}
