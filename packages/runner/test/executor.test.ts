import { EventEmitter } from 'node:events';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));
vi.mock('node:child_process', () => ({ spawn: spawnMock }));

import { buildRemoteCommand, createCommandRunner, runProcess } from '../src/executor.js';

class FakeChild extends EventEmitter {
  readonly stdout = new EventEmitter();
  readonly stderr = new EventEmitter();
  exitCode: number | null = null;
  signalCode: string | null = null;
  readonly kill = vi.fn((_signal?: string) => true);
}

let child: FakeChild;

beforeEach(() => {
  child = new FakeChild();
  spawnMock.mockReset();
  spawnMock.mockImplementation(() => child);
});

afterEach(() => {
  vi.useRealTimers();
});

describe('runProcess', () => {
  it('collects output and the exit code', async () => {
    const pending = runProcess(['/build/dec', '-i', 'clip.ivf'], { timeoutSeconds: 10 });
    child.stdout.emit('data', Buffer.from('Decoded 5 '));
    child.stdout.emit('data', Buffer.from('frames'));
    child.stderr.emit('data', Buffer.from('warn'));
    child.emit('close', 0);

    const result = await pending;
    expect(spawnMock).toHaveBeenCalledWith(
      '/build/dec',
      ['-i', 'clip.ivf'],
      expect.objectContaining({ stdio: ['ignore', 'pipe', 'pipe'] })
    );
    expect(result).toMatchObject({
      command: ['/build/dec', '-i', 'clip.ivf'],
      exitCode: 0,
      stdout: 'Decoded 5 frames',
      stderr: 'warn'
    });
    expect(result.harnessError).toBeUndefined();
  });

  it('reports a spawn failure as a harness error', async () => {
    const pending = runProcess(['/missing/tool'], { timeoutSeconds: 10 });
    child.emit('error', new Error('spawn /missing/tool ENOENT'));

    const result = await pending;
    expect(result).toMatchObject({
      exitCode: -1,
      stderr: 'spawn /missing/tool ENOENT',
      harnessError: { kind: 'spawn', message: 'spawn /missing/tool ENOENT' }
    });
  });

  it('returns the timeout sentinel and escalates to SIGKILL', async () => {
    vi.useFakeTimers();
    const pending = runProcess(['/build/enc'], { timeoutSeconds: 2 });
    child.stdout.emit('data', Buffer.from('frame 1'));

    await vi.advanceTimersByTimeAsync(2000);
    const result = await pending;
    expect(result).toMatchObject({
      exitCode: -1,
      stdout: 'frame 1',
      stderr: 'Timeout',
      harnessError: { kind: 'timeout', message: 'Timeout after 2s' }
    });
    expect(child.kill).toHaveBeenCalledWith('SIGTERM');

    await vi.advanceTimersByTimeAsync(5000);
    expect(child.kill).toHaveBeenLastCalledWith('SIGKILL');
  });

  it('does not kill a child that exited during the grace period', async () => {
    vi.useFakeTimers();
    const pending = runProcess(['/build/enc'], { timeoutSeconds: 1 });
    await vi.advanceTimersByTimeAsync(1000);
    await pending;

    child.exitCode = 143;
    child.emit('close', 143);
    await vi.advanceTimersByTimeAsync(5000);
    expect(child.kill).toHaveBeenCalledTimes(1);
  });
});

describe('buildRemoteCommand', () => {
  const target = {
    mode: 'remote' as const,
    host: 'gpu-box',
    user: 'tester',
    connectTimeoutSeconds: 5,
    envPrefixes: ['VK_', 'LD_LIBRARY_PATH']
  };

  it('quotes every argument and forwards only allow-listed variables', () => {
    const argv = buildRemoteCommand(target, {
      command: ['/build/enc', '-i', "/v/it's.yuv"],
      env: { LD_LIBRARY_PATH: '/build/lib', VK_LOADER_LAYERS_ENABLE: '*validation', HOME: '/root' },
      cwd: '/work',
      timeoutSeconds: 10
    });
    expect(argv).toEqual([
      'ssh',
      '-o',
      'ConnectTimeout=5',
      '-o',
      'BatchMode=yes',
      'tester@gpu-box',
      `cd '/work' && LD_LIBRARY_PATH='/build/lib' VK_LOADER_LAYERS_ENABLE='*validation' '/build/enc' '-i' '/v/it'"'"'s.yuv'`
    ]);
  });

  it('runs remote commands through ssh but reports the tool argv', async () => {
    const runner = createCommandRunner(target);
    const pending = runner.execute({ command: ['/build/dec', '--help'], timeoutSeconds: 10 });
    child.emit('close', 0);

    const result = await pending;
    expect(spawnMock.mock.calls[0]?.[0]).toBe('ssh');
    expect(result.command).toEqual(['/build/dec', '--help']);
    expect(runner.target).toBe('tester@gpu-box');
    expect(runner.remote).toBe(true);
  });

  it('parses the size printed by a remote stat probe', async () => {
    const runner = createCommandRunner(target);
    const pending = runner.statFile('/v/clip.yuv');
    child.stdout.emit('data', Buffer.from('152064\n'));
    child.emit('close', 0);

    expect(await pending).toEqual({ size: 152064 });
    const args: unknown = spawnMock.mock.calls[0]?.[1];
    expect(Array.isArray(args) ? args[args.length - 1] : undefined).toBe(
      "test -f '/v/clip.yuv' && stat -c %s '/v/clip.yuv'"
    );
  });
});

describe('local runner file helpers', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'runner-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('stats, lists and copies byte ranges', async () => {
    const runner = createCommandRunner({ mode: 'local' });
    await writeFile(join(directory, 'b.yuv'), '0123456789');
    await writeFile(join(directory, 'a.264'), 'x');

    expect(await runner.statFile(join(directory, 'b.yuv'))).toEqual({ size: 10 });
    expect(await runner.statFile(join(directory, 'missing.yuv'))).toBeUndefined();
    expect(await runner.statFile(directory)).toBeUndefined();
    expect(await runner.directoryExists(directory)).toBe(true);
    expect(await runner.listFiles(directory)).toEqual(['a.264', 'b.yuv']);
    expect(await runner.listFiles(join(directory, 'nope'))).toEqual([]);

    const copied = await runner.copyRange(join(directory, 'b.yuv'), join(directory, 'ref.yuv'), 2, 4);
    expect(copied).toBe(true);
    expect(await readFile(join(directory, 'ref.yuv'), 'utf8')).toBe('2345');
  });

  it('reports an incomplete copy when the source runs short', async () => {
    const runner = createCommandRunner({ mode: 'local' });
    await writeFile(join(directory, 'short.yuv'), 'abc');
    expect(await runner.copyRange(join(directory, 'short.yuv'), join(directory, 'out.yuv'), 0, 10)).toBe(false);
  });
});
