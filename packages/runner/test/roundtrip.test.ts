import { describe, expect, it } from 'vitest';
import { bitstreamCodec, isBitstreamFile, runDecoderRoundtrip } from '../src/roundtrip.js';
import { argAfter, createFakeRunner } from './fakes.js';

const DECODER = '/src/build-release/vk_video_decoder/test/vulkan-video-dec-test';

describe('bitstream detection', () => {
  it('recognizes encoder output extensions', () => {
    expect(['a.264', 'a.265', 'a.ivf', 'a.bin', 'a.yuv', 'a.json'].map(isBitstreamFile)).toEqual([
      true,
      true,
      true,
      true,
      false,
      false
    ]);
  });

  it('reads the codec from the extension or the name', () => {
    expect(bitstreamCodec('clip.265')).toBe('h265');
    expect(bitstreamCodec('clip_hevc_p4.bin')).toBe('h265');
    expect(bitstreamCodec('clip-avc.bin')).toBe('h264');
    expect(bitstreamCodec('mystery.bin')).toBeUndefined();
  });
});

describe('runDecoderRoundtrip', () => {
  const config = {
    directory: '/enc',
    outputDir: '/dec',
    toolchain: { root: '/src', platform: 'linux' as const }
  };

  it('decodes every non-empty bitstream with the decoder log scan', async () => {
    const runner = createFakeRunner({
      files: {
        [DECODER]: 1,
        '/enc/a.264': 100,
        '/enc/b.ivf': 100,
        '/enc/empty.265': 0,
        '/enc/mystery.bin': 100,
        '/enc/notes.txt': 100
      },
      directories: ['/enc'],
      respond: (request) =>
        argAfter(request.command, '-i') === '/enc/b.ivf'
          ? { stdout: 'Error: unsupported sequence header' }
          : { stdout: 'Decoder: using validation layer, no errors detected' }
    });

    const report = await runDecoderRoundtrip(config, { runner });

    expect(report.cases.map((c) => [c.name, c.codec, c.outcome])).toEqual([
      ['a.264', 'h264', 'PASSED'],
      ['b.ivf', 'av1', 'FAILED'],
      ['mystery.bin', null, 'SKIPPED']
    ]);
    expect(report.cases[2]?.message).toBe('Cannot determine codec');
    expect(report.cases.every((c) => c.category === 'roundtrip')).toBe(true);
    expect(runner.calls).toHaveLength(2);
    expect(argAfter(runner.calls[0]?.command ?? [], '-o')).toBe('/dec/a.yuv');
    expect(runner.calls[0]?.timeoutSeconds).toBe(60);
    expect(report.config.categories).toEqual(['roundtrip']);
  });

  it('applies the name filter', async () => {
    const runner = createFakeRunner({
      files: { [DECODER]: 1, '/enc/a.264': 100, '/enc/b.ivf': 100 },
      directories: ['/enc']
    });
    const report = await runDecoderRoundtrip({ ...config, filter: 'B.' }, { runner });
    expect(report.cases.map((c) => c.name)).toEqual(['b.ivf']);
  });

  it('uses an explicit decoder path', async () => {
    const runner = createFakeRunner({
      files: { '/opt/dec': 1, '/enc/a.264': 100 },
      directories: ['/enc']
    });
    await runDecoderRoundtrip({ ...config, decoderPath: '/opt/dec' }, { runner });
    expect(runner.calls[0]?.command[0]).toBe('/opt/dec');
  });

  it('fails fast on a missing decoder or directory', async () => {
    await expect(
      runDecoderRoundtrip(config, { runner: createFakeRunner({ directories: ['/enc'] }) })
    ).rejects.toThrow(`Decoder not found: ${DECODER}`);
    await expect(
      runDecoderRoundtrip(config, { runner: createFakeRunner({ files: { [DECODER]: 1 } }) })
    ).rejects.toThrow('Not a directory: /enc');
  });
});
