import { describe, expect, it } from 'vitest';
import { createQualityMetricsAdapter, parsePsnr, parseVmaf, ZERO_PSNR } from '../src/metrics.js';
import { createFakeRunner } from './fakes.js';

const PSNR_STDERR =
  '[Parsed_psnr_0 @ 0x5580] PSNR y:38.123 u:41.5 v:42.0 average:39.01 min:35.2 max:44.9\n';
const VMAF_STDERR = '[libvmaf @ 0x5581] VMAF score: 92.4567\n';

describe('parsePsnr', () => {
  it('reads every component of the summary line', () => {
    expect(parsePsnr(`frame=10\n${PSNR_STDERR}`)).toEqual({
      y: 38.123,
      u: 41.5,
      v: 42,
      average: 39.01,
      min: 35.2,
      max: 44.9
    });
  });

  it('returns undefined without a summary line', () => {
    expect(parsePsnr('no metrics here')).toBeUndefined();
  });
});

describe('parseVmaf', () => {
  it('reads the pooled score', () => {
    expect(parseVmaf(VMAF_STDERR)).toBe(92.4567);
    expect(parseVmaf('')).toBeUndefined();
  });
});

describe('createQualityMetricsAdapter', () => {
  const format = { width: 352, height: 288, chroma: '420', bitDepth: 8 } as const;

  it('decodes, compares and removes the temporary decode', async () => {
    const runner = createFakeRunner({
      respond: (request, fs) => {
        const argv = request.command;
        if (argv.includes('-y')) {
          fs.files.set('/o/decoded_no_aq.yuv', 1520640);
          return {};
        }
        if (argv.includes('[0:v][1:v]psnr')) return { stderr: PSNR_STDERR };
        return { stderr: VMAF_STDERR };
      }
    });
    const metrics = createQualityMetricsAdapter(runner, { ffmpegPath: 'ffmpeg' });

    const measurement = await metrics.measure({
      encoded: '/o/encoded_no_aq.264',
      reference: '/o/reference.yuv',
      format,
      workDir: '/o',
      name: 'no_aq'
    });

    expect(measurement.decoded).toBe(true);
    expect(measurement.psnr.average).toBe(39.01);
    expect(measurement.vmaf).toBe(92.4567);
    expect(measurement.error).toBeUndefined();
    expect(measurement.commands.decode).toBe(
      'ffmpeg -y -i /o/encoded_no_aq.264 -f rawvideo -pix_fmt yuv420p /o/decoded_no_aq.yuv'
    );
    expect(measurement.commands.psnr).toBe(
      "ffmpeg -s 352x288 -pix_fmt yuv420p -i /o/decoded_no_aq.yuv -s 352x288 -pix_fmt yuv420p -i /o/reference.yuv -lavfi '[0:v][1:v]psnr' -f null -"
    );
    expect(runner.calls).toHaveLength(3);
    expect(runner.removed).toEqual(['/o/decoded_no_aq.yuv']);
  });

  it('skips the comparisons that were not requested', async () => {
    const runner = createFakeRunner({
      respond: (request, fs) => {
        fs.files.set('/o/decoded_spatial.yuv', 100);
        return { stderr: PSNR_STDERR };
      }
    });
    const measurement = await createQualityMetricsAdapter(runner, { ffmpegPath: 'ffmpeg' }).measure({
      encoded: '/o/encoded_spatial.264',
      reference: '/o/reference.yuv',
      format,
      workDir: '/o',
      name: 'spatial',
      skipVmaf: true
    });
    expect(runner.calls).toHaveLength(2);
    expect(measurement.vmaf).toBe(0);
    expect(measurement.commands.vmaf).toBe('');
  });

  it('reports a failed decode and zero metrics', async () => {
    const runner = createFakeRunner({ respond: () => ({ exitCode: 1, stderr: 'Invalid data' }) });
    const measurement = await createQualityMetricsAdapter(runner, { ffmpegPath: 'ffmpeg' }).measure({
      encoded: '/o/encoded_no_aq.264',
      reference: '/o/reference.yuv',
      format,
      workDir: '/o',
      name: 'no_aq'
    });
    expect(measurement).toMatchObject({
      decoded: false,
      psnr: ZERO_PSNR,
      vmaf: 0,
      error: 'Failed to decode for quality analysis'
    });
    expect(runner.calls).toHaveLength(1);
    expect(runner.removed).toEqual(['/o/decoded_no_aq.yuv']);
  });
});
