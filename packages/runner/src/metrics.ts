import { join, posix } from 'node:path';
import type { CommandRunner } from './executor.js';
import { formatCommand } from './commandBuilder.js';
import { ffmpegPixelFormat, type RawFrameFormat } from './targets.js';
import type { PsnrComponents } from './types.js';

export const DECODE_TIMEOUT_SECONDS = 300;
export const PSNR_TIMEOUT_SECONDS = 300;
export const VMAF_TIMEOUT_SECONDS = 600;

const PSNR_LINE =
  /PSNR y:([0-9.]+) u:([0-9.]+) v:([0-9.]+) average:([0-9.]+) min:([0-9.]+) max:([0-9.]+)/;
const VMAF_LINE = /VMAF score:\s*([0-9.]+)/;

export const ZERO_PSNR: PsnrComponents = Object.freeze({
  y: 0,
  u: 0,
  v: 0,
  average: 0,
  min: 0,
  max: 0
});

function toNumber(text: string | undefined): number {
  const value = Number(text);
  return Number.isFinite(value) ? value : 0;
}

export function parsePsnr(text: string): PsnrComponents | undefined {
  const match = PSNR_LINE.exec(text);
  if (!match) return undefined;
  return {
    y: toNumber(match[1]),
    u: toNumber(match[2]),
    v: toNumber(match[3]),
    average: toNumber(match[4]),
    min: toNumber(match[5]),
    max: toNumber(match[6])
  };
}

export function parseVmaf(text: string): number | undefined {
  const match = VMAF_LINE.exec(text);
  return match ? toNumber(match[1]) : undefined;
}

export interface MeasureRequest {
  encoded: string;
  reference: string;
  format: RawFrameFormat;
  workDir: string;
  /** Distinguishes the temporary decode of each configuration. */
  name: string;
  skipPsnr?: boolean;
  skipVmaf?: boolean;
}

export interface QualityMeasurement {
  decoded: boolean;
  psnr: PsnrComponents;
  vmaf: number;
  commands: { decode: string; psnr: string; vmaf: string };
  error?: string;
}

export interface QualityMetricsAdapter {
  measure(request: MeasureRequest): Promise<QualityMeasurement>;
}

export function createQualityMetricsAdapter(
  runner: CommandRunner,
  options: { ffmpegPath: string }
): QualityMetricsAdapter {
  const ffmpeg = options.ffmpegPath;
  const joinPath = runner.remote ? posix.join : join;

  const compareCommand = (
    decoded: string,
    reference: string,
    format: RawFrameFormat,
    filter: 'psnr' | 'libvmaf'
  ): string[] => {
    const size = `${format.width}x${format.height}`;
    const pixelFormat = ffmpegPixelFormat(format);
    return [
      ffmpeg,
      '-s',
      size,
      '-pix_fmt',
      pixelFormat,
      '-i',
      decoded,
      '-s',
      size,
      '-pix_fmt',
      pixelFormat,
      '-i',
      reference,
      '-lavfi',
      `[0:v][1:v]${filter}`,
      '-f',
      'null',
      '-'
    ];
  };

  return {
    async measure(request) {
      const decodedPath = joinPath(request.workDir, `decoded_${request.name}.yuv`);
      const decodeArgv = [
        ffmpeg,
        '-y',
        '-i',
        request.encoded,
        '-f',
        'rawvideo',
        '-pix_fmt',
        ffmpegPixelFormat(request.format),
        decodedPath
      ];

      const measurement: QualityMeasurement = {
        decoded: false,
        psnr: { ...ZERO_PSNR },
        vmaf: 0,
        commands: { decode: formatCommand(decodeArgv), psnr: '', vmaf: '' }
      };

      try {
        const decode = await runner.execute({
          command: decodeArgv,
          timeoutSeconds: DECODE_TIMEOUT_SECONDS
        });
        const decodedFile = decode.exitCode === 0 ? await runner.statFile(decodedPath) : undefined;
        if (decodedFile === undefined || decodedFile.size === 0) {
          measurement.error = 'Failed to decode for quality analysis';
          return measurement;
        }
        measurement.decoded = true;

        if (!request.skipPsnr) {
          const argv = compareCommand(decodedPath, request.reference, request.format, 'psnr');
          measurement.commands.psnr = formatCommand(argv);
          const result = await runner.execute({ command: argv, timeoutSeconds: PSNR_TIMEOUT_SECONDS });
          measurement.psnr = parsePsnr(result.stderr) ?? { ...ZERO_PSNR };
        }

        if (!request.skipVmaf) {
          const argv = compareCommand(decodedPath, request.reference, request.format, 'libvmaf');
          measurement.commands.vmaf = formatCommand(argv);
          const result = await runner.execute({ command: argv, timeoutSeconds: VMAF_TIMEOUT_SECONDS });
          measurement.vmaf = parseVmaf(result.stderr) ?? 0;
        }

        return measurement;
      } finally {
        await runner.removeFile(decodedPath);
      }
    }
  };
}
