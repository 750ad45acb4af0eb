import { join, posix, win32 } from 'node:path';
import { readdir } from 'node:fs/promises';
import {
  CODEC_ALIASES,
  toolchainConfigSchema,
  type BitDepth,
  type Chroma,
  type Codec,
  type TargetPlatform
} from '@vkvideo-harness/schemas';
import type { CommandRunner } from './executor.js';

// ─── Toolchain layout ─────────────────────────────────────────────────────────

export interface ResolvedToolchain {
  encoder: string;
  decoder: string;
  libDir: string;
  platform: TargetPlatform;
}

export function currentPlatform(): TargetPlatform {
  const platform = process.platform;
  if (platform === 'win32' || platform === 'darwin') return platform;
  return 'linux';
}

/**
 * Locates the encoder/decoder test executables inside a source checkout.
 * Release builds live in `build-release/`, debug builds in `build/`; Windows
 * generators add a per-configuration subdirectory and `.exe`.
 */
export function resolveToolchain(input: {
  root: string;
  variant?: 'debug' | 'release';
  buildDir?: string;
  platform?: TargetPlatform;
}): ResolvedToolchain {
  const config = toolchainConfigSchema.parse(input);
  const platform = config.platform ?? currentPlatform();
  const path = platform === 'win32' ? win32 : posix;
  const release = config.variant === 'release';
  const buildDir = config.buildDir ?? path.join(config.root, release ? 'build-release' : 'build');
  const configDir = platform === 'win32' ? (release ? 'Release' : 'Debug') : '';
  const suffix = platform === 'win32' ? '.exe' : '';

  const executable = (component: 'encoder' | 'decoder', name: string): string =>
    path.join(buildDir, `vk_video_${component}`, 'test', configDir, `${name}${suffix}`);

  return {
    encoder: executable('encoder', 'vulkan-video-enc-test'),
    decoder: executable('decoder', 'vulkan-video-dec-test'),
    libDir: path.join(buildDir, 'lib'),
    platform
  };
}

/** Environment override that puts `libDir` first on the platform's library search path. */
export function libraryPathEnv(
  libDir: string,
  platform: TargetPlatform,
  inherited: NodeJS.ProcessEnv = {}
): Record<string, string> {
  if (platform === 'win32') {
    const current = inherited.PATH ?? inherited.Path ?? '';
    return { PATH: current ? `${libDir};${current}` : libDir };
  }
  const current = inherited.LD_LIBRARY_PATH ?? '';
  return { LD_LIBRARY_PATH: current ? `${libDir}:${current}` : libDir };
}

// ─── Codecs ───────────────────────────────────────────────────────────────────

export function normalizeCodec(alias: string): Codec | undefined {
  const key = alias.trim().toLowerCase();
  return Object.hasOwn(CODEC_ALIASES, key) ? CODEC_ALIASES[key] : undefined;
}

const ENCODER_CODEC_ARGS: Record<Codec, string | undefined> = {
  h264: 'avc',
  h265: 'hevc',
  av1: 'av1',
  vp9: undefined
};

export function encoderCodecArg(codec: Codec): string | undefined {
  return ENCODER_CODEC_ARGS[codec];
}

const BITSTREAM_EXTENSIONS: Record<Codec, string> = {
  h264: '.264',
  h265: '.265',
  av1: '.ivf',
  vp9: '.bin'
};

export function bitstreamExtension(codec: Codec): string {
  return BITSTREAM_EXTENSIONS[codec];
}

// ─── Raw frame inputs ─────────────────────────────────────────────────────────

export interface RawFrameFormat {
  width: number;
  height: number;
  chroma: Chroma;
  bitDepth: BitDepth;
}

export interface RawFrameInfo extends RawFrameFormat {
  packed: boolean;
}

const RAW_FRAME_NAME = /^(\d+)x(\d+)_(400|420|422|444)_(8|10)le(_packed)?\.[A-Za-z0-9]+$/;

export function parseRawFrameName(name: string): RawFrameInfo | undefined {
  const match = RAW_FRAME_NAME.exec(name);
  if (!match) return undefined;
  const [, width, height, chroma, bits, packed] = match;
  if (width === undefined || height === undefined || chroma === undefined || bits === undefined) {
    return undefined;
  }
  if (chroma !== '400' && chroma !== '420' && chroma !== '422' && chroma !== '444') {
    return undefined;
  }
  const w = Number(width);
  const h = Number(height);
  if (w <= 0 || h <= 0) return undefined;
  return {
    width: w,
    height: h,
    chroma,
    bitDepth: bits === '10' ? 10 : 8,
    packed: packed !== undefined
  };
}

export interface RawInputRequest {
  bitDepth?: BitDepth;
  chroma?: Chroma;
  /** Upper bound on width x height. */
  maxPixels?: number;
}

export interface RawInputCandidate {
  path: string;
  info: RawFrameInfo;
}

/** Larger frames first, then 4:2:0, then the lower bit depth. */
export function selectPreferredInput(
  candidates: readonly RawInputCandidate[],
  request: RawInputRequest = {}
): RawInputCandidate | undefined {
  const eligible = candidates.filter(
    ({ info }) =>
      (request.bitDepth === undefined || info.bitDepth === request.bitDepth) &&
      (request.chroma === undefined || info.chroma === request.chroma) &&
      (request.maxPixels === undefined || info.width * info.height <= request.maxPixels)
  );
  const ranked = [...eligible].sort((a, b) => {
    const area = b.info.width * b.info.height - a.info.width * a.info.height;
    if (area !== 0) return area;
    const chroma = Number(b.info.chroma === '420') - Number(a.info.chroma === '420');
    if (chroma !== 0) return chroma;
    return a.info.bitDepth - b.info.bitDepth;
  });
  return ranked[0];
}

export async function resolveRawInput(
  runner: CommandRunner,
  directories: readonly string[],
  request: RawInputRequest = {}
): Promise<RawInputCandidate | undefined> {
  const joinPath = runner.remote ? posix.join : join;
  const candidates: RawInputCandidate[] = [];
  for (const directory of directories) {
    for (const name of await runner.listFiles(directory)) {
      const info = parseRawFrameName(name);
      if (info) {
        candidates.push({ path: joinPath(directory, name), info });
      }
    }
  }
  return selectPreferredInput(candidates, request);
}

export function rawFrameBytes(format: RawFrameFormat): number {
  const luma = format.width * format.height;
  const samples =
    format.chroma === '400'
      ? luma
      : format.chroma === '420'
        ? (luma * 3) / 2
        : format.chroma === '422'
          ? luma * 2
          : luma * 3;
  return Math.floor(samples) * (format.bitDepth > 8 ? 2 : 1);
}

export function ffmpegPixelFormat(format: Pick<RawFrameFormat, 'chroma' | 'bitDepth'>): string {
  const base =
    format.chroma === '400'
      ? 'gray'
      : format.chroma === '420'
        ? 'yuv420p'
        : format.chroma === '422'
          ? 'yuv422p'
          : 'yuv444p';
  return format.bitDepth > 8 ? `${base}10le` : base;
}

// ─── Encoder profiles ─────────────────────────────────────────────────────────

export const RESERVED_PROFILE_FILES: readonly string[] = ['encoder_config.schema.json', 'README.json'];

export interface DiscoveredProfile {
  /** `stem` for generic profiles, `vendor/stem` for vendor ones. */
  name: string;
  path: string;
  vendor: string | undefined;
}

function profileStem(file: string): string | undefined {
  if (!file.endsWith('.json') || RESERVED_PROFILE_FILES.includes(file)) return undefined;
  return file.slice(0, -'.json'.length);
}

/**
 * Flat `*.json` files are generic profiles; each immediate subdirectory holds
 * one vendor's profiles. Profile directories are read on the controller host.
 */
export async function discoverProfiles(
  directory: string,
  filter?: string
): Promise<DiscoveredProfile[]> {
  const profiles: DiscoveredProfile[] = [];
  const entries = await readdir(directory, { withFileTypes: true });

  for (const entry of entries) {
    if (entry.isFile()) {
      const stem = profileStem(entry.name);
      if (stem) {
        profiles.push({ name: stem, path: join(directory, entry.name), vendor: undefined });
      }
    } else if (entry.isDirectory()) {
      const vendorDir = join(directory, entry.name);
      for (const file of await readdir(vendorDir, { withFileTypes: true })) {
        const stem = file.isFile() ? profileStem(file.name) : undefined;
        if (stem) {
          profiles.push({
            name: `${entry.name}/${stem}`,
            path: join(vendorDir, file.name),
            vendor: entry.name
          });
        }
      }
    }
  }

  const needle = filter?.toLowerCase();
  return profiles
    .filter((profile) => needle === undefined || profile.name.toLowerCase().includes(needle))
    .sort((a, b) => a.name.localeCompare(b.name));
}
