import { describe, expect, it } from 'vitest';
import { testCaseSchema } from '@vkvideo-harness/schemas';
import {
  buildCommand,
  buildDecoderCommand,
  buildEncoderCommand,
  formatAqStrength,
  formatCommand,
  validationEnv
} from '../src/commandBuilder.js';

const executables = { encoder: '/bin/enc', decoder: '/bin/dec' };

const aqCase = testCaseSchema.parse({
  name: 'ENC_AQ_H265_spatial_only',
  kind: 'encode',
  category: 'aq',
  codec: 'h265',
  input: '/v/352x288_420_8le.yuv',
  output: '/o/out.265',
  description: 'spatial only',
  width: 352,
  height: 288,
  chroma: '420',
  numFrames: 10,
  aq: { spatial: 0.5, temporal: -2 },
  expectOutput: true
});

describe('formatAqStrength', () => {
  it('keeps one decimal for whole numbers', () => {
    expect(formatAqStrength(-2)).toBe('-2.0');
    expect(formatAqStrength(0)).toBe('0.0');
    expect(formatAqStrength(1)).toBe('1.0');
    expect(formatAqStrength(0.75)).toBe('0.75');
  });
});

describe('buildEncoderCommand', () => {
  it('emits geometry, frame count and both AQ strengths', () => {
    expect(buildEncoderCommand(aqCase, '/bin/enc')).toEqual([
      '/bin/enc',
      '-i',
      '/v/352x288_420_8le.yuv',
      '-o',
      '/o/out.265',
      '-c',
      'hevc',
      '--inputWidth',
      '352',
      '--inputHeight',
      '288',
      '--inputChromaSubsampling',
      '420',
      '--numFrames',
      '10',
      '--spatialAQStrength',
      '0.5',
      '--temporalAQStrength',
      '-2.0'
    ]);
  });

  it('puts a profile first and extra arguments last', () => {
    const profileCase = testCaseSchema.parse({
      name: 'nvidia/high_quality',
      kind: 'profile',
      category: 'profile',
      codec: 'avc',
      input: '/v/in.yuv',
      output: '/o/p.264',
      description: 'profile',
      encoderConfig: '/profiles/nvidia/high_quality.json',
      extraArgs: ['--verbose']
    });
    expect(buildCommand(profileCase, executables, { validate: false })).toEqual([
      '/bin/enc',
      '--encoderConfig',
      '/profiles/nvidia/high_quality.json',
      '-i',
      '/v/in.yuv',
      '-o',
      '/o/p.264',
      '-c',
      'avc',
      '--verbose'
    ]);
  });

  it('refuses codecs without encoder support', () => {
    const vp9Case = testCaseSchema.parse({
      name: 'ENC_VP9',
      kind: 'encode',
      category: 'encode',
      codec: 'vp9',
      input: '/v/in.yuv',
      output: '/o/out.bin',
      description: 'vp9'
    });
    expect(() => buildEncoderCommand(vp9Case, '/bin/enc')).toThrow('Codec vp9 has no encoder support');
  });
});

describe('buildDecoderCommand', () => {
  it('adds the frame limit and validation flag', () => {
    const decodeCase = testCaseSchema.parse({
      name: 'DEC_AV1_clip',
      kind: 'decode',
      category: 'decode',
      codec: 'av1',
      input: '/v/clip.ivf',
      output: '/o/clip.yuv',
      description: 'clip',
      numFrames: 5
    });
    expect(buildDecoderCommand(decodeCase, '/bin/dec', { validate: true })).toEqual([
      '/bin/dec',
      '-i',
      '/v/clip.ivf',
      '--noPresent',
      '--codec',
      'av1',
      '-c',
      '5',
      '-v',
      '-o',
      '/o/clip.yuv'
    ]);
  });
});

describe('formatCommand', () => {
  it('prefixes environment overrides and quotes only where needed', () => {
    expect(formatCommand(['/bin/enc', '-i', '/a b/in.yuv'], { LD_LIBRARY_PATH: '/out/lib' })).toBe(
      "LD_LIBRARY_PATH=/out/lib /bin/enc -i '/a b/in.yuv'"
    );
  });

  it('quotes the validation layer pattern', () => {
    expect(formatCommand(['/bin/dec'], validationEnv())).toBe(
      "VK_LOADER_LAYERS_ENABLE='*validation' VK_VALIDATION_VALIDATE_SYNC=true /bin/dec"
    );
  });
});
