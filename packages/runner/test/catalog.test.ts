import { describe, expect, it } from 'vitest';
import { buildSuiteCases, loadSuiteCatalog, type SuiteCatalog } from '../src/catalog.js';
import { createFakeRunner } from './fakes.js';

const selection = { videoDir: '/videos', outputDir: '/out', maxFrames: 60 };

describe('loadSuiteCatalog', () => {
  it('loads the bundled catalog', () => {
    const catalog = loadSuiteCatalog();
    expect(catalog.decode.length).toBeGreaterThan(0);
    expect(catalog.aq.maxFrames).toBe(32);
    expect(catalog.aq.sweeps.map((sweep) => sweep.label)).toContain('combined_medium');
  });
});

describe('buildSuiteCases', () => {
  it('builds decode cases from listed and discovered clips', async () => {
    const runner = createFakeRunner({
      files: {
        '/videos/cts/clip-a.h264': 100,
        '/videos/av1-test-content/av1_input/cts1/av1-1-b8-01-size-16x16.ivf': 100,
        '/videos/vp9-sample.webm': 100,
        '/videos/notes.txt': 5
      }
    });
    const cases = await buildSuiteCases(runner, { ...selection, categories: ['decode'] });

    expect(cases.map((c) => c.name)).toEqual([
      'DEC_H264_clip_a',
      'DEC_AV1_cts1_av1_1_b8_01_size_16x16',
      'DEC_VP9_vp9_sample'
    ]);
    expect(cases[1]).toMatchObject({
      kind: 'decode',
      codec: 'av1',
      input: '/videos/av1-test-content/av1_input/cts1/av1-1-b8-01-size-16x16.ivf',
      output: '/out/DEC_AV1_cts1_av1_1_b8_01_size_16x16.yuv',
      description: 'AV1 CTS1 av1-1-b8-01-size-16x16',
      numFrames: 60,
      expectOutput: false
    });
  });

  it('honours the codec filter', async () => {
    const runner = createFakeRunner({
      files: { '/videos/cts/clip-a.h264': 100, '/videos/vp9-sample.webm': 100 }
    });
    const cases = await buildSuiteCases(runner, { ...selection, categories: ['decode'], codec: 'vp9' });
    expect(cases.map((c) => c.name)).toEqual(['DEC_VP9_vp9_sample']);
  });

  it('builds encode cases per codec and skips unsupported inputs', async () => {
    const catalog: SuiteCatalog = {
      decode: [],
      decodeDiscovery: [],
      encode: [
        {
          dir: 'cts/video',
          name: '{width}x{height}_{bitDepth}bit',
          description: 'encode {width}x{height} {bitDepth}-bit',
          files: [
            { file: '352x288_420_8le.yuv', width: 352, height: 288, bitDepth: 8, chroma: '420' },
            { file: '3840x2160_420_8le.yuv', width: 3840, height: 2160, bitDepth: 8, chroma: '420' },
            { file: '1920x1080_420_10le.yuv', width: 1920, height: 1080, bitDepth: 10, chroma: '420' },
            { file: '1920x1080_444_10le.yuv', width: 1920, height: 1080, bitDepth: 10, chroma: '444' },
            { file: '720x480_420_8le.yuv', width: 720, height: 480, bitDepth: 8, chroma: '420' }
          ]
        }
      ],
      aq: { inputs: [], maxFrames: 32, sweeps: [] }
    };
    const runner = createFakeRunner({
      files: {
        '/videos/cts/video/352x288_420_8le.yuv': 1,
        '/videos/cts/video/3840x2160_420_8le.yuv': 1,
        '/videos/cts/video/1920x1080_420_10le.yuv': 1,
        '/videos/cts/video/1920x1080_444_10le.yuv': 1
      }
    });

    const cases = await buildSuiteCases(runner, { ...selection, categories: ['encode'] }, catalog);

    expect(cases.map((c) => c.name)).toEqual([
      'ENC_H264_352x288_8bit',
      'ENC_H265_352x288_8bit',
      'ENC_H265_1920x1080_10bit',
      'ENC_AV1_352x288_8bit',
      'ENC_AV1_1920x1080_10bit'
    ]);
    expect(cases[2]).toMatchObject({
      output: '/out/ENC_H265_1920x1080_10bit.265',
      description: 'H265 encode 1920x1080 10-bit',
      bitDepth: 10,
      numFrames: 30,
      expectOutput: true
    });
  });

  it('sweeps AQ strengths on the first available input', async () => {
    const runner = createFakeRunner({
      files: {
        '/videos/cts/video/720x480_420_8le.yuv': 1,
        '/videos/cts/video/1920x1080_420_8le.yuv': 1
      }
    });
    const cases = await buildSuiteCases(runner, {
      ...selection,
      maxFrames: 30,
      categories: ['aq'],
      codec: 'h265'
    });

    expect(cases).toHaveLength(9);
    expect(cases[1]).toMatchObject({
      name: 'ENC_AQ_H265_spatial_only_0.5',
      category: 'aq',
      input: '/videos/cts/video/720x480_420_8le.yuv',
      output: '/out/ENC_AQ_H265_spatial_only_0.5.265',
      description: 'H265 AQ spatial_only_0.5 (spatial=0.5, temporal=-2.0)',
      width: 720,
      height: 480,
      numFrames: 30,
      aq: { spatial: 0.5, temporal: -2 }
    });
  });

  it('returns no AQ cases without an input', async () => {
    const cases = await buildSuiteCases(createFakeRunner(), { ...selection, categories: ['aq'] });
    expect(cases).toEqual([]);
  });
});
