import { readFileSync } from 'node:fs';
import { basename, extname, join, posix } from 'node:path';
import { z } from 'zod';
import {
  bitDepthSchema,
  chromaSchema,
  CODECS,
  codecSchema,
  ENCODABLE_CODECS,
  testCaseSchema,
  type Codec,
  type SuiteCategory,
  type TestCase
} from '@vkvideo-harness/schemas';
import type { CommandRunner } from './executor.js';
import { formatAqStrength } from './commandBuilder.js';
import { bitstreamExtension } from './targets.js';

// ─── Catalog file ─────────────────────────────────────────────────────────────

const rawFileSchema = z.object({
  file: z.string().min(1),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  bitDepth: bitDepthSchema,
  chroma: chromaSchema
});

export const suiteCatalogSchema = z.object({
  decode: z.array(
    z.object({
      codec: codecSchema,
      file: z.string().min(1),
      description: z.string().min(1),
      dir: z.string().min(1)
    })
  ),
  decodeDiscovery: z.array(
    z.object({
      codec: codecSchema,
      dirs: z.array(z.string().min(1)),
      pattern: z.string().min(1),
      namePrefix: z.string(),
      descriptionPrefix: z.string().min(1)
    })
  ),
  encode: z.array(
    z.object({
      dir: z.string().min(1),
      name: z.string().min(1),
      description: z.string().min(1),
      files: z.array(rawFileSchema)
    })
  ),
  aq: z.object({
    inputs: z.array(
      z.object({
        dir: z.string().min(1),
        file: z.string().min(1),
        width: z.number().int().positive(),
        height: z.number().int().positive()
      })
    ),
    maxFrames: z.number().int().positive(),
    sweeps: z.array(z.object({ spatial: z.number(), temporal: z.number(), label: z.string().min(1) }))
  })
});

export type SuiteCatalog = z.infer<typeof suiteCatalogSchema>;

export function loadSuiteCatalog(
  location: URL | string = new URL('../catalog/suite-catalog.json', import.meta.url)
): SuiteCatalog {
  return suiteCatalogSchema.parse(JSON.parse(readFileSync(location, 'utf8')));
}

// ─── Case construction ────────────────────────────────────────────────────────

export interface SuiteSelection {
  videoDir: string;
  outputDir: string;
  categories: readonly SuiteCategory[];
  codec?: Codec;
  maxFrames: number;
}

const ENCODE_FRAME_CAP = 30;

// Labels used in case names; H.265 cases are tagged HEVC on the decode side.
const DECODE_TAGS: Record<Codec, string> = { h264: 'H264', h265: 'HEVC', av1: 'AV1', vp9: 'VP9' };

function stemOf(file: string): string {
  return basename(file, extname(file));
}

function caseStem(file: string): string {
  return stemOf(file).replace(/-/g, '_');
}

function fill(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) =>
    key in values ? String(values[key]) : whole
  );
}

function codecOrder(codec: Codec): number {
  return CODECS.indexOf(codec);
}

/** Stable: catalog order is kept within each codec. */
function groupByCodec(cases: TestCase[]): TestCase[] {
  return cases
    .map((testCase, index) => ({ testCase, index }))
    .sort((a, b) => codecOrder(a.testCase.codec) - codecOrder(b.testCase.codec) || a.index - b.index)
    .map(({ testCase }) => testCase);
}

/**
 * Builds the suite's cases from the catalog, keeping only inputs the runner
 * confirms present on the target.
 */
export async function buildSuiteCases(
  runner: CommandRunner,
  selection: SuiteSelection,
  catalog: SuiteCatalog = loadSuiteCatalog()
): Promise<TestCase[]> {
  const joinPath = runner.remote ? posix.join : join;
  const resolveDir = (dir: string) => (dir === '.' ? selection.videoDir : joinPath(selection.videoDir, dir));
  const wanted = (codec: Codec) => selection.codec === undefined || selection.codec === codec;
  const exists = async (path: string) => (await runner.statFile(path)) !== undefined;

  const cases: TestCase[] = [];

  if (selection.categories.includes('decode')) {
    const decodeCases: TestCase[] = [];
    const seen = new Set<string>();
    const addDecode = (codec: Codec, input: string, stem: string, description: string) => {
      if (seen.has(input)) return;
      seen.add(input);
      const name = `DEC_${DECODE_TAGS[codec]}_${stem}`;
      decodeCases.push(
        testCaseSchema.parse({
          name,
          kind: 'decode',
          category: 'decode',
          codec,
          input,
          output: joinPath(selection.outputDir, `${name}.yuv`),
          description,
          numFrames: selection.maxFrames
        })
      );
    };

    for (const entry of catalog.decode) {
      if (!wanted(entry.codec)) continue;
      const input = joinPath(resolveDir(entry.dir), entry.file);
      if (await exists(input)) {
        addDecode(entry.codec, input, caseStem(entry.file), entry.description);
      }
    }

    for (const discovery of catalog.decodeDiscovery) {
      if (!wanted(discovery.codec)) continue;
      const pattern = new RegExp(discovery.pattern);
      for (const dir of discovery.dirs) {
        const directory = resolveDir(dir);
        for (const file of await runner.listFiles(directory)) {
          if (!pattern.test(file)) continue;
          addDecode(
            discovery.codec,
            joinPath(directory, file),
            `${discovery.namePrefix}${caseStem(file)}`,
            `${discovery.descriptionPrefix} ${stemOf(file)}`
          );
        }
      }
    }
    cases.push(...groupByCodec(decodeCases));
  }

  if (selection.categories.includes('encode')) {
    const encodeCases: TestCase[] = [];
    const numFrames = Math.min(selection.maxFrames, ENCODE_FRAME_CAP);
    for (const group of catalog.encode) {
      for (const raw of group.files) {
        // 4K inputs are left to the benchmark; 10-bit encodes stay on 4:2:0.
        if (raw.width > 1920 && raw.height > 1080) continue;
        if (raw.bitDepth === 10 && raw.chroma !== '420') continue;
        const input = joinPath(resolveDir(group.dir), raw.file);
        if (!(await exists(input))) continue;

        for (const codec of ENCODABLE_CODECS) {
          if (!wanted(codec)) continue;
          if (raw.bitDepth === 10 && codec === 'h264') continue;
          const values = { ...raw, stem: stemOf(raw.file) };
          const tag = codec.toUpperCase();
          const name = `ENC_${tag}_${fill(group.name, values)}`;
          encodeCases.push(
            testCaseSchema.parse({
              name,
              kind: 'encode',
              category: 'encode',
              codec,
              input,
              output: joinPath(selection.outputDir, `${name}${bitstreamExtension(codec)}`),
              description: `${tag} ${fill(group.description, values)}`,
              width: raw.width,
              height: raw.height,
              bitDepth: raw.bitDepth,
              chroma: raw.chroma,
              numFrames,
              expectOutput: true
            })
          );
        }
      }
    }
    cases.push(...groupByCodec(encodeCases));
  }

  if (selection.categories.includes('aq')) {
    let source: SuiteCatalog['aq']['inputs'][number] | undefined;
    let sourcePath = '';
    for (const candidate of catalog.aq.inputs) {
      const path = joinPath(resolveDir(candidate.dir), candidate.file);
      if (await exists(path)) {
        source = candidate;
        sourcePath = path;
        break;
      }
    }

    if (source) {
      const numFrames = Math.min(selection.maxFrames, catalog.aq.maxFrames);
      for (const codec of ENCODABLE_CODECS) {
        if (!wanted(codec)) continue;
        const tag = codec.toUpperCase();
        for (const sweep of catalog.aq.sweeps) {
          const name = `ENC_AQ_${tag}_${sweep.label}`;
          cases.push(
            testCaseSchema.parse({
              name,
              kind: 'encode',
              category: 'aq',
              codec,
              input: sourcePath,
              output: joinPath(selection.outputDir, `${name}${bitstreamExtension(codec)}`),
              description:
                `${tag} AQ ${sweep.label} ` +
                `(spatial=${formatAqStrength(sweep.spatial)}, temporal=${formatAqStrength(sweep.temporal)})`,
              width: source.width,
              height: source.height,
              bitDepth: 8,
              chroma: '420',
              numFrames,
              aq: { spatial: sweep.spatial, temporal: sweep.temporal },
              expectOutput: true
            })
          );
        }
      }
    }
  }

  return cases;
}
