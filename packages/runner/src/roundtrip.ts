import { extname, basename, join, posix } from 'node:path';
import {
  roundtripConfigSchema,
  testCaseSchema,
  type Codec,
  type RoundtripConfigInput
} from '@vkvideo-harness/schemas';
import { skippedResult } from './classifier.js';
import { silentReporter, type RunReporter } from './console.js';
import { evaluateCase } from './evaluate.js';
import { createCommandRunner, type CommandRunner } from './executor.js';
import { libraryPathEnv, normalizeCodec, resolveToolchain } from './targets.js';
import { summarizeCases } from './runner.js';
import type { CaseResult, SuiteReport } from './types.js';

export const ROUNDTRIP_SUITE_NAME = 'decoder-roundtrip';

const EXTENSION_CODECS: Record<string, Codec | undefined> = {
  '.264': 'h264',
  '.265': 'h265',
  '.ivf': 'av1',
  '.bin': undefined
};

export function isBitstreamFile(name: string): boolean {
  return extname(name) in EXTENSION_CODECS;
}

/**
 * Codec of an encoded bitstream. `.bin` carries no codec, so the name's
 * `_`-separated tokens are tried instead (`clip_hevc_p4.bin`).
 */
export function bitstreamCodec(name: string): Codec | undefined {
  const fromExtension = EXTENSION_CODECS[extname(name)];
  if (fromExtension) return fromExtension;
  for (const token of basename(name, extname(name)).split(/[_.-]/)) {
    const codec = normalizeCodec(token);
    if (codec) return codec;
  }
  return undefined;
}

export interface RoundtripDependencies {
  runner?: CommandRunner;
  reporter?: RunReporter;
}

export async function runDecoderRoundtrip(
  input: RoundtripConfigInput,
  deps: RoundtripDependencies = {}
): Promise<SuiteReport> {
  const config = roundtripConfigSchema.parse(input);
  const startedAt = new Date().toISOString();
  const reporter = deps.reporter ?? silentReporter;
  const runner = deps.runner ?? createCommandRunner(config.target);
  const joinPath = runner.remote ? posix.join : join;

  const toolchain = resolveToolchain({
    ...config.toolchain,
    platform: runner.remote ? 'linux' : config.toolchain.platform
  });
  const executables = {
    encoder: toolchain.encoder,
    decoder: config.decoderPath ?? toolchain.decoder
  };

  if ((await runner.statFile(executables.decoder)) === undefined) {
    throw new Error(`Decoder not found: ${executables.decoder}`);
  }
  if (!(await runner.directoryExists(config.directory))) {
    throw new Error(`Not a directory: ${config.directory}`);
  }

  const needle = config.filter?.toLowerCase();
  const bitstreams: string[] = [];
  for (const name of await runner.listFiles(config.directory)) {
    if (!isBitstreamFile(name)) continue;
    if (needle !== undefined && !name.toLowerCase().includes(needle)) continue;
    const size = (await runner.statFile(joinPath(config.directory, name)))?.size ?? 0;
    if (size > 0) bitstreams.push(name);
  }

  reporter.section('Decoder Roundtrip Test');
  reporter.info(`Directory: ${config.directory}`);
  reporter.info(`Decoder:   ${executables.decoder}`);
  reporter.info(`Files:     ${bitstreams.length}`);
  if (bitstreams.length > 0) {
    await runner.makeDirectory(config.outputDir);
  }

  const env = libraryPathEnv(toolchain.libDir, toolchain.platform, runner.remote ? {} : process.env);
  const results: CaseResult[] = [];

  for (const name of bitstreams) {
    const codec = bitstreamCodec(name);
    const stem = basename(name, extname(name));
    const base = {
      name,
      kind: 'decode' as const,
      category: 'roundtrip' as const,
      input: joinPath(config.directory, name),
      output: joinPath(config.outputDir, `${stem}.yuv`),
      description: `Decode ${name}`,
      numFrames: config.maxFrames
    };

    let result: CaseResult;
    if (codec === undefined) {
      result = skippedResult({ ...base, codec: null }, 'Cannot determine codec');
    } else {
      ({ result } = await evaluateCase(testCaseSchema.parse({ ...base, codec }), {
        runner,
        executables,
        env,
        validate: config.validate,
        timeoutSeconds: config.timeoutSeconds,
        logScan: 'decoder'
      }));
    }
    reporter.caseFinished(result);
    results.push(result);
  }

  return {
    runId: `${startedAt}_${ROUNDTRIP_SUITE_NAME}`,
    suiteName: ROUNDTRIP_SUITE_NAME,
    target: runner.target,
    startedAt,
    finishedAt: new Date().toISOString(),
    config: {
      validate: config.validate,
      categories: ['roundtrip'],
      maxFrames: config.maxFrames ?? 0
    },
    summary: summarizeCases(results),
    cases: results
  };
}
