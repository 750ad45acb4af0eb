import { join, posix } from 'node:path';
import {
  AQ_DISABLED,
  benchmarkConfigSchema,
  testCaseSchema,
  type BenchmarkConfig,
  type BenchmarkConfigInput
} from '@vkvideo-harness/schemas';
import type { CommandRunner } from './executor.js';
import { silentReporter, type RunReporter } from './console.js';
import { evaluateCase, errorMessage } from './evaluate.js';
import {
  createQualityMetricsAdapter,
  ZERO_PSNR,
  type QualityMeasurement,
  type QualityMetricsAdapter
} from './metrics.js';
import {
  bitstreamExtension,
  libraryPathEnv,
  rawFrameBytes,
  resolveToolchain,
  type RawFrameFormat
} from './targets.js';
import type {
  AqConfiguration,
  BenchmarkResult,
  BenchmarkRun,
  MetricDeltas,
  PsnrComponents
} from './types.js';

export const BASELINE_CONFIGURATION = 'no_aq';
export const ENCODE_TIMEOUT_SECONDS = 600;

export function createAqConfigurations(spatial = 0, temporal = 0): AqConfiguration[] {
  return [
    {
      name: BASELINE_CONFIGURATION,
      description: 'No AQ (Baseline)',
      spatialAq: AQ_DISABLED,
      temporalAq: AQ_DISABLED
    },
    {
      name: 'spatial_only',
      description: 'Spatial AQ Only',
      spatialAq: spatial,
      temporalAq: AQ_DISABLED
    },
    {
      name: 'temporal_only',
      description: 'Temporal AQ Only',
      spatialAq: AQ_DISABLED,
      temporalAq: temporal
    },
    {
      name: 'combined',
      description: 'Combined (Spatial + Temporal)',
      spatialAq: spatial,
      temporalAq: temporal
    }
  ];
}

// ─── Comparison ───────────────────────────────────────────────────────────────

export function findBaseline(
  results: readonly BenchmarkResult[],
  name: string = BASELINE_CONFIGURATION
): BenchmarkResult | undefined {
  return results.find((result) => result.config.name === name);
}

function delta(
  baseline: number | undefined,
  candidate: number,
  combine: (base: number, value: number) => number
): number | null {
  if (baseline === undefined || baseline <= 0) return null;
  return combine(baseline, candidate);
}

/** Null means "not comparable" and renders as N/A. */
export function computeDeltas(
  baseline: BenchmarkResult | undefined,
  candidate: BenchmarkResult
): MetricDeltas {
  const usable = baseline?.success === true && candidate.success ? baseline : undefined;
  return {
    sizePercent: delta(usable?.fileSize, candidate.fileSize, (b, c) => ((c - b) * 100) / b),
    psnrDb: delta(usable?.psnr.average, candidate.psnr.average, (b, c) => c - b),
    vmaf: delta(usable?.vmaf, candidate.vmaf, (b, c) => c - b)
  };
}

export interface BestResults {
  bestVmaf: BenchmarkResult | undefined;
  bestPsnr: BenchmarkResult | undefined;
  smallestSize: BenchmarkResult | undefined;
}

function pick(
  results: readonly BenchmarkResult[],
  better: (candidate: BenchmarkResult, current: BenchmarkResult) => boolean
): BenchmarkResult | undefined {
  let best: BenchmarkResult | undefined;
  for (const result of results) {
    if (best === undefined || better(result, best)) best = result;
  }
  return best;
}

export function summarizeBest(results: readonly BenchmarkResult[]): BestResults {
  const successful = results.filter((result) => result.success);
  return {
    bestVmaf: pick(successful, (a, b) => a.vmaf > b.vmaf),
    bestPsnr: pick(successful, (a, b) => a.psnr.average > b.psnr.average),
    smallestSize: pick(successful, (a, b) => a.fileSize < b.fileSize)
  };
}

export type QualityRating = 'Excellent' | 'Good' | 'Fair' | 'Poor';

export function psnrRating(db: number): QualityRating {
  if (db > 40) return 'Excellent';
  if (db >= 35) return 'Good';
  if (db >= 30) return 'Fair';
  return 'Poor';
}

export function vmafRating(score: number): QualityRating {
  if (score > 90) return 'Excellent';
  if (score >= 80) return 'Good';
  if (score >= 70) return 'Fair';
  return 'Poor';
}

// ─── Run ──────────────────────────────────────────────────────────────────────

export interface BenchmarkDependencies {
  runner: CommandRunner;
  metrics?: QualityMetricsAdapter;
  reporter?: RunReporter;
  now?: () => Date;
}

function emptyCommands(encode = ''): BenchmarkResult['commands'] {
  return { encode, decode: '', psnr: '', vmaf: '' };
}

function skippedRun(config: AqConfiguration, reason: string): BenchmarkResult {
  return {
    config,
    outcome: 'SKIPPED',
    success: false,
    fileSize: 0,
    encodeTime: 0,
    psnr: { ...ZERO_PSNR },
    vmaf: 0,
    error: reason,
    outputFile: undefined,
    aqDumpDir: undefined,
    commands: emptyCommands()
  };
}

function frameCount(config: BenchmarkConfig, inputSize: number, frameSize: number): number {
  const available = Math.floor(inputSize / frameSize) - config.startFrame;
  const requested = config.numFrames ?? available;
  return Math.max(0, Math.min(requested, available));
}

export async function runAqBenchmark(
  input: BenchmarkConfigInput,
  deps: BenchmarkDependencies
): Promise<BenchmarkRun> {
  const config = benchmarkConfigSchema.parse(input);
  const { runner } = deps;
  const reporter = deps.reporter ?? silentReporter;
  const metrics =
    deps.metrics ?? createQualityMetricsAdapter(runner, { ffmpegPath: config.ffmpegPath });
  const joinPath = runner.remote ? posix.join : join;
  const configurations = createAqConfigurations(
    config.spatialAqStrength,
    config.temporalAqStrength
  );

  const toolchain = resolveToolchain({
    ...config.toolchain,
    platform: runner.remote ? 'linux' : config.toolchain.platform
  });

  const finish = (results: BenchmarkResult[]): BenchmarkRun => ({
    timestamp: (deps.now ?? (() => new Date()))(),
    settings: {
      input: config.input,
      width: config.width,
      height: config.height,
      codec: config.codec,
      numFrames: config.numFrames,
      rateControlMode: config.rateControlMode,
      averageBitrate: config.averageBitrate,
      gopFrameCount: config.gopFrameCount,
      consecutiveBFrameCount: config.consecutiveBFrameCount
    },
    baselineName: BASELINE_CONFIGURATION,
    results
  });

  if (runner.remote && !(await runner.checkConnectivity())) {
    throw new Error(`Cannot connect to ${runner.target}`);
  }

  const source = await runner.statFile(config.input);
  if (source === undefined) {
    reporter.warn(`Input file not found: ${config.input}`);
    return finish(configurations.map((c) => skippedRun(c, `Input file not found: ${config.input}`)));
  }

  await runner.makeDirectory(config.outputDir);

  const format: RawFrameFormat = {
    width: config.width,
    height: config.height,
    chroma: config.chroma,
    bitDepth: config.bitDepth
  };
  const referencePath = joinPath(config.outputDir, 'reference.yuv');
  const wantsMetrics = !(config.skipPsnr && config.skipVmaf);
  let haveReference = false;

  try {
    if (wantsMetrics) {
      const frameSize = rawFrameBytes(format);
      const frames = frameCount(config, source.size, frameSize);
      reporter.info(`Extracting ${frames} reference frames from frame ${config.startFrame}...`);
      haveReference =
        frames > 0 &&
        (await runner.copyRange(
          config.input,
          referencePath,
          config.startFrame * frameSize,
          frames * frameSize
        ));
      if (!haveReference) {
        reporter.warn('Reference extraction failed; quality metrics will be skipped');
      }
    }

    const results: BenchmarkResult[] = [];
    for (const configuration of configurations) {
      reporter.section(`${configuration.description} (spatial=${configuration.spatialAq}, temporal=${configuration.temporalAq})`);
      const result = await runConfiguration(configuration, {
        config,
        runner,
        metrics,
        reporter,
        joinPath,
        executables: toolchain,
        env: libraryPathEnv(toolchain.libDir, toolchain.platform, runner.remote ? {} : process.env),
        reference: haveReference ? { path: referencePath, format } : undefined
      });
      results.push(result);
    }
    return finish(results);
  } finally {
    if (haveReference) {
      await runner.removeFile(referencePath);
    }
  }
}

interface ConfigurationContext {
  config: BenchmarkConfig;
  runner: CommandRunner;
  metrics: QualityMetricsAdapter;
  reporter: RunReporter;
  joinPath: (...parts: string[]) => string;
  executables: { encoder: string; decoder: string };
  env: Readonly<Record<string, string>>;
  reference: { path: string; format: RawFrameFormat } | undefined;
}

async function runConfiguration(
  configuration: AqConfiguration,
  context: ConfigurationContext
): Promise<BenchmarkResult> {
  const { config, runner, reporter, joinPath } = context;
  const outputFile = joinPath(
    config.outputDir,
    `encoded_${configuration.name}${bitstreamExtension(config.codec)}`
  );
  const aqDumpDir = joinPath(config.aqDumpDir ?? config.outputDir, `aq_dump_${configuration.name}`);

  try {
    await runner.makeDirectory(aqDumpDir);
    const testCase = testCaseSchema.parse({
      name: configuration.name,
      kind: 'encode',
      category: 'aq',
      codec: config.codec,
      input: config.input,
      output: outputFile,
      description: configuration.description,
      width: config.width,
      height: config.height,
      encodeWidth: config.encodeWidth ?? config.width,
      encodeHeight: config.encodeHeight ?? config.height,
      chroma: config.chroma,
      bitDepth: config.bitDepth,
      numFrames: config.numFrames,
      startFrame: config.startFrame > 0 ? config.startFrame : undefined,
      rateControlMode: config.rateControlMode,
      averageBitrate: config.averageBitrate,
      gopFrameCount: config.gopFrameCount,
      idrPeriod: config.idrPeriod,
      consecutiveBFrameCount: config.consecutiveBFrameCount,
      qualityLevel: config.qualityLevel,
      usageHints: config.usageHints,
      contentHints: config.contentHints,
      tuningMode: config.tuningMode,
      aq: { spatial: configuration.spatialAq, temporal: configuration.temporalAq },
      aqDumpDir,
      expectOutput: true
    });

    const evaluated = await evaluateCase(testCase, {
      runner,
      executables: context.executables,
      env: context.env,
      validate: config.validate,
      timeoutSeconds: ENCODE_TIMEOUT_SECONDS
    });
    reporter.caseFinished(evaluated.result);
    if (config.verbose && evaluated.result.command) {
      reporter.info(`  Command: ${evaluated.result.command}`);
    }

    const success = evaluated.result.outcome === 'PASSED';
    const encoded = success ? await runner.statFile(outputFile) : undefined;

    let measurement: QualityMeasurement | undefined;
    let metricsError: string | undefined;
    if (success && context.reference) {
      try {
        measurement = await context.metrics.measure({
          encoded: outputFile,
          reference: context.reference.path,
          format: context.reference.format,
          workDir: config.outputDir,
          name: configuration.name,
          skipPsnr: config.skipPsnr,
          skipVmaf: config.skipVmaf
        });
        metricsError = measurement.error;
      } catch (error) {
        metricsError = `Quality analysis failed: ${errorMessage(error)}`;
      }
      if (measurement?.decoded) {
        reporter.info(
          `  PSNR: ${measurement.psnr.average.toFixed(2)} dB, VMAF: ${measurement.vmaf.toFixed(2)}`
        );
      }
    }

    const psnr: PsnrComponents = measurement?.psnr ?? { ...ZERO_PSNR };
    return {
      config: configuration,
      outcome: evaluated.result.outcome,
      success,
      fileSize: encoded?.size ?? 0,
      encodeTime: evaluated.invocation?.durationSeconds ?? 0,
      psnr,
      vmaf: measurement?.vmaf ?? 0,
      error: success ? (metricsError ?? '') : evaluated.result.message,
      outputFile,
      aqDumpDir,
      commands: {
        encode: evaluated.result.command,
        decode: measurement?.commands.decode ?? '',
        psnr: measurement?.commands.psnr ?? '',
        vmaf: measurement?.commands.vmaf ?? ''
      }
    };
  } catch (error) {
    const message = errorMessage(error);
    reporter.warn(`${configuration.name}: ${message}`);
    return {
      ...skippedRun(configuration, message),
      outcome: 'ERROR',
      outputFile,
      aqDumpDir
    };
  }
}
