#!/usr/bin/env node
import { join, relative } from 'node:path';
import { Command } from 'commander';
import {
  createCommandRunner,
  createConsoleReporter,
  createPalette,
  detectColorSupport,
  renderBenchmarkReport,
  runAqBenchmark,
  writeBenchmarkArtifacts
} from '@vkvideo-harness/runner';
import {
  bitDepthSchema,
  chromaSchema,
  contentHintsSchema,
  encodableCodecSchema,
  rateControlModeSchema,
  tuningModeSchema,
  usageHintsSchema
} from '@vkvideo-harness/schemas';
import {
  addTargetOptions,
  buildExecutionTarget,
  buildToolchainConfig,
  parseInteger,
  parseNumber,
  resolvePath,
  workspaceRoot,
  type TargetCliOptions
} from './options.js';

interface BenchmarkCliOptions extends TargetCliOptions {
  input: string;
  width: number;
  height: number;
  codec: string;
  outputDir: string;
  reportDir?: string;
  numFrames?: number;
  startFrame: number;
  encodeWidth?: number;
  encodeHeight?: number;
  chroma: string;
  bitDepth: number;
  rateControl: string;
  bitrate?: number;
  gop: number;
  idrPeriod: number;
  bFrames: number;
  qualityLevel: number;
  usage: string;
  content: string;
  tuning: string;
  spatialAq: number;
  temporalAq: number;
  aqDumpDir?: string;
  skipPsnr?: boolean;
  skipVmaf?: boolean;
  validate?: boolean;
  verbose?: boolean;
  ffmpeg: string;
}

const program = new Command();

addTargetOptions(program)
  .name('run-aq-benchmark')
  .description('Encode one clip with and without adaptive quantization and compare size, PSNR and VMAF')
  .requiredOption('-i, --input <path>', 'raw YUV input')
  .requiredOption('--width <n>', 'input width', parseInteger)
  .requiredOption('--height <n>', 'input height', parseInteger)
  .option('-c, --codec <name>', 'h264 | h265 | av1', 'h264')
  .option('-o, --output-dir <path>', 'directory for encoded outputs', './aq_benchmark_results')
  .option('--report-dir <path>', 'where the report files are written (default: --output-dir)')
  .option('-n, --num-frames <n>', 'frames to encode (default: all)', parseInteger)
  .option('--start-frame <n>', 'first frame to encode', parseInteger, 0)
  .option('--encode-width <n>', 'encoded width', parseInteger)
  .option('--encode-height <n>', 'encoded height', parseInteger)
  .option('--chroma <subsampling>', '400 | 420 | 422 | 444', '420')
  .option('--bit-depth <n>', '8 | 10', parseInteger, 8)
  .option('--rate-control <mode>', 'default | disabled | cbr | vbr', 'vbr')
  .option('--bitrate <bps>', 'average bitrate in bits per second', parseInteger)
  .option('--gop <n>', 'GOP frame count', parseInteger, 16)
  .option('--idr-period <n>', 'IDR period', parseInteger, 4294967295)
  .option('--b-frames <n>', 'consecutive B frames', parseInteger, 3)
  .option('--quality-level <n>', 'encoder quality level 0-7', parseInteger, 4)
  .option('--usage <hint>', 'default | transcoding | streaming | recording', 'transcoding')
  .option('--content <hint>', 'default | camera | desktop | rendered', 'default')
  .option('--tuning <mode>', 'default | highquality | lowlatency | lossless', 'default')
  .option('--spatial-aq <strength>', 'spatial AQ strength for the custom run, -1.0 to 1.0', parseNumber, 0)
  .option('--temporal-aq <strength>', 'temporal AQ strength for the custom run, -1.0 to 1.0', parseNumber, 0)
  .option('--aq-dump-dir <path>', 'parent directory for per-configuration AQ dumps')
  .option('--skip-psnr', 'do not compute PSNR')
  .option('--skip-vmaf', 'do not compute VMAF')
  .option('--validate', 'enable Vulkan validation layers')
  .option('--verbose', 'print every command')
  .option('--ffmpeg <path>', 'ffmpeg executable', 'ffmpeg')
  .action(async (options: BenchmarkCliOptions) => {
    const target = buildExecutionTarget(options);
    const remote = target.mode === 'remote';
    const palette = createPalette(detectColorSupport());
    const outputDir = resolvePath(options.outputDir, remote);

    const run = await runAqBenchmark(
      {
        input: resolvePath(options.input, remote),
        width: options.width,
        height: options.height,
        codec: encodableCodecSchema.parse(options.codec),
        outputDir,
        numFrames: options.numFrames,
        startFrame: options.startFrame,
        encodeWidth: options.encodeWidth,
        encodeHeight: options.encodeHeight,
        chroma: chromaSchema.parse(options.chroma),
        bitDepth: bitDepthSchema.parse(options.bitDepth),
        rateControlMode: rateControlModeSchema.parse(options.rateControl),
        averageBitrate: options.bitrate,
        gopFrameCount: options.gop,
        idrPeriod: options.idrPeriod,
        consecutiveBFrameCount: options.bFrames,
        qualityLevel: options.qualityLevel,
        usageHints: usageHintsSchema.parse(options.usage),
        contentHints: contentHintsSchema.parse(options.content),
        tuningMode: tuningModeSchema.parse(options.tuning),
        spatialAqStrength: options.spatialAq,
        temporalAqStrength: options.temporalAq,
        aqDumpDir: options.aqDumpDir === undefined ? undefined : resolvePath(options.aqDumpDir, remote),
        skipPsnr: Boolean(options.skipPsnr),
        skipVmaf: Boolean(options.skipVmaf),
        validate: Boolean(options.validate),
        verbose: Boolean(options.verbose),
        ffmpegPath: options.ffmpeg,
        target,
        toolchain: buildToolchainConfig(options, remote)
      },
      {
        runner: createCommandRunner(target),
        reporter: createConsoleReporter({ palette, verbose: Boolean(options.verbose) })
      }
    );

    // Remote output directories name paths on the target, so reports land locally.
    const reportDir = options.reportDir
      ? resolvePath(options.reportDir)
      : remote
        ? resolvePath(join('reports', 'aq_benchmark'))
        : outputDir;
    const artifacts = writeBenchmarkArtifacts(run, reportDir);

    console.log(renderBenchmarkReport(run));
    console.table(
      run.results.map((result) => ({
        config: result.config.name,
        outcome: result.outcome,
        bytes: result.fileSize,
        'encode (s)': result.encodeTime.toFixed(2),
        psnr: result.psnr.average.toFixed(2),
        vmaf: result.vmaf.toFixed(2)
      }))
    );
    const display = (path: string): string => relative(workspaceRoot(), path) || path;
    console.log(`Report written to ${display(artifacts.report)}`);
    console.log(`Results written to ${display(artifacts.results)}`);

    process.exitCode = run.results.some((result) => result.success) ? 0 : 1;
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
