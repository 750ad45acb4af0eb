#!/usr/bin/env node
import { join, relative } from 'node:path';
import { Command } from 'commander';
import {
  createCommandRunner,
  createConsoleReporter,
  createPalette,
  detectColorSupport,
  runProfileSuite,
  suiteExitCode,
  writeSuiteReport
} from '@vkvideo-harness/runner';
import { bitDepthSchema, chromaSchema, codecSchema } from '@vkvideo-harness/schemas';
import {
  addTargetOptions,
  buildExecutionTarget,
  buildToolchainConfig,
  parseInteger,
  resolvePath,
  workspaceRoot,
  type TargetCliOptions
} from './options.js';

interface ProfileCliOptions extends TargetCliOptions {
  profileDir: string;
  videoDir: string;
  outputDir: string;
  report?: string;
  codec?: string;
  filter?: string;
  maxFrames: number;
  maxQualityPreset: number;
  input?: string;
  width?: number;
  height?: number;
  chroma: string;
  bitDepth: number;
  timeout: number;
  validate?: boolean;
  verbose?: boolean;
}

function inputOverride(options: ProfileCliOptions, remote: boolean) {
  if (options.input === undefined) return undefined;
  if (options.width === undefined || options.height === undefined) {
    throw new Error('--input needs --width and --height.');
  }
  return {
    file: resolvePath(options.input, remote),
    width: options.width,
    height: options.height,
    chroma: chromaSchema.parse(options.chroma),
    bitDepth: bitDepthSchema.parse(options.bitDepth)
  };
}

const program = new Command();

addTargetOptions(program)
  .name('run-profile-tests')
  .description('Encode a small clip once per JSON encoder profile')
  .requiredOption('--profile-dir <path>', 'directory of encoder profiles (vendor subdirectories allowed)')
  .requiredOption('--video-dir <path>', 'directory searched for a raw YUV input')
  .option('--output-dir <path>', 'directory for encoded outputs', '/tmp/vulkan_encoder_profile_tests')
  .option('--report <path>', 'JSON report path (default: <output-dir>/profile_report.json)')
  .option('--codec <name>', 'only run profiles for one codec')
  .option('--filter <text>', 'only run profiles whose name contains this text')
  .option('--max-frames <n>', 'frames per encode', parseInteger, 30)
  .option('--max-quality-preset <n>', 'highest qualityPreset the encoder supports', parseInteger, 4)
  .option('--input <path>', 'raw YUV input instead of searching --video-dir')
  .option('--width <n>', 'width of --input', parseInteger)
  .option('--height <n>', 'height of --input', parseInteger)
  .option('--chroma <subsampling>', 'chroma of --input', '420')
  .option('--bit-depth <n>', 'bit depth of --input', parseInteger, 8)
  .option('--timeout <seconds>', 'timeout per encode', parseInteger, 300)
  .option('--validate', 'enable Vulkan validation layers')
  .option('--verbose', 'print every command')
  .action(async (options: ProfileCliOptions) => {
    const target = buildExecutionTarget(options);
    const remote = target.mode === 'remote';
    const palette = createPalette(detectColorSupport());
    const outputDir = resolvePath(options.outputDir, remote);

    const report = await runProfileSuite(
      {
        // Profiles are read on this machine and handed to the encoder by path.
        profileDir: resolvePath(options.profileDir),
        videoDir: resolvePath(options.videoDir, remote),
        outputDir,
        codec: options.codec === undefined ? undefined : codecSchema.parse(options.codec),
        profileFilter: options.filter,
        maxFrames: options.maxFrames,
        maxSupportedQualityPreset: options.maxQualityPreset,
        input: inputOverride(options, remote),
        timeoutSeconds: options.timeout,
        validate: Boolean(options.validate),
        verbose: Boolean(options.verbose),
        target,
        toolchain: buildToolchainConfig(options, remote)
      },
      {
        runner: createCommandRunner(target),
        reporter: createConsoleReporter({ palette, verbose: Boolean(options.verbose) })
      }
    );

    const reportPath = options.report
      ? resolvePath(options.report)
      : remote
        ? resolvePath(join('reports', 'profile_report.json'))
        : join(outputDir, 'profile_report.json');
    writeSuiteReport(report, reportPath);

    console.table(
      report.cases.map((result) => ({
        profile: result.name,
        codec: result.codec ?? '-',
        outcome: result.outcome,
        'time (s)': result.durationSeconds.toFixed(2),
        message: result.message
      }))
    );
    const { summary } = report;
    console.log(
      `Summary: ${palette.green(`${summary.passed} passed`)}, ${palette.red(`${summary.failed} failed`)}, ` +
        `${palette.yellow(`${summary.skipped} skipped`)}, ${summary.errors} errors`
    );
    console.log(`Report written to ${relative(workspaceRoot(), reportPath) || reportPath}`);
    process.exitCode = suiteExitCode(report);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
