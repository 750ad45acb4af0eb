#!/usr/bin/env node
import { join, relative } from 'node:path';
import { Command } from 'commander';
import {
  createCommandRunner,
  createConsoleReporter,
  createPalette,
  detectColorSupport,
  runSuite,
  suiteExitCode,
  writeSuiteReport
} from '@vkvideo-harness/runner';
import { codecSchema, type SuiteCategory } from '@vkvideo-harness/schemas';
import {
  buildExecutionTarget,
  buildToolchainConfig,
  addTargetOptions,
  parseInteger,
  resolvePath,
  workspaceRoot,
  type TargetCliOptions
} from './options.js';

interface SuiteCliOptions extends TargetCliOptions {
  videoDir: string;
  decoder?: boolean;
  encoder?: boolean;
  aq?: boolean;
  codec?: string;
  quick?: boolean;
  maxFrames: number;
  timeout: number;
  validate?: boolean;
  verbose?: boolean;
  outputDir: string;
  report?: string;
}

const QUICK_FRAMES = 5;

function selectCategories(options: SuiteCliOptions): SuiteCategory[] {
  const both = options.decoder === options.encoder;
  const categories: SuiteCategory[] = [];
  if (both || options.decoder) categories.push('decode');
  if (both || options.encoder) categories.push('encode');
  if (options.aq) categories.push('aq');
  return categories;
}

const program = new Command();

addTargetOptions(program)
  .name('run-video-suite')
  .description('Run the decoder/encoder test catalog against the Vulkan video samples')
  .requiredOption('--video-dir <path>', 'directory containing test clips')
  .option('--decoder', 'run decoder tests only')
  .option('--encoder', 'run encoder tests only')
  .option('--aq', 'include adaptive quantization encoder tests')
  .option('--codec <name>', 'only run one codec (h264, h265, av1, vp9)')
  .option('--quick', `process ${QUICK_FRAMES} frames per test`)
  .option('--max-frames <n>', 'maximum frames per test', parseInteger, 30)
  .option('--timeout <seconds>', 'timeout per test', parseInteger, 300)
  .option('--validate', 'enable Vulkan validation layers')
  .option('--verbose', 'print diagnostics for failing tests')
  .option('--output-dir <path>', 'directory for decoded/encoded artifacts', '/tmp/vulkan_video_tests')
  .option('--report <path>', 'JSON report path (default: <output-dir>/test_report.json)')
  .action(async (options: SuiteCliOptions) => {
    const target = buildExecutionTarget(options);
    const remote = target.mode === 'remote';
    const palette = createPalette(detectColorSupport());
    const runner = createCommandRunner(target);
    const outputDir = resolvePath(options.outputDir, remote);

    const report = await runSuite(
      {
        videoDir: resolvePath(options.videoDir, remote),
        outputDir,
        categories: selectCategories(options),
        codec: options.codec === undefined ? undefined : codecSchema.parse(options.codec),
        maxFrames: options.quick ? QUICK_FRAMES : options.maxFrames,
        timeoutSeconds: options.timeout,
        validate: Boolean(options.validate),
        verbose: Boolean(options.verbose),
        target,
        toolchain: buildToolchainConfig(options, remote)
      },
      {
        runner,
        reporter: createConsoleReporter({ palette, verbose: Boolean(options.verbose) })
      }
    );

    const reportPath = options.report
      ? resolvePath(options.report)
      : remote
        ? resolvePath(join('reports', 'test_report.json'))
        : join(outputDir, 'test_report.json');
    writeSuiteReport(report, reportPath);

    console.log(`\n${palette.bold('TEST SUMMARY')}`);
    console.table([
      { metric: 'total', value: report.summary.total },
      { metric: 'passed', value: report.summary.passed },
      { metric: 'failed', value: report.summary.failed },
      { metric: 'skipped', value: report.summary.skipped },
      { metric: 'errors', value: report.summary.errors },
      { metric: 'validation errors', value: report.summary.validationErrors },
      { metric: 'duration (s)', value: report.summary.durationSeconds.toFixed(2) }
    ]);

    const problems = report.cases.filter((c) => c.outcome === 'FAILED' || c.outcome === 'ERROR');
    if (problems.length > 0) {
      console.log(palette.red('Failed/Error Tests:'));
      for (const result of problems) {
        console.log(`  - ${result.name}: ${result.message || 'See output'}`);
      }
    }

    console.log(`Report written to ${relative(workspaceRoot(), reportPath) || reportPath}`);
    process.exitCode = suiteExitCode(report);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
