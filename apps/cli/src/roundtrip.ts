#!/usr/bin/env node
import { join, relative } from 'node:path';
import { Command } from 'commander';
import {
  createCommandRunner,
  createConsoleReporter,
  createPalette,
  detectColorSupport,
  runDecoderRoundtrip,
  suiteExitCode,
  writeSuiteReport
} from '@vkvideo-harness/runner';
import {
  addTargetOptions,
  buildExecutionTarget,
  buildToolchainConfig,
  parseInteger,
  resolvePath,
  workspaceRoot,
  type TargetCliOptions
} from './options.js';

interface RoundtripCliOptions extends TargetCliOptions {
  outputDir: string;
  report?: string;
  filter?: string;
  decoder?: string;
  maxFrames?: number;
  timeout: number;
  validate?: boolean;
  verbose?: boolean;
}

const program = new Command();

addTargetOptions(program)
  .name('run-decoder-roundtrip')
  .description('Decode every encoded bitstream in a directory (.264, .265, .ivf, .bin)')
  .argument('<directory>', 'directory holding encoder outputs')
  .option('--output-dir <path>', 'directory for decoded YUV', '/tmp/vulkan_decoder_roundtrip')
  .option('--report <path>', 'JSON report path (default: <output-dir>/roundtrip_report.json)')
  .option('--filter <text>', 'only decode files whose name contains this text')
  .option('--decoder <path>', 'decoder executable (default: from the build directory)')
  .option('--max-frames <n>', 'frames to decode per file (default: all)', parseInteger)
  .option('--timeout <seconds>', 'timeout per decode', parseInteger, 60)
  .option('--validate', 'enable Vulkan validation layers')
  .option('--verbose', 'print diagnostics for failing decodes')
  .action(async (directory: string, options: RoundtripCliOptions) => {
    const target = buildExecutionTarget(options);
    const remote = target.mode === 'remote';
    const palette = createPalette(detectColorSupport());
    const outputDir = resolvePath(options.outputDir, remote);

    const report = await runDecoderRoundtrip(
      {
        directory: resolvePath(directory, remote),
        outputDir,
        filter: options.filter,
        decoderPath: options.decoder === undefined ? undefined : resolvePath(options.decoder, remote),
        maxFrames: options.maxFrames,
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
        ? resolvePath(join('reports', 'roundtrip_report.json'))
        : join(outputDir, 'roundtrip_report.json');
    writeSuiteReport(report, reportPath);

    const { summary } = report;
    console.table([
      { outcome: 'PASSED', count: summary.passed },
      { outcome: 'FAILED', count: summary.failed },
      { outcome: 'SKIPPED', count: summary.skipped },
      { outcome: 'ERROR', count: summary.errors }
    ]);
    console.log(`Report written to ${relative(workspaceRoot(), reportPath) || reportPath}`);
    process.exitCode = suiteExitCode(report);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
