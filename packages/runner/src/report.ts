import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { benchmarkDocumentSchema, type BenchmarkDocument } from '@vkvideo-harness/schemas';
import {
  computeDeltas,
  findBaseline,
  psnrRating,
  summarizeBest,
  vmafRating
} from './benchmark.js';
import type { BenchmarkResult, BenchmarkRun, MetricDeltas } from './types.js';

// ─── Formatting helpers ───────────────────────────────────────────────────────

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

function signed(value: number, digits: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}`;
}

function orNa(value: number | null, render: (value: number) => string): string {
  return value === null ? 'N/A' : render(value);
}

function kilobytes(bytes: number): string {
  return (bytes / 1024).toFixed(1);
}

function row(cells: readonly string[]): string {
  return `| ${cells.join(' | ')} |`;
}

function border(widths: readonly number[]): string {
  return `+${widths.map((width) => '-'.repeat(width + 2)).join('+')}+`;
}

const SUMMARY_WIDTHS = [20, 10, 8, 8, 8, 8] as const;
const PSNR_WIDTHS = [20, 8, 8, 8, 8, 8, 8] as const;
const RULE = '='.repeat(80);

// ─── Text report ──────────────────────────────────────────────────────────────

function summaryRow(result: BenchmarkResult, isBaseline: boolean, deltas: MetricDeltas): string {
  const name = result.config.description.padEnd(20);
  if (!result.success) {
    return row([name, result.outcome.padStart(10), ...Array.from({ length: 4 }, () => 'N/A'.padStart(8))]);
  }
  const sizeDelta = isBaseline ? 'baseline' : orNa(deltas.sizePercent, (v) => `${signed(v, 1)}%`);
  const vmafDelta = isBaseline ? 'baseline' : orNa(deltas.vmaf, (v) => signed(v, 2));
  return row([
    name,
    kilobytes(result.fileSize).padStart(10),
    sizeDelta.padStart(8),
    result.psnr.average.toFixed(2).padStart(8),
    result.vmaf.toFixed(2).padStart(8),
    vmafDelta.padStart(8)
  ]);
}

function psnrRow(result: BenchmarkResult): string {
  const name = result.config.description.padEnd(20);
  if (!result.success) {
    return row([name, result.outcome.padStart(8), ...Array.from({ length: 5 }, () => 'N/A'.padStart(8))]);
  }
  const { y, u, v, average, min, max } = result.psnr;
  return row([name, ...[y, u, v, average, min, max].map((value) => value.toFixed(2).padStart(8))]);
}

function analysisLines(run: BenchmarkRun): string[] {
  const lines: string[] = [];
  const { bestVmaf, bestPsnr, smallestSize } = summarizeBest(run.results);
  if (!bestVmaf || !bestPsnr || !smallestSize) {
    lines.push('  No configuration encoded successfully.');
    return lines;
  }

  lines.push(`  Best VMAF:      ${bestVmaf.config.description} (${bestVmaf.vmaf.toFixed(2)})`);
  lines.push(
    `  Best PSNR:      ${bestPsnr.config.description} (${bestPsnr.psnr.average.toFixed(2)} dB)`
  );
  lines.push(
    `  Smallest Size:  ${smallestSize.config.description} (${kilobytes(smallestSize.fileSize)} KB)`
  );
  lines.push('');

  const rated = run.results.filter((r) => r.success && (r.psnr.average > 0 || r.vmaf > 0));
  if (rated.length > 0) {
    lines.push('  Quality Ratings:');
    for (const result of rated) {
      const parts: string[] = [];
      if (result.psnr.average > 0) parts.push(`PSNR ${psnrRating(result.psnr.average)}`);
      if (result.vmaf > 0) parts.push(`VMAF ${vmafRating(result.vmaf)}`);
      lines.push(`    ${result.config.description}: ${parts.join(', ')}`);
    }
    lines.push('');
  }

  const baseline = findBaseline(run.results, run.baselineName);
  if (!baseline?.success) {
    lines.push('  AQ Improvements vs Baseline: N/A (baseline did not encode)');
    return lines;
  }

  lines.push('  AQ Improvements vs Baseline:');
  for (const result of run.results) {
    if (result.config.name === run.baselineName || !result.success) continue;
    const deltas = computeDeltas(baseline, result);
    lines.push(
      `    ${result.config.description}: ` +
        `Size ${orNa(deltas.sizePercent, (v) => `${signed(v, 1)}%`)}, ` +
        `PSNR ${orNa(deltas.psnrDb, (v) => `${signed(v, 2)} dB`)}, ` +
        `VMAF ${orNa(deltas.vmaf, (v) => signed(v, 2))}`
    );
  }
  return lines;
}

function fenced(label: string, command: string): string[] {
  return command ? [`**${label}:**`, '```', command, '```', ''] : [];
}

export function renderBenchmarkReport(run: BenchmarkRun, generatedAt: Date = run.timestamp): string {
  const { settings } = run;
  const baseline = findBaseline(run.results, run.baselineName);
  const lines: string[] = [
    RULE,
    '           AQ QUALITY BENCHMARK REPORT',
    RULE,
    '',
    `Generated: ${formatTimestamp(generatedAt)}`,
    '',
    '## Test Configuration',
    '',
    `  Input File:     ${settings.input}`,
    `  Resolution:     ${settings.width}x${settings.height}`,
    `  Codec:          ${settings.codec.toUpperCase()}`,
    `  Frames:         ${settings.numFrames ?? 'all'}`,
    `  Rate Control:   ${settings.rateControlMode ?? 'default'}`,
    `  Bitrate:        ${settings.averageBitrate !== undefined ? `${settings.averageBitrate} bps` : 'default'}`,
    `  GOP Size:       ${settings.gopFrameCount ?? 'default'}`,
    `  B-Frames:       ${settings.consecutiveBFrameCount ?? 'default'}`,
    '',
    '## Results Summary',
    '',
    '```',
    border(SUMMARY_WIDTHS),
    row(['Configuration'.padEnd(20), 'Size (KB)'.padEnd(10), 'vs Base'.padEnd(8), 'PSNR'.padEnd(8), 'VMAF'.padEnd(8), 'vs Base'.padEnd(8)]),
    border(SUMMARY_WIDTHS)
  ];

  for (const result of run.results) {
    const isBaseline = result.config.name === run.baselineName;
    lines.push(summaryRow(result, isBaseline, computeDeltas(baseline, result)));
  }

  lines.push(border(SUMMARY_WIDTHS), '```', '', '## Detailed PSNR Breakdown', '', '```');
  lines.push(
    border(PSNR_WIDTHS),
    row(['Configuration'.padEnd(20), ...['PSNR Y', 'PSNR U', 'PSNR V', 'Average', 'Min', 'Max'].map((h) => h.padEnd(8))]),
    border(PSNR_WIDTHS)
  );
  for (const result of run.results) {
    lines.push(psnrRow(result));
  }
  lines.push(border(PSNR_WIDTHS), '```', '', '## Output Files', '');

  for (const result of run.results) {
    if (result.success && result.outputFile) {
      lines.push(
        `  ${result.config.description}:`,
        `    File: ${result.outputFile}`,
        `    Size: ${result.fileSize.toLocaleString('en-US')} bytes (${kilobytes(result.fileSize)} KB)`,
        `    Encode time: ${result.encodeTime.toFixed(2)}s`
      );
      if (result.error) lines.push(`    Quality analysis: ${result.error}`);
    } else {
      lines.push(`  ${result.config.description}: ${result.outcome} - ${result.error}`);
    }
    lines.push('');
  }

  lines.push('## Analysis', '', ...analysisLines(run), '');

  lines.push(
    '## Command Lines Used',
    '',
    'All command lines are also saved to individual `commands_<config>.txt` files.',
    ''
  );
  for (const result of run.results) {
    lines.push(`### ${result.config.description}`, '');
    lines.push(
      ...fenced('Encode', result.commands.encode),
      ...fenced('Decode', result.commands.decode),
      ...fenced('PSNR', result.commands.psnr),
      ...fenced('VMAF', result.commands.vmaf)
    );
    if (result.aqDumpDir) {
      lines.push(`**AQ Dump Dir:** \`${result.aqDumpDir}\``, '');
    }
  }

  lines.push(RULE, '                         END OF REPORT', RULE);
  return lines.join('\n');
}

// ─── Machine-readable document ────────────────────────────────────────────────

export function buildBenchmarkDocument(run: BenchmarkRun): BenchmarkDocument {
  const baseline = findBaseline(run.results, run.baselineName);
  const best = summarizeBest(run.results);

  return benchmarkDocumentSchema.parse({
    timestamp: run.timestamp.toISOString(),
    configuration: {
      input: run.settings.input,
      width: run.settings.width,
      height: run.settings.height,
      codec: run.settings.codec,
      num_frames: run.settings.numFrames ?? null,
      bitrate: run.settings.averageBitrate ?? null,
      gop_size: run.settings.gopFrameCount ?? null,
      b_frames: run.settings.consecutiveBFrameCount ?? null
    },
    baseline: run.baselineName,
    results: run.results.map((result) => {
      const deltas =
        result.config.name === run.baselineName ? null : computeDeltas(baseline, result);
      return {
        config_name: result.config.name,
        description: result.config.description,
        spatial_aq: result.config.spatialAq,
        temporal_aq: result.config.temporalAq,
        outcome: result.outcome,
        success: result.success,
        file_size: result.fileSize,
        encode_time: result.encodeTime,
        psnr: { ...result.psnr },
        vmaf: result.vmaf,
        error: result.error || null,
        output_file: result.outputFile ?? null,
        aq_dump_dir: result.aqDumpDir ?? null,
        commands: { ...result.commands },
        deltas: deltas && {
          size_percent: deltas.sizePercent,
          psnr_db: deltas.psnrDb,
          vmaf: deltas.vmaf
        }
      };
    }),
    analysis: {
      best_vmaf: best.bestVmaf?.config.name ?? null,
      best_psnr: best.bestPsnr?.config.name ?? null,
      smallest_size: best.smallestSize?.config.name ?? null
    }
  });
}

export function renderCommandFile(result: BenchmarkResult, generatedAt: Date): string {
  const { description } = result.config;
  const lines = [
    `# Command lines for ${description}`,
    `# Generated: ${formatTimestamp(generatedAt)}`,
    `#${'='.repeat(78)}`,
    '',
    '## ENCODE COMMAND',
    `# Encodes input to ${description} configuration`,
    result.commands.encode,
    ''
  ];
  if (result.commands.decode) {
    lines.push(
      '## DECODE COMMAND',
      '# Decodes encoded bitstream to raw YUV for quality analysis',
      result.commands.decode,
      ''
    );
  }
  if (result.commands.psnr) {
    lines.push(
      '## PSNR CALCULATION COMMAND',
      '# Calculates PSNR between decoded and reference YUV',
      result.commands.psnr,
      ''
    );
  }
  if (result.commands.vmaf) {
    lines.push(
      '## VMAF CALCULATION COMMAND',
      '# Calculates VMAF score between decoded and reference YUV',
      result.commands.vmaf,
      ''
    );
  }
  if (result.aqDumpDir) {
    lines.push('## AQ DUMP DIRECTORY', '# AQ library output location', result.aqDumpDir);
  }
  return `${lines.join('\n')}\n`;
}

export interface BenchmarkArtifacts {
  report: string;
  results: string;
  commandFiles: string[];
}

/** Writes the report, the JSON document and one command file per configuration. */
export function writeBenchmarkArtifacts(
  run: BenchmarkRun,
  outputDir: string,
  generatedAt: Date = run.timestamp
): BenchmarkArtifacts {
  mkdirSync(outputDir, { recursive: true });

  const report = join(outputDir, 'benchmark_report.txt');
  writeFileSync(report, renderBenchmarkReport(run, generatedAt), 'utf8');

  const results = join(outputDir, 'benchmark_results.json');
  writeFileSync(results, JSON.stringify(buildBenchmarkDocument(run), null, 2), 'utf8');

  const commandFiles = run.results.map((result) => {
    const path = join(outputDir, `commands_${result.config.name}.txt`);
    writeFileSync(path, renderCommandFile(result, generatedAt), 'utf8');
    return path;
  });

  return { report, results, commandFiles };
}
