import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import {
  suiteConfigSchema,
  type CaseCategory,
  type SuiteConfigInput
} from '@vkvideo-harness/schemas';
import { buildSuiteCases, type SuiteCatalog } from './catalog.js';
import { silentReporter, type RunReporter } from './console.js';
import { evaluateCase } from './evaluate.js';
import { createCommandRunner, type CommandRunner } from './executor.js';
import { libraryPathEnv, resolveToolchain } from './targets.js';
import type { CaseResult, SuiteReport } from './types.js';

export const SUITE_NAME = 'vulkan-video';

const SECTION_TITLES: Partial<Record<CaseCategory, string>> = {
  decode: 'DECODER TESTS',
  encode: 'ENCODER TESTS',
  aq: 'AQ ENCODER TESTS'
};

function now(): string {
  return new Date().toISOString();
}

export interface SuiteDependencies {
  runner?: CommandRunner;
  reporter?: RunReporter;
  catalog?: SuiteCatalog;
}

export function summarizeCases(results: readonly CaseResult[]): SuiteReport['summary'] {
  const count = (outcome: CaseResult['outcome']) =>
    results.filter((result) => result.outcome === outcome).length;
  return {
    total: results.length,
    passed: count('PASSED'),
    failed: count('FAILED'),
    skipped: count('SKIPPED'),
    errors: count('ERROR'),
    validationErrors: results.reduce((acc, result) => acc + result.validationErrors, 0),
    durationSeconds: results.reduce((acc, result) => acc + result.durationSeconds, 0)
  };
}

export async function runSuite(
  input: SuiteConfigInput,
  deps: SuiteDependencies = {}
): Promise<SuiteReport> {
  const config = suiteConfigSchema.parse(input);
  const startedAt = now();
  const reporter = deps.reporter ?? silentReporter;
  const runner = deps.runner ?? createCommandRunner(config.target);

  if (runner.remote && !(await runner.checkConnectivity())) {
    reporter.warn(`Cannot connect to remote at ${runner.target}`);
  }
  await runner.makeDirectory(config.outputDir);

  const toolchain = resolveToolchain({
    ...config.toolchain,
    platform: runner.remote ? 'linux' : config.toolchain.platform
  });
  const env = libraryPathEnv(toolchain.libDir, toolchain.platform, runner.remote ? {} : process.env);

  const cases = await buildSuiteCases(
    runner,
    {
      videoDir: config.videoDir,
      outputDir: config.outputDir,
      categories: config.categories,
      codec: config.codec,
      maxFrames: config.maxFrames
    },
    deps.catalog
  );

  const results: CaseResult[] = [];
  let currentCategory: CaseCategory | undefined;
  for (const testCase of cases) {
    if (testCase.category !== currentCategory) {
      currentCategory = testCase.category;
      const inCategory = cases.filter((c) => c.category === currentCategory).length;
      reporter.section(SECTION_TITLES[currentCategory] ?? currentCategory.toUpperCase());
      reporter.info(`Found ${inCategory} test cases\n`);
    }

    const { result } = await evaluateCase(testCase, {
      runner,
      executables: toolchain,
      env,
      validate: config.validate,
      timeoutSeconds: config.timeoutSeconds
    });
    reporter.caseFinished(result);
    results.push(result);
  }

  return {
    runId: `${startedAt}_${SUITE_NAME}`,
    suiteName: SUITE_NAME,
    target: runner.target,
    startedAt,
    finishedAt: now(),
    config: {
      validate: config.validate,
      categories: [...config.categories],
      maxFrames: config.maxFrames
    },
    summary: summarizeCases(results),
    cases: results
  };
}

/** Non-zero when any case FAILED or hit a harness ERROR; SKIPPED alone passes. */
export function suiteExitCode(report: Pick<SuiteReport, 'summary'>): number {
  return report.summary.failed > 0 || report.summary.errors > 0 ? 1 : 0;
}

export function writeSuiteReport(report: SuiteReport, outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, JSON.stringify(report, null, 2), 'utf8');
}
