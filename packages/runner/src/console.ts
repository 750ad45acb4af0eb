import { Chalk, type ChalkInstance } from 'chalk';
import type { CaseResult, Outcome } from '@vkvideo-harness/schemas';

export type Palette = ChalkInstance;

export const STATUS_GLYPHS: Readonly<Record<Outcome, string>> = {
  PASSED: '✓',
  FAILED: '✗',
  SKIPPED: '○',
  ERROR: '!'
};

/**
 * Legacy Windows consoles print escape codes verbatim; Windows Terminal and
 * the VS Code terminal render them.
 */
export function detectColorSupport(
  stream: { isTTY?: boolean } = process.stdout,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): boolean {
  if (env.NO_COLOR !== undefined) return false;
  if (platform === 'win32') {
    return env.WT_SESSION !== undefined || env.TERM_PROGRAM === 'vscode';
  }
  return stream.isTTY === true;
}

export function createPalette(enabled: boolean): Palette {
  return new Chalk({ level: enabled ? 1 : 0 });
}

export function paintOutcome(palette: Palette, outcome: Outcome, text: string): string {
  switch (outcome) {
    case 'PASSED':
      return palette.green(text);
    case 'FAILED':
      return palette.red(text);
    case 'SKIPPED':
      return palette.yellow(text);
    case 'ERROR':
      return palette.magenta(text);
  }
}

// ─── Reporters ────────────────────────────────────────────────────────────────

export interface RunReporter {
  section(title: string): void;
  info(message: string): void;
  warn(message: string): void;
  caseFinished(result: CaseResult): void;
}

export function createConsoleReporter(options: { palette: Palette; verbose: boolean }): RunReporter {
  const { palette, verbose } = options;
  return {
    section(title) {
      console.log(`\n${palette.bold('='.repeat(70))}`);
      console.log(palette.bold(title));
      console.log(palette.bold('='.repeat(70)));
    },
    info(message) {
      console.log(message);
    },
    warn(message) {
      console.log(palette.yellow(`Warning: ${message}`));
    },
    caseFinished(result) {
      const glyph = paintOutcome(palette, result.outcome, `[${STATUS_GLYPHS[result.outcome]}]`);
      console.log(`  ${result.name} ${glyph} (${result.durationSeconds.toFixed(2)}s)`);
      if (verbose && result.outcome !== 'PASSED') {
        if (result.message) console.log(palette.gray(`    ${result.message}`));
        if (result.validationErrors > 0) {
          console.log(palette.gray(`    Validation errors: ${result.validationErrors}`));
        }
      }
    }
  };
}

export const silentReporter: RunReporter = {
  section() {},
  info() {},
  warn() {},
  caseFinished() {}
};
