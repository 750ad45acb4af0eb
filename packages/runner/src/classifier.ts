import type { CaseResult } from '@vkvideo-harness/schemas';
import type { Classification, InvocationResult } from './types.js';

export const MAX_MESSAGE_LENGTH = 300;

/**
 * `decoder` additionally fails a run whose log mentions an error without
 * mentioning validation. Encoder logs print benign "error" tokens
 * (error-resilience settings, rate-control error terms), so the default scan
 * only looks for the validation-error phrase.
 */
export type LogScanMode = 'default' | 'decoder';

export interface ClassifyOptions {
  expectOutput: boolean;
  /** Size of the declared output artifact; undefined when it does not exist. */
  outputSize?: number;
  logScan?: LogScanMode;
  /** With validation layers on, any validation diagnostic fails the run. */
  validate?: boolean;
}

const VALIDATION_ERROR_PHRASE = /validation error/i;

const VALIDATION_DIAGNOSTIC_PATTERNS = ['VALIDATION ERROR', 'Validation Error', 'VK_ERROR_', 'ERROR:'];

export function truncateMessage(stderr: string, stdout: string): string {
  const stderrText = stderr.trim();
  if (stderrText) return stderrText.slice(0, MAX_MESSAGE_LENGTH);
  const stdoutText = stdout.trim();
  if (stdoutText) return stdoutText.slice(0, MAX_MESSAGE_LENGTH);
  return 'Unknown error';
}

export function classifyInvocation(
  invocation: InvocationResult,
  options: ClassifyOptions
): Classification {
  if (invocation.harnessError) {
    return {
      outcome: 'ERROR',
      message: invocation.harnessError.message.slice(0, MAX_MESSAGE_LENGTH)
    };
  }

  const log = `${invocation.stdout}\n${invocation.stderr}`;
  const failure = (): Classification => ({
    outcome: 'FAILED',
    message: truncateMessage(invocation.stderr, invocation.stdout)
  });

  if (invocation.exitCode !== 0) return failure();
  if (VALIDATION_ERROR_PHRASE.test(log)) return failure();
  if (options.validate && countValidationErrors(log) > 0) return failure();

  if (options.logScan === 'decoder') {
    const lower = log.toLowerCase();
    if (lower.includes('error') && !lower.includes('validation')) return failure();
  }

  // A zero exit code does not vouch for the artifact.
  if (options.expectOutput && !(options.outputSize !== undefined && options.outputSize > 0)) {
    return {
      outcome: 'FAILED',
      message: options.outputSize === undefined ? 'Output file not created' : 'Output file is empty'
    };
  }

  return { outcome: 'PASSED', message: '' };
}

/** Number of log lines carrying a validation-layer or Vulkan error diagnostic. */
export function countValidationErrors(text: string): number {
  return text
    .split('\n')
    .filter((line) => VALIDATION_DIAGNOSTIC_PATTERNS.some((pattern) => line.includes(pattern)))
    .length;
}

export type CaseIdentity = Pick<CaseResult, 'name' | 'codec' | 'category' | 'description'>;

export function skippedResult(testCase: CaseIdentity, reason: string): CaseResult {
  return {
    name: testCase.name,
    codec: testCase.codec,
    category: testCase.category,
    description: testCase.description,
    outcome: 'SKIPPED',
    durationSeconds: 0,
    message: reason,
    validationErrors: 0,
    command: ''
  };
}
