import type { CaseResult, TestCase } from '@vkvideo-harness/schemas';
import type { CommandRunner } from './executor.js';
import {
  buildCommand,
  executableFor,
  formatCommand,
  validationEnv,
  type ToolExecutables
} from './commandBuilder.js';
import {
  classifyInvocation,
  countValidationErrors,
  MAX_MESSAGE_LENGTH,
  skippedResult,
  type LogScanMode
} from './classifier.js';
import type { EvaluatedCase } from './types.js';

export interface CaseEnvironment {
  runner: CommandRunner;
  executables: ToolExecutables;
  /** Library search path and any other overrides for the tool. */
  env: Readonly<Record<string, string>>;
  validate: boolean;
  timeoutSeconds: number;
  logScan?: LogScanMode;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorResult(testCase: TestCase, message: string, command = ''): CaseResult {
  return {
    name: testCase.name,
    codec: testCase.codec,
    category: testCase.category,
    description: testCase.description,
    outcome: 'ERROR',
    durationSeconds: 0,
    message: message.slice(0, MAX_MESSAGE_LENGTH),
    validationErrors: 0,
    command
  };
}

/** Runs one case end to end. Never rejects: any failure becomes the case's result. */
export async function evaluateCase(
  testCase: TestCase,
  environment: CaseEnvironment
): Promise<EvaluatedCase> {
  const { runner } = environment;
  let commandText = '';

  try {
    if ((await runner.statFile(testCase.input)) === undefined) {
      return { testCase, result: skippedResult(testCase, `Input file not found: ${testCase.input}`) };
    }
    const executable = executableFor(testCase, environment.executables);
    if ((await runner.statFile(executable)) === undefined) {
      return { testCase, result: skippedResult(testCase, `Executable not found: ${executable}`) };
    }

    const argv = buildCommand(testCase, environment.executables, { validate: environment.validate });
    const env = {
      ...environment.env,
      ...(environment.validate ? validationEnv() : {})
    };
    commandText = formatCommand(argv, env);

    // A leftover artifact from an earlier run must not count as this run's output.
    if (testCase.expectOutput) {
      await runner.removeFile(testCase.output);
    }

    const invocation = await runner.execute({
      command: argv,
      env,
      timeoutSeconds: environment.timeoutSeconds
    });

    const output =
      testCase.expectOutput && !invocation.harnessError
        ? await runner.statFile(testCase.output)
        : undefined;

    const classification = classifyInvocation(invocation, {
      expectOutput: testCase.expectOutput,
      outputSize: output?.size,
      logScan: environment.logScan,
      validate: environment.validate
    });

    return {
      testCase,
      invocation,
      result: {
        name: testCase.name,
        codec: testCase.codec,
        category: testCase.category,
        description: testCase.description,
        outcome: classification.outcome,
        durationSeconds: invocation.durationSeconds,
        message: classification.message,
        validationErrors: countValidationErrors(`${invocation.stdout}\n${invocation.stderr}`),
        command: commandText
      }
    };
  } catch (error) {
    return { testCase, result: errorResult(testCase, errorMessage(error), commandText) };
  }
}
