import type {
  CaseResult,
  Codec,
  Outcome,
  SuiteReport,
  TestCase
} from '@vkvideo-harness/schemas';

export type { CaseResult, SuiteReport };

export type HarnessErrorKind = 'timeout' | 'spawn';

export interface HarnessError {
  kind: HarnessErrorKind;
  message: string;
}

export interface CommandRequest {
  command: readonly string[];
  env?: Readonly<Record<string, string>>;
  cwd?: string;
  timeoutSeconds: number;
}

export interface InvocationResult {
  readonly command: readonly string[];
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationSeconds: number;
  readonly harnessError?: HarnessError;
}

export interface FileStat {
  size: number;
}

export interface Classification {
  outcome: Outcome;
  message: string;
}

export interface PsnrComponents {
  y: number;
  u: number;
  v: number;
  average: number;
  min: number;
  max: number;
}

export interface StageCommands {
  encode: string;
  decode: string;
  psnr: string;
  vmaf: string;
}

export interface AqConfiguration {
  readonly name: string;
  readonly description: string;
  readonly spatialAq: number;
  readonly temporalAq: number;
}

export interface BenchmarkResult {
  readonly config: AqConfiguration;
  readonly outcome: Outcome;
  readonly success: boolean;
  readonly fileSize: number;
  readonly encodeTime: number;
  readonly psnr: PsnrComponents;
  readonly vmaf: number;
  readonly error: string;
  readonly outputFile: string | undefined;
  readonly aqDumpDir: string | undefined;
  readonly commands: StageCommands;
}

export interface BenchmarkSettings {
  input: string;
  width: number;
  height: number;
  codec: Codec;
  numFrames: number | undefined;
  rateControlMode: string | undefined;
  averageBitrate: number | undefined;
  gopFrameCount: number | undefined;
  consecutiveBFrameCount: number | undefined;
}

export interface BenchmarkRun {
  readonly timestamp: Date;
  readonly settings: BenchmarkSettings;
  readonly baselineName: string;
  readonly results: readonly BenchmarkResult[];
}

export interface MetricDeltas {
  sizePercent: number | null;
  psnrDb: number | null;
  vmaf: number | null;
}

export interface EvaluatedCase {
  testCase: TestCase;
  result: CaseResult;
  invocation?: InvocationResult;
}
