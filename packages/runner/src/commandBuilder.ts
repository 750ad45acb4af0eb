import type { TestCase } from '@vkvideo-harness/schemas';
import { shellQuote } from './shell.js';
import { encoderCodecArg } from './targets.js';

export interface ToolExecutables {
  encoder: string;
  decoder: string;
}

export interface DecoderCommandOptions {
  validate: boolean;
}

/** `-2` renders as `-2.0`, matching how the encoder documents its strengths. */
export function formatAqStrength(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function flag(name: string, value: string | number | undefined): string[] {
  return value === undefined ? [] : [name, String(value)];
}

export function buildEncoderCommand(testCase: TestCase, executable: string): string[] {
  const codecArg = encoderCodecArg(testCase.codec);
  if (codecArg === undefined) {
    throw new Error(`Codec ${testCase.codec} has no encoder support`);
  }

  return [
    executable,
    ...flag('--encoderConfig', testCase.encoderConfig),
    '-i',
    testCase.input,
    '-o',
    testCase.output,
    '-c',
    codecArg,
    ...flag('--inputWidth', testCase.width),
    ...flag('--inputHeight', testCase.height),
    ...flag('--encodeWidth', testCase.encodeWidth),
    ...flag('--encodeHeight', testCase.encodeHeight),
    ...flag('--inputChromaSubsampling', testCase.chroma),
    ...flag('--inputBpp', testCase.bitDepth),
    ...flag('--numFrames', testCase.numFrames),
    ...flag('--startFrame', testCase.startFrame),
    ...flag('--rateControlMode', testCase.rateControlMode),
    ...flag('--averageBitrate', testCase.averageBitrate),
    ...flag('--gopFrameCount', testCase.gopFrameCount),
    ...flag('--idrPeriod', testCase.idrPeriod),
    ...flag('--consecutiveBFrameCount', testCase.consecutiveBFrameCount),
    ...flag('--qualityLevel', testCase.qualityLevel),
    ...flag('--usageHints', testCase.usageHints),
    ...flag('--contentHints', testCase.contentHints),
    ...flag('--tuningMode', testCase.tuningMode),
    // Both strengths are always passed when set, the disabled sentinel included.
    ...(testCase.aq
      ? [
          '--spatialAQStrength',
          formatAqStrength(testCase.aq.spatial),
          '--temporalAQStrength',
          formatAqStrength(testCase.aq.temporal)
        ]
      : []),
    ...flag('--aqDumpDir', testCase.aqDumpDir),
    ...testCase.extraArgs
  ];
}

export function buildDecoderCommand(
  testCase: TestCase,
  executable: string,
  options: DecoderCommandOptions
): string[] {
  return [
    executable,
    '-i',
    testCase.input,
    '--noPresent',
    '--codec',
    testCase.codec,
    ...flag('-c', testCase.numFrames),
    ...(options.validate ? ['-v'] : []),
    '-o',
    testCase.output,
    ...testCase.extraArgs
  ];
}

export function buildCommand(
  testCase: TestCase,
  executables: ToolExecutables,
  options: DecoderCommandOptions
): string[] {
  switch (testCase.kind) {
    case 'decode':
      return buildDecoderCommand(testCase, executables.decoder, options);
    case 'encode':
    case 'profile':
      return buildEncoderCommand(testCase, executables.encoder);
  }
}

export function executableFor(testCase: TestCase, executables: ToolExecutables): string {
  return testCase.kind === 'decode' ? executables.decoder : executables.encoder;
}

export function validationEnv(): Record<string, string> {
  return {
    VK_LOADER_LAYERS_ENABLE: '*validation',
    VK_VALIDATION_VALIDATE_SYNC: 'true'
  };
}

/** Shell text that replays `argv` with the given environment overrides. */
export function formatCommand(
  argv: readonly string[],
  env: Readonly<Record<string, string>> = {}
): string {
  const assignments = Object.entries(env).map(([name, value]) => `${name}=${shellQuote(value)}`);
  return [...assignments, ...argv.map(shellQuote)].join(' ');
}
