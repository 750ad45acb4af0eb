import { readFile } from 'node:fs/promises';
import { join, posix } from 'node:path';
import {
  encoderProfileSchema,
  profileRunConfigSchema,
  testCaseSchema,
  type Codec,
  type ProfileRunConfigInput
} from '@vkvideo-harness/schemas';
import { MAX_MESSAGE_LENGTH } from './classifier.js';
import { silentReporter, type RunReporter } from './console.js';
import { errorMessage, evaluateCase } from './evaluate.js';
import { createCommandRunner, type CommandRunner } from './executor.js';
import {
  bitstreamExtension,
  discoverProfiles,
  encoderCodecArg,
  libraryPathEnv,
  normalizeCodec,
  resolveRawInput,
  resolveToolchain,
  type DiscoveredProfile,
  type RawFrameFormat
} from './targets.js';
import { summarizeCases } from './runner.js';
import type { CaseResult, SuiteReport } from './types.js';

export const PROFILE_SUITE_NAME = 'encoder-profiles';

// Profiles are exercised on small clips; larger inputs only slow the matrix down.
const PROFILE_INPUT_MAX_PIXELS = 720 * 480;

export interface ProfileSuiteDependencies {
  runner?: CommandRunner;
  reporter?: RunReporter;
}

function profileResult(
  profile: DiscoveredProfile,
  codec: Codec | null,
  outcome: CaseResult['outcome'],
  message: string
): CaseResult {
  return {
    name: profile.name,
    codec,
    category: 'profile',
    description: `Encoder profile ${profile.name}`,
    outcome,
    durationSeconds: 0,
    message: message.slice(0, MAX_MESSAGE_LENGTH),
    validationErrors: 0,
    command: ''
  };
}

async function readProfile(
  profile: DiscoveredProfile
): Promise<{ codecField: string; qualityPreset: number | undefined } | { error: string }> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(profile.path, 'utf8'));
  } catch (error) {
    return { error: `Invalid JSON: ${errorMessage(error)}` };
  }
  const parsed = encoderProfileSchema.safeParse(raw);
  if (parsed.success) {
    return { codecField: parsed.data.codec, qualityPreset: parsed.data.qualityPreset };
  }
  const issue = parsed.error.issues.find((candidate) => candidate.path[0] !== 'codec');
  if (issue) {
    const where = issue.path.length > 0 ? `${issue.path.join('.')} ` : '';
    return { error: `Invalid profile: ${where}${issue.message}` };
  }
  // A missing or non-string codec leaves the profile unroutable, not broken.
  const rest = encoderProfileSchema.omit({ codec: true }).safeParse(raw);
  return { codecField: '', qualityPreset: rest.success ? rest.data.qualityPreset : undefined };
}

export async function runProfileSuite(
  input: ProfileRunConfigInput,
  deps: ProfileSuiteDependencies = {}
): Promise<SuiteReport> {
  const config = profileRunConfigSchema.parse(input);
  const startedAt = new Date().toISOString();
  const reporter = deps.reporter ?? silentReporter;
  const runner = deps.runner ?? createCommandRunner(config.target);
  const joinPath = runner.remote ? posix.join : join;

  const toolchain = resolveToolchain({
    ...config.toolchain,
    platform: runner.remote ? 'linux' : config.toolchain.platform
  });

  if (runner.remote && !(await runner.checkConnectivity())) {
    throw new Error(`Cannot connect to remote at ${runner.target}`);
  }
  if ((await runner.statFile(toolchain.encoder)) === undefined) {
    throw new Error(`Encoder not found at ${toolchain.encoder}`);
  }
  if (!config.input && !(await runner.directoryExists(config.videoDir))) {
    throw new Error(`Video directory does not exist: ${config.videoDir}`);
  }

  const profiles = await discoverProfiles(config.profileDir, config.profileFilter);
  if (profiles.length === 0) {
    throw new Error(`No JSON profiles found in ${config.profileDir}`);
  }
  await runner.makeDirectory(config.outputDir);

  const env = libraryPathEnv(toolchain.libDir, toolchain.platform, runner.remote ? {} : process.env);

  // Every profile encodes the same clip, so resolve it once.
  let source: { path: string; format: RawFrameFormat } | undefined;
  if (config.input) {
    const { file, ...format } = config.input;
    source = { path: file, format };
  } else {
    const found = await resolveRawInput(
      runner,
      [joinPath(config.videoDir, 'cts', 'video'), config.videoDir],
      { bitDepth: 8, chroma: '420', maxPixels: PROFILE_INPUT_MAX_PIXELS }
    );
    source = found && { path: found.path, format: found.info };
  }

  reporter.section('Running Profiles');
  const results: CaseResult[] = [];
  const record = (result: CaseResult): void => {
    reporter.caseFinished(result);
    results.push(result);
  };

  for (const profile of profiles) {
    const loaded = await readProfile(profile);
    if ('error' in loaded) {
      record(profileResult(profile, null, 'FAILED', loaded.error));
      continue;
    }

    const codec = normalizeCodec(loaded.codecField);
    if (codec === undefined || encoderCodecArg(codec) === undefined) {
      const reason = loaded.codecField ? `Missing/unknown codec: ${loaded.codecField}` : 'Missing/unknown codec';
      record(profileResult(profile, null, 'SKIPPED', reason));
      continue;
    }
    if (
      loaded.qualityPreset !== undefined &&
      loaded.qualityPreset > config.maxSupportedQualityPreset
    ) {
      record(
        profileResult(
          profile,
          codec,
          'SKIPPED',
          `Unsupported qualityPreset=${loaded.qualityPreset} (max=${config.maxSupportedQualityPreset})`
        )
      );
      continue;
    }
    if (config.codec !== undefined && config.codec !== codec) continue;

    if (!source) {
      record(profileResult(profile, codec, 'SKIPPED', 'No input YUV found'));
      continue;
    }

    const testCase = testCaseSchema.parse({
      name: profile.name,
      kind: 'profile',
      category: 'profile',
      codec,
      input: source.path,
      output: joinPath(
        config.outputDir,
        `profile_${profile.name.replace(/\//g, '_')}${bitstreamExtension(codec)}`
      ),
      description: `Encoder profile ${profile.name}`,
      width: source.format.width,
      height: source.format.height,
      chroma: source.format.chroma,
      bitDepth: source.format.bitDepth === 8 ? undefined : source.format.bitDepth,
      numFrames: config.maxFrames,
      encoderConfig: profile.path,
      expectOutput: true
    });

    const { result } = await evaluateCase(testCase, {
      runner,
      executables: toolchain,
      env,
      validate: config.validate,
      timeoutSeconds: config.timeoutSeconds
    });
    if (config.verbose) {
      reporter.info(`  Command: ${result.command}`);
    }
    record(result);
  }

  return {
    runId: `${startedAt}_${PROFILE_SUITE_NAME}`,
    suiteName: PROFILE_SUITE_NAME,
    target: runner.target,
    startedAt,
    finishedAt: new Date().toISOString(),
    config: {
      validate: config.validate,
      categories: ['profile'],
      maxFrames: config.maxFrames
    },
    summary: summarizeCases(results),
    cases: results
  };
}
