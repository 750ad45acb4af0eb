import { z } from 'zod';

// ─── Codecs ───────────────────────────────────────────────────────────────────

export const CODECS = ['h264', 'h265', 'av1', 'vp9'] as const;
export const ENCODABLE_CODECS = ['h264', 'h265', 'av1'] as const;

// Every spelling the scripts, profiles and CLI flags use for a codec.
export const CODEC_ALIASES: Record<string, (typeof CODECS)[number]> = {
  h264: 'h264',
  avc: 'h264',
  '264': 'h264',
  h265: 'h265',
  hevc: 'h265',
  '265': 'h265',
  av1: 'av1',
  vp9: 'vp9'
};

function canonicalCodec(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const key = value.trim().toLowerCase();
  return CODEC_ALIASES[key] ?? key;
}

export const codecSchema = z.preprocess(canonicalCodec, z.enum(CODECS));
export const encodableCodecSchema = z.preprocess(canonicalCodec, z.enum(ENCODABLE_CODECS));

export const chromaSchema = z.enum(['400', '420', '422', '444']);
export const bitDepthSchema = z.union([z.literal(8), z.literal(10)]);

export const rateControlModeSchema = z.enum(['default', 'disabled', 'cbr', 'vbr']);
export const usageHintsSchema = z.enum(['default', 'transcoding', 'streaming', 'recording']);
export const contentHintsSchema = z.enum(['default', 'camera', 'desktop', 'rendered']);
export const tuningModeSchema = z.enum(['default', 'highquality', 'lowlatency', 'lossless']);

// ─── Adaptive quantization ────────────────────────────────────────────────────

/** Strength value the encoder reads as "AQ engaged but inert". */
export const AQ_DISABLED = -2.0;
export const AQ_MIN_ENGAGED = -1.0;
export const AQ_MAX = 1.0;

export const aqStrengthSchema = z
  .number()
  .finite()
  .max(AQ_MAX, { message: `AQ strength must be <= ${AQ_MAX.toFixed(1)}` })
  .refine((value) => value >= AQ_MIN_ENGAGED || value <= AQ_DISABLED, {
    message: 'AQ strengths between -2.0 and -1.0 (exclusive) are reserved'
  });

export const aqSettingsSchema = z.object({
  spatial: aqStrengthSchema,
  temporal: aqStrengthSchema
});

export function isAqDisabled(strength: number): boolean {
  return strength <= AQ_DISABLED;
}

// ─── Test cases ───────────────────────────────────────────────────────────────

export const caseKindSchema = z.enum(['decode', 'encode', 'profile']);
export const caseCategorySchema = z.enum(['decode', 'encode', 'aq', 'profile', 'roundtrip']);

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().min(0);

export const testCaseSchema = z.object({
  name: z.string().min(1),
  kind: caseKindSchema,
  category: caseCategorySchema,
  codec: codecSchema,
  input: z.string().min(1),
  output: z.string().min(1),
  description: z.string().min(1),
  width: positiveInt.optional(),
  height: positiveInt.optional(),
  encodeWidth: positiveInt.optional(),
  encodeHeight: positiveInt.optional(),
  bitDepth: bitDepthSchema.optional(),
  chroma: chromaSchema.optional(),
  numFrames: positiveInt.optional(),
  startFrame: nonNegativeInt.optional(),
  rateControlMode: rateControlModeSchema.optional(),
  averageBitrate: positiveInt.optional(),
  gopFrameCount: nonNegativeInt.optional(),
  idrPeriod: nonNegativeInt.optional(),
  consecutiveBFrameCount: nonNegativeInt.optional(),
  qualityLevel: z.number().int().min(0).max(7).optional(),
  usageHints: usageHintsSchema.optional(),
  contentHints: contentHintsSchema.optional(),
  tuningMode: tuningModeSchema.optional(),
  aq: aqSettingsSchema.optional(),
  aqDumpDir: z.string().min(1).optional(),
  encoderConfig: z.string().min(1).optional(),
  extraArgs: z.array(z.string()).default([]),
  expectOutput: z.boolean().default(false)
});

// ─── Encoder JSON profiles ────────────────────────────────────────────────────

// Only the fields the harness acts on are typed; the encoder owns the rest.
export const encoderProfileSchema = z
  .object({
    codec: z.string().min(1),
    qualityPreset: z.coerce.number().int().optional().catch(undefined)
  })
  .passthrough();

// ─── Execution target ─────────────────────────────────────────────────────────

export const executionTargetSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('local')
  }),
  z.object({
    mode: z.literal('remote'),
    host: z.string().min(1),
    user: z.string().min(1),
    connectTimeoutSeconds: positiveInt.default(5),
    envPrefixes: z.array(z.string().min(1)).default(['VK_', 'LD_LIBRARY_PATH'])
  })
]);

export const platformSchema = z.enum(['linux', 'win32', 'darwin']);

export const toolchainConfigSchema = z.object({
  root: z.string().min(1),
  variant: z.enum(['debug', 'release']).default('release'),
  buildDir: z.string().min(1).optional(),
  platform: platformSchema.optional()
});

// ─── Run configurations ───────────────────────────────────────────────────────

export const suiteCategorySchema = z.enum(['decode', 'encode', 'aq']);

export const suiteConfigSchema = z.object({
  videoDir: z.string().min(1),
  outputDir: z.string().min(1).default('/tmp/vulkan_video_tests'),
  categories: z.array(suiteCategorySchema).min(1).default(['decode', 'encode']),
  codec: codecSchema.optional(),
  maxFrames: positiveInt.default(30),
  timeoutSeconds: positiveInt.default(300),
  validate: z.boolean().default(false),
  verbose: z.boolean().default(false),
  target: executionTargetSchema.default({ mode: 'local' }),
  toolchain: toolchainConfigSchema
});

export const benchmarkConfigSchema = z.object({
  input: z.string().min(1),
  width: positiveInt,
  height: positiveInt,
  codec: encodableCodecSchema,
  outputDir: z.string().min(1),
  numFrames: positiveInt.optional(),
  startFrame: nonNegativeInt.default(0),
  encodeWidth: positiveInt.optional(),
  encodeHeight: positiveInt.optional(),
  chroma: chromaSchema.default('420'),
  bitDepth: bitDepthSchema.default(8),
  rateControlMode: rateControlModeSchema.default('vbr'),
  averageBitrate: positiveInt.optional(),
  gopFrameCount: nonNegativeInt.default(16),
  idrPeriod: nonNegativeInt.default(4294967295),
  consecutiveBFrameCount: nonNegativeInt.default(3),
  qualityLevel: z.number().int().min(0).max(7).default(4),
  usageHints: usageHintsSchema.default('transcoding'),
  contentHints: contentHintsSchema.default('default'),
  tuningMode: tuningModeSchema.default('default'),
  spatialAqStrength: aqStrengthSchema.default(0),
  temporalAqStrength: aqStrengthSchema.default(0),
  aqDumpDir: z.string().min(1).optional(),
  skipPsnr: z.boolean().default(false),
  skipVmaf: z.boolean().default(false),
  validate: z.boolean().default(false),
  verbose: z.boolean().default(false),
  ffmpegPath: z.string().min(1).default('ffmpeg'),
  target: executionTargetSchema.default({ mode: 'local' }),
  toolchain: toolchainConfigSchema
});

export const rawInputOverrideSchema = z.object({
  file: z.string().min(1),
  width: positiveInt,
  height: positiveInt,
  bitDepth: bitDepthSchema.default(8),
  chroma: chromaSchema.default('420')
});

export const profileRunConfigSchema = z.object({
  profileDir: z.string().min(1),
  videoDir: z.string().min(1),
  outputDir: z.string().min(1).default('/tmp/vulkan_encoder_profile_tests'),
  codec: codecSchema.optional(),
  profileFilter: z.string().optional(),
  maxFrames: positiveInt.default(30),
  maxSupportedQualityPreset: z.number().int().min(0).max(7).default(4),
  input: rawInputOverrideSchema.optional(),
  timeoutSeconds: positiveInt.default(300),
  validate: z.boolean().default(false),
  verbose: z.boolean().default(false),
  target: executionTargetSchema.default({ mode: 'local' }),
  toolchain: toolchainConfigSchema
});

export const roundtripConfigSchema = z.object({
  directory: z.string().min(1),
  outputDir: z.string().min(1).default('/tmp/vulkan_decoder_roundtrip'),
  filter: z.string().optional(),
  decoderPath: z.string().min(1).optional(),
  maxFrames: positiveInt.optional(),
  timeoutSeconds: positiveInt.default(60),
  validate: z.boolean().default(false),
  verbose: z.boolean().default(false),
  target: executionTargetSchema.default({ mode: 'local' }),
  toolchain: toolchainConfigSchema
});

// ─── Reports ──────────────────────────────────────────────────────────────────

export const outcomeSchema = z.enum(['PASSED', 'FAILED', 'SKIPPED', 'ERROR']);

export const caseResultSchema = z.object({
  name: z.string(),
  // Null when the case never got far enough to know its codec (unreadable profile).
  codec: codecSchema.nullable(),
  category: caseCategorySchema,
  description: z.string(),
  outcome: outcomeSchema,
  durationSeconds: z.number().min(0),
  message: z.string(),
  validationErrors: z.number().int().min(0),
  command: z.string()
});

export const suiteReportSchema = z.object({
  runId: z.string().min(1),
  suiteName: z.string().min(1),
  target: z.string().min(1),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  config: z.object({
    validate: z.boolean(),
    categories: z.array(z.string()),
    maxFrames: z.number().int()
  }),
  summary: z.object({
    total: z.number().int().min(0),
    passed: z.number().int().min(0),
    failed: z.number().int().min(0),
    skipped: z.number().int().min(0),
    errors: z.number().int().min(0),
    validationErrors: z.number().int().min(0),
    durationSeconds: z.number().min(0)
  }),
  cases: z.array(caseResultSchema)
});

const psnrDocumentSchema = z.object({
  y: z.number(),
  u: z.number(),
  v: z.number(),
  average: z.number(),
  min: z.number(),
  max: z.number()
});

export const benchmarkDocumentSchema = z.object({
  timestamp: z.string().datetime({ offset: true }),
  configuration: z.object({
    input: z.string(),
    width: z.number().int(),
    height: z.number().int(),
    codec: z.string(),
    num_frames: z.number().int().nullable(),
    bitrate: z.number().int().nullable(),
    gop_size: z.number().int().nullable(),
    b_frames: z.number().int().nullable()
  }),
  baseline: z.string(),
  results: z.array(
    z.object({
      config_name: z.string(),
      description: z.string(),
      spatial_aq: z.number(),
      temporal_aq: z.number(),
      outcome: outcomeSchema,
      success: z.boolean(),
      file_size: z.number().int().min(0),
      encode_time: z.number().min(0),
      psnr: psnrDocumentSchema,
      vmaf: z.number(),
      error: z.string().nullable(),
      output_file: z.string().nullable(),
      aq_dump_dir: z.string().nullable(),
      commands: z.object({
        encode: z.string(),
        decode: z.string(),
        psnr: z.string(),
        vmaf: z.string()
      }),
      deltas: z
        .object({
          size_percent: z.number().nullable(),
          psnr_db: z.number().nullable(),
          vmaf: z.number().nullable()
        })
        .nullable()
    })
  ),
  analysis: z.object({
    best_vmaf: z.string().nullable(),
    best_psnr: z.string().nullable(),
    smallest_size: z.string().nullable()
  })
});

// ─── Types ────────────────────────────────────────────────────────────────────

export type Codec = z.infer<typeof codecSchema>;
export type EncodableCodec = z.infer<typeof encodableCodecSchema>;
export type Chroma = z.infer<typeof chromaSchema>;
export type BitDepth = z.infer<typeof bitDepthSchema>;
export type RateControlMode = z.infer<typeof rateControlModeSchema>;
export type AqSettings = z.infer<typeof aqSettingsSchema>;
export type CaseKind = z.infer<typeof caseKindSchema>;
export type CaseCategory = z.infer<typeof caseCategorySchema>;
export type TestCaseInput = z.input<typeof testCaseSchema>;
export type TestCase = Readonly<z.infer<typeof testCaseSchema>>;
export type EncoderProfile = z.infer<typeof encoderProfileSchema>;
export type ExecutionTarget = z.infer<typeof executionTargetSchema>;
export type ExecutionTargetInput = z.input<typeof executionTargetSchema>;
export type TargetPlatform = z.infer<typeof platformSchema>;
export type ToolchainConfig = z.infer<typeof toolchainConfigSchema>;
export type SuiteCategory = z.infer<typeof suiteCategorySchema>;
export type SuiteConfig = z.infer<typeof suiteConfigSchema>;
export type SuiteConfigInput = z.input<typeof suiteConfigSchema>;
export type BenchmarkConfig = z.infer<typeof benchmarkConfigSchema>;
export type BenchmarkConfigInput = z.input<typeof benchmarkConfigSchema>;
export type ProfileRunConfig = z.infer<typeof profileRunConfigSchema>;
export type ProfileRunConfigInput = z.input<typeof profileRunConfigSchema>;
export type RoundtripConfig = z.infer<typeof roundtripConfigSchema>;
export type RoundtripConfigInput = z.input<typeof roundtripConfigSchema>;
export type Outcome = z.infer<typeof outcomeSchema>;
export type CaseResult = z.infer<typeof caseResultSchema>;
export type SuiteReport = z.infer<typeof suiteReportSchema>;
export type BenchmarkDocument = z.infer<typeof benchmarkDocumentSchema>;
