import { z } from 'zod';

// ===== Task types =====

export const TASK_TYPES = [
  'app-control',
  'app-action',
  'messaging',
  'query',
  'file-op',
  'system-op',
  'conversation',
  'unknown',
] as const;

export const TaskTypeSchema = z.enum(TASK_TYPES);
export type TaskType = z.infer<typeof TaskTypeSchema>;

// ===== Configuration =====

const TaskDefinitionSchema = z.object({
  requiredSlots: z.array(z.string()).default([]),
  multiStep: z.boolean().default(false),
});

export type TaskDefinition = z.infer<typeof TaskDefinitionSchema>;

const DEFAULT_TASKS: Record<Exclude<TaskType, 'unknown'>, { requiredSlots: string[]; multiStep: boolean }> = {
  'app-control': { requiredSlots: ['app'], multiStep: false },
  'app-action': { requiredSlots: ['app', 'action'], multiStep: true },
  messaging: { requiredSlots: ['contact', 'message'], multiStep: true },
  query: { requiredSlots: ['query'], multiStep: false },
  'file-op': { requiredSlots: ['operation', 'target'], multiStep: false },
  'system-op': { requiredSlots: ['operation'], multiStep: false },
  conversation: { requiredSlots: [], multiStep: false },
};

function ordered(
  ctx: z.RefinementCtx,
  minKey: string,
  min: number,
  maxKey: string,
  max: number,
): void {
  if (min > max) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [minKey],
      message: `${minKey} (${min}) must not exceed ${maxKey} (${max})`,
    });
  }
}

export const VoxdeskConfigSchema = z.object({
  audio: z.object({
    sampleRate: z.number().int().min(8000).max(48000).default(16000),
    frameMs: z.number().int().min(10).max(100).default(30),
  }).default({}),
  threshold: z.object({
    initialNoiseFloor: z.number().min(0).max(1).default(0.01),
    initialMargin: z.number().min(0).max(1).default(0.02),
    marginMin: z.number().min(0).max(1).default(0.01),
    marginMax: z.number().min(0).max(1).default(0.1),
    marginDecay: z.number().min(0).max(0.01).default(0.00001),
    thresholdMin: z.number().min(0).max(1).default(0.015),
    thresholdMax: z.number().min(0).max(1).default(0.3),
    hysteresis: z.number().min(0).max(0.5).default(0.005),
    adaptationRate: z.number().min(0).max(1).default(0.05),
  }).superRefine((t, ctx) => {
    ordered(ctx, 'marginMin', t.marginMin, 'marginMax', t.marginMax);
    ordered(ctx, 'thresholdMin', t.thresholdMin, 'thresholdMax', t.thresholdMax);
  }).default({}),
  gate: z.object({
    minOnsetFrames: z.number().int().min(1).default(3),
    graceMs: z.number().int().min(0).default(600),
    minUtteranceMs: z.number().int().min(0).default(300),
    maxUtteranceMs: z.number().int().min(500).default(15000),
    queueCapacity: z.number().int().min(1).default(256),
  }).default({}),
  asr: z.object({
    primary: z.enum(['whisper', 'vosk']).default('whisper'),
    secondary: z.enum(['whisper', 'vosk']).default('vosk'),
    primaryTimeoutMs: z.number().int().min(1).default(4000),
    secondaryTimeoutMs: z.number().int().min(1).default(4000),
    locale: z.string().default('en-US'),
    languageHint: z.string().default('en'),
    whisperUrl: z.string().default('http://localhost:8080'),
    voskUrl: z.string().default('ws://localhost:2700'),
  }).default({}),
  classifier: z.object({
    remoteEnabled: z.boolean().default(false),
    remoteUrl: z.string().default('http://localhost:11434'),
    remoteModel: z.string().default('gemma2:2b'),
    remoteTimeoutMs: z.number().int().min(1).default(1500),
    remoteConfidenceFloor: z.number().min(0).max(1).default(0.6),
    ruleConfidenceFloor: z.number().min(0).max(1).default(0.35),
    floorMin: z.number().min(0).max(1).default(0.2),
    wakeWord: z.string().default('assistant'),
  }).superRefine((c, ctx) => {
    ordered(ctx, 'floorMin', c.floorMin, 'ruleConfidenceFloor', c.ruleConfidenceFloor);
    ordered(ctx, 'floorMin', c.floorMin, 'remoteConfidenceFloor', c.remoteConfidenceFloor);
  }).default({}),
  context: z.object({
    ttlMs: z.number().int().min(1).default(120_000),
    maxTurns: z.number().int().min(1).default(20),
  }).default({}),
  tasks: z.object({
    'app-control': TaskDefinitionSchema.default(DEFAULT_TASKS['app-control']),
    'app-action': TaskDefinitionSchema.default(DEFAULT_TASKS['app-action']),
    messaging: TaskDefinitionSchema.default(DEFAULT_TASKS.messaging),
    query: TaskDefinitionSchema.default(DEFAULT_TASKS.query),
    'file-op': TaskDefinitionSchema.default(DEFAULT_TASKS['file-op']),
    'system-op': TaskDefinitionSchema.default(DEFAULT_TASKS['system-op']),
    conversation: TaskDefinitionSchema.default(DEFAULT_TASKS.conversation),
  }).default({}),
  learning: z.object({
    correctionWindowMs: z.number().int().min(1).default(300_000),
    weightStep: z.number().min(0).default(0.1),
    weightMin: z.number().min(0).default(0.5),
    weightMax: z.number().min(0).default(1.5),
    marginStep: z.number().min(0).default(0.005),
    floorStep: z.number().min(0).default(0.05),
    repeatCount: z.number().int().min(2).default(3),
    repeatWindowMs: z.number().int().min(1).default(20_000),
    maxLearnedPhrases: z.number().int().min(1).default(500),
  }).superRefine((l, ctx) => {
    ordered(ctx, 'weightMin', l.weightMin, 'weightMax', l.weightMax);
  }).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    pretty: z.boolean().default(false),
  }).default({}),
});

export type VoxdeskConfig = z.infer<typeof VoxdeskConfigSchema>;
export type VoxdeskConfigInput = z.input<typeof VoxdeskConfigSchema>;
export type ThresholdConfig = VoxdeskConfig['threshold'];
export type GateConfig = VoxdeskConfig['gate'];
export type AsrConfig = VoxdeskConfig['asr'];
export type ClassifierConfig = VoxdeskConfig['classifier'];
export type ContextConfig = VoxdeskConfig['context'];
export type TaskCatalog = VoxdeskConfig['tasks'];
export type LearningConfig = VoxdeskConfig['learning'];
