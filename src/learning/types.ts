import { z } from 'zod';
import { TaskTypeSchema } from '../core/types.js';

export const ThresholdSignalSchema = z.enum(['too-permissive', 'too-strict']);
export type ThresholdSignal = z.infer<typeof ThresholdSignalSchema>;

const EnergyProfileSchema = z.object({
  peak: z.number().min(0),
  mean: z.number().min(0),
  trailing: z.number().min(0),
  noiseFloor: z.number().min(0),
});

const SlotsSchema = z.record(z.string());

const EventBase = {
  turnId: z.string().min(1),
  /** Normalized transcript text of the corrected turn */
  text: z.string().min(1),
  /** When the corrected turn was recorded (ms) */
  turnAt: z.number().finite(),
};

export const CorrectionEventSchema = z.discriminatedUnion('reason', [
  z.object({
    reason: z.literal('explicit'),
    ...EventBase,
    predictedTaskType: TaskTypeSchema,
    correctedTaskType: TaskTypeSchema,
    correctedSlots: SlotsSchema.default({}),
    /** What the user actually said, when recognition got it wrong */
    correctedText: z.string().min(1).optional(),
    thresholdSignal: ThresholdSignalSchema.optional(),
    energy: EnergyProfileSchema.optional(),
  }),
  z.object({
    reason: z.literal('repeated-utterance'),
    ...EventBase,
  }),
  z.object({
    reason: z.literal('execution-failure'),
    ...EventBase,
    taskType: TaskTypeSchema,
    detail: z.string().optional(),
  }),
]);

export type CorrectionEvent = z.input<typeof CorrectionEventSchema>;
export type ParsedCorrectionEvent = z.output<typeof CorrectionEventSchema>;
export type CorrectionReason = ParsedCorrectionEvent['reason'];

export interface LearningUpdate {
  reason: CorrectionReason;
  turnId: string;
  text: string;
  /** Applied weight deltas by task type */
  weightDeltas?: Record<string, number>;
  /** Applied margin delta (positive = stricter) */
  marginDelta?: number;
  /** Accumulated floor relief for the transcript */
  floorRelief?: number;
  learnedPhrase?: boolean;
  learnedCorrection?: boolean;
  suspect?: boolean;
}
