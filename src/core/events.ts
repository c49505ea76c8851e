import { EventEmitter } from 'eventemitter3';
import type { GateState, Utterance } from '../audio/types.js';
import type { DiscardedUtterance } from '../audio/voice-activity-gate.js';
import type { FallbackEvent } from '../asr/arbiter.js';
import type { Transcript } from '../asr/types.js';
import type { ContextTurn, EvictedTurn } from '../context/types.js';
import type { ClassificationResult } from '../intent/types.js';
import type { LearningUpdate } from '../learning/types.js';
import type { Command, DisambiguationRequest } from '../planner/types.js';
import type {
  ClassificationDegradedError,
  CorrectionIgnoredError,
  RecognitionUnavailableError,
  UnresolvableIntentError,
} from './errors.js';

export interface VoxdeskEvents {
  'gate:state': { from: GateState; to: GateState };
  'utterance:emitted': Utterance;
  'utterance:discarded': DiscardedUtterance;
  'asr:fallback': FallbackEvent;
  'asr:unavailable': { utteranceId: string; error: RecognitionUnavailableError };
  'transcript': Transcript;
  'classification': { utteranceId: string; result: ClassificationResult };
  'classification:degraded': { text: string; error: ClassificationDegradedError };
  'command': Command;
  'disambiguation': DisambiguationRequest;
  'unresolvable': UnresolvableIntentError;
  'turn:appended': ContextTurn;
  'turn:superseded': { utteranceId: string; text: string };
  'turn:evicted': EvictedTurn;
  'learning:update': LearningUpdate;
  'learning:ignored': CorrectionIgnoredError;
}

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof VoxdeskEvents>(event: K, listener: (data: VoxdeskEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof VoxdeskEvents>(event: K, listener: (data: VoxdeskEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof VoxdeskEvents>(event: K, listener: (data: VoxdeskEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof VoxdeskEvents>(event: K, data: VoxdeskEvents[K]): void {
    this.emitter.emit(event, data);
  }
}
