/**
 * voxdesk — voice command pipeline for the desktop
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, VoiceSession, WhisperHttpEngine, VoskWebSocketEngine } from 'voxdesk';
 *
 * const config = new ConfigManager().load();
 * const session = new VoiceSession({
 *   config,
 *   primary: new WhisperHttpEngine({ baseUrl: config.asr.whisperUrl }),
 *   secondary: new VoskWebSocketEngine({ url: config.asr.voskUrl }),
 *   executor: myDesktopExecutor,
 * });
 * session.bus.on('command', command => console.log(command.action, command.slots));
 * for (const frame of microphoneFrames) session.ingest(frame);
 * ```
 */

// Core
export { ConfigManager, defaultConfig, type ConfigOverrides, type ConfigManagerOptions } from './core/config.js';
export { EventBus, type VoxdeskEvents } from './core/events.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export { AsyncMutex } from './core/mutex.js';
export {
  VoxdeskError,
  ConfigError,
  EngineTimeoutError,
  RecognitionUnavailableError,
  ClassificationDegradedError,
  UnresolvableIntentError,
  CorrectionIgnoredError,
  type EngineFailure,
  type PipelineStage,
} from './core/errors.js';
export {
  TASK_TYPES,
  VoxdeskConfigSchema,
  type TaskType,
  type VoxdeskConfig,
  type VoxdeskConfigInput,
} from './core/types.js';

// Audio
export { NoiseThresholdModel, type ManualThreshold } from './audio/threshold-model.js';
export { VoiceActivityGate, type DiscardedUtterance } from './audio/voice-activity-gate.js';
export { FrameQueue } from './audio/frame-queue.js';
export { readPcmFrames, type PcmReaderOptions } from './audio/pcm-reader.js';
export { calibrate, type CalibrationReport } from './audio/calibration.js';
export { frameEnergy, encodeWav } from './audio/pcm.js';
export type { AudioFrame, GateState, Utterance, ThresholdState } from './audio/types.js';

// Speech recognition
export { AsrArbiter, type AsrArbiterOptions, type FallbackEvent } from './asr/arbiter.js';
export { TranscriptNormalizer } from './asr/normalize.js';
export { createSpeechEngine } from './asr/engines.js';
export { WhisperHttpEngine } from './asr/providers/whisper-http.js';
export { VoskWebSocketEngine } from './asr/providers/vosk-ws.js';
export type { SpeechToTextProvider, RecognitionResult, Transcript, EngineStats } from './asr/types.js';

// Intent
export { IntentClassifier } from './intent/intent-classifier.js';
export { RuleBasedClassifier, toCommandText } from './intent/rule-classifier.js';
export { OllamaTaskClassifier } from './intent/ollama-classifier.js';
export { ClassifierState } from './intent/classifier-state.js';
export { scoreComplexity } from './intent/complexity.js';
export { resolveApp, matchKnownApp } from './intent/apps.js';
export type { ClassificationResult, RemoteClassifier, RemoteClassification, RuleMatch, Slots, SuspectMatch } from './intent/types.js';

// Context and planning
export { ContextManager } from './context/context-manager.js';
export type { ContextTurn, ContextReader, TurnOutcome } from './context/types.js';
export { CommandPlanner, isConfirmation } from './planner/command-planner.js';
export type { Command, DisambiguationRequest, PlanResult, SubAction } from './planner/types.js';

// Learning
export { CorrectionLearner } from './learning/correction-learner.js';
export { RepetitionDetector } from './learning/repetition-detector.js';
export { CorrectionEventSchema, type CorrectionEvent, type LearningUpdate } from './learning/types.js';

// Pipeline
export { VoiceSession, type VoiceSessionOptions } from './pipeline/session.js';
export { DryRunExecutor, ConsoleSpeech } from './pipeline/collaborators.js';
export { textTranscript } from './pipeline/text-input.js';
export type { Executor, ExecutionResult, SpeechOutput, TurnResult, UserCorrection } from './pipeline/types.js';

export { VERSION, NAME } from './version.js';
