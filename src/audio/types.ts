/**
 * Audio Types — frames, utterances and the adaptive threshold state
 * shared by the threshold model, the voice activity gate and the ASR arbiter.
 */

export interface AudioFrame {
  /** Mono 16-bit PCM samples */
  samples: Int16Array;
  /** Sample rate in Hz */
  sampleRate: number;
  /** Monotonic capture time of the first sample (ms) */
  timestamp: number;
}

export type GateState = 'idle' | 'listening' | 'trailing-silence' | 'emitted';

export interface Utterance {
  id: string;
  frames: AudioFrame[];
  sampleRate: number;
  /** Timestamp of the first voiced frame (ms) */
  startedAt: number;
  /** Timestamp where the last voiced frame ended (ms) */
  endedAt: number;
  /** Voiced span, endedAt - startedAt */
  durationMs: number;
  /** Silence buffered after the voiced span before the gate closed */
  trailingMs: number;
  peakEnergy: number;
  meanEnergy: number;
  /** Mean energy of the trailing-silence frames (0 when none) */
  trailingEnergy: number;
  /** Noise floor estimate when the gate closed */
  noiseFloorAtClose: number;
  /** Closed by the maximum-duration guard rather than by silence */
  forced: boolean;
}

export interface ThresholdState {
  noiseFloor: number;
  margin: number;
  /** noiseFloor + margin, clamped to the configured range */
  threshold: number;
  /** Energy a frame must reach to open (or re-open) the gate */
  enterThreshold: number;
  /** Energy below which an open gate starts its grace period */
  exitThreshold: number;
  hysteresis: number;
  adaptationRate: number;
  /** False while a manual override is in force */
  adaptive: boolean;
}

export interface EnergyProfile {
  peak: number;
  mean: number;
  trailing: number;
  noiseFloor: number;
}
