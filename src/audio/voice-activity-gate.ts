/**
 * VoiceActivityGate — Frame-by-frame utterance segmentation.
 *
 * States:
 *   idle ──(N consecutive frames ≥ enter)──▶ listening
 *   listening ──(frame < exit)──▶ trailing-silence
 *   trailing-silence ──(frame ≥ enter)──▶ listening
 *   trailing-silence ──(grace window elapsed)──▶ emitted ──▶ idle
 *
 * Utterances longer than maxUtteranceMs are force-emitted; utterances whose
 * voiced span is shorter than minUtteranceMs are discarded as noise.
 * Only frames seen in idle (outside an onset run), and trailing-silence
 * frames below the exit threshold, reach the threshold model.
 */

import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import { getLogger } from '../core/logger.js';
import type { GateConfig } from '../core/types.js';
import { frameDurationMs, frameEnergy } from './pcm.js';
import type { NoiseThresholdModel } from './threshold-model.js';
import type { AudioFrame, GateState, Utterance } from './types.js';

interface BufferedFrame {
  frame: AudioFrame;
  energy: number;
}

export interface DiscardedUtterance {
  durationMs: number;
  frames: number;
  reason: 'too-short';
}

export class VoiceActivityGate extends EventEmitter {
  private state: GateState = 'idle';
  private onset: BufferedFrame[] = [];
  private buffer: BufferedFrame[] = [];
  private startedAt = 0;
  private lastVoicedEnd = 0;
  private silenceStartedAt = 0;
  private trailingSum = 0;
  private trailingCount = 0;
  private readonly logger = getLogger();

  constructor(
    private readonly threshold: NoiseThresholdModel,
    private readonly config: GateConfig,
  ) {
    super();
  }

  // ─────────────────────────────────────────────────────────
  // FRAME PROCESSING
  // ─────────────────────────────────────────────────────────

  /**
   * Feed one frame. Returns the utterance when this frame closes one.
   */
  process(frame: AudioFrame): Utterance | null {
    const energy = frameEnergy(frame.samples);
    const levels = this.threshold.snapshot();
    const frameEnd = frame.timestamp + frameDurationMs(frame);

    switch (this.state) {
      case 'idle':
        if (energy >= levels.enterThreshold) {
          this.onset.push({ frame, energy });
          if (this.onset.length >= this.config.minOnsetFrames) {
            this.buffer = this.onset;
            this.onset = [];
            this.startedAt = this.buffer[0].frame.timestamp;
            this.lastVoicedEnd = frameEnd;
            this.transition('listening');
          }
        } else {
          this.onset = [];
          this.threshold.update(energy);
        }
        return null;

      case 'listening':
        this.buffer.push({ frame, energy });
        if (energy >= levels.exitThreshold) {
          this.lastVoicedEnd = frameEnd;
        } else {
          this.silenceStartedAt = frame.timestamp;
          this.trailingSum = energy;
          this.trailingCount = 1;
          this.transition('trailing-silence');
        }
        return this.checkMaxDuration(frameEnd);

      case 'trailing-silence':
        this.buffer.push({ frame, energy });
        if (energy >= levels.enterThreshold) {
          this.lastVoicedEnd = frameEnd;
          this.trailingSum = 0;
          this.trailingCount = 0;
          this.transition('listening');
          return this.checkMaxDuration(frameEnd);
        }
        if (energy < levels.exitThreshold) {
          this.threshold.update(energy);
        }
        this.trailingSum += energy;
        this.trailingCount++;
        if (frameEnd - this.silenceStartedAt >= this.config.graceMs) {
          return this.close(frameEnd, false);
        }
        return this.checkMaxDuration(frameEnd);

      case 'emitted':
        // Transient; close() always moves on to idle.
        this.transition('idle');
        return this.process(frame);
    }
  }

  getState(): GateState {
    return this.state;
  }

  /**
   * Drop any partial utterance and return to idle.
   */
  reset(): void {
    this.onset = [];
    this.clearBuffer();
    if (this.state !== 'idle') {
      this.transition('idle');
    }
  }

  // ─────────────────────────────────────────────────────────
  // INTERNAL
  // ─────────────────────────────────────────────────────────

  private checkMaxDuration(frameEnd: number): Utterance | null {
    if (frameEnd - this.startedAt >= this.config.maxUtteranceMs) {
      this.logger.debug({ spanMs: frameEnd - this.startedAt }, 'Utterance reached maximum duration');
      return this.close(frameEnd, true);
    }
    return null;
  }

  private close(bufferEnd: number, forced: boolean): Utterance | null {
    const voicedEnd = forced && this.state === 'listening' ? bufferEnd : this.lastVoicedEnd;
    const durationMs = voicedEnd - this.startedAt;

    if (!forced && durationMs < this.config.minUtteranceMs) {
      const discarded: DiscardedUtterance = {
        durationMs,
        frames: this.buffer.length,
        reason: 'too-short',
      };
      this.logger.debug(discarded, 'Discarded utterance shorter than minimum');
      this.clearBuffer();
      this.transition('idle');
      this.emit('discarded', discarded);
      return null;
    }

    let peak = 0;
    let sum = 0;
    for (const b of this.buffer) {
      if (b.energy > peak) peak = b.energy;
      sum += b.energy;
    }
    const trailing = this.state === 'trailing-silence' && this.trailingCount > 0
      ? this.trailingSum / this.trailingCount
      : 0;

    const utterance: Utterance = {
      id: `utt_${nanoid(10)}`,
      frames: this.buffer.map(b => b.frame),
      sampleRate: this.buffer[0].frame.sampleRate,
      startedAt: this.startedAt,
      endedAt: voicedEnd,
      durationMs,
      trailingMs: Math.max(bufferEnd - voicedEnd, 0),
      peakEnergy: peak,
      meanEnergy: sum / this.buffer.length,
      trailingEnergy: trailing,
      noiseFloorAtClose: this.threshold.snapshot().noiseFloor,
      forced,
    };

    this.clearBuffer();
    this.transition('emitted');
    this.emit('utterance', utterance);
    this.transition('idle');
    return utterance;
  }

  private clearBuffer(): void {
    this.buffer = [];
    this.trailingSum = 0;
    this.trailingCount = 0;
  }

  private transition(next: GateState): void {
    const previous = this.state;
    this.state = next;
    this.emit('state', { from: previous, to: next });
  }
}
