/**
 * Sample matching for overlays.
 *
 * Matchers pair samples of different streams by local timestamp: a scene
 * frame with the gaze sample closest to it in time, and optionally with the
 * audio received since the previous frame.
 */

import type { AudioSample, GazeSample, Sample, VideoSample } from '../core/models/samples.js';

// ============================================================================
// Types
// ============================================================================

export interface MatchedPair<P extends Sample, S extends Sample> {
  readonly primary: P;
  readonly secondary: S;
  /** secondary.timestampNs − primary.timestampNs */
  readonly deltaNs: bigint;
}

export interface MatchedSceneAudioGaze {
  readonly frame: VideoSample<'scene'>;
  readonly gaze: GazeSample;
  /** Audio chunks up to the frame's timestamp, oldest first */
  readonly audio: readonly AudioSample[];
}

export interface OverlayMatcherOptions {
  /** Secondary samples kept for matching */
  capacity?: number;
  /** Pairs further apart than this are not formed */
  maxDeltaNs?: bigint;
}

const DEFAULT_CAPACITY = 256;

function absolute(value: bigint): bigint {
  return value < 0n ? -value : value;
}

// ============================================================================
// Overlay Matcher
// ============================================================================

/**
 * Pairs each primary sample with the closest buffered secondary sample.
 */
export class OverlayMatcher<P extends Sample, S extends Sample> {
  private readonly capacity: number;
  private readonly maxDeltaNs: bigint | null;
  private secondaries: S[] = [];

  constructor(options: OverlayMatcherOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_CAPACITY;
    this.maxDeltaNs = options.maxDeltaNs ?? null;
  }

  pushSecondary(sample: S): void {
    const last = this.secondaries[this.secondaries.length - 1];
    if (last && (sample.epoch !== last.epoch || sample.timestampNs < last.timestampNs)) {
      // Reconnect boundary: older samples are no longer comparable
      this.secondaries = [];
    }
    this.secondaries.push(sample);
    if (this.secondaries.length > this.capacity) {
      this.secondaries.shift();
    }
  }

  /**
   * Closest secondary sample to `primary`. Secondaries older than the match
   * are discarded, as later primaries cannot be closer to them.
   *
   * @returns null when nothing is buffered or the closest is too far away
   */
  match(primary: P): MatchedPair<P, S> | null {
    let bestIndex = -1;
    let bestDistance: bigint | null = null;

    for (const [index, candidate] of this.secondaries.entries()) {
      const distance = absolute(candidate.timestampNs - primary.timestampNs);
      if (bestDistance === null || distance < bestDistance) {
        bestDistance = distance;
        bestIndex = index;
      }
    }

    const best = this.secondaries[bestIndex];
    if (!best || bestDistance === null) return null;
    if (this.maxDeltaNs !== null && bestDistance > this.maxDeltaNs) return null;

    this.secondaries = this.secondaries.slice(bestIndex);
    return Object.freeze({
      primary,
      secondary: best,
      deltaNs: best.timestampNs - primary.timestampNs,
    });
  }

  size(): number {
    return this.secondaries.length;
  }

  clear(): void {
    this.secondaries = [];
  }
}

// ============================================================================
// Scene + Audio + Gaze
// ============================================================================

/**
 * Pairs each scene frame with the closest gaze sample and hands over the
 * audio chunks received up to the frame.
 */
export class SceneAudioMatcher {
  private readonly gaze: OverlayMatcher<VideoSample<'scene'>, GazeSample>;
  private readonly audioCapacity: number;
  private audio: AudioSample[] = [];

  constructor(options: OverlayMatcherOptions = {}) {
    this.gaze = new OverlayMatcher(options);
    this.audioCapacity = options.capacity ?? DEFAULT_CAPACITY;
  }

  pushGaze(sample: GazeSample): void {
    this.gaze.pushSecondary(sample);
  }

  pushAudio(sample: AudioSample): void {
    this.audio.push(sample);
    if (this.audio.length > this.audioCapacity) {
      this.audio.shift();
    }
  }

  /**
   * @returns null while no gaze sample can be matched
   */
  match(frame: VideoSample<'scene'>): MatchedSceneAudioGaze | null {
    const pair = this.gaze.match(frame);
    if (!pair) return null;

    const upTo = this.audio.findIndex((chunk) => chunk.timestampNs > frame.timestampNs);
    const audio = upTo === -1 ? this.audio : this.audio.slice(0, upTo);
    this.audio = upTo === -1 ? [] : this.audio.slice(upTo);

    return Object.freeze({ frame, gaze: pair.secondary, audio: Object.freeze(audio) });
  }

  clear(): void {
    this.gaze.clear();
    this.audio = [];
  }
}
