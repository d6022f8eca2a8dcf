// src/lib/types/player.types.ts

export interface TrackMeta {
  readonly name: string;
  readonly durationSec: number;
}

export interface Transport {
  readonly isPlaying: boolean;
  readonly currentTimeSec: number;
  readonly speed: number; // clamped to TRANSPORT_CONSTANTS.MIN_SPEED..MAX_SPEED
  readonly pitchSemitones: number; // clamped to TRANSPORT_CONSTANTS.MIN_PITCH..MAX_PITCH
}

/**
 * A/B loop bounds. When both are set the reducer keeps `aSec <= bSec`,
 * and `enabled` is only ever switched on with both present.
 */
export interface LoopPoints {
  readonly aSec?: number;
  readonly bSec?: number;
  readonly enabled: boolean;
}

export interface Marker {
  readonly id: string;
  readonly timeSec: number;
}

/** How a tap on the waveform is interpreted. `"loop"` is the plain seek mode. */
export type Mode = "marker" | "setA" | "setB" | "loop";

export interface Viewport {
  readonly startSec: number;
  readonly endSec: number;
}

export interface ToastState {
  readonly message: string;
  readonly expiresAt: number; // epoch milliseconds
}

/** Replaced wholesale on every action; only the orchestrator produces new values. */
export interface AppState {
  readonly track?: TrackMeta;
  readonly transport: Transport;
  readonly loop: LoopPoints;
  readonly mode: Mode;
  readonly markers: readonly Marker[];
  readonly viewport: Viewport;
  readonly isLoading: boolean;
  readonly toast?: ToastState;
  /** True while the user drags the playhead; engine ticks are dropped meanwhile. */
  readonly isScrubbing: boolean;
}

export interface LoopRange {
  readonly a: number;
  readonly b: number;
}
