// src/lib/logic/selectors.ts
import type {
  AppState,
  LoopPoints,
  LoopRange,
  Viewport,
} from "$lib/types/player.types";

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

export const normalizedLoopRange = (loop: LoopPoints): LoopRange | undefined => {
  const { aSec, bSec } = loop;
  if (aSec === undefined || bSec === undefined) return undefined;
  return aSec <= bSec ? { a: aSec, b: bSec } : { a: bSec, b: aSec };
};

// Fallback bounds for drawing a half-set loop: start of track / end of track.
export const effectiveLoopStart = (loop: LoopPoints): number => loop.aSec ?? 0;
export const effectiveLoopEnd = (loop: LoopPoints, durationSec: number): number =>
  loop.bSec ?? durationSec;

export const hasManualA = (loop: LoopPoints): boolean => loop.aSec !== undefined;
export const hasManualB = (loop: LoopPoints): boolean => loop.bSec !== undefined;

export const viewportDuration = (viewport: Viewport): number =>
  viewport.endSec - viewport.startSec;

export const selectTrackDuration = (s: AppState): number =>
  s.track?.durationSec ?? 0;

/** Clamps a time to the loaded track; 0 when nothing is loaded. */
export const clampTimeToTrack = (s: AppState, timeSec: number): number => {
  if (!s.track || !Number.isFinite(timeSec)) return 0;
  return clamp(timeSec, 0, s.track.durationSec);
};

export const selectLoopRange = (s: AppState): LoopRange | undefined =>
  normalizedLoopRange(s.loop);

export const selectCanLoop = (s: AppState): boolean =>
  s.loop.aSec !== undefined && s.loop.bSec !== undefined;

export const selectShouldShowLoopOverlay = (s: AppState): boolean =>
  s.loop.enabled && normalizedLoopRange(s.loop) !== undefined;

export const selectHasTrack = (s: AppState): boolean => s.track !== undefined;

export const selectPlaybackProgress = (s: AppState): number => {
  if (!s.track || s.track.durationSec <= 0) return 0;
  return s.transport.currentTimeSec / s.track.durationSec;
};

export const selectPositionToTime = (s: AppState, position: number): number => {
  if (!s.track) return 0;
  return position * s.track.durationSec;
};

export const selectViewportPositionToTime = (
  s: AppState,
  position: number,
): number => s.viewport.startSec + position * viewportDuration(s.viewport);
