// src/lib/types/effect.types.ts

export const EFFECT_TYPE = {
  LOAD: "load",
  PLAY_FROM: "playFrom",
  PAUSE: "pause",
  SEEK: "seek",
  SET_RATE: "setRate",
  SET_PITCH: "setPitch",
  SET_LOOP: "setLoop",
  COMPUTE_PEAKS: "computePeaks",
} as const;

/**
 * Commands for the engine and the peak computer. The engine keeps no resume
 * position, so every `playFrom` names its start time.
 */
export type Effect =
  | { type: typeof EFFECT_TYPE.LOAD; url: string }
  | { type: typeof EFFECT_TYPE.PLAY_FROM; fromTimeSec: number }
  | { type: typeof EFFECT_TYPE.PAUSE }
  | { type: typeof EFFECT_TYPE.SEEK; timeSec: number }
  | { type: typeof EFFECT_TYPE.SET_RATE; rate: number }
  | { type: typeof EFFECT_TYPE.SET_PITCH; semitones: number }
  | {
      type: typeof EFFECT_TYPE.SET_LOOP;
      aSec: number | undefined;
      bSec: number | undefined;
      enabled: boolean;
    }
  | { type: typeof EFFECT_TYPE.COMPUTE_PEAKS };

export type EffectType = Effect["type"];

export const effects = {
  load: (url: string): Effect => ({ type: EFFECT_TYPE.LOAD, url }),
  playFrom: (fromTimeSec: number): Effect => ({
    type: EFFECT_TYPE.PLAY_FROM,
    fromTimeSec,
  }),
  pause: (): Effect => ({ type: EFFECT_TYPE.PAUSE }),
  seek: (timeSec: number): Effect => ({ type: EFFECT_TYPE.SEEK, timeSec }),
  setRate: (rate: number): Effect => ({ type: EFFECT_TYPE.SET_RATE, rate }),
  setPitch: (semitones: number): Effect => ({
    type: EFFECT_TYPE.SET_PITCH,
    semitones,
  }),
  setLoop: (
    aSec: number | undefined,
    bSec: number | undefined,
    enabled: boolean,
  ): Effect => ({ type: EFFECT_TYPE.SET_LOOP, aSec, bSec, enabled }),
  computePeaks: (): Effect => ({ type: EFFECT_TYPE.COMPUTE_PEAKS }),
};
