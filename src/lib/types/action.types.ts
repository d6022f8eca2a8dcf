// src/lib/types/action.types.ts
import type { Mode, TrackMeta } from "./player.types";

export const ACTION_TYPE = {
  APPEARED: "appeared",
  IMPORT_PICKED: "importPicked",
  IMPORT_SUCCEEDED: "importSucceeded",
  IMPORT_FAILED: "importFailed",
  SET_MODE: "setMode",
  TAP_WAVEFORM: "tapWaveform",
  TRANSPORT_SCRUB_CHANGED: "transportScrubChanged",
  TRANSPORT_SCRUB_ENDED: "transportScrubEnded",
  TOGGLE_PLAY: "togglePlay",
  TICK: "tick",
  PLAYBACK_FINISHED: "playbackFinished",
  SPEED_DELTA: "speedDelta",
  PITCH_DELTA: "pitchDelta",
  ADD_MARKER: "addMarker",
  DELETE_MARKER: "deleteMarker",
  TOGGLE_LOOP_ENABLED: "toggleLoopEnabled",
  SET_A: "setA",
  SET_B: "setB",
  TAPPED_A: "tappedA",
  TAPPED_B: "tappedB",
  CLEAR_TOAST_IF_EXPIRED: "clearToastIfExpired",
} as const;

type ActionOf<T extends string, P = undefined> = P extends undefined
  ? { type: T }
  : { type: T; payload: P };

interface TimePayload {
  timeSec: number;
}

interface DeltaPayload {
  delta: number;
}

/** Everything that can happen to the core: user input, timer fires and engine callbacks. */
export type Action =
  | ActionOf<typeof ACTION_TYPE.APPEARED>
  | ActionOf<typeof ACTION_TYPE.IMPORT_PICKED, { url: string }>
  | ActionOf<typeof ACTION_TYPE.IMPORT_SUCCEEDED, { track: TrackMeta }>
  | ActionOf<typeof ACTION_TYPE.IMPORT_FAILED, { message: string }>
  | ActionOf<typeof ACTION_TYPE.SET_MODE, { mode: Mode }>
  | ActionOf<typeof ACTION_TYPE.TAP_WAVEFORM, TimePayload>
  | ActionOf<typeof ACTION_TYPE.TRANSPORT_SCRUB_CHANGED, TimePayload>
  | ActionOf<typeof ACTION_TYPE.TRANSPORT_SCRUB_ENDED, TimePayload>
  | ActionOf<typeof ACTION_TYPE.TOGGLE_PLAY>
  | ActionOf<typeof ACTION_TYPE.TICK, { currentTimeSec: number }>
  | ActionOf<typeof ACTION_TYPE.PLAYBACK_FINISHED>
  | ActionOf<typeof ACTION_TYPE.SPEED_DELTA, DeltaPayload>
  | ActionOf<typeof ACTION_TYPE.PITCH_DELTA, DeltaPayload>
  | ActionOf<typeof ACTION_TYPE.ADD_MARKER, TimePayload>
  | ActionOf<typeof ACTION_TYPE.DELETE_MARKER, { id: string }>
  | ActionOf<typeof ACTION_TYPE.TOGGLE_LOOP_ENABLED, { enabled: boolean }>
  | ActionOf<typeof ACTION_TYPE.SET_A, TimePayload>
  | ActionOf<typeof ACTION_TYPE.SET_B, TimePayload>
  | ActionOf<typeof ACTION_TYPE.TAPPED_A>
  | ActionOf<typeof ACTION_TYPE.TAPPED_B>
  | ActionOf<typeof ACTION_TYPE.CLEAR_TOAST_IF_EXPIRED, { now: number }>;

export type ActionType = Action["type"];

export const actions = {
  appeared: (): Action => ({ type: ACTION_TYPE.APPEARED }),
  importPicked: (url: string): Action => ({
    type: ACTION_TYPE.IMPORT_PICKED,
    payload: { url },
  }),
  importSucceeded: (track: TrackMeta): Action => ({
    type: ACTION_TYPE.IMPORT_SUCCEEDED,
    payload: { track },
  }),
  importFailed: (message: string): Action => ({
    type: ACTION_TYPE.IMPORT_FAILED,
    payload: { message },
  }),
  setMode: (mode: Mode): Action => ({
    type: ACTION_TYPE.SET_MODE,
    payload: { mode },
  }),
  tapWaveform: (timeSec: number): Action => ({
    type: ACTION_TYPE.TAP_WAVEFORM,
    payload: { timeSec },
  }),
  transportScrubChanged: (timeSec: number): Action => ({
    type: ACTION_TYPE.TRANSPORT_SCRUB_CHANGED,
    payload: { timeSec },
  }),
  transportScrubEnded: (timeSec: number): Action => ({
    type: ACTION_TYPE.TRANSPORT_SCRUB_ENDED,
    payload: { timeSec },
  }),
  togglePlay: (): Action => ({ type: ACTION_TYPE.TOGGLE_PLAY }),
  tick: (currentTimeSec: number): Action => ({
    type: ACTION_TYPE.TICK,
    payload: { currentTimeSec },
  }),
  playbackFinished: (): Action => ({ type: ACTION_TYPE.PLAYBACK_FINISHED }),
  speedDelta: (delta: number): Action => ({
    type: ACTION_TYPE.SPEED_DELTA,
    payload: { delta },
  }),
  pitchDelta: (delta: number): Action => ({
    type: ACTION_TYPE.PITCH_DELTA,
    payload: { delta },
  }),
  addMarker: (timeSec: number): Action => ({
    type: ACTION_TYPE.ADD_MARKER,
    payload: { timeSec },
  }),
  deleteMarker: (id: string): Action => ({
    type: ACTION_TYPE.DELETE_MARKER,
    payload: { id },
  }),
  toggleLoopEnabled: (enabled: boolean): Action => ({
    type: ACTION_TYPE.TOGGLE_LOOP_ENABLED,
    payload: { enabled },
  }),
  setA: (timeSec: number): Action => ({
    type: ACTION_TYPE.SET_A,
    payload: { timeSec },
  }),
  setB: (timeSec: number): Action => ({
    type: ACTION_TYPE.SET_B,
    payload: { timeSec },
  }),
  tappedA: (): Action => ({ type: ACTION_TYPE.TAPPED_A }),
  tappedB: (): Action => ({ type: ACTION_TYPE.TAPPED_B }),
  clearToastIfExpired: (now: number): Action => ({
    type: ACTION_TYPE.CLEAR_TOAST_IF_EXPIRED,
    payload: { now },
  }),
};
