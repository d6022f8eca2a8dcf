// src/lib/stores/player.store.ts
import { writable, type Writable } from "svelte/store";
import type { AppState, LoopPoints } from "$lib/types/player.types";
import { TRANSPORT_CONSTANTS, UI_CONSTANTS } from "$lib/utils/constants";

export const createDefaultLoopPoints = (): LoopPoints => ({
  aSec: undefined,
  bSec: undefined,
  enabled: false,
});

export const createInitialAppState = (): AppState => ({
  track: undefined,
  transport: {
    isPlaying: false,
    currentTimeSec: 0,
    speed: TRANSPORT_CONSTANTS.DEFAULT_SPEED,
    pitchSemitones: TRANSPORT_CONSTANTS.DEFAULT_PITCH,
  },
  loop: createDefaultLoopPoints(),
  mode: "loop",
  markers: [],
  viewport: { startSec: 0, endSec: UI_CONSTANTS.DEFAULT_VIEWPORT_END_SEC },
  isLoading: false,
  toast: undefined,
  isScrubbing: false,
});

/**
 * Backing store for one orchestrator. Only the orchestrator holds the
 * writable; everything else sees it through `readonly()`.
 */
export const createPlayerStore = (
  initialState: AppState = createInitialAppState(),
): Writable<AppState> => writable<AppState>(initialState);
