// src/lib/stores/derived.store.ts
import { derived, type Readable } from "svelte/store";
import type { AppState, LoopRange } from "$lib/types/player.types";
import {
  selectCanLoop,
  selectHasTrack,
  selectLoopRange,
  selectPlaybackProgress,
  selectShouldShowLoopOverlay,
} from "$lib/logic/selectors";

export interface SelectorStores {
  loopRange: Readable<LoopRange | undefined>;
  canLoop: Readable<boolean>;
  showLoopOverlay: Readable<boolean>;
  hasTrack: Readable<boolean>;
  progress: Readable<number>;
  /**
   * A "hot" store that changes on every engine tick. Views that only show the
   * playhead should subscribe here rather than to the whole state.
   */
  currentTime: Readable<number>;
}

export function createSelectorStores(state: Readable<AppState>): SelectorStores {
  return {
    loopRange: derived(state, ($state) => selectLoopRange($state)),
    canLoop: derived(state, ($state) => selectCanLoop($state)),
    showLoopOverlay: derived(state, ($state) => selectShouldShowLoopOverlay($state)),
    hasTrack: derived(state, ($state) => selectHasTrack($state)),
    progress: derived(state, ($state) => selectPlaybackProgress($state)),
    currentTime: derived(state, ($state) => $state.transport.currentTimeSec),
  };
}
