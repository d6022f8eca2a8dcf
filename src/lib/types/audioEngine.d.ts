import type { TrackMeta } from "./player.types";

/**
 * The playback engine as the core sees it. It holds no resume position of its
 * own: `play` always carries the time to start from.
 */
export interface IAudioEnginePort {
  /** Fired at engine-chosen granularity while audio is running. */
  onTimeUpdate?: (timeSec: number) => void;
  /** Fired once when playback reaches the end of the media. */
  onPlaybackFinished?: () => void;

  load(url: string): Promise<TrackMeta>;
  play(fromTimeSec: number): void;
  pause(): void;
  seek(timeSec: number): void;
  setRate(rate: number): void;
  setPitchSemitones(semitones: number): void;
  /** Best-effort hint; loop wrap correctness never depends on it. */
  setLoop(aSec: number | undefined, bSec: number | undefined, enabled: boolean): void;
}

export interface IScopedResourceAccess {
  /** Returns true when access was granted and must later be released with `stop`. */
  start(url: string): boolean;
  stop(url: string): void;
}
