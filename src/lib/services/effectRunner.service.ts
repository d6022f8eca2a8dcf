// src/lib/services/effectRunner.service.ts
import { get, readonly, writable, type Readable } from "svelte/store";
import { actions, type Action } from "$lib/types/action.types";
import { EFFECT_TYPE, type Effect } from "$lib/types/effect.types";
import type {
  IAudioEnginePort,
  IScopedResourceAccess,
} from "$lib/types/audioEngine";
import type { IWaveformPeakComputer, WaveformPeaks } from "$lib/types/waveform";
import { VISUALIZER_CONSTANTS } from "$lib/utils/constants";
import { errorMessage } from "$lib/utils/errors";
import { consoleLogger, type Logger } from "$lib/utils/logger";
import { EMPTY_WAVEFORM_PEAKS } from "$lib/utils/waveform";

export interface EffectRunnerDeps {
  engine: IAudioEnginePort;
  peakComputer: IWaveformPeakComputer;
  scopedAccess?: IScopedResourceAccess;
  logger?: Logger;
  peakBuckets?: number;
}

export type Dispatch = (action: Action) => void;

/**
 * Executes effects against the engine and the peak computer and feeds every
 * outcome back through `dispatch`. It never writes core state itself.
 *
 * Waveform peaks are kept here rather than in `AppState`, which is replaced
 * on every action and should stay small.
 */
export class EffectRunner {
  private readonly engine: IAudioEnginePort;
  private readonly peakComputer: IWaveformPeakComputer;
  private readonly scopedAccess?: IScopedResourceAccess;
  private readonly logger: Logger;
  private readonly peakBuckets: number;

  private readonly _peaks = writable<WaveformPeaks>(EMPTY_WAVEFORM_PEAKS);
  public readonly peaksStore: Readable<WaveformPeaks> = readonly(this._peaks);

  private currentUrl: string | null = null;
  // Bumped on every load; results carrying an older value are stale.
  private loadGeneration = 0;
  private isDisposed = false;

  constructor(
    deps: EffectRunnerDeps,
    private readonly dispatch: Dispatch,
  ) {
    this.engine = deps.engine;
    this.peakComputer = deps.peakComputer;
    this.scopedAccess = deps.scopedAccess;
    this.logger = deps.logger ?? consoleLogger;
    this.peakBuckets =
      deps.peakBuckets ?? VISUALIZER_CONSTANTS.WAVEFORM_TARGET_BUCKETS;

    this.engine.onTimeUpdate = (timeSec: number) => {
      if (this.isDisposed) return;
      this.dispatch(actions.tick(timeSec));
    };
    this.engine.onPlaybackFinished = () => {
      if (this.isDisposed) return;
      this.dispatch(actions.playbackFinished());
    };
  }

  public get peaks(): WaveformPeaks {
    return get(this._peaks);
  }

  public run(effect: Effect): void {
    if (this.isDisposed) {
      this.logger.warn(
        `[EffectRunner] Ignoring effect '${effect.type}' after dispose.`,
      );
      return;
    }

    switch (effect.type) {
      case EFFECT_TYPE.LOAD:
        this.startLoad(effect.url);
        break;
      case EFFECT_TYPE.COMPUTE_PEAKS:
        this.startPeakComputation();
        break;
      default:
        this.callEngine(effect);
    }
  }

  public dispose(): void {
    if (this.isDisposed) return;
    this.isDisposed = true;
    // invalidates whatever load or peak computation is still in flight
    this.loadGeneration++;
    this.engine.onTimeUpdate = undefined;
    this.engine.onPlaybackFinished = undefined;
    this.logger.log("[EffectRunner] Disposed");
  }

  private callEngine(effect: Effect): void {
    try {
      switch (effect.type) {
        case EFFECT_TYPE.PLAY_FROM:
          this.engine.play(effect.fromTimeSec);
          break;
        case EFFECT_TYPE.PAUSE:
          this.engine.pause();
          break;
        case EFFECT_TYPE.SEEK:
          this.engine.seek(effect.timeSec);
          break;
        case EFFECT_TYPE.SET_RATE:
          this.engine.setRate(effect.rate);
          break;
        case EFFECT_TYPE.SET_PITCH:
          this.engine.setPitchSemitones(effect.semitones);
          break;
        case EFFECT_TYPE.SET_LOOP:
          this.engine.setLoop(effect.aSec, effect.bSec, effect.enabled);
          break;
        default:
          this.logger.warn(`[EffectRunner] '${effect.type}' is not an engine command.`);
      }
    } catch (e) {
      this.logger.error(`[EffectRunner] Engine command '${effect.type}' failed:`, e);
    }
  }

  private startLoad(url: string): void {
    this.currentUrl = url;
    const generation = ++this.loadGeneration;
    this._peaks.set(EMPTY_WAVEFORM_PEAKS);

    this._loadAudio(url, generation).catch((e) => {
      this.logger.error("[EffectRunner] Unexpected error while loading:", e);
    });
  }

  private async _loadAudio(url: string, generation: number): Promise<void> {
    this.logger.log(`[EffectRunner] Loading ${url}`);
    let result: Action;
    try {
      const track = await this.engine.load(url);
      result = actions.importSucceeded(track);
    } catch (e) {
      this.logger.warn(`[EffectRunner] Load failed for ${url}:`, e);
      result = actions.importFailed(errorMessage(e));
    }

    if (generation !== this.loadGeneration) {
      this.logger.warn(`[EffectRunner] Dropping superseded load of ${url}.`);
      return;
    }
    this.dispatch(result);
  }

  private startPeakComputation(): void {
    const url = this.currentUrl;
    if (url === null) {
      this.logger.warn("[EffectRunner] computePeaks requested with no loaded file.");
      return;
    }
    this._computePeaks(url, this.loadGeneration).catch((e) => {
      this.logger.error("[EffectRunner] Unexpected error computing peaks:", e);
    });
  }

  private async _computePeaks(url: string, generation: number): Promise<void> {
    let accessGranted = false;
    let peaks: WaveformPeaks;
    try {
      accessGranted = this.scopedAccess?.start(url) ?? false;
      peaks = await this.peakComputer.computePeaks(url, this.peakBuckets);
    } catch (e) {
      // a missing waveform is cosmetic; playback is unaffected
      this.logger.warn(`[EffectRunner] Peak computation failed for ${url}:`, e);
      peaks = EMPTY_WAVEFORM_PEAKS;
    } finally {
      if (accessGranted) this.scopedAccess?.stop(url);
    }

    if (generation !== this.loadGeneration) {
      this.logger.warn(`[EffectRunner] Dropping peaks for superseded file ${url}.`);
      return;
    }
    this._peaks.set(peaks);
  }
}
