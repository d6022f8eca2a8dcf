// src/lib/services/AudioOrchestrator.service.ts
import { readonly, type Readable, type Writable } from "svelte/store";
import { reduce, type ReducerEnv } from "$lib/logic/reducer";
import { createInitialAppState, createPlayerStore } from "$lib/stores/player.store";
import { actions, ACTION_TYPE, type Action } from "$lib/types/action.types";
import type { IAudioEnginePort, IScopedResourceAccess } from "$lib/types/audioEngine";
import type { AppState } from "$lib/types/player.types";
import type { IWaveformPeakComputer, WaveformPeaks } from "$lib/types/waveform";
import { UI_CONSTANTS, VISUALIZER_CONSTANTS } from "$lib/utils/constants";
import { generateMarkerId } from "$lib/utils/id";
import { consoleLogger, type Logger } from "$lib/utils/logger";
import { EffectRunner } from "./effectRunner.service";

export interface CoreConfig {
  toastCheckIntervalMs: number;
  peakBuckets: number;
}

export interface OrchestratorDeps {
  engine: IAudioEnginePort;
  peakComputer: IWaveformPeakComputer;
  scopedAccess?: IScopedResourceAccess;
  now?: () => number;
  generateId?: () => string;
  logger?: Logger;
  config?: Partial<CoreConfig>;
  initialState?: AppState;
}

const DEFAULT_CONFIG: CoreConfig = {
  toastCheckIntervalMs: UI_CONSTANTS.TOAST_CHECK_INTERVAL_MS,
  peakBuckets: VISUALIZER_CONSTANTS.WAVEFORM_TARGET_BUCKETS,
};

// Fired many times a second; logging them would drown everything else.
const QUIET_ACTIONS: ReadonlySet<Action["type"]> = new Set([
  ACTION_TYPE.TICK,
  ACTION_TYPE.CLEAR_TOAST_IF_EXPIRED,
]);

/**
 * Owns the session state and is its only writer.
 *
 * Every change goes through `send`: UI gestures, engine callbacks, load and
 * peak completions and the toast timer alike. Actions sent while an earlier
 * one is still being handled are queued and handled in submission order.
 */
export class AudioOrchestrator {
  public readonly state: Readable<AppState>;
  public readonly peaks: Readable<WaveformPeaks>;

  private readonly store: Writable<AppState>;
  private current: AppState;
  private readonly runner: EffectRunner;
  private readonly env: ReducerEnv;
  private readonly logger: Logger;
  private readonly config: CoreConfig;

  private readonly queue: Action[] = [];
  private isDispatching = false;
  private isDisposed = false;
  private toastTimer: ReturnType<typeof setInterval> | null = null;

  constructor(deps: OrchestratorDeps) {
    this.logger = deps.logger ?? consoleLogger;
    this.config = { ...DEFAULT_CONFIG, ...deps.config };
    this.env = {
      now: deps.now ?? Date.now,
      generateId: deps.generateId ?? generateMarkerId,
    };

    this.current = deps.initialState ?? createInitialAppState();
    this.store = createPlayerStore(this.current);
    this.state = readonly(this.store);

    this.runner = new EffectRunner(
      {
        engine: deps.engine,
        peakComputer: deps.peakComputer,
        scopedAccess: deps.scopedAccess,
        logger: this.logger,
        peakBuckets: this.config.peakBuckets,
      },
      (action) => this.send(action),
    );
    this.peaks = this.runner.peaksStore;

    this.startToastTimer();
    this.logger.log("[AO-LOG] Orchestrator created.");
  }

  public getState(): AppState {
    return this.current;
  }

  public getPeaks(): WaveformPeaks {
    return this.runner.peaks;
  }

  public send(action: Action): void {
    if (this.isDisposed) {
      this.logger.warn(`[AO-LOG] send('${action.type}') after dispose, ignoring.`);
      return;
    }

    this.queue.push(action);
    if (this.isDispatching) return;

    this.isDispatching = true;
    try {
      let next = this.queue.shift();
      while (next !== undefined) {
        this.process(next);
        next = this.queue.shift();
      }
    } finally {
      this.isDispatching = false;
    }
  }

  public dispose(): void {
    if (this.isDisposed) return;
    this.isDisposed = true;
    this.stopToastTimer();
    this.queue.length = 0;
    this.runner.dispose();
    this.logger.log("[AO-LOG] Orchestrator disposed.");
  }

  private process(action: Action): void {
    if (!QUIET_ACTIONS.has(action.type)) {
      this.logger.log(`[AO-LOG] send: ${action.type}`);
    }

    const { state, effects } = reduce(this.current, action, this.env);
    if (state !== this.current) {
      this.current = state;
      try {
        this.store.set(state);
      } catch (e) {
        // the state is committed either way; its effects still have to run
        this.logger.error(`[AO-LOG] State subscriber failed during '${action.type}':`, e);
      }
    }

    for (const effect of effects) {
      if (this.isDisposed) break;
      this.runner.run(effect);
    }
  }

  private startToastTimer(): void {
    this.toastTimer = setInterval(() => {
      if (this.current.toast) {
        this.send(actions.clearToastIfExpired(this.env.now()));
      }
    }, this.config.toastCheckIntervalMs);
  }

  private stopToastTimer(): void {
    if (this.toastTimer !== null) {
      clearInterval(this.toastTimer);
      this.toastTimer = null;
    }
  }
}
