// src/lib/index.ts
export { AudioOrchestrator } from "./services/AudioOrchestrator.service";
export type { CoreConfig, OrchestratorDeps } from "./services/AudioOrchestrator.service";
export { EffectRunner } from "./services/effectRunner.service";
export type { Dispatch, EffectRunnerDeps } from "./services/effectRunner.service";
export { WaveformPeakComputer } from "./services/waveformPeaks.service";
export { reduce } from "./logic/reducer";
export type { ReduceResult, ReducerEnv } from "./logic/reducer";
export * from "./logic/selectors";
export { createSelectorStores } from "./stores/derived.store";
export type { SelectorStores } from "./stores/derived.store";
export { createInitialAppState, createDefaultLoopPoints } from "./stores/player.store";
export { ACTION_TYPE, actions } from "./types/action.types";
export type { Action, ActionType } from "./types/action.types";
export { EFFECT_TYPE, effects } from "./types/effect.types";
export type { Effect, EffectType } from "./types/effect.types";
export type * from "./types/player.types";
export type { IAudioEnginePort, IScopedResourceAccess } from "./types/audioEngine";
export type {
  DecodedAudio,
  IAudioDecoderPort,
  IWaveformPeakComputer,
  WaveformPeaks,
} from "./types/waveform";
export * from "./utils/formatters";
export * from "./utils/constants";
export { AudioEngineError, errorMessage } from "./utils/errors";
export type { AudioEngineErrorKind } from "./utils/errors";
export { EMPTY_WAVEFORM_PEAKS, createWaveformPeaks, mixToMono } from "./utils/waveform";
export type { Logger } from "./utils/logger";
