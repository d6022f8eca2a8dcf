// src/lib/utils/constants.ts
export interface TransportConstants {
  MIN_SPEED: number;
  MAX_SPEED: number;
  DEFAULT_SPEED: number;
  MIN_PITCH: number;
  MAX_PITCH: number;
  DEFAULT_PITCH: number;
}
export const TRANSPORT_CONSTANTS: TransportConstants = {
  MIN_SPEED: 0.25,
  MAX_SPEED: 2.0,
  DEFAULT_SPEED: 1.0,
  MIN_PITCH: -12,
  MAX_PITCH: 12,
  DEFAULT_PITCH: 0,
};
export interface UiConstants {
  TOAST_DURATION_MS: number;
  TOAST_CHECK_INTERVAL_MS: number;
  DEFAULT_VIEWPORT_END_SEC: number;
  IMPORT_FAILED_MESSAGE: string;
  LOOP_NEEDS_BOUNDS_MESSAGE: string;
}
export const UI_CONSTANTS: UiConstants = {
  TOAST_DURATION_MS: 1500,
  TOAST_CHECK_INTERVAL_MS: 100,
  DEFAULT_VIEWPORT_END_SEC: 60,
  IMPORT_FAILED_MESSAGE: "Unable to open file",
  LOOP_NEEDS_BOUNDS_MESSAGE: "Set A and B",
};
export interface VisualizerConstants {
  WAVEFORM_TARGET_BUCKETS: number;
}
export const VISUALIZER_CONSTANTS: VisualizerConstants = {
  WAVEFORM_TARGET_BUCKETS: 1000,
};
