// src/lib/utils/waveform.ts
import type { DecodedAudio, WaveformPeaks } from "$lib/types/waveform";

export const EMPTY_WAVEFORM_PEAKS: WaveformPeaks = Object.freeze({
  min: [],
  max: [],
  buckets: 0,
  durationSec: 0,
});

/**
 * Averages all channels into a single mono channel.
 * Channels shorter than the first one contribute silence for the missing tail.
 */
export function mixToMono(channels: Float32Array[]): Float32Array {
  const first = channels[0];
  if (!first) return new Float32Array(0);
  if (channels.length === 1) return first;

  const mono = new Float32Array(first.length);
  for (let i = 0; i < first.length; i++) {
    let sum = 0;
    for (const channel of channels) {
      sum += channel[i] ?? 0;
    }
    mono[i] = sum / channels.length;
  }
  return mono;
}

/**
 * Downsamples decoded audio into min/max buckets for drawing.
 *
 * The bucket count is capped at the sample count, and every bucket spans
 * `floor(samples / buckets)` samples; trailing samples that do not fill a
 * whole bucket are not drawn.
 *
 * @param audio Decoded PCM, one Float32Array per channel.
 * @param targetBuckets The number of buckets wanted.
 */
export function createWaveformPeaks(
  audio: DecodedAudio,
  targetBuckets: number,
): WaveformPeaks {
  const mono = mixToMono(audio.channels);
  const sampleCount = mono.length;

  if (sampleCount === 0 || targetBuckets <= 0 || audio.sampleRate <= 0) {
    return EMPTY_WAVEFORM_PEAKS;
  }

  const buckets = Math.min(Math.floor(targetBuckets), sampleCount);
  const samplesPerBucket = Math.floor(sampleCount / buckets);
  const min = new Array<number>(buckets).fill(0);
  const max = new Array<number>(buckets).fill(0);

  for (let bucket = 0; bucket < buckets; bucket++) {
    const start = bucket * samplesPerBucket;
    const end = Math.min(start + samplesPerBucket, sampleCount);
    let minVal = Infinity;
    let maxVal = -Infinity;

    for (let i = start; i < end; i++) {
      const v = mono[i];
      if (v < minVal) minVal = v;
      if (v > maxVal) maxVal = v;
    }

    min[bucket] = isFinite(minVal) ? minVal : 0;
    max[bucket] = isFinite(maxVal) ? maxVal : 0;
  }

  return {
    min,
    max,
    buckets,
    durationSec: sampleCount / audio.sampleRate,
  };
}
