export interface WaveformPeaks {
  min: number[];
  max: number[];
  buckets: number;
  durationSec: number;
}

export interface IWaveformPeakComputer {
  computePeaks(url: string, targetBuckets: number): Promise<WaveformPeaks>;
}

export interface DecodedAudio {
  sampleRate: number;
  channels: Float32Array[];
}

export interface IAudioDecoderPort {
  decode(url: string): Promise<DecodedAudio>;
}
