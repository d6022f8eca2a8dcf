// src/lib/services/waveformPeaks.service.ts
import type {
  IAudioDecoderPort,
  IWaveformPeakComputer,
  WaveformPeaks,
} from "$lib/types/waveform";
import { consoleLogger, type Logger } from "$lib/utils/logger";
import { createWaveformPeaks } from "$lib/utils/waveform";

/**
 * Decodes a file through the injected decoder and reduces it to min/max
 * buckets. Decode errors propagate; the effect runner decides what a
 * failure means for the UI.
 */
export class WaveformPeakComputer implements IWaveformPeakComputer {
  constructor(
    private readonly decoder: IAudioDecoderPort,
    private readonly logger: Logger = consoleLogger,
  ) {}

  public async computePeaks(
    url: string,
    targetBuckets: number,
  ): Promise<WaveformPeaks> {
    const audio = await this.decoder.decode(url);
    const peaks = createWaveformPeaks(audio, targetBuckets);
    this.logger.log(
      `[WaveformPeakComputer] ${url}: ${peaks.buckets} buckets, ${peaks.durationSec.toFixed(2)}s`,
    );
    return peaks;
  }
}
