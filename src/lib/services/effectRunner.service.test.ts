// src/lib/services/effectRunner.service.test.ts
import { describe, it, expect, vi, beforeEach } from "vitest";
import { EffectRunner } from "./effectRunner.service";
import { actions, type Action } from "$lib/types/action.types";
import { effects } from "$lib/types/effect.types";
import type { IAudioEnginePort } from "$lib/types/audioEngine";
import type { TrackMeta } from "$lib/types/player.types";
import type { WaveformPeaks } from "$lib/types/waveform";
import { AudioEngineError } from "$lib/utils/errors";
import { EMPTY_WAVEFORM_PEAKS } from "$lib/utils/waveform";

const TRACK: TrackMeta = { name: "Scales.wav", durationSec: 42 };
const PEAKS: WaveformPeaks = { min: [-0.5, -0.25], max: [0.5, 0.25], buckets: 2, durationSec: 42 };

class FakeEngine implements IAudioEnginePort {
  onTimeUpdate?: (timeSec: number) => void;
  onPlaybackFinished?: () => void;
  load = vi.fn(async (_url: string): Promise<TrackMeta> => TRACK);
  play = vi.fn((_fromTimeSec: number) => {});
  pause = vi.fn(() => {});
  seek = vi.fn((_timeSec: number) => {});
  setRate = vi.fn((_rate: number) => {});
  setPitchSemitones = vi.fn((_semitones: number) => {});
  setLoop = vi.fn(
    (_aSec: number | undefined, _bSec: number | undefined, _enabled: boolean) => {},
  );
}

const deferred = <T>() => {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

const flushPromises = () => new Promise((resolve) => setTimeout(resolve, 0));

const createPeakComputer = () => ({
  computePeaks: vi.fn(async (_url: string, _buckets: number): Promise<WaveformPeaks> => PEAKS),
});

const createScopedAccess = () => ({
  start: vi.fn((_url: string) => true),
  stop: vi.fn((_url: string) => {}),
});

const createLogger = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

const createDispatch = () => vi.fn((_action: Action) => {});

describe("EffectRunner", () => {
  let engine: FakeEngine;
  let peakComputer: ReturnType<typeof createPeakComputer>;
  let scopedAccess: ReturnType<typeof createScopedAccess>;
  let logger: ReturnType<typeof createLogger>;
  let dispatch: ReturnType<typeof createDispatch>;
  let runner: EffectRunner;

  beforeEach(() => {
    engine = new FakeEngine();
    peakComputer = createPeakComputer();
    scopedAccess = createScopedAccess();
    logger = createLogger();
    dispatch = createDispatch();
    runner = new EffectRunner(
      { engine, peakComputer, scopedAccess, logger, peakBuckets: 64 },
      dispatch,
    );
  });

  describe("engine commands", () => {
    it("should forward each command to the engine", () => {
      runner.run(effects.playFrom(12.5));
      runner.run(effects.pause());
      runner.run(effects.seek(3));
      runner.run(effects.setRate(1.25));
      runner.run(effects.setPitch(-2));
      runner.run(effects.setLoop(10, 20, true));

      expect(engine.play).toHaveBeenCalledWith(12.5);
      expect(engine.pause).toHaveBeenCalledTimes(1);
      expect(engine.seek).toHaveBeenCalledWith(3);
      expect(engine.setRate).toHaveBeenCalledWith(1.25);
      expect(engine.setPitchSemitones).toHaveBeenCalledWith(-2);
      expect(engine.setLoop).toHaveBeenCalledWith(10, 20, true);
    });

    it("should log and swallow an engine command that throws", () => {
      engine.play.mockImplementation(() => {
        throw new Error("device lost");
      });

      expect(() => runner.run(effects.playFrom(1))).not.toThrow();
      expect(logger.error).toHaveBeenCalledWith(
        "[EffectRunner] Engine command 'playFrom' failed:",
        expect.any(Error),
      );
    });
  });

  describe("engine callbacks", () => {
    it("should turn time updates into ticks", () => {
      engine.onTimeUpdate?.(7.5);
      expect(dispatch).toHaveBeenCalledWith(actions.tick(7.5));
    });

    it("should turn end of media into playbackFinished", () => {
      engine.onPlaybackFinished?.();
      expect(dispatch).toHaveBeenCalledWith(actions.playbackFinished());
    });
  });

  describe("load", () => {
    it("should dispatch importSucceeded with the track metadata", async () => {
      runner.run(effects.load("/audio/scales.wav"));
      await flushPromises();

      expect(engine.load).toHaveBeenCalledWith("/audio/scales.wav");
      expect(dispatch).toHaveBeenCalledTimes(1);
      expect(dispatch).toHaveBeenCalledWith(actions.importSucceeded(TRACK));
    });

    it("should dispatch importFailed with the error message", async () => {
      engine.load.mockRejectedValueOnce(new AudioEngineError("fileNotFound"));

      runner.run(effects.load("/audio/missing.wav"));
      await flushPromises();

      expect(dispatch).toHaveBeenCalledWith(actions.importFailed("Audio file not found"));
    });

    it("should drop a load that finishes after a newer one was started", async () => {
      const first = deferred<TrackMeta>();
      const second = deferred<TrackMeta>();
      engine.load
        .mockImplementationOnce(() => first.promise)
        .mockImplementationOnce(() => second.promise);
      const newer = { name: "Newer.wav", durationSec: 10 };

      runner.run(effects.load("/a.wav"));
      runner.run(effects.load("/b.wav"));
      second.resolve(newer);
      await flushPromises();
      first.resolve(TRACK);
      await flushPromises();

      expect(dispatch).toHaveBeenCalledTimes(1);
      expect(dispatch).toHaveBeenCalledWith(actions.importSucceeded(newer));
    });

    it("should drop a superseded failure as well", async () => {
      const first = deferred<TrackMeta>();
      engine.load.mockImplementationOnce(() => first.promise);

      runner.run(effects.load("/a.wav"));
      runner.run(effects.load("/b.wav"));
      first.reject(new Error("gone"));
      await flushPromises();

      expect(dispatch).toHaveBeenCalledTimes(1);
      expect(dispatch).toHaveBeenCalledWith(actions.importSucceeded(TRACK));
    });

    it("should reset the peaks when a new load starts", async () => {
      runner.run(effects.load("/a.wav"));
      await flushPromises();
      runner.run(effects.computePeaks());
      await flushPromises();
      expect(runner.peaks).toEqual(PEAKS);

      runner.run(effects.load("/b.wav"));
      expect(runner.peaks).toBe(EMPTY_WAVEFORM_PEAKS);
    });
  });

  describe("computePeaks", () => {
    it("should compute peaks for the current file inside a scoped access", async () => {
      runner.run(effects.load("/a.wav"));
      await flushPromises();
      runner.run(effects.computePeaks());
      await flushPromises();

      expect(peakComputer.computePeaks).toHaveBeenCalledWith("/a.wav", 64);
      expect(scopedAccess.start).toHaveBeenCalledWith("/a.wav");
      expect(scopedAccess.stop).toHaveBeenCalledWith("/a.wav");
      expect(runner.peaks).toEqual(PEAKS);
    });

    it("should publish the peaks through the readable store", async () => {
      const seen: WaveformPeaks[] = [];
      const unsubscribe = runner.peaksStore.subscribe((p) => seen.push(p));

      runner.run(effects.load("/a.wav"));
      await flushPromises();
      runner.run(effects.computePeaks());
      await flushPromises();
      unsubscribe();

      expect(seen[seen.length - 1]).toEqual(PEAKS);
    });

    it("should fall back to empty peaks and still release access on failure", async () => {
      peakComputer.computePeaks.mockRejectedValueOnce(new Error("decode failed"));

      runner.run(effects.load("/a.wav"));
      await flushPromises();
      runner.run(effects.computePeaks());
      await flushPromises();

      expect(runner.peaks).toBe(EMPTY_WAVEFORM_PEAKS);
      expect(scopedAccess.stop).toHaveBeenCalledWith("/a.wav");
      expect(logger.warn).toHaveBeenCalledWith(
        "[EffectRunner] Peak computation failed for /a.wav:",
        expect.any(Error),
      );
      expect(dispatch).toHaveBeenCalledTimes(1);
    });

    it("should not release access that was never granted", async () => {
      scopedAccess.start.mockReturnValueOnce(false);

      runner.run(effects.load("/a.wav"));
      await flushPromises();
      runner.run(effects.computePeaks());
      await flushPromises();

      expect(scopedAccess.stop).not.toHaveBeenCalled();
      expect(runner.peaks).toEqual(PEAKS);
    });

    it("should do nothing before any file was loaded", () => {
      runner.run(effects.computePeaks());

      expect(peakComputer.computePeaks).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(
        "[EffectRunner] computePeaks requested with no loaded file.",
      );
    });

    it("should drop peaks of a file that was replaced meanwhile", async () => {
      const pending = deferred<WaveformPeaks>();
      peakComputer.computePeaks.mockImplementationOnce(() => pending.promise);

      runner.run(effects.load("/a.wav"));
      await flushPromises();
      runner.run(effects.computePeaks());
      runner.run(effects.load("/b.wav"));
      pending.resolve(PEAKS);
      await flushPromises();

      expect(runner.peaks).toBe(EMPTY_WAVEFORM_PEAKS);
      expect(scopedAccess.stop).toHaveBeenCalledWith("/a.wav");
    });
  });

  describe("dispose", () => {
    it("should detach from the engine and ignore further effects", () => {
      runner.dispose();

      expect(engine.onTimeUpdate).toBeUndefined();
      expect(engine.onPlaybackFinished).toBeUndefined();

      runner.run(effects.playFrom(1));
      expect(engine.play).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(
        "[EffectRunner] Ignoring effect 'playFrom' after dispose.",
      );
    });

    it("should drop a load still in flight", async () => {
      const pending = deferred<TrackMeta>();
      engine.load.mockImplementationOnce(() => pending.promise);

      runner.run(effects.load("/a.wav"));
      runner.dispose();
      pending.resolve(TRACK);
      await flushPromises();

      expect(dispatch).not.toHaveBeenCalled();
    });

    it("should be idempotent", () => {
      runner.dispose();
      runner.dispose();
      expect(logger.log).toHaveBeenCalledWith("[EffectRunner] Disposed");
      expect(logger.log.mock.calls.filter(([m]) => m === "[EffectRunner] Disposed")).toHaveLength(1);
    });
  });
});
