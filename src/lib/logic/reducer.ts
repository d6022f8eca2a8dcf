// src/lib/logic/reducer.ts
import { ACTION_TYPE, type Action } from "$lib/types/action.types";
import { effects as fx, type Effect } from "$lib/types/effect.types";
import type { AppState, LoopPoints } from "$lib/types/player.types";
import { createDefaultLoopPoints } from "$lib/stores/player.store";
import { TRANSPORT_CONSTANTS, UI_CONSTANTS } from "$lib/utils/constants";
import { pitchToastMessage, speedToastMessage } from "$lib/utils/formatters";
import { clamp, clampTimeToTrack, selectCanLoop } from "./selectors";

/** The only outside inputs the reducer reads. Injected so tests can pin them. */
export interface ReducerEnv {
  now: () => number;
  generateId: () => string;
}

export interface ReduceResult {
  state: AppState;
  effects: Effect[];
}

const unchanged = (state: AppState): ReduceResult => ({ state, effects: [] });

const finiteTime = (timeSec: number): number =>
  Number.isFinite(timeSec) ? timeSec : 0;

// Into [0, duration] with a track loaded; only floored at 0 without one.
const validTime = (state: AppState, timeSec: number): number =>
  state.track ? clampTimeToTrack(state, timeSec) : Math.max(0, finiteTime(timeSec));

const withToast = (state: AppState, message: string, env: ReducerEnv): AppState => ({
  ...state,
  toast: { message, expiresAt: env.now() + UI_CONSTANTS.TOAST_DURATION_MS },
});

const normalizeLoop = (loop: LoopPoints): LoopPoints => {
  const { aSec, bSec } = loop;
  if (aSec === undefined || bSec === undefined || aSec <= bSec) return loop;
  return { ...loop, aSec: bSec, bSec: aSec };
};

const setLoopEffect = (loop: LoopPoints): Effect =>
  fx.setLoop(loop.aSec, loop.bSec, loop.enabled);

const withLoop = (state: AppState, loop: LoopPoints): ReduceResult => {
  const normalized = normalizeLoop(loop);
  return {
    state: { ...state, loop: normalized },
    effects: [setLoopEffect(normalized)],
  };
};

/**
 * Pure transition function: `(state, action, env) -> (state, effects)`.
 *
 * Never throws and never touches I/O. Failures the user should see are
 * expressed as a toast plus an empty effect list.
 */
export function reduce(
  state: AppState,
  action: Action,
  env: ReducerEnv,
): ReduceResult {
  switch (action.type) {
    case ACTION_TYPE.APPEARED:
      return unchanged(state);

    case ACTION_TYPE.IMPORT_PICKED:
      return {
        state: {
          ...state,
          isLoading: true,
          isScrubbing: false,
          transport: { ...state.transport, isPlaying: false, currentTimeSec: 0 },
          loop: createDefaultLoopPoints(),
          markers: [],
        },
        // pause first so the outgoing track is never observed as playing
        effects: [fx.pause(), fx.load(action.payload.url)],
      };

    case ACTION_TYPE.IMPORT_SUCCEEDED: {
      const { track } = action.payload;
      return {
        state: {
          ...state,
          track,
          isLoading: false,
          isScrubbing: false,
          markers: [],
          loop: createDefaultLoopPoints(),
          transport: { ...state.transport, currentTimeSec: 0 },
          viewport: { startSec: 0, endSec: track.durationSec },
        },
        effects: [fx.computePeaks()],
      };
    }

    case ACTION_TYPE.IMPORT_FAILED: {
      const message = action.payload.message || UI_CONSTANTS.IMPORT_FAILED_MESSAGE;
      return {
        state: withToast({ ...state, isLoading: false }, message, env),
        effects: [],
      };
    }

    case ACTION_TYPE.SET_MODE:
      return unchanged({ ...state, mode: action.payload.mode });

    case ACTION_TYPE.TAP_WAVEFORM: {
      const timeSec = validTime(state, action.payload.timeSec);
      const base: AppState = { ...state, isScrubbing: false };
      if (state.mode === "setA") {
        return withLoop(base, { ...base.loop, aSec: timeSec });
      }
      if (state.mode === "setB") {
        return withLoop(base, { ...base.loop, bSec: timeSec });
      }
      if (state.mode === "marker") {
        return reduce(base, { type: ACTION_TYPE.ADD_MARKER, payload: { timeSec } }, env);
      }
      // plain seek; a stateless engine has to be restarted to hear the jump
      return {
        state: {
          ...base,
          transport: { ...base.transport, currentTimeSec: timeSec },
        },
        effects: base.transport.isPlaying ? [fx.playFrom(timeSec)] : [],
      };
    }

    case ACTION_TYPE.TRANSPORT_SCRUB_CHANGED: {
      const timeSec = clampTimeToTrack(state, action.payload.timeSec);
      return {
        state: {
          ...state,
          isScrubbing: true,
          transport: { ...state.transport, currentTimeSec: timeSec },
        },
        // while playing the audio keeps running; only the playhead follows the drag
        effects: state.transport.isPlaying ? [] : [fx.seek(timeSec)],
      };
    }

    case ACTION_TYPE.TRANSPORT_SCRUB_ENDED: {
      const timeSec = clampTimeToTrack(state, action.payload.timeSec);
      return {
        state: {
          ...state,
          isScrubbing: false,
          transport: { ...state.transport, currentTimeSec: timeSec },
        },
        effects: state.transport.isPlaying
          ? [fx.playFrom(timeSec)]
          : [fx.seek(timeSec)],
      };
    }

    case ACTION_TYPE.TOGGLE_PLAY: {
      const { transport } = state;
      if (transport.isPlaying) {
        return {
          state: { ...state, transport: { ...transport, isPlaying: false } },
          effects: [fx.pause()],
        };
      }
      return {
        state: { ...state, transport: { ...transport, isPlaying: true } },
        effects: [fx.playFrom(transport.currentTimeSec)],
      };
    }

    case ACTION_TYPE.TICK: {
      if (state.isScrubbing) return unchanged(state);
      const timeSec = validTime(state, action.payload.currentTimeSec);
      const { aSec, bSec, enabled } = state.loop;
      // a tick that lands after a pause must not restart the audio
      const canWrap = state.transport.isPlaying && enabled;
      if (canWrap && aSec !== undefined && bSec !== undefined && timeSec >= bSec) {
        return {
          state: {
            ...state,
            transport: { ...state.transport, currentTimeSec: aSec },
          },
          effects: [fx.playFrom(aSec)],
        };
      }
      return unchanged({
        ...state,
        transport: { ...state.transport, currentTimeSec: timeSec },
      });
    }

    case ACTION_TYPE.PLAYBACK_FINISHED:
      return unchanged({
        ...state,
        transport: { ...state.transport, isPlaying: false },
      });

    case ACTION_TYPE.SPEED_DELTA: {
      const { delta } = action.payload;
      const current = state.transport.speed;
      const speed = clamp(
        Number.isFinite(delta) ? current + delta : current,
        TRANSPORT_CONSTANTS.MIN_SPEED,
        TRANSPORT_CONSTANTS.MAX_SPEED,
      );
      return {
        state: withToast(
          { ...state, transport: { ...state.transport, speed } },
          speedToastMessage(speed),
          env,
        ),
        effects: [fx.setRate(speed)],
      };
    }

    case ACTION_TYPE.PITCH_DELTA: {
      const { delta } = action.payload;
      const current = state.transport.pitchSemitones;
      const pitchSemitones = clamp(
        Number.isFinite(delta) ? current + delta : current,
        TRANSPORT_CONSTANTS.MIN_PITCH,
        TRANSPORT_CONSTANTS.MAX_PITCH,
      );
      return {
        state: withToast(
          { ...state, transport: { ...state.transport, pitchSemitones } },
          pitchToastMessage(pitchSemitones),
          env,
        ),
        effects: [fx.setPitch(pitchSemitones)],
      };
    }

    case ACTION_TYPE.ADD_MARKER:
      return unchanged({
        ...state,
        markers: [
          ...state.markers,
          { id: env.generateId(), timeSec: validTime(state, action.payload.timeSec) },
        ],
      });

    case ACTION_TYPE.DELETE_MARKER: {
      const { id } = action.payload;
      if (!state.markers.some((m) => m.id === id)) return unchanged(state);
      return unchanged({
        ...state,
        markers: state.markers.filter((m) => m.id !== id),
      });
    }

    case ACTION_TYPE.TOGGLE_LOOP_ENABLED: {
      if (!action.payload.enabled) {
        const loop = { ...state.loop, enabled: false };
        return { state: { ...state, loop }, effects: [setLoopEffect(loop)] };
      }
      if (!selectCanLoop(state)) {
        const loop = { ...state.loop, enabled: false };
        return {
          state: withToast(
            { ...state, loop },
            UI_CONSTANTS.LOOP_NEEDS_BOUNDS_MESSAGE,
            env,
          ),
          // still mirrored so the engine hint never drifts from the model
          effects: [setLoopEffect(loop)],
        };
      }
      const loop = { ...state.loop, enabled: true };
      return { state: { ...state, loop }, effects: [setLoopEffect(loop)] };
    }

    case ACTION_TYPE.SET_A:
      return withLoop(state, {
        ...state.loop,
        aSec: validTime(state, action.payload.timeSec),
      });

    case ACTION_TYPE.SET_B:
      return withLoop(state, {
        ...state.loop,
        bSec: validTime(state, action.payload.timeSec),
      });

    case ACTION_TYPE.TAPPED_A: {
      const timeSec = state.transport.currentTimeSec;
      const { bSec } = state.loop;
      if (bSec !== undefined && timeSec > bSec) {
        return withLoop(state, { aSec: timeSec, bSec: undefined, enabled: false });
      }
      return withLoop(state, { ...state.loop, aSec: timeSec });
    }

    case ACTION_TYPE.TAPPED_B: {
      const timeSec = state.transport.currentTimeSec;
      const { aSec } = state.loop;
      if (aSec !== undefined && timeSec < aSec) {
        return withLoop(state, { aSec: undefined, bSec: timeSec, enabled: false });
      }
      return withLoop(state, { ...state.loop, bSec: timeSec });
    }

    case ACTION_TYPE.CLEAR_TOAST_IF_EXPIRED: {
      const { toast } = state;
      if (!toast || action.payload.now < toast.expiresAt) return unchanged(state);
      return unchanged({ ...state, toast: undefined });
    }
  }
}
