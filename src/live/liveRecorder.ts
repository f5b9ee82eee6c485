import path from "node:path";
import { AsyncFileSink, type AsyncByteSink, type FileSinkOptions } from "../recording/byteSink";
import { encodeFrame } from "../recording/frameCodec";
import { encodeHeader } from "../recording/headerCodec";
import { currentHeader } from "../recording/recordingFormat";
import { monotonicNowUs, type Clock } from "./clock";

/**
 * One live message stream and the encoder that turns its messages into
 * frame payloads.
 */
export interface CaptureSource<T> {
  /**
   * Start receiving. The iterable should end when `signal` aborts; the
   * capture loop also stops waiting on it at that point.
   */
  subscribe(signal: AbortSignal): AsyncIterable<T>;
  encode(message: T): Uint8Array;
}

/**
 * A connected remote service exposing its two subscribable streams.
 */
export interface RemoteSession<S = Uint8Array, F = Uint8Array> {
  state: CaptureSource<S>;
  trajectory: CaptureSource<F>;
}

export type ChannelName = "state" | "trajectory";

export type SessionSinks = Record<ChannelName, AsyncByteSink>;

export type SessionResult = Record<ChannelName, number>;

export type RecordStreamOptions = {
  /** Shared session start, in the clock's microseconds. */
  startInstant: bigint;
  clock?: Clock;
  signal?: AbortSignal;
};

export type RecordSessionOptions = {
  clock?: Clock;
  signal?: AbortSignal;

  /**
   * When one capture loop fails, cancel the other one too, so a session
   * never leaves a one-sided recording behind. Default true.
   */
  jointCancellation?: boolean;
};

const ABORTED = Symbol("aborted");

function nextOrAbort<T>(
  iterator: AsyncIterator<T>,
  signal: AbortSignal
): Promise<IteratorResult<T> | typeof ABORTED> {

  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(ABORTED);
    signal.addEventListener("abort", onAbort, { once: true });
    iterator.next().then(
      (result) => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Capture one stream into one sink.
 *
 * The header is written before the first frame. Every frame is encoded
 * whole and written in one awaited call, and cancellation is only honored
 * between frames, so the sink never ends inside a frame. The sink is
 * closed on every path, after the last write has settled.
 *
 * @returns the number of frames written
 */
export async function recordStream<T>(
  source: CaptureSource<T>,
  sink: AsyncByteSink,
  opts: RecordStreamOptions
): Promise<number> {
  const clock = opts.clock ?? monotonicNowUs;
  const signal = opts.signal ?? new AbortController().signal;

  let written = 0;
  let iterator: AsyncIterator<T> | null = null;
  let waiting = false;

  try {
    await sink.write(encodeHeader(currentHeader()));
    await sink.flush();

    iterator = source.subscribe(signal)[Symbol.asyncIterator]();

    for (;;) {
      if (signal.aborted) break;
      // Set only while a next() call is outstanding.
      waiting = true;
      const next = await nextOrAbort(iterator, signal);
      if (next === ABORTED) break;
      waiting = false;
      if (next.done) break;

      const now = clock() - opts.startInstant;
      const elapsed = now < 0n ? 0n : now;
      const frame = encodeFrame(elapsed, source.encode(next.value));
      await sink.write(frame);
      await sink.flush();
      written++;
    }
  } finally {
    try {
      // A next() still pending after abort is left to the source, which
      // watches the same signal.
      if (iterator && !waiting && iterator.return) {
        await iterator.return();
      }
    } finally {
      await sink.close();
    }
  }

  return written;
}

/**
 * Capture both streams of a session concurrently against one clock
 * origin. The loops share nothing but the start instant.
 */
export async function recordSession<S, F>(
  session: RemoteSession<S, F>,
  sinks: SessionSinks,
  opts: RecordSessionOptions = {}
): Promise<SessionResult> {
  const clock = opts.clock ?? monotonicNowUs;
  const joint = opts.jointCancellation ?? true;
  const startInstant = clock();

  const controller = new AbortController();
  const outer = opts.signal;
  const forwardAbort = () => controller.abort(outer?.reason);
  if (outer?.aborted) {
    forwardAbort();
  } else {
    outer?.addEventListener("abort", forwardAbort, { once: true });
  }

  async function capture<T>(source: CaptureSource<T>, sink: AsyncByteSink): Promise<number> {
    try {
      return await recordStream(source, sink, {
        startInstant,
        clock,
        signal: controller.signal,
      });
    } catch (err) {
      if (joint) controller.abort(err);
      throw err;
    }
  }

  try {
    const [state, trajectory] = await Promise.allSettled([
      capture(session.state, sinks.state),
      capture(session.trajectory, sinks.trajectory),
    ]);

    const failures: unknown[] = [];
    if (state.status === "rejected") failures.push(state.reason);
    if (trajectory.status === "rejected") failures.push(trajectory.reason);

    if (failures.length === 1) throw failures[0];
    if (failures.length > 1) {
      throw new AggregateError(failures, "Both capture loops failed");
    }

    return {
      state: state.status === "fulfilled" ? state.value : 0,
      trajectory: trajectory.status === "fulfilled" ? trajectory.value : 0,
    };
  } finally {
    outer?.removeEventListener("abort", forwardAbort);
  }
}

export function recordingPaths(stem: string): Record<ChannelName, string> {
  return {
    state: `${stem}.state`,
    trajectory: `${stem}.traj`,
  };
}

/**
 * Record a session to `<stem>.state` and `<stem>.traj`.
 */
export async function recordToFiles<S, F>(
  session: RemoteSession<S, F>,
  stem: string,
  opts: RecordSessionOptions & FileSinkOptions = {}
): Promise<SessionResult> {
  const paths = recordingPaths(path.resolve(stem));
  const state = await AsyncFileSink.create(paths.state, opts);

  let trajectory: AsyncFileSink;
  try {
    trajectory = await AsyncFileSink.create(paths.trajectory, opts);
  } catch (err) {
    await state.close();
    throw err;
  }

  return await recordSession(session, { state, trajectory }, opts);
}
