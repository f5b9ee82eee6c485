import WebSocket from "ws";
import { rawPayloadCodec } from "../recording/changeCodec";
import type { CaptureSource, RemoteSession } from "./liveRecorder";

export const DEFAULT_ADDRESS = "localhost";
export const DEFAULT_PORT = 38801;

export const STATE_PATH = "/state";
export const TRAJECTORY_PATH = "/trajectory";

export type WsSessionOptions = {
  address?: string;
  port?: number;
  /** Give up on connecting after this many milliseconds. */
  connectTimeoutMs?: number;
};

export type WsSession = RemoteSession<Buffer, Buffer> & {
  close(): Promise<void>;
};

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * Queues the messages of one socket and hands them out as an async
 * iterator. The iterator ends when the socket closes or the subscription
 * is aborted, and fails when the socket errors.
 */
export class SocketMessages implements AsyncIterableIterator<Buffer> {
  private readonly queue: Buffer[] = [];
  private waiter: {
    resolve: (r: IteratorResult<Buffer>) => void;
    reject: (e: Error) => void;
  } | null = null;
  private ended = false;
  private failure: Error | null = null;

  constructor(private readonly ws: WebSocket) {
    ws.on("message", (data) => this.push(toBuffer(data)));
    ws.on("close", () => this.end());
    ws.on("error", (err) => this.fail(err));
  }

  private push(message: Buffer) {
    if (this.ended) return;
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w.resolve({ done: false, value: message });
    } else {
      this.queue.push(message);
    }
  }

  private fail(err: Error) {
    if (this.ended) return;
    this.failure = err;
    this.ended = true;
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w.reject(err);
    }
  }

  end() {
    if (this.ended) return;
    this.ended = true;
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w.resolve({ done: true, value: undefined });
    }
  }

  bindSignal(signal: AbortSignal): this {
    if (signal.aborted) {
      this.end();
    } else {
      signal.addEventListener("abort", () => this.end(), { once: true });
    }
    return this;
  }

  next(): Promise<IteratorResult<Buffer>> {
    // Messages already received are delivered before the end is reported.
    const queued = this.queue.shift();
    if (queued !== undefined) {
      return Promise.resolve({ done: false, value: queued });
    }
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve({ done: true, value: undefined });
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  async return(): Promise<IteratorResult<Buffer>> {
    this.end();
    this.ws.close();
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}

function waitForOpen(ws: WebSocket, url: string, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      ws.terminate();
      reject(new Error(`Timeout connecting to ${url} after ${timeoutMs}ms`));
    }, timeoutMs);
    ws.once("open", () => {
      clearTimeout(timer);
      resolve();
    });
    ws.once("error", (e) => {
      clearTimeout(timer);
      reject(e);
    });
  });
}

function closeSocket(ws: WebSocket): Promise<void> {
  if (ws.readyState === WebSocket.CLOSED) return Promise.resolve();
  return new Promise<void>((resolve) => {
    ws.once("close", () => resolve());
    ws.close();
  });
}

function captureSource(messages: SocketMessages): CaptureSource<Buffer> {
  return {
    subscribe: (signal) => messages.bindSignal(signal),
    encode: rawPayloadCodec.encode,
  };
}

/**
 * Connect to both streams of a remote service. Messages arrive already
 * serialized and are recorded byte for byte.
 */
export async function connectWsSession(opts: WsSessionOptions = {}): Promise<WsSession> {
  const address = opts.address ?? DEFAULT_ADDRESS;
  const port = opts.port ?? DEFAULT_PORT;
  const timeoutMs = opts.connectTimeoutMs ?? 5000;

  const stateUrl = `ws://${address}:${port}${STATE_PATH}`;
  const trajectoryUrl = `ws://${address}:${port}${TRAJECTORY_PATH}`;

  const stateWs = new WebSocket(stateUrl);
  const trajectoryWs = new WebSocket(trajectoryUrl);

  // Queue from the start so nothing sent right after the handshake is lost.
  const stateMessages = new SocketMessages(stateWs);
  const trajectoryMessages = new SocketMessages(trajectoryWs);

  try {
    await Promise.all([
      waitForOpen(stateWs, stateUrl, timeoutMs),
      waitForOpen(trajectoryWs, trajectoryUrl, timeoutMs),
    ]);
  } catch (err) {
    stateWs.terminate();
    trajectoryWs.terminate();
    throw err;
  }

  return {
    state: captureSource(stateMessages),
    trajectory: captureSource(trajectoryMessages),
    close: async () => {
      await Promise.all([closeSocket(stateWs), closeSocket(trajectoryWs)]);
    },
  };
}
