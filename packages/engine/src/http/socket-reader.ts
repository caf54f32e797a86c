import { fail, ok, type Result } from "../errors/app-error.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { decodeToString } from "../utils/buffer.js";

const LF = 10;
const CR = 13;
const DEFAULT_MAX_LINE_LENGTH = 8 * 1024; // 8KB
const DEFAULT_HIGH_WATER_MARK = 64 * 1024; // 64KB
const DEFAULT_MAX_BUFFERED = 1024 * 1024; // 1MB

export interface SocketReaderOptions {
  /** Budget for the whole request, measured from construction. 0 waits forever. */
  timeoutMs?: number;
  maxLineLength?: number;
  /** Unrequested bytes held before the socket is paused. */
  highWaterMark?: number;
  /**
   * Unrequested bytes held before further data is dropped. Only reached by
   * sockets that ignore `pause`.
   */
  maxBuffered?: number;
}

/** Anything that can hand over an exact number of body bytes. */
export interface ByteSource {
  readExact(length: number): Promise<Result<Uint8Array>>;
}

/**
 * Buffers bytes arriving on a socket and serves them back as lines or
 * fixed-size blocks.
 *
 * Listeners are attached in the constructor, so a reader must be created as
 * soon as the connection is accepted: nothing that arrives before that is
 * kept.
 *
 * Bytes nobody has asked for yet are bounded: past `highWaterMark` the
 * socket is paused until a read needs more, and past `maxBuffered` incoming
 * data is dropped and the next read that needs it fails.
 */
export class SocketReader implements ByteSource {
  // Unread bytes live in store[start, end).
  private store: Uint8Array = new Uint8Array(0);
  private start = 0;
  private end = 0;
  // Bytes the pending readExact still needs; they do not count against the bounds.
  private wanted = 0;
  private paused = false;
  private overflowed = false;
  private released = false;
  private closed = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];
  private received = 0;
  private readonly deadline: number | null;
  private readonly maxLineLength: number;
  private readonly highWaterMark: number;
  private readonly maxBuffered: number;

  constructor(
    private readonly socket: ITcpSocket,
    options: SocketReaderOptions = {},
  ) {
    const timeoutMs = options.timeoutMs ?? 0;
    this.deadline = timeoutMs > 0 ? Date.now() + timeoutMs : null;
    this.maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
    this.maxBuffered = options.maxBuffered ?? DEFAULT_MAX_BUFFERED;

    socket.onData((data) => this.receive(data));

    socket.onClose(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notifyWaiters();
    });
  }

  /** Total bytes seen on the socket so far, including dropped ones. */
  get bytesReceived(): number {
    return this.received;
  }

  /** Bytes currently held and not yet read. */
  get bytesBuffered(): number {
    return this.end - this.start;
  }

  /** True once the peer has gone away. */
  get isClosed(): boolean {
    return this.closed;
  }

  /** Next line, without its trailing "\n" or "\r\n". */
  async readLine(): Promise<Result<string>> {
    while (true) {
      const newline = this.store.subarray(this.start, this.end).indexOf(LF);
      if (newline !== -1) {
        if (newline > this.maxLineLength) {
          return this.lineTooLong();
        }
        const lineEnd = this.start + newline;
        const contentEnd =
          newline > 0 && this.store[lineEnd - 1] === CR ? lineEnd - 1 : lineEnd;
        const line = decodeToString(this.store.subarray(this.start, contentEnd));
        this.consume(newline + 1);
        return ok(line);
      }

      if (this.bytesBuffered > this.maxLineLength) {
        return this.lineTooLong();
      }

      const waited = await this.waitForMore();
      if (!waited.ok) return waited;
    }
  }

  async readExact(length: number): Promise<Result<Uint8Array>> {
    const out = new Uint8Array(length);
    let position = 0;

    while (position < length) {
      const available = this.bytesBuffered;
      if (available > 0) {
        const take = Math.min(length - position, available);
        out.set(this.store.subarray(this.start, this.start + take), position);
        this.consume(take);
        position += take;
        continue;
      }

      this.wanted = length - position;
      const waited = await this.waitForMore();
      if (!waited.ok) {
        this.wanted = 0;
        return waited;
      }
    }

    this.wanted = 0;
    return ok(out);
  }

  /**
   * The request is settled: free what is held and ignore anything the peer
   * still sends.
   */
  release(): void {
    this.released = true;
    this.wanted = 0;
    this.store = new Uint8Array(0);
    this.start = 0;
    this.end = 0;
  }

  private receive(data: Uint8Array): void {
    this.received += data.length;
    if (this.released || this.overflowed) return;

    const unrequested = this.bytesBuffered + data.length - this.wanted;
    if (unrequested > this.maxBuffered) {
      // The stream now has a gap; nothing after it is kept.
      this.overflowed = true;
      this.pause();
      this.notifyWaiters();
      return;
    }

    this.append(data);
    if (unrequested > this.highWaterMark) {
      this.pause();
    }
    this.notifyWaiters();
  }

  private append(data: Uint8Array): void {
    const length = this.bytesBuffered;
    if (this.end + data.length > this.store.length) {
      const needed = length + data.length;
      if (needed <= this.store.length / 2) {
        this.store.copyWithin(0, this.start, this.end);
      } else {
        const grown = new Uint8Array(Math.max(needed, this.store.length * 2));
        grown.set(this.store.subarray(this.start, this.end));
        this.store = grown;
      }
      this.start = 0;
      this.end = length;
    }
    this.store.set(data, this.end);
    this.end += data.length;
  }

  private consume(count: number): void {
    this.start += count;
    if (this.start === this.end) {
      this.start = 0;
      this.end = 0;
    }
  }

  private pause(): void {
    if (this.paused) return;
    this.paused = true;
    this.socket.pause?.();
  }

  private resume(): void {
    if (!this.paused) return;
    this.paused = false;
    this.socket.resume?.();
  }

  private lineTooLong(): Result<never> {
    return fail(
      "Invalid",
      `Request line or header exceeds ${this.maxLineLength} bytes`,
    );
  }

  private async waitForMore(): Promise<Result<void>> {
    if (this.socketError) {
      return fail(
        "IO",
        `Error reading request: ${this.socketError.message}`,
        this.socketError,
      );
    }

    if (this.overflowed) {
      return fail(
        "Invalid",
        `Request sent more than ${this.maxBuffered} bytes ahead of the reader`,
      );
    }

    if (this.closed) {
      return fail("Invalid", "Connection closed before request was complete");
    }

    this.resume();
    const remaining = this.deadline === null ? null : this.deadline - Date.now();
    const hadActivity = await this.waitForActivity(remaining);
    if (!hadActivity) {
      return fail("IO", "Request timed out before completion");
    }
    return ok(undefined);
  }

  private waitForActivity(timeoutMs: number | null): Promise<boolean> {
    if (timeoutMs === null) {
      return new Promise((resolve) => {
        this.waiters.push(() => resolve(true));
      });
    }

    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
