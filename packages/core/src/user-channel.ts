import type { ChannelSink } from "@switchboard/types";

/**
 * Per-session outlet for user-facing frames. Frames produced before a sink
 * is attached are buffered and flushed, in order, on attach.
 */
export class UserChannel {
  private sink?: ChannelSink;
  private buffer: string[] = [];
  private closed = false;

  get attached(): boolean {
    return this.sink !== undefined;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Attach a sink, replacing (and closing) any previous one, and flush the buffer. */
  attach(sink: ChannelSink): void {
    const previous = this.sink;
    this.sink = sink;
    if (previous && previous !== sink) {
      previous.close("Replaced by a newer connection");
    }
    const pending = this.buffer;
    this.buffer = [];
    for (const frame of pending) {
      sink.send(frame);
    }
  }

  isCurrent(sink: ChannelSink): boolean {
    return this.sink === sink;
  }

  /** Forget the sink without notifying it. */
  detach(sink?: ChannelSink): void {
    if (!sink || this.sink === sink) {
      this.sink = undefined;
    }
  }

  deliver(frame: string): void {
    if (this.closed) return;
    if (this.sink) {
      this.sink.send(frame);
    } else {
      this.buffer.push(frame);
    }
  }

  close(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    const sink = this.sink;
    this.sink = undefined;
    this.buffer = [];
    sink?.close(reason);
  }
}
