import { describe, it, expect } from "vitest";
import type { ChannelSink } from "@switchboard/types";
import { UserChannel } from "./user-channel.js";

function recorder() {
  const frames: string[] = [];
  const closed: string[] = [];
  const sink: ChannelSink = {
    send: (frame) => {
      frames.push(frame);
    },
    close: (reason) => {
      closed.push(reason);
    },
  };
  return { frames, closed, sink };
}

describe("UserChannel", () => {
  it("buffers frames until a sink attaches", () => {
    const channel = new UserChannel();
    channel.deliver("one");
    channel.deliver("two");
    const { frames, sink } = recorder();

    channel.attach(sink);
    channel.deliver("three");

    expect(frames).toEqual(["one", "two", "three"]);
  });

  it("closes the previous sink when replaced", () => {
    const channel = new UserChannel();
    const first = recorder();
    const second = recorder();
    channel.attach(first.sink);

    channel.attach(second.sink);
    channel.deliver("hello");

    expect(first.closed).toEqual(["Replaced by a newer connection"]);
    expect(first.frames).toEqual([]);
    expect(second.frames).toEqual(["hello"]);
    expect(channel.isCurrent(first.sink)).toBe(false);
  });

  it("ignores detaching a sink that was already replaced", () => {
    const channel = new UserChannel();
    const first = recorder();
    const second = recorder();
    channel.attach(first.sink);
    channel.attach(second.sink);

    channel.detach(first.sink);

    expect(channel.attached).toBe(true);
    expect(channel.isCurrent(second.sink)).toBe(true);
  });

  it("drops frames after close and notifies the sink once", () => {
    const channel = new UserChannel();
    const { frames, closed, sink } = recorder();
    channel.attach(sink);

    channel.close("user exit");
    channel.close("again");
    channel.deliver("late");

    expect(closed).toEqual(["user exit"]);
    expect(frames).toEqual([]);
    expect(channel.isClosed).toBe(true);
  });
});
