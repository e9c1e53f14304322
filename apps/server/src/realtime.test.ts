import { EventEmitter } from "node:events";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SwitchboardRuntime, DEFAULT_RUNTIME_CONFIG, silentLogger } from "@switchboard/core";
import { asSessionId, SessionNotFoundError } from "@switchboard/types";
import {
  attachRealtimeChannel,
  SESSION_NOT_FOUND_CLOSE_CODE,
  type RealtimeSocket,
} from "./realtime.js";

class FakeSocket extends EventEmitter implements RealtimeSocket {
  readyState = 1;
  readonly sent: string[] = [];
  closedWith?: { code?: number; reason?: string };

  send(data: string): void {
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closedWith = { code, reason };
    this.readyState = 3;
  }

  /** Simulates the client sending a text frame. */
  receive(text: string): void {
    this.emit("message", Buffer.from(text, "utf8"), false);
  }

  /** Simulates the client going away. */
  disconnect(): void {
    this.readyState = 3;
    this.emit("close");
  }
}

describe("realtime channel", () => {
  let runtime: SwitchboardRuntime;

  beforeEach(async () => {
    runtime = new SwitchboardRuntime();
    runtime.subscribe("triage", {
      topic: "triage",
      description: "triage agent",
      tools: [],
      handler: { handleTask: async (turn) => ({ response: `echo: ${turn.task.payload}` }) },
    });
    await runtime.start();
  });

  afterEach(async () => {
    await runtime.stop();
  });

  it("sends exactly the greeting on open", async () => {
    const id = await runtime.createSession();
    const socket = new FakeSocket();

    await attachRealtimeChannel(runtime, socket, id, silentLogger());

    expect(socket.sent).toEqual([DEFAULT_RUNTIME_CONFIG.greeting]);
  });

  it("turns client frames into user messages", async () => {
    const id = await runtime.createSession();
    const socket = new FakeSocket();
    await attachRealtimeChannel(runtime, socket, id, silentLogger());

    socket.receive("hello there");

    await vi.waitFor(() => {
      expect(socket.sent).toEqual([DEFAULT_RUNTIME_CONFIG.greeting, "echo: hello there"]);
    });
  });

  it("closes with 4404 for an unknown session and creates nothing", async () => {
    const socket = new FakeSocket();

    await attachRealtimeChannel(runtime, socket, asSessionId("missing"), silentLogger());

    expect(socket.closedWith).toEqual({ code: SESSION_NOT_FOUND_CLOSE_CODE, reason: "Session not found" });
    expect(socket.sent).toEqual([]);
    expect(runtime.liveSessionCount).toBe(0);
  });

  it("ends the session when the client disconnects", async () => {
    const id = await runtime.createSession();
    const socket = new FakeSocket();
    await attachRealtimeChannel(runtime, socket, id, silentLogger());

    socket.disconnect();

    await vi.waitFor(() => {
      expect(runtime.liveSessionCount).toBe(0);
    });
    await expect(runtime.submitUserMessage(id, "anyone?")).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it("closes the socket after the farewell on exit", async () => {
    const id = await runtime.createSession();
    const socket = new FakeSocket();
    await attachRealtimeChannel(runtime, socket, id, silentLogger());

    socket.receive("exit");

    await vi.waitFor(() => {
      expect(socket.closedWith).toEqual({ code: 1000, reason: "user exit" });
    });
    expect(socket.sent).toEqual([DEFAULT_RUNTIME_CONFIG.greeting, DEFAULT_RUNTIME_CONFIG.farewell]);
  });
});
