import { v7 as uuidv7 } from "uuid";
import type {
  AgentDecision,
  AgentDescriptor,
  AgentResponseMessage,
  AgentTurn,
  AgentTurnContext,
  ChannelHandle,
  ChannelSink,
  EventBus,
  LogEntry,
  Runtime,
  RuntimeConfig,
  Session,
  SessionId,
  SessionStore,
  Subscription,
  SwitchboardEvent,
  SystemTopic,
  TaskEnvelope,
  Topic,
  ToolResult,
  TraceContext,
  UserTaskMessage,
} from "@switchboard/types";
import {
  asSessionId,
  HUMAN_TOPIC,
  RoutingError,
  SessionNotFoundError,
  SwitchboardError,
  ToolExecutionError,
  TRIAGE_TOPIC,
  USER_TOPIC,
} from "@switchboard/types";
import { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
import { SessionContext } from "./session-context.js";
import { SerialQueue } from "./serial-queue.js";
import { TopicRegistry } from "./topic-registry.js";
import { ToolDispatcher } from "./tool-dispatcher.js";
import { UserChannel } from "./user-channel.js";
import { describeFailure, routingNotice } from "./failure-messages.js";
import { silentLogger, type Logger } from "./logger.js";

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  defaultTopic: TRIAGE_TOPIC,
  greeting: "Hello! I'm the project assistant. How can I help you today?",
  resumeGreeting: "Welcome back! Let's pick up where we left off.",
  farewell: "Goodbye! Your session has ended.",
  exitCommand: "exit",
  escalationNotice:
    "I've passed your conversation to a human operator. They will reply here shortly.",
  maxHandoffsPerTurn: 5,
  idleTimeoutMs: 30 * 60_000,
};

export interface SwitchboardRuntimeOptions {
  config?: Partial<RuntimeConfig>;
  store?: SessionStore;
  logger?: Logger;
  bus?: EventBus;
}

interface LiveSession {
  readonly context: SessionContext;
  readonly queue: SerialQueue;
  readonly channel: UserChannel;
  readonly abort: AbortController;
  readonly logger: Logger;
  /** Loaded from the store rather than created by this process. */
  readonly hydrated: boolean;
  resumed: boolean;
  persisting: Promise<void>;
}

interface PendingTransfer {
  readonly target: Topic;
  readonly callId: string;
  readonly tool: string;
  readonly args: Record<string, unknown>;
}

/**
 * The Switchboard Runtime: owns sessions, serializes each session's
 * messages, routes tasks to the agent on the session's active topic and
 * carries out handoffs.
 */
export class SwitchboardRuntime implements Runtime {
  readonly bus: EventBus;
  readonly config: RuntimeConfig;
  private readonly registry = new TopicRegistry();
  private readonly dispatchers = new Map<AgentDescriptor, ToolDispatcher>();
  private readonly sessions = new Map<SessionId, LiveSession>();
  private readonly hydrating = new Map<SessionId, Promise<LiveSession | undefined>>();
  private readonly store?: SessionStore;
  private readonly logger: Logger;
  private subscriptions: Subscription[] = [];
  private idleSweep?: NodeJS.Timeout;
  private started = false;

  constructor(options: SwitchboardRuntimeOptions = {}) {
    this.config = { ...DEFAULT_RUNTIME_CONFIG, ...options.config };
    this.logger = (options.logger ?? silentLogger()).child({ component: "runtime" });
    this.bus = options.bus ?? new InMemoryEventBus(this.logger.child({ component: "bus" }));
    this.store = options.store;
  }

  subscribe(topic: Topic, agent: AgentDescriptor): void {
    this.registry.register(topic, agent);
    if (!this.dispatchers.has(agent)) {
      this.dispatchers.set(agent, new ToolDispatcher(agent.tools));
    }
    this.logger.debug({ topic, tools: agent.tools.length }, "Agent subscribed");
  }

  async start(): Promise<void> {
    if (this.started) return;
    const { defaultTopic } = this.config;
    if (!this.registry.has(defaultTopic)) {
      throw new RoutingError(
        defaultTopic,
        `No agent is subscribed to the default topic "${defaultTopic}"`,
      );
    }
    this.registry.seal();

    for (const topic of this.registry.topics()) {
      this.subscriptions.push(
        this.bus.subscribe<TaskEnvelope>({ topics: [topic] }, (event) => this.deliver(topic, event)),
      );
    }
    this.subscriptions.push(
      this.bus.subscribe<AgentResponseMessage>({ topics: [USER_TOPIC] }, (event) => {
        this.sessions.get(event.sessionId)?.channel.deliver(event.payload.payload);
      }),
    );

    const { idleTimeoutMs } = this.config;
    if (idleTimeoutMs > 0) {
      this.idleSweep = setInterval(() => {
        this.reapIdleSessions().catch((err: unknown) => {
          this.logger.error({ err }, "Idle session sweep failed");
        });
      }, Math.min(idleTimeoutMs, 60_000));
      this.idleSweep.unref();
    }

    this.started = true;
    this.logger.info(
      { topics: this.registry.topics(), defaultTopic, persistent: this.store !== undefined, idleTimeoutMs },
      "Runtime started",
    );
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    clearInterval(this.idleSweep);
    this.idleSweep = undefined;
    const live = [...this.sessions.values()];
    for (const session of live) {
      session.abort.abort(new Error("Runtime stopping"));
      session.channel.close("Server shutting down");
      this.sessions.delete(session.context.id);
    }
    // Aborted turns still append their failure replies; let them land first.
    await Promise.all(live.map((session) => session.queue.idle()));
    await Promise.all(live.map((session) => this.flush(session)));
    for (const sub of this.subscriptions) {
      sub.unsubscribe();
    }
    this.subscriptions = [];
    this.started = false;
    this.logger.info({ released: live.length }, "Runtime stopped");
  }

  async createSession(): Promise<SessionId> {
    this.assertStarted();
    const id = asSessionId(uuidv7());
    const live = this.track(SessionContext.create(id, this.config.defaultTopic), false);
    const traceCtx = createTraceContext();

    live.context.append({ kind: "UserLogin", source: USER_TOPIC, payload: null });
    await this.respond(live, this.config.defaultTopic, this.config.greeting, traceCtx);
    await this.flush(live);
    await this.publishSystem("system.session.created", live, { activeTopic: live.context.activeTopic }, traceCtx);

    live.logger.info("Session created");
    return id;
  }

  async submitUserMessage(sessionId: SessionId, text: string): Promise<void> {
    const live = await this.requireSession(sessionId);
    return live.queue.enqueue(() => this.processUserMessage(live, text));
  }

  async openChannel(sessionId: SessionId, sink: ChannelSink): Promise<ChannelHandle> {
    const live = await this.requireSession(sessionId);
    live.channel.attach(sink);
    live.logger.debug("Channel attached");

    if (live.hydrated && !live.resumed) {
      live.resumed = true;
      await live.queue.enqueue(async () => {
        await this.respond(live, live.context.activeTopic, this.config.resumeGreeting, createTraceContext());
        await this.flush(live);
      });
    }

    return {
      sessionId,
      close: async () => {
        if (!live.channel.isCurrent(sink)) return;
        live.channel.detach(sink);
        await this.closeSession(sessionId, "channel closed");
      },
    };
  }

  async closeSession(sessionId: SessionId, reason: string): Promise<void> {
    const live = this.sessions.get(sessionId);
    if (live) {
      await this.endSession(live, reason);
      return;
    }
    const stored = await this.store?.get(sessionId);
    if (stored && stored.status === "active") {
      await this.store?.update(sessionId, { status: "ended", lastActiveAt: new Date().toISOString() });
      this.logger.info({ sessionId, reason }, "Stored session closed");
    }
  }

  async respondAsOperator(sessionId: SessionId, text: string): Promise<void> {
    const live = await this.requireSession(sessionId);
    await live.queue.enqueue(async () => {
      if (!live.context.escalated) {
        throw new SwitchboardError("INVALID_STATE", `Session ${sessionId} is not escalated`);
      }
      await this.respond(live, HUMAN_TOPIC, text, createTraceContext());
      await this.flush(live);
    });
  }

  async releaseEscalation(sessionId: SessionId, topic?: Topic): Promise<void> {
    const live = await this.requireSession(sessionId);
    const target = topic ?? this.config.defaultTopic;
    if (!this.registry.has(target)) {
      throw new RoutingError(target);
    }
    await live.queue.enqueue(async () => {
      if (!live.context.escalated) {
        throw new SwitchboardError("INVALID_STATE", `Session ${sessionId} is not escalated`);
      }
      live.context.setEscalated(false);
      live.context.setActiveTopic(target);
      await this.flush(live);
      await this.publishSystem("system.handoff", live, { from: HUMAN_TOPIC, to: target }, createTraceContext());
      live.logger.info({ topic: target }, "Escalation released");
    });
  }

  async describeSession(sessionId: SessionId): Promise<Session | undefined> {
    const live = this.sessions.get(sessionId);
    if (live) return live.context.snapshot();
    return this.store?.get(sessionId);
  }

  /**
   * End live sessions that have no attached channel, nothing queued and no
   * activity for `idleTimeoutMs`. Returns the ids that were ended.
   */
  async reapIdleSessions(now: number = Date.now()): Promise<SessionId[]> {
    const { idleTimeoutMs } = this.config;
    if (idleTimeoutMs <= 0) return [];
    const idle = [...this.sessions.values()].filter(
      (live) =>
        !live.channel.attached &&
        live.queue.size === 0 &&
        now - Date.parse(live.context.lastActiveAt) >= idleTimeoutMs,
    );
    for (const live of idle) {
      await this.endSession(live, "idle timeout");
    }
    if (idle.length > 0) {
      this.logger.info({ ended: idle.length }, "Idle sessions ended");
    }
    return idle.map((live) => live.context.id);
  }

  /** Number of sessions held in memory. */
  get liveSessionCount(): number {
    return this.sessions.size;
  }

  // ---------------------------------------------------------------------------
  // Message processing
  // ---------------------------------------------------------------------------

  private async processUserMessage(live: LiveSession, text: string): Promise<void> {
    const { context } = live;
    if (context.status === "ended") {
      throw new SessionNotFoundError(context.id);
    }
    const traceCtx = createTraceContext();
    const task = context.appendUserTask(text);
    live.logger.debug({ sequence: task.sequence, traceId: traceCtx.traceId }, "User task received");

    try {
      if (text.trim().toLowerCase() === this.config.exitCommand.trim().toLowerCase()) {
        await this.respond(live, context.activeTopic, this.config.farewell, traceCtx);
        await this.endSession(live, "user exit");
        return;
      }

      if (context.escalated) {
        await this.bus.publish(createEvent(HUMAN_TOPIC, context.id, task, traceCtx));
        return;
      }

      let topic = context.activeTopic;
      if (!this.registry.has(topic)) {
        await this.revertToDefault(live, new RoutingError(topic), traceCtx);
        topic = this.config.defaultTopic;
      }
      await this.dispatch(live, topic, task, 0, traceCtx);
    } finally {
      await this.flush(live);
    }
  }

  private async dispatch(
    live: LiveSession,
    topic: Topic,
    task: UserTaskMessage,
    hop: number,
    traceCtx: TraceContext,
  ): Promise<void> {
    const envelope: TaskEnvelope = { task, history: [...live.context.history], hop };
    await this.bus.publish(createEvent(topic, live.context.id, envelope, createTraceContext(traceCtx)));
  }

  /** Bus handler for agent topics: runs the subscribed agent on one task. */
  private async deliver(topic: Topic, event: SwitchboardEvent<TaskEnvelope>): Promise<void> {
    const live = this.sessions.get(event.sessionId);
    if (!live || live.context.status === "ended") return;
    const agent = this.registry.resolve(topic);
    const dispatcher = agent && this.dispatchers.get(agent);
    if (!agent || !dispatcher) {
      live.logger.warn({ topic }, "Task published on a topic without an agent");
      return;
    }

    const envelope = event.payload;
    const traceCtx = event.traceCtx;
    const logger = live.logger.child({ topic, hop: envelope.hop });
    const transfer: { pending?: PendingTransfer } = {};

    const callTool = async (
      name: string,
      args: Record<string, unknown>,
      options?: { callId?: string },
    ): Promise<ToolResult> => {
      live.abort.signal.throwIfAborted();
      const callId = options?.callId ?? uuidv7();
      const invocation = { sessionId: live.context.id, topic, callId, signal: live.abort.signal };
      const spec = dispatcher.resolve(name);

      if (spec?.isDelegate && transfer.pending) {
        const { target } = transfer.pending;
        logger.debug({ tool: name, pending: target }, "Ignoring additional transfer");
        return {
          callId,
          tool: name,
          output: `A transfer to ${target} is already pending. Only one transfer per turn is carried out.`,
          durationMs: 0,
        };
      }

      const recordCall = (): void => {
        live.context.append({ kind: "ToolCall", source: topic, payload: { callId, tool: name, args } });
      };

      let result: ToolResult;
      try {
        result = await dispatcher.invoke(name, args, invocation);
      } catch (err) {
        live.abort.signal.throwIfAborted();
        const failure =
          err instanceof ToolExecutionError
            ? err
            : new ToolExecutionError(name, "handler_failed", String(err), { cause: err });
        recordCall();
        live.context.append({
          kind: "ToolResult",
          source: topic,
          payload: { callId, tool: name, output: failure.message, isError: true },
        });
        logger.warn({ tool: name, reason: failure.reason }, "Tool call failed");
        throw failure;
      }
      live.abort.signal.throwIfAborted();

      if (result.delegateTo !== undefined) {
        transfer.pending = { target: result.delegateTo, callId, tool: name, args };
        return { ...result, output: `Transfer to ${result.delegateTo} scheduled.` };
      }

      recordCall();
      live.context.append({
        kind: "ToolResult",
        source: topic,
        payload: { callId, tool: name, output: result.output, isError: false },
      });
      logger.debug({ tool: name, durationMs: result.durationMs }, "Tool call completed");
      return result;
    };

    const ctx: AgentTurnContext = {
      topic,
      tools: agent.tools,
      get history() {
        return [...live.context.history];
      },
      callTool,
      signal: live.abort.signal,
      log: (entry: Omit<LogEntry, "sessionId" | "topic">) => {
        logger[entry.level]({ ...entry.data, traceId: (entry.traceCtx ?? traceCtx).traceId }, entry.message);
      },
    };

    const turn: AgentTurn = {
      sessionId: live.context.id,
      traceCtx,
      task: envelope.task,
      history: envelope.history,
    };

    let decision: AgentDecision;
    try {
      decision = await agent.handler.handleTask(turn, ctx);
    } catch (err) {
      if (this.isClosed(live)) return;
      logger.warn({ err }, "Agent failed to handle task");
      await this.respond(live, topic, describeFailure(err, this.config.defaultTopic), traceCtx);
      return;
    }
    if (this.isClosed(live)) return;

    if (decision.response !== undefined && decision.response !== "") {
      await this.respond(live, topic, decision.response, traceCtx);
    }
    if (this.isClosed(live)) return;

    const { pending } = transfer;
    const target = decision.delegateTo ?? pending?.target;
    if (target === undefined) return;
    const via = pending?.target === target ? pending : undefined;
    await this.handoff(live, topic, target, envelope, traceCtx, via);
  }

  /**
   * Record a transfer and move the session to `target`. The record, the topic
   * change and the re-delivery happen without yielding in between.
   */
  private async handoff(
    live: LiveSession,
    from: Topic,
    target: Topic,
    envelope: TaskEnvelope,
    traceCtx: TraceContext,
    via?: PendingTransfer,
  ): Promise<void> {
    const { context } = live;
    const callId = via?.callId ?? uuidv7();
    const tool = via?.tool ?? `transfer_to_${target}`;
    const args = via?.args ?? {};
    context.append({ kind: "ToolCall", source: from, payload: { callId, tool, args } });

    if (target === HUMAN_TOPIC) {
      context.append({
        kind: "ToolResult",
        source: from,
        payload: { callId, tool, output: "Transferred to a human operator.", isError: false, delegateTo: HUMAN_TOPIC },
      });
      context.setActiveTopic(HUMAN_TOPIC);
      context.setEscalated(true);
      live.logger.info({ from }, "Session escalated to a human operator");
      await this.publishSystem("system.escalated", live, { from }, traceCtx);
      await this.respond(live, HUMAN_TOPIC, this.config.escalationNotice, traceCtx);
      return;
    }

    const hop = envelope.hop + 1;
    let failure: RoutingError | undefined;
    if (!this.registry.has(target)) {
      failure = new RoutingError(target);
    } else if (hop > this.config.maxHandoffsPerTurn) {
      failure = new RoutingError(
        target,
        `Handoff limit of ${this.config.maxHandoffsPerTurn} per message reached`,
      );
    }

    if (failure) {
      context.append({
        kind: "ToolResult",
        source: from,
        payload: { callId, tool, output: failure.message, isError: true },
      });
      await this.revertToDefault(live, failure, traceCtx);
      return;
    }

    context.append({
      kind: "ToolResult",
      source: from,
      payload: {
        callId,
        tool,
        output: `Transferred to ${target}. Adopt persona immediately.`,
        isError: false,
        delegateTo: target,
      },
    });
    context.setActiveTopic(target);
    live.logger.info({ from, to: target, hop }, "Session handed off");
    await this.publishSystem("system.handoff", live, { from, to: target }, traceCtx);
    await this.dispatch(live, target, envelope.task, hop, traceCtx);
  }

  private async revertToDefault(live: LiveSession, err: RoutingError, traceCtx: TraceContext): Promise<void> {
    const { defaultTopic } = this.config;
    live.context.setActiveTopic(defaultTopic);
    live.logger.warn({ topic: err.topic, err: err.message }, "Routing failed, reverting to default topic");
    await this.publishSystem("system.routing_error", live, { topic: err.topic, message: err.message }, traceCtx);
    await this.respond(live, defaultTopic, routingNotice(err, defaultTopic), traceCtx);
  }

  /** Append an AgentResponse and publish it to the user topic. */
  private async respond(live: LiveSession, source: Topic, text: string, traceCtx: TraceContext): Promise<void> {
    const message = live.context.append({ kind: "AgentResponse", source, payload: text });
    await this.bus.publish(createEvent(USER_TOPIC, live.context.id, message, traceCtx));
  }

  // ---------------------------------------------------------------------------
  // Session bookkeeping
  // ---------------------------------------------------------------------------

  private track(context: SessionContext, hydrated: boolean): LiveSession {
    const live: LiveSession = {
      context,
      queue: new SerialQueue(),
      channel: new UserChannel(),
      abort: new AbortController(),
      logger: this.logger.child({ sessionId: context.id }),
      hydrated,
      resumed: false,
      persisting: Promise.resolve(),
    };
    this.sessions.set(context.id, live);
    return live;
  }

  private async requireSession(sessionId: SessionId): Promise<LiveSession> {
    this.assertStarted();
    const live = this.sessions.get(sessionId);
    if (live) return live;

    if (this.store) {
      let loading = this.hydrating.get(sessionId);
      if (!loading) {
        loading = this.hydrate(sessionId).finally(() => this.hydrating.delete(sessionId));
        this.hydrating.set(sessionId, loading);
      }
      const hydrated = await loading;
      if (hydrated) return hydrated;
    }
    throw new SessionNotFoundError(sessionId);
  }

  private async hydrate(sessionId: SessionId): Promise<LiveSession | undefined> {
    const stored = await this.store?.get(sessionId);
    if (!stored || stored.status !== "active") return undefined;
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;
    const live = this.track(SessionContext.restore(stored), true);
    live.logger.info({ messages: stored.history.length, topic: stored.activeTopic }, "Session restored from store");
    return live;
  }

  private async endSession(live: LiveSession, reason: string): Promise<void> {
    const { context } = live;
    if (context.status === "ended") return;
    live.abort.abort(new Error(`Session closed: ${reason}`));
    context.end();
    this.sessions.delete(context.id);
    live.channel.close(reason);
    await this.flush(live);
    await this.publishSystem("system.session.ended", live, { reason }, createTraceContext());
    live.logger.info({ reason }, "Session ended");
  }

  /** Persist new messages and metadata. Store failures are logged. */
  private flush(live: LiveSession): Promise<void> {
    const run = live.persisting.then(() => this.persist(live));
    live.persisting = run;
    return run;
  }

  private async persist(live: LiveSession): Promise<void> {
    const { store } = this;
    if (!store) return;
    const { context } = live;
    const unsaved = context.unsaved();
    const count = context.history.length;
    try {
      if (!context.isPersisted) {
        await store.create(context.snapshot());
      } else {
        if (unsaved.length > 0) {
          await store.append(context.id, unsaved);
        }
        await store.update(context.id, {
          status: context.status,
          activeTopic: context.activeTopic,
          escalated: context.escalated,
          lastActiveAt: context.lastActiveAt,
        });
      }
      context.markPersisted(count);
    } catch (err) {
      live.logger.error({ err }, "Failed to persist session");
    }
  }

  private async publishSystem(
    topic: SystemTopic,
    live: LiveSession,
    payload: Record<string, unknown>,
    traceCtx: TraceContext,
  ): Promise<void> {
    await this.bus.publish(createEvent(topic, live.context.id, payload, traceCtx));
  }

  private isClosed(live: LiveSession): boolean {
    return live.abort.signal.aborted || live.context.status === "ended";
  }

  private assertStarted(): void {
    if (!this.started) {
      throw new SwitchboardError("INVALID_STATE", "Runtime has not been started");
    }
  }
}
