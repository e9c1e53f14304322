import fs from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const ServerSchema = z
  .object({
    bind: z.string().default("127.0.0.1"),
    port: z.number().int().min(0).max(65535).default(8000),
  })
  .default({});

const RuntimeSchema = z
  .object({
    defaultTopic: z.string().min(1).default("triage"),
    greeting: z
      .string()
      .default("Hello! I'm the project assistant. How can I help you today?"),
    resumeGreeting: z
      .string()
      .default("Welcome back! Let's pick up where we left off."),
    farewell: z.string().default("Goodbye! Your session has ended."),
    exitCommand: z.string().min(1).default("exit"),
    escalationNotice: z
      .string()
      .default("I've passed your conversation to a human operator. They will reply here shortly."),
    maxHandoffsPerTurn: z.number().int().min(1).default(5),
    idleTimeoutMs: z.number().int().min(0).default(30 * 60_000),
  })
  .default({});

const ProviderSchema = z
  .object({
    kind: z.enum(["openai", "ollama"]).default("openai"),
    model: z.string().min(1).default("gpt-4o-mini"),
    baseUrl: z.string().url().optional(),
    timeoutMs: z.number().int().positive().default(60_000),
  })
  .default({});

const PersistenceSchema = z
  .object({
    dbPath: z.string().min(1).optional(),
  })
  .default({});

const WorkspaceSchema = z
  .object({
    documentsDir: z.string().min(1).default("./workspace/documents"),
    knowledgeDir: z.string().min(1).default("./workspace/knowledge"),
  })
  .default({});

const LoggingSchema = z
  .object({
    level: LogLevelSchema.default("info"),
  })
  .default({});

export const SwitchboardConfigSchema = z.object({
  server: ServerSchema,
  runtime: RuntimeSchema,
  provider: ProviderSchema,
  persistence: PersistenceSchema,
  workspace: WorkspaceSchema,
  logging: LoggingSchema,
});

export type SwitchboardConfig = z.infer<typeof SwitchboardConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Load configuration from a YAML file. A missing file yields the defaults.
 * `PORT`, `LOG_LEVEL` and `SWITCHBOARD_DB_PATH` override the file.
 */
export function loadConfig(
  path: string,
  env: Record<string, string | undefined> = process.env,
): SwitchboardConfig {
  let raw: unknown = {};
  if (fs.existsSync(path)) {
    try {
      raw = yaml.load(fs.readFileSync(path, "utf8")) ?? {};
    } catch (err) {
      throw new ConfigError(`Could not parse ${path}: ${errorMessage(err)}`, { cause: err });
    }
  }
  return parseConfig(raw, env, path);
}

export function parseConfig(
  raw: unknown,
  env: Record<string, string | undefined> = {},
  source = "configuration",
): SwitchboardConfig {
  const parsed = SwitchboardConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${source}: ${detail}`, { cause: parsed.error });
  }
  return applyEnv(parsed.data, env);
}

function applyEnv(
  config: SwitchboardConfig,
  env: Record<string, string | undefined>,
): SwitchboardConfig {
  let { server, logging, persistence } = config;

  if (env.PORT !== undefined && env.PORT !== "") {
    const port = z.coerce.number().int().min(0).max(65535).safeParse(env.PORT);
    if (!port.success) {
      throw new ConfigError(`Invalid PORT: ${env.PORT}`);
    }
    server = { ...server, port: port.data };
  }

  if (env.LOG_LEVEL !== undefined && env.LOG_LEVEL !== "") {
    const level = LogLevelSchema.safeParse(env.LOG_LEVEL);
    if (!level.success) {
      throw new ConfigError(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}`);
    }
    logging = { ...logging, level: level.data };
  }

  if (env.SWITCHBOARD_DB_PATH !== undefined && env.SWITCHBOARD_DB_PATH !== "") {
    persistence = { ...persistence, dbPath: env.SWITCHBOARD_DB_PATH };
  }

  return { ...config, server, logging, persistence };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
