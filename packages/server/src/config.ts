import { readFile } from "node:fs/promises";
import { z } from "zod";

import { DEFAULT_QUESTION_API_URL } from "./adapters/OpenTriviaQuestionProvider.js";
import { createGameConfig, type GameConfig } from "./core.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export interface ServerConfig {
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly questionApiUrl: string;
  readonly game: GameConfig;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "ConfigError";
  }

  static because(source: string, issues: readonly string[]): ConfigError {
    return new ConfigError(`Invalid configuration in ${source}: ${issues.join("; ")}`, issues);
  }
}

const portSchema = z.number().int().min(0).max(65_535);
const playersPerGameSchema = z.number().int().min(1);
const roundDurationMsSchema = z.number().int().positive();

const fileSettingsSchema = z
  .object({
    port: portSchema,
    logLevel: z.enum(LOG_LEVELS),
    questionApiUrl: z.string().url(),
    playersPerGame: playersPerGameSchema,
    roundDurationMs: roundDurationMsSchema,
  })
  .partial()
  .strict();

// environment values are always strings
const envSettingsSchema = z
  .object({
    port: z.coerce.number().pipe(portSchema),
    logLevel: z.enum(LOG_LEVELS),
    questionApiUrl: z.string().url(),
    playersPerGame: z.coerce.number().pipe(playersPerGameSchema),
    roundDurationMs: z.coerce.number().pipe(roundDurationMsSchema),
  })
  .partial()
  .strict();

type Settings = z.infer<typeof fileSettingsSchema>;
type SettingsSchema = z.ZodType<Settings, z.ZodTypeDef, unknown>;

export interface LoadServerConfigOptions {
  readonly env?: NodeJS.ProcessEnv;
  /** Path of a JSON file whose keys match {@link Settings} */
  readonly configFile?: string;
}

const DEFAULT_PORT = 9999;

export async function loadServerConfig({
  env = process.env,
  configFile,
}: LoadServerConfigOptions = {}): Promise<ServerConfig> {
  const fromFile = configFile ? await readSettingsFile(configFile) : {};
  const fromEnv = parseSettings("environment", envSettingsSchema, {
    port: env["PORT"],
    logLevel: env["LOG_LEVEL"],
    questionApiUrl: env["QUESTION_API_URL"],
    playersPerGame: env["PLAYERS_PER_GAME"],
    roundDurationMs: env["ROUND_DURATION_MS"],
  });

  const settings: Settings = { ...fromFile, ...fromEnv };

  return {
    port: settings.port ?? DEFAULT_PORT,
    logLevel: settings.logLevel ?? "info",
    questionApiUrl: settings.questionApiUrl ?? DEFAULT_QUESTION_API_URL,
    game: createGameConfig({
      ...(settings.playersPerGame !== undefined
        ? { playersPerGame: settings.playersPerGame }
        : {}),
      ...(settings.roundDurationMs !== undefined
        ? { roundDurationMs: settings.roundDurationMs }
        : {}),
    }),
  };
}

async function readSettingsFile(path: string): Promise<Settings> {
  const text = await readFile(path, "utf8");

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw ConfigError.because(path, [
      error instanceof Error ? error.message : "not valid JSON",
    ]);
  }

  return parseSettings(path, fileSettingsSchema, payload);
}

function parseSettings(source: string, schema: SettingsSchema, raw: unknown): Settings {
  const candidate =
    typeof raw === "object" && raw !== null
      ? Object.fromEntries(
          Object.entries(raw).filter(([, value]) => value !== undefined && value !== ""),
        )
      : raw;

  const parsed = schema.safeParse(candidate);
  if (!parsed.success) {
    throw ConfigError.because(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`),
    );
  }
  return parsed.data;
}
