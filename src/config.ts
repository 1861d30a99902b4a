/**
 * Runtime configuration read from environment variables.
 *
 * | Variable            | Values                        | Default                 |
 * | ------------------- | ----------------------------- | ----------------------- |
 * | `SHELFDB_STORE`     | `memory`, `json`, `sqlite`    | `memory`                |
 * | `SHELFDB_PATH`      | file path                     | `./data/shelf.<ext>`    |
 * | `SHELFDB_WAL`       | `true`, `false`               | `true`                  |
 * | `SHELFDB_LOG_LEVEL` | `debug` ... `silent`          | `warn`                  |
 */
import { LOG_LEVELS, type LogLevel } from "./logger.ts";

export type StoreKind = "memory" | "json" | "sqlite";

const STORE_KINDS: readonly StoreKind[] = ["memory", "json", "sqlite"];

export interface ShelfConfig {
  readonly store: StoreKind;
  /** File backing the sqlite store; base name of the json store's per-collection files. */
  readonly path: string;
  /** Use SQLite write-ahead logging. */
  readonly wal: boolean;
  readonly logLevel: LogLevel;
}

const DEFAULT_PATHS: Record<StoreKind, string> = {
  memory: "",
  json: "./data/shelf.json",
  sqlite: "./data/shelf.sqlite",
};

type Environment = Record<string, string | undefined>;

/**
 * Build a configuration from an environment.
 *
 * @param env - Variables to read (defaults to `process.env`)
 * @throws Error naming the variable when a value is not recognized
 *
 * @example
 * ```typescript
 * const config = loadConfig({ SHELFDB_STORE: "sqlite", SHELFDB_PATH: ":memory:" });
 * ```
 */
export function loadConfig(env: Environment = process.env): ShelfConfig {
  const store = parseChoice("SHELFDB_STORE", env.SHELFDB_STORE, STORE_KINDS, "memory");
  const logLevel = parseChoice("SHELFDB_LOG_LEVEL", env.SHELFDB_LOG_LEVEL, LOG_LEVELS, "warn");

  return Object.freeze({
    store,
    path: env.SHELFDB_PATH || DEFAULT_PATHS[store],
    wal: parseBoolean("SHELFDB_WAL", env.SHELFDB_WAL, true),
    logLevel,
  });
}

function parseChoice<T extends string>(
  name: string,
  raw: string | undefined,
  choices: readonly T[],
  fallback: T
): T {
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = raw.trim().toLowerCase();
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new Error(`${name} must be one of ${choices.join(", ")}; got "${raw}"`);
  }
  return match;
}

function parseBoolean(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === "") {
    return fallback;
  }
  switch (raw.trim().toLowerCase()) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      throw new Error(`${name} must be true or false; got "${raw}"`);
  }
}
