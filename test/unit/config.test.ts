import { describe, it } from "node:test";
import assert from "node:assert";
import { loadConfig } from "../../src/config.ts";

describe("loadConfig", () => {
  it("should fall back to defaults", () => {
    assert.deepStrictEqual(loadConfig({}), {
      store: "memory",
      path: "",
      wal: true,
      logLevel: "warn",
    });
  });

  it("should pick a default path per store", () => {
    assert.strictEqual(loadConfig({ SHELFDB_STORE: "json" }).path, "./data/shelf.json");
    assert.strictEqual(loadConfig({ SHELFDB_STORE: "sqlite" }).path, "./data/shelf.sqlite");
  });

  it("should read every variable", () => {
    const config = loadConfig({
      SHELFDB_STORE: " SQLite ",
      SHELFDB_PATH: ":memory:",
      SHELFDB_WAL: "0",
      SHELFDB_LOG_LEVEL: "DEBUG",
    });
    assert.deepStrictEqual(config, { store: "sqlite", path: ":memory:", wal: false, logLevel: "debug" });
  });

  it("should reject unknown values, naming the variable", () => {
    assert.throws(
      () => loadConfig({ SHELFDB_STORE: "redis" }),
      { message: 'SHELFDB_STORE must be one of memory, json, sqlite; got "redis"' }
    );
    assert.throws(() => loadConfig({ SHELFDB_WAL: "maybe" }), /SHELFDB_WAL must be true or false/);
  });

  it("should return a frozen object", () => {
    assert.ok(Object.isFrozen(loadConfig({})));
  });
});
