import { test, expect } from "vitest";

import { loadServerConfigFromEnv } from "../src/config.js";

test("defaults apply when nothing is set", () => {
  expect(loadServerConfigFromEnv({})).toEqual({
    host: "0.0.0.0",
    port: 8080,
    syncPath: "/scene",
    maxPayloadBytes: 67_108_864,
    maxQueuedMessages: 10_000,
    maxQueuedBytes: 67_108_864,
    debug: false,
  });
});

test("reads overrides from the environment", () => {
  expect(
    loadServerConfigFromEnv({
      HOST: " 127.0.0.1 ",
      PORT: "9000",
      SCENEWIRE_SYNC_PATH: "/sync",
      SCENEWIRE_MAX_PAYLOAD_BYTES: "1024",
      SCENEWIRE_MAX_QUEUED_MESSAGES: "50",
      SCENEWIRE_MAX_QUEUED_BYTES: "4096",
      SCENEWIRE_DEBUG: "TRUE",
    })
  ).toEqual({
    host: "127.0.0.1",
    port: 9000,
    syncPath: "/sync",
    maxPayloadBytes: 1024,
    maxQueuedMessages: 50,
    maxQueuedBytes: 4096,
    debug: true,
  });
});

test("blank values fall back to defaults", () => {
  const config = loadServerConfigFromEnv({ HOST: "  ", PORT: "", SCENEWIRE_DEBUG: "0" });
  expect(config.host).toBe("0.0.0.0");
  expect(config.port).toBe(8080);
  expect(config.debug).toBe(false);
});

test("rejects invalid values", () => {
  expect(() => loadServerConfigFromEnv({ PORT: "abc" })).toThrow("invalid PORT: abc");
  expect(() => loadServerConfigFromEnv({ PORT: "70000" })).toThrow("invalid PORT: 70000");
  expect(() => loadServerConfigFromEnv({ PORT: "-1" })).toThrow("invalid PORT: -1");
  expect(() => loadServerConfigFromEnv({ SCENEWIRE_SYNC_PATH: "scene" })).toThrow("invalid SCENEWIRE_SYNC_PATH: scene");
  expect(() => loadServerConfigFromEnv({ SCENEWIRE_MAX_QUEUED_MESSAGES: "1.5" })).toThrow(
    "invalid SCENEWIRE_MAX_QUEUED_MESSAGES: 1.5"
  );
  expect(() => loadServerConfigFromEnv({ SCENEWIRE_DEBUG: "yes" })).toThrow("invalid SCENEWIRE_DEBUG: yes");
});
