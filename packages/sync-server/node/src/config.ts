export type ServerConfig = {
  host: string;
  port: number;
  syncPath: string;
  maxPayloadBytes: number;
  maxQueuedMessages: number;
  maxQueuedBytes: number;
  debug: boolean;
};

export type Env = Record<string, string | undefined>;

const DEFAULT_PORT = 8080;
const DEFAULT_MAX_BYTES = 64 * 1024 * 1024;
const DEFAULT_MAX_QUEUED_MESSAGES = 10_000;

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value <= 0) throw new Error(`invalid ${name}: ${raw}`);
  return value;
}

function flag(env: Env, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "" || raw === "0" || raw === "false") return false;
  if (raw === "1" || raw === "true") return true;
  throw new Error(`invalid ${name}: ${env[name]}`);
}

export function loadServerConfigFromEnv(env: Env = process.env): ServerConfig {
  const host = env.HOST?.trim() || "0.0.0.0";
  const port = positiveInt(env, "PORT", DEFAULT_PORT);
  if (port > 65535) throw new Error(`invalid PORT: ${env.PORT}`);

  const syncPath = env.SCENEWIRE_SYNC_PATH?.trim() || "/scene";
  if (!syncPath.startsWith("/")) throw new Error(`invalid SCENEWIRE_SYNC_PATH: ${syncPath}`);

  return {
    host,
    port,
    syncPath,
    maxPayloadBytes: positiveInt(env, "SCENEWIRE_MAX_PAYLOAD_BYTES", DEFAULT_MAX_BYTES),
    maxQueuedMessages: positiveInt(env, "SCENEWIRE_MAX_QUEUED_MESSAGES", DEFAULT_MAX_QUEUED_MESSAGES),
    maxQueuedBytes: positiveInt(env, "SCENEWIRE_MAX_QUEUED_BYTES", DEFAULT_MAX_BYTES),
    debug: flag(env, "SCENEWIRE_DEBUG"),
  };
}
