import { ConfigError } from "./core/errors.js";

export interface AppConfig {
  port: number;
  /** Message file loaded at startup. */
  messageFile?: string;
  /** Load the bundled sample messages at startup. */
  seed: boolean;
}

export type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: parsePort(env.PORT),
    messageFile: env.MAIL_INDEX_FILE || undefined,
    seed: parseFlag("MAIL_INDEX_SEED", env.MAIL_INDEX_SEED),
  };
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw === "") return 3000;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError("PORT", `must be an integer between 0 and 65535, got "${raw}"`);
  }
  return port;
}

function parseFlag(name: string, raw: string | undefined): boolean {
  if (raw === undefined || raw === "" || raw === "0") return false;
  if (raw === "1") return true;
  throw new ConfigError(name, `must be "0" or "1", got "${raw}"`);
}
