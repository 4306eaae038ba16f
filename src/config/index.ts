import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse } from "yaml";
import type { ZodError } from "zod";
import { appConfigSchema } from "./schema";
import type { AppConfig, ChannelConfig } from "./schema";

export const DEFAULT_CONFIG_PATH = "./config.yaml";

/** `CONFIG_PATH` from the environment, else `./config.yaml`, made absolute. */
export function resolveConfigPath(env: NodeJS.ProcessEnv): string {
  return resolve(env["CONFIG_PATH"] ?? DEFAULT_CONFIG_PATH);
}

function readYamlDocument(configPath: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let document: unknown;
  try {
    document = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }
  if (document === null || document === undefined) {
    throw new Error(`config file at ${configPath} is empty, see config.example.yaml`);
  }
  return document;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("\n");
}

/**
 * Reads and validates the digest configuration. Unreadable files, malformed
 * YAML, an empty document and schema violations each raise their own error;
 * schema violations list every offending key.
 */
export function loadConfig(configPath: string): AppConfig {
  const result = appConfigSchema.safeParse(readYamlDocument(configPath));
  if (!result.success) {
    throw new Error(`invalid configuration in ${configPath}:\n${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Turns the configured "HH:MM" into a daily cron expression.
 */
export function toDailyCron(time: string): string {
  const [hour = "8", minute = "0"] = time.split(":");
  return `${parseInt(minute, 10)} ${parseInt(hour, 10)} * * *`;
}

export { loadSecrets } from "./env";
export type { Secrets } from "./env";
export type { AppConfig, ChannelConfig };
