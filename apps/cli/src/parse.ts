/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax; bad values throw ConfigError.
 */
import { readFile } from "node:fs/promises";
import { ConfigError } from "@lexcov/core";

export type KV = Record<string, string>;

export function parseKV(args: string[]): KV {
  const result: KV = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function requireArg(kv: KV, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new ConfigError({ message: `Missing required argument: --${key}${label ? ` (${label})` : ""}` });
  }
  return val;
}

export function optionalArg(kv: KV, key: string): string | undefined {
  const val = kv[key];
  return val ? val : undefined;
}

export function intArg(kv: KV, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = Number(val);
  if (!Number.isInteger(n)) {
    throw new ConfigError({ message: `--${key} must be an integer, got "${val}"` });
  }
  return n;
}

export function floatArg(kv: KV, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = Number(val);
  if (!Number.isFinite(n)) {
    throw new ConfigError({ message: `--${key} must be a number, got "${val}"` });
  }
  return n;
}

export function strArg(kv: KV, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function boolArg(kv: KV, key: string, defaultVal: boolean): boolean {
  const val = kv[key];
  if (!val) return defaultVal;
  return val === "true" || val === "1";
}

/** Load a JSON config file and merge with CLI overrides. */
export async function loadConfig(kv: KV): Promise<KV> {
  const configPath = kv["config"];
  if (!configPath) return kv;

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(configPath, "utf-8"));
  } catch (cause) {
    throw new ConfigError({ message: `Failed to load config file "${configPath}"`, cause });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError({ message: `Config file "${configPath}" must contain a JSON object` });
  }

  const config: KV = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      config[key] = String(value);
    } else {
      throw new ConfigError({ message: `Config key "${key}" in "${configPath}" must be a string, number or boolean` });
    }
  }
  // CLI overrides take precedence
  return { ...config, ...kv };
}
