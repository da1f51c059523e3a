import { readFile } from "node:fs/promises";
import path from "node:path";
import { ConfigError, errorMessage } from "./errors.js";

export type Config = {
  excludedExtensions: string[];
  excludedDirectories: string[];
  imageDirectory: string;
  displaySeconds: number;
  port: number;
  templatePath: string;
  logFile?: string;
};

export const defaultConfig: Readonly<Config> = Object.freeze({
  excludedExtensions: [".mp4", ".mov", ".heic"],
  excludedDirectories: [],
  imageDirectory: "/mnt/photos",
  displaySeconds: 10,
  port: 8080,
  templatePath: "./index.html",
});

export const CONFIG_ENV = "PICTURE_FRAME_CONFIG";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringList(raw: Record<string, unknown>, key: keyof Config) {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
    throw new ConfigError(`${key} must be a list of strings`);
  }
  return [...value];
}

function string(raw: Record<string, unknown>, key: keyof Config) {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value === "") {
    throw new ConfigError(`${key} must be a non-empty string`);
  }
  return value;
}

function number(raw: Record<string, unknown>, key: keyof Config) {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number`);
  }
  return value;
}

export function parseConfig(raw: unknown): Config {
  if (!isRecord(raw)) {
    throw new ConfigError("config must be a JSON object");
  }

  const imageDirectory =
    string(raw, "imageDirectory") ?? defaultConfig.imageDirectory;
  if (!path.isAbsolute(imageDirectory)) {
    throw new ConfigError("imageDirectory must be an absolute path");
  }

  const displaySeconds = Math.max(
    1,
    Math.floor(number(raw, "displaySeconds") ?? defaultConfig.displaySeconds)
  );

  const port = number(raw, "port") ?? defaultConfig.port;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError("port must be an integer between 0 and 65535");
  }

  const config: Config = {
    excludedExtensions:
      stringList(raw, "excludedExtensions") ?? [
        ...defaultConfig.excludedExtensions,
      ],
    excludedDirectories:
      stringList(raw, "excludedDirectories") ?? [
        ...defaultConfig.excludedDirectories,
      ],
    imageDirectory,
    displaySeconds,
    port,
    templatePath: string(raw, "templatePath") ?? defaultConfig.templatePath,
  };
  const logFile = string(raw, "logFile");
  if (logFile) config.logFile = logFile;
  return config;
}

/**
 * Without a path the defaults apply. With one, a missing or malformed
 * file is a ConfigError.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  if (!configPath) return parseConfig({});

  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (err) {
    throw new ConfigError(
      `cannot read config ${configPath}: ${errorMessage(err)}`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `cannot parse config ${configPath}: ${errorMessage(err)}`
    );
  }
  return parseConfig(raw);
}

export function resolveConfigPath(
  argv: readonly string[],
  env: NodeJS.ProcessEnv
): string | undefined {
  return argv[0] || env[CONFIG_ENV] || undefined;
}
