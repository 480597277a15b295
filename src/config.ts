import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { z } from "zod";
import { errorMessage } from "./logging.js";
import type { AppConfig, CliOptions } from "./types.js";

export const CONFIG_FILE_NAME = "rev.json";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const fileConfigSchema = z
  .object({
    requested: z.string().min(1).optional(),
    org: z.string().min(1).optional(),
    labels: z.array(z.string().min(1)).optional(),
    pageSize: z.number().int().min(1).max(100).optional(),
    hardCap: z.number().int().min(1).optional(),
    circular: z.boolean().optional(),
    truncate: z.boolean().optional()
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export const DEFAULT_FILE_CONFIG: FileConfig = {
  labels: [],
  pageSize: 20,
  hardCap: 100,
  circular: false,
  truncate: true
};

export function configHome(env: NodeJS.ProcessEnv = process.env): string {
  if (env.REV_CONFIG_HOME) {
    return env.REV_CONFIG_HOME;
  }

  return join(env.XDG_CONFIG_HOME || join(homedir(), ".config"), "rev");
}

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(configHome(env), CONFIG_FILE_NAME);
}

export function readConfigFile(path: string): FileConfig {
  if (!existsSync(path)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigError(`Could not read ${path}: ${errorMessage(error)}`);
  }

  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${path}: ${details}`);
  }

  return parsed.data;
}

/** Writes the default config file unless one exists. Returns whether it wrote. */
export function writeDefaultConfig(path: string): boolean {
  if (existsSync(path)) {
    return false;
  }

  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, `${JSON.stringify(DEFAULT_FILE_CONFIG, null, 2)}\n`, "utf8");
  return true;
}

export function resolveConfig(
  options: CliOptions,
  file: FileConfig,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const labels = options.labels && options.labels.length > 0 ? options.labels : file.labels;

  return {
    filter: {
      requested: options.requested ?? file.requested,
      org: options.org ?? file.org,
      labels: labels && labels.length > 0 ? labels : undefined
    },
    pageSize: file.pageSize ?? 20,
    hardCap: options.hardCap ?? file.hardCap ?? 100,
    circular: file.circular ?? false,
    truncate: file.truncate ?? true,
    githubToken: env.GITHUB_API_TOKEN || null
  };
}

export function loadConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): AppConfig {
  return resolveConfig(options, readConfigFile(configPath(env)), env);
}
