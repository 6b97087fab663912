import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import YAML from "yaml";

import { ConfigError, errorMessage } from "../domain/errors";
import {
  configInputSchema,
  DEFAULT_PROTECTED_BRANCHES,
  type TaskBranchConfig,
  toSystem,
} from "../domain/types";

export const CONFIG_ENV_VAR = "TASKBRANCH_CONFIG_FILE";
export const REPO_CONFIG_NAME = ".taskbranch.yml";

export interface LocateConfigOptions {
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
  repoRoot?: string;
  homeDir?: string;
}

/**
 * Explicit paths (flag, then environment) are returned even when missing so
 * that reading them fails loudly. Default locations only count when present.
 */
export async function locateConfigFile(options: LocateConfigOptions): Promise<string | undefined> {
  const env = options.env ?? process.env;
  if (options.explicitPath) {
    return path.resolve(options.explicitPath);
  }
  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return path.resolve(fromEnv);
  }

  const candidates: string[] = [];
  if (options.repoRoot) {
    candidates.push(path.join(options.repoRoot, REPO_CONFIG_NAME));
  }
  const configHome = env.XDG_CONFIG_HOME || path.join(options.homeDir ?? os.homedir(), ".config");
  candidates.push(path.join(configHome, "taskbranch", "config.yml"));

  for (const candidate of candidates) {
    if (await fs.pathExists(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

export async function readConfigFile(filePath: string): Promise<TaskBranchConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigError("config file not found", filePath, { cause: error });
    }
    throw new ConfigError(errorMessage(error), filePath, { cause: error });
  }
  return parseConfig(raw, filePath);
}

export function parseConfig(raw: string, filePath: string): TaskBranchConfig {
  let data: unknown;
  try {
    data = YAML.parse(raw);
  } catch (error) {
    throw new ConfigError(`invalid YAML: ${errorMessage(error)}`, filePath, { cause: error });
  }

  const parsed = configInputSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      )
      .join("; ");
    throw new ConfigError(details, filePath, { cause: parsed.error });
  }

  return {
    path: filePath,
    systems: parsed.data.systems.map(toSystem),
    upstream: parsed.data.upstream,
    protectedBranches: parsed.data.protected ?? [...DEFAULT_PROTECTED_BRANCHES],
  };
}

export async function loadConfig(
  options: LocateConfigOptions,
): Promise<TaskBranchConfig | undefined> {
  const location = await locateConfigFile(options);
  if (!location) {
    return undefined;
  }
  return readConfigFile(location);
}
