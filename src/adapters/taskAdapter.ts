import { execFile } from "node:child_process";
import { promisify } from "node:util";
import YAML from "yaml";

import { AdapterFailure, errorMessage } from "../domain/errors";
import { type System, type SystemType, type Task, taskResponseSchema } from "../domain/types";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/** Runs `file` with `args`; rejects on a non-zero exit. */
export type CommandRunner = (
  file: string,
  args: string[],
  env: NodeJS.ProcessEnv,
) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (file, args, env) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    env,
    encoding: "utf8",
    maxBuffer: 10 * 1024 * 1024,
  });
  return { stdout, stderr };
};

/** Capability the workflow uses to look tasks up; tests substitute their own. */
export interface TaskAdapter {
  fetch(system: System, taskId: string): Promise<Task>;
  requiresHook(system: System): boolean;
}

interface FetchStrategy {
  requiresHook: boolean;
  fetch(system: System, taskId: string): Promise<Task>;
}

export interface CommandTaskAdapterOptions {
  run?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

export class CommandTaskAdapter implements TaskAdapter {
  private readonly run: CommandRunner;
  private readonly env: NodeJS.ProcessEnv;
  private readonly strategies: Record<SystemType, FetchStrategy>;

  constructor(options: CommandTaskAdapterOptions = {}) {
    this.run = options.run ?? runCommand;
    this.env = options.env ?? process.env;
    this.strategies = {
      generic: {
        requiresHook: true,
        fetch: (system, taskId) => this.fetchFromCommand(system, taskId),
      },
      plain: {
        requiresHook: false,
        fetch: async (system, taskId) => ({ id: taskId, system }),
      },
    };
  }

  fetch(system: System, taskId: string): Promise<Task> {
    return this.strategies[system.type].fetch(system, taskId);
  }

  requiresHook(system: System): boolean {
    return this.strategies[system.type].requiresHook;
  }

  private async fetchFromCommand(system: System, taskId: string): Promise<Task> {
    const [file, ...baseArgs] = (system.command ?? "").trim().split(/\s+/).filter(Boolean);
    if (!file) {
      throw new AdapterFailure(system.name, taskId, "no command configured");
    }

    let result: CommandResult;
    try {
      result = await this.run(file, [...baseArgs, taskId], {
        ...this.env,
        TASKBRANCH_TASK: taskId,
        TASKBRANCH_SYSTEM: system.name,
      });
    } catch (error) {
      throw new AdapterFailure(system.name, taskId, describeCommandError(file, error), {
        cause: error,
      });
    }

    return parseTaskResponse(system, taskId, result.stdout);
  }
}

export function parseTaskResponse(system: System, taskId: string, stdout: string): Task {
  if (stdout.trim().length === 0) {
    throw new AdapterFailure(system.name, taskId, "adapter produced no output");
  }

  let data: unknown;
  try {
    data = YAML.parse(stdout);
  } catch (error) {
    throw new AdapterFailure(system.name, taskId, `unreadable output: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const parsed = taskResponseSchema.safeParse(data);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "output");
    throw new AdapterFailure(
      system.name,
      taskId,
      `malformed response (${Array.from(new Set(fields)).join(", ")})`,
      { cause: parsed.error },
    );
  }

  return { ...parsed.data, system };
}

function describeCommandError(file: string, error: unknown): string {
  if (error instanceof Error) {
    if ("code" in error && error.code === "ENOENT") {
      return `command not found: ${file}`;
    }
    const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr.trim() : "";
    if (stderr) {
      return stderr;
    }
  }
  return errorMessage(error);
}
