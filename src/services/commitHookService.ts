import path from "node:path";
import fs from "fs-extra";

import type { BranchStore } from "../adapters/branchStore";
import { withMessageBuffer } from "../adapters/messageBuffer";
import type { TaskAdapter } from "../adapters/taskAdapter";
import { errorMessage } from "../domain/errors";
import { renderAnnotation } from "../domain/rendering";
import type { Task } from "../domain/types";
import type { ConfigResolver } from "./configResolver";

export const HOOK_NAME = "prepare-commit-msg";
export const HOOK_MARKER = "# taskbranch:prepare-commit-msg";

export const HOOK_SCRIPT = `#!/bin/sh
${HOOK_MARKER}
# Adds the current task to commit messages. Never blocks a commit.
command -v git-taskbranch >/dev/null 2>&1 || exit 0
git-taskbranch hook "$@"
exit 0
`;

export type HookInstallOutcome = "installed" | "present" | "foreign";

export interface HookInstallResult {
  outcome: HookInstallOutcome;
  path: string;
}

export async function installHook(hooksDir: string): Promise<HookInstallResult> {
  const hookPath = path.join(hooksDir, HOOK_NAME);
  let existing: string | undefined;
  try {
    existing = await fs.readFile(hookPath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw error;
    }
  }

  if (existing !== undefined) {
    return { outcome: existing.includes(HOOK_MARKER) ? "present" : "foreign", path: hookPath };
  }

  await fs.ensureDir(hooksDir);
  await fs.writeFile(hookPath, HOOK_SCRIPT, { encoding: "utf8", mode: 0o755 });
  await fs.chmod(hookPath, 0o755);
  return { outcome: "installed", path: hookPath };
}

export type AnnotationSkipReason =
  | "no-branch"
  | "no-config"
  | "unresolved"
  | "already-present"
  | "error";

export interface PrepareMessageOptions {
  messageFile: string;
}

export interface PrepareMessageResult {
  annotated: boolean;
  line?: string;
  skipped?: AnnotationSkipReason;
  /** Problems that degraded the annotation without blocking the commit. */
  warnings: string[];
}

export interface CommitHookDeps {
  store: BranchStore;
  adapter: TaskAdapter;
  resolver?: ConfigResolver;
}

/** Places `line` as its own paragraph ahead of the message, leaving an empty subject. */
export function insertAnnotation(message: string, line: string): string | undefined {
  if (message.split(/\r?\n/).includes(line)) {
    return undefined;
  }
  return `\n\n${line}\n\n${message}`;
}

export class CommitHookService {
  constructor(private readonly deps: CommitHookDeps) {}

  /** Never rejects: every failure turns into a skipped or degraded annotation. */
  async prepareCommitMessage(options: PrepareMessageOptions): Promise<PrepareMessageResult> {
    const warnings: string[] = [];
    let branch: string;
    try {
      branch = await this.deps.store.currentBranch();
    } catch (error) {
      return { annotated: false, skipped: "no-branch", warnings: [errorMessage(error)] };
    }

    const { resolver } = this.deps;
    if (!resolver) {
      return { annotated: false, skipped: "no-config", warnings };
    }
    const system = resolver.find(branch);
    if (!system) {
      return { annotated: false, skipped: "unresolved", warnings };
    }

    let task: Task;
    try {
      task = await this.deps.adapter.fetch(system, branch);
    } catch (error) {
      warnings.push(errorMessage(error));
      task = { id: branch, system };
    }

    const line = renderAnnotation(branch, task, system);
    try {
      const changed = await withMessageBuffer(options.messageFile, (message) =>
        insertAnnotation(message, line),
      );
      if (!changed) {
        return { annotated: false, line, skipped: "already-present", warnings };
      }
      return { annotated: true, line, warnings };
    } catch (error) {
      warnings.push(errorMessage(error));
      return { annotated: false, line, skipped: "error", warnings };
    }
  }
}
