import type { BranchStore } from "../adapters/branchStore";
import type { TaskAdapter } from "../adapters/taskAdapter";
import { errorMessage, VcsFailure } from "../domain/errors";
import { renderStatusLine } from "../domain/rendering";
import {
  DEFAULT_PROTECTED_BRANCHES,
  DEFAULT_UPSTREAM_CANDIDATES,
  type System,
  type Task,
} from "../domain/types";
import { type HookInstallResult, installHook } from "./commitHookService";
import type { ConfigResolver } from "./configResolver";

export interface TaskBranchServiceDeps {
  store: BranchStore;
  adapter: TaskAdapter;
  /** Absent when no config file was found. */
  resolver?: ConfigResolver;
  protectedBranches?: readonly string[];
  upstream?: string;
}

export interface StartResult {
  taskId: string;
  created: boolean;
  system?: System;
  hook?: HookInstallResult;
}

export interface StatusEntry {
  branch: string;
  task: Task;
  line: string;
  error?: string;
}

export interface CleanOptions {
  dryRun: boolean;
  upstream?: string;
}

export interface CleanResult {
  dryRun: boolean;
  upstream: string;
  current?: string;
  cleaned: string[];
  errors: Array<{ branch: string; error: string }>;
}

function byCodeUnit(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export class TaskBranchService {
  private readonly protectedBranches: Set<string>;

  constructor(private readonly deps: TaskBranchServiceDeps) {
    this.protectedBranches = new Set<string>(deps.protectedBranches ?? DEFAULT_PROTECTED_BRANCHES);
  }

  async start(taskId: string): Promise<StartResult> {
    const system = this.deps.resolver?.find(taskId);
    const current = await this.tryCurrentBranch();
    if (current === taskId) {
      return { taskId, created: false, system };
    }

    if (await this.deps.store.branchExists(taskId)) {
      await this.deps.store.switch(taskId);
      return { taskId, created: false, system };
    }

    await this.deps.store.createAndSwitch(taskId);
    if (!system || !this.deps.adapter.requiresHook(system)) {
      return { taskId, created: true, system };
    }
    const hook = await installHook(await this.deps.store.hooksDir());
    return { taskId, created: true, system, hook };
  }

  /** Task branches, sorted by code unit. */
  async list(): Promise<string[]> {
    const branches = await this.deps.store.listBranches();
    return Array.from(branches)
      .filter((branch) => this.isTaskBranch(branch))
      .sort(byCodeUnit);
  }

  /** One entry per task branch; an adapter failure only empties that entry. */
  async status(): Promise<StatusEntry[]> {
    const entries: StatusEntry[] = [];
    for (const branch of await this.list()) {
      const system = this.deps.resolver?.find(branch);
      let task: Task = { id: branch, system };
      let error: string | undefined;
      if (system) {
        try {
          task = await this.deps.adapter.fetch(system, branch);
        } catch (fetchError) {
          error = errorMessage(fetchError);
        }
      }
      entries.push({ branch, task, line: renderStatusLine(branch, task), error });
    }
    return entries;
  }

  async clean(options: CleanOptions): Promise<CleanResult> {
    const upstream = await this.resolveUpstream(options.upstream);
    const current = await this.tryCurrentBranch();
    const result: CleanResult = {
      dryRun: options.dryRun,
      upstream,
      current,
      cleaned: [],
      errors: [],
    };

    for (const branch of await this.list()) {
      if (branch === current || branch === upstream) {
        continue;
      }
      try {
        if (!(await this.deps.store.isAncestor(branch, upstream))) {
          continue;
        }
        if (!options.dryRun) {
          await this.deps.store.delete(branch);
        }
        result.cleaned.push(branch);
      } catch (error) {
        result.errors.push({ branch, error: errorMessage(error) });
      }
    }

    return result;
  }

  isTaskBranch(branch: string): boolean {
    if (this.deps.resolver) {
      return this.deps.resolver.matches(branch);
    }
    return !this.protectedBranches.has(branch);
  }

  private async resolveUpstream(explicit?: string): Promise<string> {
    const preferred = explicit ?? this.deps.upstream;
    if (preferred) {
      if (!(await this.deps.store.refExists(preferred))) {
        throw new VcsFailure(`Upstream '${preferred}' does not exist`);
      }
      return preferred;
    }
    for (const candidate of DEFAULT_UPSTREAM_CANDIDATES) {
      if (await this.deps.store.refExists(candidate)) {
        return candidate;
      }
    }
    throw new VcsFailure(
      `No upstream branch found (tried ${DEFAULT_UPSTREAM_CANDIDATES.join(", ")}); pass --upstream`,
    );
  }

  private async tryCurrentBranch(): Promise<string | undefined> {
    try {
      return await this.deps.store.currentBranch();
    } catch (error) {
      if (error instanceof VcsFailure) {
        return undefined;
      }
      throw error;
    }
  }
}
