import type { BranchStore } from "../../src/adapters/branchStore";
import { VcsFailure } from "../../src/domain/errors";

/**
 * In-process stand-in for a git repository: commits with parents, a branch
 * table and HEAD. A fresh store is unborn, like `git init`.
 */
export class MemoryBranchStore implements BranchStore {
  readonly branches = new Map<string, string>();
  readonly deleted: string[] = [];
  readonly failDeletes = new Set<string>();
  head: string | undefined;
  detached = false;
  dirty = false;
  private readonly parents = new Map<string, string[]>();
  private counter = 0;

  constructor(
    readonly root = "/repo",
    readonly hooksPath = "/repo/.git/hooks",
    initialBranch = "master",
  ) {
    this.head = initialBranch;
  }

  /** Adds a commit on the current branch and returns its id. */
  commit(): string {
    if (!this.head) {
      throw new Error("cannot commit on a detached HEAD in this store");
    }
    this.counter += 1;
    const id = `c${this.counter}`;
    const parent = this.branches.get(this.head);
    this.parents.set(id, parent ? [parent] : []);
    this.branches.set(this.head, id);
    return id;
  }

  /** Creates or moves `name` to whatever `target` resolves to, without switching. */
  setBranch(name: string, target: string): void {
    const commit = this.resolve(target);
    if (!commit) {
      throw new Error(`unknown target ${target}`);
    }
    this.branches.set(name, commit);
  }

  async resolveRoot(): Promise<string> {
    return this.root;
  }

  async hooksDir(): Promise<string> {
    return this.hooksPath;
  }

  async currentBranch(): Promise<string> {
    if (this.detached || !this.head) {
      throw new VcsFailure("HEAD is detached; no current branch");
    }
    return this.head;
  }

  async listBranches(): Promise<Set<string>> {
    return new Set(this.branches.keys());
  }

  async branchExists(name: string): Promise<boolean> {
    return this.branches.has(name);
  }

  async refExists(ref: string): Promise<boolean> {
    return this.resolve(ref) !== undefined;
  }

  async createAndSwitch(name: string): Promise<void> {
    if (this.branches.has(name)) {
      throw new VcsFailure(`fatal: a branch named '${name}' already exists`);
    }
    const current = this.head ? this.branches.get(this.head) : undefined;
    if (current) {
      this.branches.set(name, current);
    }
    this.head = name;
    this.detached = false;
  }

  async switch(name: string): Promise<void> {
    if (!this.branches.has(name)) {
      throw new VcsFailure(`error: pathspec '${name}' did not match any file(s) known to git`);
    }
    if (this.dirty) {
      throw new VcsFailure(
        "error: Your local changes to the following files would be overwritten by checkout",
      );
    }
    this.head = name;
    this.detached = false;
  }

  async isAncestor(candidate: string, of: string): Promise<boolean> {
    const start = this.resolve(candidate);
    const end = this.resolve(of);
    if (!start || !end) {
      throw new VcsFailure(`fatal: Not a valid object name ${start ? of : candidate}`);
    }
    const pending = [end];
    const seen = new Set<string>();
    while (pending.length > 0) {
      const next = pending.pop();
      if (next === undefined || seen.has(next)) {
        continue;
      }
      if (next === start) {
        return true;
      }
      seen.add(next);
      pending.push(...(this.parents.get(next) ?? []));
    }
    return false;
  }

  async delete(name: string): Promise<void> {
    if (!this.branches.has(name)) {
      throw new VcsFailure(`error: branch '${name}' not found`);
    }
    if (!this.detached && this.head === name) {
      throw new VcsFailure(`error: Cannot delete branch '${name}' checked out at '${this.root}'`);
    }
    if (this.failDeletes.has(name)) {
      throw new VcsFailure(`error: could not lock config file for '${name}'`);
    }
    this.branches.delete(name);
    this.deleted.push(name);
  }

  private resolve(ref: string): string | undefined {
    const branch = this.branches.get(ref);
    if (branch) {
      return branch;
    }
    return this.parents.has(ref) ? ref : undefined;
  }
}
