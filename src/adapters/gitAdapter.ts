import path from "node:path";

import simpleGit, { type SimpleGit } from "simple-git";

import { errorMessage, VcsFailure } from "../domain/errors";
import type { BranchStore } from "./branchStore";

const HEADS_PREFIX = "refs/heads/";

export class GitAdapter implements BranchStore {
  private readonly git: SimpleGit;

  constructor(readonly cwd: string) {
    this.git = simpleGit({ baseDir: cwd });
  }

  async resolveRoot(): Promise<string> {
    try {
      return await this.git.revparse(["--show-toplevel"]);
    } catch (error) {
      throw new VcsFailure("Failed to resolve git repository root", { cause: error });
    }
  }

  async hooksDir(): Promise<string> {
    const relative = await this.run(() => this.git.revparse(["--git-path", "hooks"]));
    return path.resolve(this.cwd, relative);
  }

  async currentBranch(): Promise<string> {
    // symbolic-ref also names an unborn branch, which `rev-parse` cannot.
    const output = await this.run(() =>
      this.git.raw(["symbolic-ref", "--quiet", "--short", "HEAD"]),
    );
    const name = output.trim();
    if (!name) {
      throw new VcsFailure("HEAD is detached; no current branch");
    }
    return name;
  }

  async listBranches(): Promise<Set<string>> {
    const output = await this.run(() =>
      this.git.raw(["for-each-ref", "--format=%(refname)", HEADS_PREFIX]),
    );
    const branches = new Set<string>();
    for (const line of output.split(/\r?\n/)) {
      const ref = line.trim();
      if (ref.startsWith(HEADS_PREFIX)) {
        branches.add(ref.slice(HEADS_PREFIX.length));
      }
    }
    return branches;
  }

  async branchExists(name: string): Promise<boolean> {
    return this.refExists(`${HEADS_PREFIX}${name}`);
  }

  async refExists(ref: string): Promise<boolean> {
    const resolved = await this.run(() => this.git.raw(["rev-parse", "--verify", "--quiet", ref]));
    return resolved.trim().length > 0;
  }

  async createAndSwitch(name: string): Promise<void> {
    await this.run(() => this.git.checkoutLocalBranch(name));
  }

  async switch(name: string): Promise<void> {
    await this.run(() => this.git.checkout(name));
  }

  async isAncestor(candidate: string, of: string): Promise<boolean> {
    const head = (
      await this.run(() => this.git.raw(["rev-parse", "--verify", candidate]))
    ).trim();
    // merge-base prints nothing when the histories are unrelated.
    const base = (await this.run(() => this.git.raw(["merge-base", candidate, of]))).trim();
    return head.length > 0 && base === head;
  }

  async delete(name: string): Promise<void> {
    // Ancestry is checked by callers against the upstream, not HEAD, so force.
    await this.run(() => this.git.deleteLocalBranch(name, true));
  }

  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw new VcsFailure(errorMessage(error).trim(), { cause: error });
    }
  }
}
