/**
 * Branch and ref operations the task workflow needs from version control.
 * Implementations surface the underlying tool's failures as `VcsFailure`.
 */
export interface BranchStore {
  resolveRoot(): Promise<string>;
  /** Absolute path of the directory git reads hooks from. */
  hooksDir(): Promise<string>;
  currentBranch(): Promise<string>;
  listBranches(): Promise<Set<string>>;
  branchExists(name: string): Promise<boolean>;
  refExists(ref: string): Promise<boolean>;
  createAndSwitch(name: string): Promise<void>;
  switch(name: string): Promise<void>;
  /** True when every commit reachable from `candidate` is reachable from `of`. */
  isAncestor(candidate: string, of: string): Promise<boolean>;
  delete(name: string): Promise<void>;
}
