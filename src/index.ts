export type { BranchStore } from "./adapters/branchStore";
export { loadConfig, locateConfigFile, parseConfig, readConfigFile } from "./adapters/configFile";
export { GitAdapter } from "./adapters/gitAdapter";
export { withMessageBuffer } from "./adapters/messageBuffer";
export {
  type CommandRunner,
  CommandTaskAdapter,
  parseTaskResponse,
  type TaskAdapter,
} from "./adapters/taskAdapter";
export { runCli } from "./cli";
export {
  AdapterFailure,
  ConfigError,
  TaskBranchError,
  UnresolvedTaskError,
  VcsFailure,
} from "./domain/errors";
export { renderAnnotation, renderStatusLine } from "./domain/rendering";
export type { System, SystemType, Task, TaskBranchConfig } from "./domain/types";
export { CommitHookService, installHook } from "./services/commitHookService";
export { ConfigResolver } from "./services/configResolver";
export { TaskBranchService } from "./services/taskBranchService";
