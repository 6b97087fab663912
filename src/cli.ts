import { Command, CommanderError, type OptionValues } from "commander";

import type { BranchStore } from "./adapters/branchStore";
import { loadConfig } from "./adapters/configFile";
import { GitAdapter } from "./adapters/gitAdapter";
import { CommandTaskAdapter, type TaskAdapter } from "./adapters/taskAdapter";
import { errorMessage } from "./domain/errors";
import { CommitHookService, installHook } from "./services/commitHookService";
import { ConfigResolver } from "./services/configResolver";
import { TaskBranchService } from "./services/taskBranchService";
import {
  type ColorMode,
  formatError,
  formatId,
  formatNote,
  formatWarning,
  setColorMode,
} from "./utils/cliUi";

export const CLI_VERSION = "0.1.0";

const colorModes = new Set<string>(["auto", "always", "never"]);

function isColorMode(value: string): value is ColorMode {
  return colorModes.has(value);
}

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDeps {
  cwd: string;
  env: NodeJS.ProcessEnv;
  io: CliIO;
  createStore(cwd: string): BranchStore;
  adapter: TaskAdapter;
}

export function defaultCliDeps(): CliDeps {
  return {
    cwd: process.cwd(),
    env: process.env,
    io: {
      stdout: (text) => process.stdout.write(text),
      stderr: (text) => process.stderr.write(text),
    },
    createStore: (cwd) => new GitAdapter(cwd),
    adapter: new CommandTaskAdapter({ env: process.env }),
  };
}

type GlobalOptions = {
  configFile?: string;
  color?: string;
};

type CommandContext = {
  store: BranchStore;
  tasks: TaskBranchService;
  hooks: CommitHookService;
};

export type RunState = {
  exitCode: number;
};

async function getCommandContext(deps: CliDeps, globals: GlobalOptions): Promise<CommandContext> {
  const store = deps.createStore(deps.cwd);
  const repoRoot = await store.resolveRoot();
  const config = await loadConfig({
    explicitPath: globals.configFile,
    env: deps.env,
    repoRoot,
  });
  const resolver = config ? new ConfigResolver(config) : undefined;
  return {
    store,
    tasks: new TaskBranchService({
      store,
      adapter: deps.adapter,
      resolver,
      protectedBranches: config?.protectedBranches,
      upstream: config?.upstream,
    }),
    hooks: new CommitHookService({ store, adapter: deps.adapter, resolver }),
  };
}

async function handleStart(taskId: string, context: CommandContext, io: CliIO): Promise<void> {
  const result = await context.tasks.start(taskId);
  if (!result.created) {
    io.stdout(`Switching to existing task ${formatId(taskId)}\n`);
    return;
  }
  io.stdout(`Creating new task ${formatId(taskId)}\n`);
  if (result.system) {
    io.stdout(`${formatNote(`Tracked by ${result.system.name}`)}\n`);
  }
  switch (result.hook?.outcome) {
    case "installed":
      io.stdout("Installing commit hook\n");
      break;
    case "foreign":
      io.stderr(`${formatWarning(`${result.hook.path} exists and was left untouched`)}\n`);
      break;
    default:
      break;
  }
}

async function handleList(context: CommandContext, io: CliIO): Promise<void> {
  for (const branch of await context.tasks.list()) {
    io.stdout(`${branch}\n`);
  }
}

async function handleStatus(context: CommandContext, io: CliIO): Promise<void> {
  const entries = await context.tasks.status();
  if (entries.length === 0) {
    io.stdout("No tasks started\n");
    return;
  }
  for (const entry of entries) {
    io.stdout(`${entry.line}\n`);
    if (entry.error) {
      io.stderr(`${formatWarning(entry.error)}\n`);
    }
  }
}

async function handleClean(
  options: { dryRun?: boolean; upstream?: string },
  context: CommandContext,
  io: CliIO,
  state: RunState,
): Promise<void> {
  const result = await context.tasks.clean({
    dryRun: Boolean(options.dryRun),
    upstream: options.upstream,
  });
  for (const branch of result.cleaned) {
    io.stdout(`${branch}\n`);
  }
  if (result.errors.length > 0) {
    for (const failure of result.errors) {
      io.stderr(`${formatError(`${failure.branch}: ${failure.error}`)}\n`);
    }
    state.exitCode = 1;
  }
}

async function handleInstallHook(
  context: CommandContext,
  io: CliIO,
  state: RunState,
): Promise<void> {
  const result = await installHook(await context.store.hooksDir());
  switch (result.outcome) {
    case "installed":
      io.stdout("Installing commit hook\n");
      break;
    case "present":
      io.stdout("Commit hook already installed\n");
      break;
    case "foreign":
      io.stderr(`${formatError(`${result.path} exists and was not written by taskbranch`)}\n`);
      state.exitCode = 1;
      break;
  }
}

async function handleHook(
  messageFile: string,
  deps: CliDeps,
  globals: GlobalOptions,
): Promise<void> {
  const report = (message: string) => deps.io.stderr(`${formatWarning(message)}\n`);
  let context: CommandContext;
  try {
    context = await getCommandContext(deps, globals);
  } catch (error) {
    report(errorMessage(error));
    return;
  }
  const result = await context.hooks.prepareCommitMessage({ messageFile });
  for (const warning of result.warnings) {
    report(warning);
  }
}

export function buildProgram(deps: CliDeps, state: RunState): Command {
  const { io } = deps;
  const program = new Command();
  program
    .name("taskbranch")
    .description("Branch-per-task workflow for git, annotated by external task trackers")
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });

  program.helpCommand(false);
  program.option("--config-file <path>", "task system configuration (YAML)");
  program.option("--color <when>", "color output: auto|always|never", "auto");

  program.hook("preAction", (_, actionCommand) => {
    const { color } = actionCommand.optsWithGlobals<GlobalOptions>();
    const normalized = (color ?? "auto").toLowerCase();
    if (!isColorMode(normalized)) {
      throw new Error("--color must be one of: auto, always, never");
    }
    setColorMode(normalized);
  });

  const withContext = async (
    command: Command,
    handler: (context: CommandContext) => Promise<void>,
  ): Promise<void> => {
    try {
      await handler(await getCommandContext(deps, command.optsWithGlobals<GlobalOptions>()));
    } catch (error) {
      io.stderr(`${errorMessage(error)}\n`);
      state.exitCode = 1;
    }
  };

  program
    .command("start")
    .description("Switch to the branch for a task, creating it when needed")
    .argument("<task-id>", "task identifier, used as the branch name")
    .action((taskId: string, _options: OptionValues, command: Command) =>
      withContext(command, (context) => handleStart(taskId, context, io)),
    );

  program
    .command("list")
    .description("List task branches")
    .action((_options: OptionValues, command: Command) =>
      withContext(command, (context) => handleList(context, io)),
    );

  program
    .command("status")
    .description("Show each task branch with its tracker status and title")
    .action((_options: OptionValues, command: Command) =>
      withContext(command, (context) => handleStatus(context, io)),
    );

  program
    .command("clean")
    .description("Delete task branches already merged into the upstream branch")
    .option("--dry-run", "list the branches without deleting them")
    .option("--upstream <ref>", "reference branch (default: origin/HEAD, then origin/main)")
    .action((options: { dryRun?: boolean; upstream?: string }, command: Command) =>
      withContext(command, (context) => handleClean(options, context, io, state)),
    );

  program
    .command("install-hook")
    .description("Install the prepare-commit-msg hook into this repository")
    .action((_options: OptionValues, command: Command) =>
      withContext(command, (context) => handleInstallHook(context, io, state)),
    );

  program
    .command("hook", { hidden: true })
    .description("Annotate a commit message with the current task (run by git)")
    .argument("<message-file>")
    .argument("[source]")
    .argument("[sha]")
    .action(
      async (
        messageFile: string,
        _source: string | undefined,
        _sha: string | undefined,
        _options: OptionValues,
        command: Command,
      ) => {
        // A failing hook would block the commit.
        try {
          await handleHook(messageFile, deps, command.optsWithGlobals<GlobalOptions>());
        } catch (error) {
          io.stderr(`${formatWarning(errorMessage(error))}\n`);
        }
      },
    );

  return program;
}

/** Runs one command line (without the node and script entries) and returns its exit code. */
export async function runCli(argv: string[], deps: CliDeps = defaultCliDeps()): Promise<number> {
  const state: RunState = { exitCode: 0 };
  const program = buildProgram(deps, state);
  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    deps.io.stderr(`${errorMessage(error)}\n`);
    return 1;
  }
  return state.exitCode;
}
