import { UnresolvedTaskError } from "../domain/errors";
import type { System, TaskBranchConfig } from "../domain/types";

export class ConfigResolver {
  constructor(private readonly config: Pick<TaskBranchConfig, "systems">) {}

  get systems(): readonly System[] {
    return this.config.systems;
  }

  /** First system in document order with any pattern matching `taskId`. */
  resolve(taskId: string): System {
    const system = this.find(taskId);
    if (!system) {
      throw new UnresolvedTaskError(taskId);
    }
    return system;
  }

  find(taskId: string): System | undefined {
    return this.config.systems.find((system) =>
      system.patterns.some((pattern) => pattern.test(taskId)),
    );
  }

  matches(name: string): boolean {
    return this.find(name) !== undefined;
  }
}
