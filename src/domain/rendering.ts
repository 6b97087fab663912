import type { System, Task } from "./types";

/** `<name> (<status>): <title>`, with absent fields as empty strings. */
export function renderStatusLine(name: string, task: Pick<Task, "title" | "status">): string {
  return `${name} (${task.status ?? ""}): ${task.title ?? ""}`;
}

/**
 * Line inserted into commit messages. The `generic` format reads
 * `<type> #<id> <title>` and falls back to the bare identifier until the
 * tracker reports a title.
 */
export function renderAnnotation(taskId: string, task: Task, system?: System): string {
  if (system?.messageFormat === "generic") {
    if (!task.title) {
      return taskId;
    }
    return `${system.type} #${task.id} ${task.title}`;
  }
  return renderStatusLine(taskId, task);
}
