import { z } from "zod";

import { errorMessage } from "./errors";

export const systemTypeOrder = ["generic", "plain"] as const;

export const messageFormatOrder = ["generic"] as const;

export const DEFAULT_PROTECTED_BRANCHES = ["main", "master", "develop"] as const;

export const DEFAULT_UPSTREAM_CANDIDATES = ["origin/HEAD", "origin/main", "origin/master"] as const;

export type SystemType = (typeof systemTypeOrder)[number];
export type MessageFormat = (typeof messageFormatOrder)[number];

const patternSchema = z
  .string()
  .min(1)
  .superRefine((value, ctx) => {
    try {
      new RegExp(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid pattern '${value}': ${errorMessage(error)}`,
      });
    }
  });

export const systemInputSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(systemTypeOrder),
    command: z.string().min(1).optional(),
    // Older configs nest the command one level down.
    our: z.object({ command: z.string().min(1) }).optional(),
    patterns: z.array(patternSchema).min(1),
    "message-format": z.enum(messageFormatOrder).optional(),
  })
  .superRefine((value, ctx) => {
    if (value.type === "generic" && !value.command && !value.our?.command) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["command"],
        message: `System '${value.name}' of type generic requires a command`,
      });
    }
  });

export type SystemInput = z.infer<typeof systemInputSchema>;

export const configInputSchema = z.object({
  upstream: z.string().min(1).optional(),
  protected: z.array(z.string().min(1)).optional(),
  systems: z.array(systemInputSchema).default([]),
});

export type ConfigInput = z.infer<typeof configInputSchema>;

export interface System {
  readonly name: string;
  readonly type: SystemType;
  readonly command?: string;
  readonly patterns: readonly RegExp[];
  readonly messageFormat?: MessageFormat;
}

export interface TaskBranchConfig {
  readonly path: string;
  readonly systems: readonly System[];
  readonly upstream?: string;
  readonly protectedBranches: readonly string[];
}

export interface Task {
  id: string;
  title?: string;
  status?: string;
  system?: System;
}

const optionalText = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => (value === null || value === undefined ? undefined : String(value)));

/** Shape an adapter writes to stdout. */
export const taskResponseSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform((value) => String(value)),
  title: optionalText,
  status: optionalText,
});

export type TaskResponse = z.infer<typeof taskResponseSchema>;

export function toSystem(input: SystemInput): System {
  return Object.freeze({
    name: input.name,
    type: input.type,
    command: input.command ?? input.our?.command,
    patterns: Object.freeze(input.patterns.map((pattern) => new RegExp(`^(?:${pattern})$`))),
    messageFormat: input["message-format"],
  });
}
