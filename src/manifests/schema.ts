/**
 * Zod schemas for the manifest boundary.
 *
 * Issue messages are the exact SchemaViolation texts surfaced to operators,
 * e.g. "missing field: status" or "invalid priority: urgent".
 */
import { z } from "zod";
import {
  PROJECT_STATUSES,
  TASK_PRIORITIES,
  TASK_STATUSES,
  UNASSIGNED_AGENT,
  type ProjectStatus,
} from "./types.ts";

function nullToUndefined(value: unknown): unknown {
  return value === null ? undefined : value;
}

/** Lower-case enum tokens; "In Progress" and "in_progress" read as "in-progress". */
function normalizeToken(value: unknown): unknown {
  if (value === null) return undefined;
  if (typeof value !== "string") return value;
  const token = value.trim().toLowerCase().replace(/[\s_]+/g, "-");
  return token === "" ? undefined : token;
}

/** Raw value as it appeared in the manifest, e.g. 5, true or {"a":1}. */
function rawValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function requiredText(field: string) {
  return z.preprocess(
    nullToUndefined,
    z
      .string({
        errorMap: (_issue, ctx) => ({
          message:
            ctx.data === undefined ? `missing field: ${field}` : `invalid ${field}: ${rawValue(ctx.data)}`,
        }),
      })
      .trim()
      .min(1, `missing field: ${field}`),
  );
}

const StatusSchema = requiredText("status").transform((value, ctx): ProjectStatus => {
  const status = PROJECT_STATUSES.find((s) => s === value.toLowerCase());
  if (!status) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid status: ${value}` });
    return z.NEVER;
  }
  return status;
});

/** The three fields every manifest must carry, checked in this order. */
export const ManifestHeaderSchema = z.object({
  name: requiredText("name"),
  type: requiredText("type"),
  status: StatusSchema,
});

export const TaskRecordSchema = z.object({
  description: requiredText("description"),
  assignedAgent: z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : nullToUndefined(value)),
    z
      .string({
        errorMap: (_issue, ctx) => ({ message: `invalid assignedAgent: ${rawValue(ctx.data)}` }),
      })
      .trim()
      .refine((agent) => agent !== UNASSIGNED_AGENT, {
        message: `invalid assignedAgent: "${UNASSIGNED_AGENT}" is reserved for tasks with no agent`,
      })
      .optional(),
  ),
  priority: z.preprocess(
    normalizeToken,
    z
      .enum(TASK_PRIORITIES, {
        errorMap: (_issue, ctx) => ({ message: `invalid priority: ${String(ctx.data)}` }),
      })
      .default("medium"),
  ),
  status: z.preprocess(
    normalizeToken,
    z
      .enum(TASK_STATUSES, {
        errorMap: (_issue, ctx) => ({ message: `invalid status: ${String(ctx.data)}` }),
      })
      .default("pending"),
  ),
});

export type ManifestHeader = z.infer<typeof ManifestHeaderSchema>;
export type TaskRecord = z.infer<typeof TaskRecordSchema>;

/** First issue of a failed parse, as "<path>: <message>" style parts. */
export function firstIssue(error: z.ZodError): { field: string | null; message: string } {
  const issue = error.issues[0];
  if (!issue) return { field: null, message: "invalid manifest" };
  const head = issue.path[0];
  return { field: head === undefined ? null : String(head), message: issue.message };
}
