import { z } from "zod";
import { ConfigurationError, ERROR_KINDS, type ErrorCode, type ErrorKind } from "./errors.js";

const ErrorKindSchema = z.custom<ErrorKind>(
  (val) => typeof val === "string" && ERROR_KINDS.some((k) => k === val),
  { message: `Expected one of: ${ERROR_KINDS.join(", ")}` },
);

export const RetryOptionsSchema = z
  .object({
    maxAttempts: z.number().int().min(1),
    backoffFactor: z.number().positive(),
    unitMs: z.number().min(0),
    maxDelayMs: z.number().min(0),
    retryableKinds: z.array(ErrorKindSchema),
  })
  .partial()
  .strict();

export const ConcurrencySchema = z.number().int().min(1);

export const RetryCountSchema = z.number({ invalid_type_error: "Retries must be a number" }).int().min(0);

const TaskIdSchema = z
  .string()
  .min(1, "Task id must not be empty")
  .regex(/^[A-Za-z0-9_.-]+$/, "Task id may only contain letters, digits, '.', '_' and '-'");

export const WorkflowTaskSchema = z
  .object({
    id: TaskIdSchema,
    command: z.string().min(1, "Command must not be empty"),
    dependsOn: z.array(TaskIdSchema).default([]),
    env: z.record(z.string()).default({}),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export const WorkflowFileSchema = z
  .object({
    tasks: z.array(WorkflowTaskSchema).min(1, "Workflow must declare at least one task"),
  })
  .strict();

export type WorkflowTask = z.infer<typeof WorkflowTaskSchema>;
export type WorkflowFile = z.infer<typeof WorkflowFileSchema>;

/** Parse `value` with `schema`, raising a ConfigurationError with every issue on failure. */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  code: ErrorCode = "INVALID_OPTIONS",
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ConfigurationError(code, msg, { cause: result.error });
  }
  return result.data;
}
