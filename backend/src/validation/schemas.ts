// Input validation schemas using Zod for limit definitions and operator input

import { z } from "zod";
import { Strategy } from "@ratewarden/shared";
import { ConfigurationError } from "../errors";

// ─── Common Schemas ──────────────────────────────────────────────────────────

export const ActionNameSchema = z.string()
    .trim()
    .min(1, "Action name is required")
    .max(128, "Action name too long");

export const StrategySchema = z.enum([Strategy.TokenBucket, Strategy.SlidingWindow, Strategy.FixedWindow], {
    errorMap: () => ({ message: "Unknown strategy" }),
});

// ─── Limit Schemas ───────────────────────────────────────────────────────────

export const RateLimitConfigSchema = z.object({
    action: ActionNameSchema,
    maxRequests: z.number().int("maxRequests must be an integer").positive("maxRequests must be > 0"),
    windowSeconds: z.number().int("windowSeconds must be an integer").positive("windowSeconds must be > 0"),
    strategy: StrategySchema,
    enableAdaptive: z.boolean().default(false),
    enableCascading: z.boolean().default(false),
    description: z.string().max(200, "Description too long").optional(),
});

/** What callers may pass to registerLimit: feature flags default to off. */
export type RateLimitConfigInput = z.input<typeof RateLimitConfigSchema>;

export const CascadeTargetsSchema = z.array(ActionNameSchema);

export const CascadeMapSchema = z.record(ActionNameSchema, CascadeTargetsSchema);

// ─── Helpers ─────────────────────────────────────────────────────────────────

export type ValidationResult<T> =
    | { success: true; data: T }
    | { success: false; errors: z.ZodError };

export function validate<S extends z.ZodTypeAny>(schema: S, data: unknown): ValidationResult<z.output<S>> {
    const result = schema.safeParse(data);
    if (result.success) {
        return { success: true, data: result.data };
    }
    return { success: false, errors: result.error };
}

export function formatIssues(errors: z.ZodError): string[] {
    return errors.issues.map((e) => `${e.path.length > 0 ? e.path.join(".") : "(root)"}: ${e.message}`);
}

/** Parse with `schema` or throw a ConfigurationError listing every issue. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.output<S> {
    const result = validate(schema, data);
    if (result.success) return result.data;

    const issues = formatIssues(result.errors);
    throw new ConfigurationError(`Invalid ${what}: ${issues.join(", ")}`, issues);
}
