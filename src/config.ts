import { z } from "zod";
import { InvalidConfigError } from "./errors.js";
import type { Logger } from "./types.js";

export const DEFAULT_MAX_STEPS = 400;

export const environmentOptionsSchema = z.object({
  maxSteps: z.number().int().positive().default(DEFAULT_MAX_STEPS),
  seed: z.number().int().optional(),
});

export type EnvironmentOptions = z.input<typeof environmentOptionsSchema> & { logger?: Logger };

export interface ResolvedEnvironmentOptions {
  maxSteps: number;
  seed: number | undefined;
  logger: Logger;
}

export function resolveEnvironmentOptions(options: EnvironmentOptions = {}): ResolvedEnvironmentOptions {
  const parsed = environmentOptionsSchema.safeParse({ maxSteps: options.maxSteps, seed: options.seed });
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`),
    );
  }
  return {
    maxSteps: parsed.data.maxSteps,
    seed: parsed.data.seed,
    logger: options.logger ?? console,
  };
}
