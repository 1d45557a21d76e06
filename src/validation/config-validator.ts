/**
 * Engine Configuration Validation
 *
 * Schema-based validation of engine configuration using Zod.
 */

import { z } from "zod";
import type { EngineConfig } from "../types.js";

// =============================================================================
// Zod Schemas
// =============================================================================

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

export const retryOptionsSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  minDelayMs: z.number().nonnegative().default(100),
  maxDelayMs: z.number().nonnegative().default(30_000),
  jitterFactor: z.number().min(0).max(1).default(0.2),
});

export const schedulerConfigSchema = z.object({
  pollIntervalMs: z.number().nonnegative().default(1000),
  defaultTimeoutMs: z.number().positive().default(3_600_000),
  probeRetry: retryOptionsSchema.default({}),
});

export const logDestinationSchema = z.object({
  type: z.enum(["console", "file"]),
  config: z.record(z.string(), z.unknown()).default({}),
  filter: z
    .object({
      minLevel: logLevelSchema.optional(),
    })
    .optional(),
});

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default("info"),
  includeTimestamps: z.boolean().default(true),
  includeMetadata: z.boolean().default(true),
  destinations: z.array(logDestinationSchema).default([{ type: "console", config: {} }]),
  redactPatterns: z.array(z.string()).default([]),
});

export const engineConfigSchema = z.object({
  stackName: z.string().min(1).default("stack"),
  scheduler: schedulerConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

// =============================================================================
// Validation Functions
// =============================================================================

export function validateEngineConfig(
  config: unknown,
): ReturnType<typeof engineConfigSchema.safeParse> {
  return engineConfigSchema.safeParse(config);
}

export function validateSchedulerConfig(
  config: unknown,
): ReturnType<typeof schedulerConfigSchema.safeParse> {
  return schedulerConfigSchema.safeParse(config);
}

/**
 * Parse configuration, throwing with every issue listed on failure
 */
export function parseEngineConfig(config: unknown): EngineConfig {
  const result = engineConfigSchema.safeParse(config ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
    );
    throw new Error(`Invalid engine configuration: ${issues.join("; ")}`);
  }
  return result.data;
}

// =============================================================================
// Default Configuration
// =============================================================================

export function getDefaultEngineConfig(): EngineConfig {
  return engineConfigSchema.parse({});
}

/**
 * Merge partial config with defaults
 */
export function mergeWithDefaults(partial: {
  stackName?: string;
  scheduler?: Partial<EngineConfig["scheduler"]>;
  logging?: Partial<EngineConfig["logging"]>;
}): EngineConfig {
  const defaults = getDefaultEngineConfig();
  return {
    stackName: partial.stackName ?? defaults.stackName,
    scheduler: {
      ...defaults.scheduler,
      ...partial.scheduler,
      probeRetry: { ...defaults.scheduler.probeRetry, ...partial.scheduler?.probeRetry },
    },
    logging: { ...defaults.logging, ...partial.logging },
  };
}
