/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const SpeedConfigSchema = z
  .object({
    minRpm: z.number().positive(),
    maxRpm: z.number().positive(),
  })
  .refine((range) => range.minRpm <= range.maxRpm, {
    message: "minRpm must not exceed maxRpm",
  });

export const ScanConfigSchema = z.object({
  extension: z.string().min(1),
  followSymlinks: z.boolean(),
});

export const LocatorConfigSchema = z.object({
  // Single command letter designating spindle speed (case-insensitive)
  command: z.string().regex(/^[A-Za-z]$/),
  // Maximum number of lines searched from the start of a file
  searchWindow: z.number().int().positive(),
  // Stop searching after the first line holding a motion command
  stopAtMotion: z.boolean(),
  // G codes treated as motion (G0 rapid, G1 linear, G2/G3 arcs)
  motionCodes: z.array(z.number().int().nonnegative()),
});

export const BatchConfigSchema = z.object({
  concurrency: z.number().int().positive().max(64),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  showProgress: z.boolean(),
});

export const UpdaterConfigSchema = z.object({
  speed: SpeedConfigSchema,
  scan: ScanConfigSchema,
  locator: LocatorConfigSchema,
  batch: BatchConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialUpdaterConfigSchema = z.object({
  speed: z
    .object({
      minRpm: z.number().positive().optional(),
      maxRpm: z.number().positive().optional(),
    })
    .optional(),
  scan: ScanConfigSchema.partial().optional(),
  locator: LocatorConfigSchema.partial().optional(),
  batch: BatchConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type SpeedConfig = z.infer<typeof SpeedConfigSchema>;
export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type LocatorConfig = z.infer<typeof LocatorConfigSchema>;
export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type UpdaterConfig = z.infer<typeof UpdaterConfigSchema>;
export type PartialUpdaterConfig = z.infer<typeof PartialUpdaterConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
