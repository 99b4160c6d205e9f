/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const SirilConfigSchema = z.object({
  // Executable used to drive Siril headless (resolved through PATH)
  binary: z.string().min(1),
});

export const MergeConfigSchema = z.object({
  processDir: z.string().min(1),
  seqName: z.string().min(1),
  // Sort matched files by name within each session instead of keeping directory order
  sort: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  showProgress: z.boolean(),
});

export const PipelineConfigSchema = z.object({
  siril: SirilConfigSchema,
  merge: MergeConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialPipelineConfigSchema = PipelineConfigSchema.partial().extend({
  siril: SirilConfigSchema.partial().optional(),
  merge: MergeConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type SirilConfig = z.infer<typeof SirilConfigSchema>;
export type MergeConfig = z.infer<typeof MergeConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PartialPipelineConfig = z.infer<typeof PartialPipelineConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
