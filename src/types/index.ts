/**
 * Central type exports
 */

// Configuration
export type {
  PipelineConfig,
  PartialPipelineConfig,
  SirilConfig,
  MergeConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  PipelineConfigSchema,
  PartialPipelineConfigSchema,
} from "./config";

// Siril
export type { SirilClient } from "./siril";

// Pipeline
export type {
  PipelineState,
  PipelinePhase,
  TransitionListener,
  SessionMergeCount,
  MergeResult,
  ProcessingStats,
} from "./pipeline";

// Context
export type { PipelineContext } from "./context";
