/**
 * Utility exports
 */

// Path utilities
export { resolvePath, expandHome } from "./resolve-path";
export { expandSessions } from "./expand-sessions";
export { assertUniqueSessions } from "./unique-sessions";
export { createSequenceMatcher, sequenceFileName } from "./sequence-name";

// Filesystem utilities
export { fileExists, directoryExists } from "./file-exists";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// Siril scoping
export { DirectoryScope } from "./directory-scope";
export { withSession } from "./tool-session";

// Classes
export { ConversionManifest, MANIFEST_FILENAME } from "./conversion-manifest";
export { Logger } from "./logger";
export type { LogSink } from "./logger";
export { Tracker } from "./tracker";
