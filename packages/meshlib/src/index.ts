/**
 * GMD mesh toolkit
 *
 * Vertex fusion for importing GMD vertex buffers into an editor mesh, and
 * submesh building for exporting it back.
 *
 * @packageDocumentation
 */

export * from "./types.js";
export {
  VertexBuffer,
  type VertexAttribute,
} from "./vertex-buffer.js";
export {
  fusionOptionsSchema,
  importOptionsSchema,
  exportOptionsSchema,
  parseFusionOptions,
  parseImportOptions,
  parseExportOptions,
  type FusionOptions,
  type FusionOptionsInput,
  type ImportOptions,
  type ImportOptionsInput,
  type ExportOptions,
  type ExportOptionsInput,
} from "./config.js";
export {
  ERROR_CODES,
  MeshlibError,
  FusionInvariantError,
  SubmeshLimitError,
  ErrorReporter,
  type ErrorCode,
  type ErrorContext,
} from "./errors.js";
export {
  Logger,
  LogLevel,
  StageLogger,
  type LogContext,
  type LogEntry,
  type LoggerConfig,
  type StageStats,
} from "./logger.js";
export { validateMeshBuffers } from "./validation.js";
export * from "./fusion/index.js";
export * from "./editor/index.js";
export * from "./submesh/index.js";
