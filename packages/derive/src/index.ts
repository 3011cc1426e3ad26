export { isEntrypoint, main, parseCliArgs, usage } from "./cli.js";
export type { CliOptions, MainIo, ParseResult } from "./cli.js";
export { loadConfig } from "./config/loadConfig.js";
export { DEFAULT_CONFIG_PATH, DEFAULT_IMPORT_SOURCE } from "./config/types.js";
export type { DeriveConfig } from "./config/types.js";
export { analyzeSource } from "./analysis/analyzeSource.js";
export { CORE_TYPE_EXPORTS, CORE_VALUE_EXPORTS, instanceNameFor } from "./analysis/names.js";
export type { AggregateShape, Comparator, DeriveTarget, FieldComparator } from "./analysis/types.js";
export { emitModule } from "./emit/emitModule.js";
export { deriveSource } from "./engine/deriveSource.js";
export type { DerivedModule, DeriveSourceOptions } from "./engine/deriveSource.js";
export { runDerive } from "./engine/run.js";
export type { DeriveReport, DerivedOutput, OutputStatus, RunDeriveOptions, RunMode } from "./engine/types.js";
export { formatJsonReport } from "./reporting/formatJson.js";
export { formatPrettyReport } from "./reporting/formatPretty.js";
export {
  ConfigError,
  DeriveError,
  UnsupportedFieldTypeError,
  UnsupportedShapeError,
  UsageError
} from "./util/errors.js";
export type { DeriveErrorLocation } from "./util/errors.js";
