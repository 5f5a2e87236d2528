/**
 * @bitext/core -- shared errors, service ports, dtypes and line I/O.
 */
export {
  FormatError,
  ConsistencyError,
  UsageError,
  IoError,
  ConfigError,
  describeError,
  keepTypedOr,
  type PipelineError,
} from "./errors.js";
export { TokenizerService, type Tokenizer, type ItemConsumer } from "./interfaces.js";
export { Registry } from "./registry.js";
export {
  DTYPES,
  isDtype,
  dtypeBytes,
  dtypeRange,
  dtypeCode,
  dtypeFromCode,
  bestFittingDtype,
  type Dtype,
  type OutputFormat,
  type LogLevelName,
} from "./types.js";
export { readLines } from "./io.js";
