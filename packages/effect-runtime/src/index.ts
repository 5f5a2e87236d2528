export { TokenizerFrom, TokenizerNamed } from "./layers.js";

export {
  prettyLogger,
  parseLogLevel,
  withLogging,
} from "./logging.js";
