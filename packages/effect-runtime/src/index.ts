export {
  ReaderFrom,
  MorphologyFrom,
  LoggingLive,
} from "./layers.js";

export {
  prettyLogger,
  formatMessage,
  withSpan,
  parseLogLevel,
} from "./logging.js";
