export { LoggerLive } from "./layers.js";

export {
  prettyLogger,
  withSpan,
  parseLogLevel,
} from "./logging.js";
