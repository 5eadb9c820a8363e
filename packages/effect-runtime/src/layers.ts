/**
 * Effect layers.
 */
import { Layer, Logger } from "effect";
import { prettyLogger, parseLogLevel } from "./logging.js";

/** Swap the default logger for prettyLogger and drop messages below `level`. */
export const LoggerLive = (level: string) =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(parseLogLevel(level)),
  );
