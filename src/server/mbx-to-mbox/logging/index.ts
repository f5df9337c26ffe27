export { ConversionLog, type LogEntry, type LogLevel, type LogSink } from "./conversion-log.js";
