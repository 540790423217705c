// LNMP streaming, flow control and negotiation

export {
  type LogData,
  type Logger,
  LogNamespace,
  isEnabled,
  createLogger,
  silentLogger,
} from "./logging.ts";

export * from "./streaming/index.ts";
export { BackpressureController, DEFAULT_WINDOW_SIZE } from "./backpressure.ts";
export * from "./negotiation/index.ts";
