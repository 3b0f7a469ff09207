import pino, { type BaseLogger, type Logger } from "pino";

/** The slice of a pino logger the receiver writes to. Fastify's `app.log` satisfies it. */
export type ReceiverLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export function createLogger(component: string, level: string = process.env.SEISMO_LOG_LEVEL ?? "info"): Logger {
  return pino({ name: component, level });
}
