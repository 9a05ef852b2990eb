import pino from "pino";

export type Logger = pino.Logger;

// stdout carries command output, so every log line goes to stderr
export function getLogger(level: string, pretty: boolean): Logger {
  const options: pino.LoggerOptions = {
    level,
    base: undefined, // do not inject pid and hostname automatically
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (pretty) {
    return pino({
      ...options,
      transport: { target: "pino-pretty", options: { colorize: true, destination: 2 } }
    });
  }
  return pino(options, pino.destination(2));
}
