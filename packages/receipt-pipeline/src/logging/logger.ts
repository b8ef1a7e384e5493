export type PipelineLogger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export const LOG_PREFIX = "[receipt-pipeline]";

export const defaultLogger: PipelineLogger = {
  debug: (message) => console.debug(message),
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

export const silentLogger: PipelineLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function scopedMessage(scope: string, message: string): string {
  return `${LOG_PREFIX} ${scope}: ${message}`;
}
