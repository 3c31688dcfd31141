export type PipelineLogger = {
  info(message: string): void;
  error(message: string, error?: unknown): void;
};

export const consoleLogger: PipelineLogger = {
  info(message) {
    console.log(message);
  },
  error(message, error) {
    if (error === undefined) {
      console.error(message);
      return;
    }

    console.error(message, error);
  }
};

export const silentLogger: PipelineLogger = {
  info() {},
  error() {}
};

export function scopedLogger(logger: PipelineLogger, scope: string): PipelineLogger {
  return {
    info(message) {
      logger.info(`[${scope}] ${message}`);
    },
    error(message, error) {
      logger.error(`[${scope}] ${message}`, error);
    }
  };
}
