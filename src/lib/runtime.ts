export interface GeneratorDebugLogger {
  generate: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

let debugLogger: GeneratorDebugLogger = {
  generate: () => undefined,
  error: () => undefined,
};

export const debug = {
  generate: (...args: unknown[]) => {
    debugLogger.generate(...args);
  },
  error: (...args: unknown[]) => {
    debugLogger.error(...args);
  },
};

export const setDebugLogger = (logger: GeneratorDebugLogger): void => {
  debugLogger = logger;
};

export const getDebugLogger = (): GeneratorDebugLogger => debugLogger;
