// Environment-gated console logging

const isDev = () => process.env.NODE_ENV === 'development';

/**
 * Debug logging, development only.
 */
export const debug = (...args: unknown[]) => {
  if (isDev()) {
    console.log(...args);
  }
};

/**
 * Info logging, development only.
 */
export const logInfo = (...args: unknown[]) => {
  if (isDev()) {
    console.info(...args);
  }
};

/**
 * Warning logging (always shows)
 */
export const logWarning = (...args: unknown[]) => {
  console.warn(...args);
};

/**
 * Error logging (always shows)
 */
export const logError = (...args: unknown[]) => {
  console.error(...args);
};
