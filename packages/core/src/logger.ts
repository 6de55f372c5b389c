import type { Logger } from "./types.js";

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.stack && error.stack.trim() ? error.stack : error.message;
  }
  return String(error);
}

export function createConsoleLogger(prefix = "claimmark"): Logger {
  return {
    info(message) {
      console.log(`[${prefix}] ${message}`);
    },
    warn(message, error) {
      console.warn(`[${prefix}] ${message}`);
      if (error !== undefined) console.warn(describe(error));
    },
    error(message, error) {
      console.error(`[${prefix}] ${message}`);
      if (error !== undefined) console.error(describe(error));
    }
  };
}
