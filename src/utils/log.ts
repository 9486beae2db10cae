// stdout carries JSON results and MCP frames, so all logging goes to stderr.

export const log = {
  info(message: string, ...rest: unknown[]): void {
    console.error(`✅ ${message}`, ...rest);
  },
  step(message: string, ...rest: unknown[]): void {
    console.error(`➡️  ${message}`, ...rest);
  },
  warn(message: string, ...rest: unknown[]): void {
    console.error(`⚠️  ${message}`, ...rest);
  },
  error(message: string, ...rest: unknown[]): void {
    console.error(`❌ ${message}`, ...rest);
  },
  debug(message: string, ...rest: unknown[]): void {
    if (process.env.DEBUG) {
      console.error(`🔍 ${message}`, ...rest);
    }
  },
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
