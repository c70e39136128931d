type Level = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

function write(level: Level, args: unknown[]): void {
  console.error(`[${level}]`, ...args);
}

/** Writes to stderr only: stdout is reserved for the MCP stdio transport. */
export const logger = {
  info: (...args: unknown[]) => write('INFO', args),
  warn: (...args: unknown[]) => write('WARN', args),
  error: (...args: unknown[]) => write('ERROR', args),
  debug: (...args: unknown[]) => {
    if (process.env.DEBUG) write('DEBUG', args);
  },
};
