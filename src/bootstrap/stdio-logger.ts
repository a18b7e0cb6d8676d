import { Console } from "node:console";

/** Route console writes to stderr so stdout stays reserved for the MCP stream. */
export function redirectConsoleToStderr(stream: NodeJS.WritableStream = process.stderr): void {
  const stderrConsole = new Console({ stdout: stream, stderr: stream });
  console.log = (...args: unknown[]) => stderrConsole.log(...args);
  console.info = (...args: unknown[]) => stderrConsole.info(...args);
  console.debug = (...args: unknown[]) => stderrConsole.debug(...args);
  console.warn = (...args: unknown[]) => stderrConsole.warn(...args);
  console.error = (...args: unknown[]) => stderrConsole.error(...args);
}
