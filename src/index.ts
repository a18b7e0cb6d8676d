#!/usr/bin/env node
/**
 * MCP server entry point used by the CLI launcher and npm package main field.
 * stdout carries the protocol, so console output is moved to stderr first.
 */
import { redirectConsoleToStderr } from "./bootstrap/stdio-logger.js";
import { runStdioServer } from "./mcp-server.js";

redirectConsoleToStderr();

runStdioServer().catch((error: unknown) => {
  console.error("Fatal error in MCP server:", error);
  process.exit(1);
});
