import { FastMCP } from "fastmcp";
import { loadConfig } from "./config.ts";
import { logger, setLogLevel } from "./lib/logger.ts";
import {
  SessionManager,
  calculateTool,
  clearSessionTool,
  listSessionsTool,
  listVariablesTool,
  resetVariablesTool,
} from "./tools/index.ts";

const config = loadConfig();
setLogLevel(config.logLevel);
SessionManager.configure(config);

const server = new FastMCP({
  name: "linecalc",
  version: "0.1.0",
});

// Register tools
server.addTool(calculateTool);
server.addTool(resetVariablesTool);
server.addTool(listVariablesTool);
server.addTool(listSessionsTool);
server.addTool(clearSessionTool);

logger.info("starting", { handlers: config.handlers.join(",") });

// Start server (stdio for local MCP agents)
server.start({ transportType: "stdio" }).catch((err: unknown) => {
  logger.error("server failed to start", { error: err instanceof Error ? err.message : String(err) });
  process.exitCode = 1;
});
