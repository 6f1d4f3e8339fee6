#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { parseFlags } from "./flags.js";
import { runStdioServer } from "./server.js";
import { logErr } from "./util.js";

try {
  const config = loadConfig({ ...process.env, ...parseFlags(process.argv.slice(2)) });
  await runStdioServer(config);
} catch (err) {
  if (err instanceof ConfigurationError) {
    logErr("fatal:", err.message);
  } else {
    logErr("fatal:", err instanceof Error ? err.stack || err.message : String(err));
  }
  process.exit(1);
}
