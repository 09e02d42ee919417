#!/usr/bin/env node
import { startServer } from "./server/index.js";
import { logError, getErrorMessage } from "./core/logging.js";

startServer().catch((err: unknown) => {
  logError("Fatal:", getErrorMessage(err));
  process.exit(1);
});
