/**
 * CareDesk - Entry Point
 * Run: npm start
 */

import { startServer } from "./server.ts";

startServer().catch((err) => {
  console.error("[caredesk:server] Failed to start:", err);
  process.exitCode = 1;
});
