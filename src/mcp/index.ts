import { startMCPServer } from "./server";
import { log } from "../utils/log";

startMCPServer().catch((error: unknown) => {
  log.error("Failed to start server:", error);
  process.exit(1);
});
