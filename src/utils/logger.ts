/**
 * Process-wide structured logger.
 */

import pino from "pino";

const logger = pino({
  name: "chai",
  level: process.env.CHAI_LOG_LEVEL || "info",
});

export default logger;
