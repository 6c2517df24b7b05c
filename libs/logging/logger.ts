import { pino } from "pino";
import { getRuntimeConfig } from "../config/runtimeConfig.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: getRuntimeConfig().logLevel,
  base: {
    system: "msgbridge"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger bound to a component name.
 */
export function getComponentLogger(component: string) {
  return logger.child({ component });
}
