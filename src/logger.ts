import pino from "pino";
import { env } from "./config/env";

export const logger = pino({
  name: "grid-topology-actions",
  level: env.LOG_LEVEL,
});

export type Logger = pino.Logger;

const children = new Map<string, Logger>();

/** One child logger per component, shared by every caller asking for it. */
export function componentLogger(component: string): Logger {
  let child = children.get(component);
  if (!child) {
    child = logger.child({ component });
    children.set(component, child);
  }
  return child;
}
