import { Logger } from "tslog";

export const LOG_LEVEL_ENV = "PLASTICSCM_SETUP_LOG_LEVEL";

/**
 * Resolve the tslog minimum level (0 = silly ... 6 = fatal).
 * An explicit PLASTICSCM_SETUP_LOG_LEVEL wins; otherwise info in production
 * and debug everywhere else.
 */
export function resolveMinLevel(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env[LOG_LEVEL_ENV]?.trim();
  if (raw) {
    const level = Number(raw);
    if (Number.isInteger(level) && level >= 0 && level <= 6) {
      return level;
    }
  }
  return env.NODE_ENV === "production" ? 3 : 2;
}

export function createLogger(name: string): Logger<unknown> {
  return new Logger({
    name,
    type: "pretty",
    minLevel: resolveMinLevel(),
  });
}
