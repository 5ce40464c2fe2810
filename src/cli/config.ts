import { isLogLevel, type LogLevel } from "../diagnostics/LogRing";
import { ValidationError } from "../errors";

export interface CliConfig {
  /** `MPM_DIR`, else the working directory. */
  directory: string;
  /** `MPM_LOG_LEVEL`; `null` keeps logs off stderr. */
  logLevel: LogLevel | null;
}

export function resolveCliConfig(env: NodeJS.ProcessEnv, cwd: string): CliConfig {
  const dir = env.MPM_DIR?.trim();
  const level = env.MPM_LOG_LEVEL?.trim().toLowerCase();

  let logLevel: LogLevel | null = null;
  if (level) {
    if (!isLogLevel(level)) {
      throw new ValidationError(`MPM_LOG_LEVEL must be one of debug, info, warn, error (got "${level}")`);
    }
    logLevel = level;
  }

  return { directory: dir ? dir : cwd, logLevel };
}
