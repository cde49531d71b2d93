/**
 * Configuration errors
 *
 * @module config/errors
 */

/**
 * The configuration file is missing, unreadable or invalid
 */
export class ConfigError extends Error {
  public readonly code = "CONFIG_ERROR" as const;

  /** One line per validation problem, `path: message` */
  public readonly issues: string[];

  /** File the configuration was read from, if any */
  public readonly configPath?: string;

  public override readonly cause?: Error;

  constructor(message: string, options: { issues?: string[]; configPath?: string; cause?: Error } = {}) {
    super(message);
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
    this.configPath = options.configPath;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}
