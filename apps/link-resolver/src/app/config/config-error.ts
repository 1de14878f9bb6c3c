import { BaseError } from "@durable-links/errors"

export type ConfigErrorCode = "config_invalid" | "config_file_unreadable"

export class ConfigError extends BaseError<ConfigErrorCode> {
  /** `details` is the readable issue list, one line per setting. */
  static invalid(details: string): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
    })
  }

  static unreadable(file: string, cause: unknown): ConfigError {
    return new ConfigError(`Failed to read env file ${file}`, {
      code: "config_file_unreadable",
      context: { file },
      cause,
    })
  }
}
