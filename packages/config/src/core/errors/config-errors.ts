import { BaseError } from "@keyscope/errors"

export class ConfigValidationError extends BaseError<"config_invalid"> {
  static fromIssues(summary: string, sources: readonly string[]): ConfigValidationError {
    return new ConfigValidationError(`Configuration validation failed:\n${summary}`, {
      code: "config_invalid",
      context: { sources },
      isOperational: false,
    })
  }
}
