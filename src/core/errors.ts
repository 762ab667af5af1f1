export type ConfigurationErrorCode = "jwt_secret_missing" | "config_file_invalid" | "config_file_unreadable";
export type TokenIssueErrorCode = "secret_empty" | "lifetime_invalid";
export type UsageErrorCode = "format_invalid" | "option_unknown";

export class IssuerError<TCode extends string = string> extends Error {
  readonly code: TCode;
  readonly details?: unknown;

  constructor(input: { code: TCode; message: string; details?: unknown }) {
    super(input.message);
    this.name = new.target.name;
    this.code = input.code;
    this.details = input.details;
  }
}

export class ConfigurationError extends IssuerError<ConfigurationErrorCode> {}

export class TokenIssueError extends IssuerError<TokenIssueErrorCode> {}

export class UsageError extends IssuerError<UsageErrorCode> {}
