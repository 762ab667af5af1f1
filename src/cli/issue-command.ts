import { IssuerError, UsageError } from "../core/errors.js";
import { ConfigResolver } from "../core/services/config-resolver.js";
import { adviseOnSecret } from "../core/services/secret-advisor.js";
import { TokenIssuer } from "../core/services/token-issuer.js";
import type { IssuedToken } from "../core/types/token.js";

export interface OutputStream {
  write(chunk: string): unknown;
}

export type OutputFormat = "text" | "json";

export interface IssueCommandOptions {
  argv?: string[] | undefined;
  env?: Record<string, string | undefined> | undefined;
  cwd?: string | undefined;
  now?: Date | undefined;
  createId?: (() => string) | undefined;
  stdout?: OutputStream | undefined;
  stderr?: OutputStream | undefined;
}

interface ParsedArgs {
  format: OutputFormat;
  quiet: boolean;
  help: boolean;
}

export const USAGE = [
  "Usage: local-admin-token [--format=text|json] [--quiet]",
  "",
  "Prints an HS256 admin token signed with the local JWT secret.",
  "Secret: APP__JWT_SECRET, JWT_SECRET, or jwt_secret in config/default.toml.",
  "Lifetime: APP__JWT_EXPIRATION, JWT_EXPIRATION, or jwt_expiration (default 3600 seconds)."
].join("\n");

function readArg(argv: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const item = argv.find((entry) => entry.startsWith(prefix));
  return item ? item.slice(prefix.length) : undefined;
}

function parseArgs(argv: string[]): ParsedArgs {
  const unknown = argv.find(
    (entry) => !entry.startsWith("--format=") && entry !== "--quiet" && entry !== "--help" && entry !== "-h"
  );
  if (unknown !== undefined) {
    throw new UsageError({ code: "option_unknown", message: `Unknown option: ${unknown}\n${USAGE}` });
  }

  const format = readArg(argv, "format") ?? "text";
  if (format !== "text" && format !== "json") {
    throw new UsageError({
      code: "format_invalid",
      message: `Unsupported --format value "${format}". Use "text" or "json".`
    });
  }

  return {
    format,
    quiet: argv.includes("--quiet"),
    help: argv.includes("--help") || argv.includes("-h")
  };
}

export function formatTextReport(issued: IssuedToken): string {
  return [
    `Generated admin JWT (valid for ${issued.lifetimeSeconds} seconds):`,
    "",
    issued.token,
    "",
    "Use it as:",
    `Authorization: Bearer ${issued.token}`,
    ""
  ].join("\n");
}

export function formatJsonReport(issued: IssuedToken): string {
  const report = {
    token: issued.token,
    tokenType: "Bearer",
    expiresIn: issued.lifetimeSeconds,
    expiresAt: issued.expiresAt,
    authorizationHeader: `Bearer ${issued.token}`
  };
  return `${JSON.stringify(report, null, 2)}\n`;
}

// Returns the exit code; errors other than IssuerError propagate to the caller.
export function runIssueCommand(options: IssueCommandOptions = {}): number {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  try {
    const args = parseArgs(options.argv ?? process.argv.slice(2));
    if (args.help) {
      stdout.write(`${USAGE}\n`);
      return 0;
    }

    const resolver = new ConfigResolver({ env: options.env, cwd: options.cwd });
    const secret = resolver.resolveSecret();
    const lifetimeSeconds = resolver.resolveLifetimeSeconds();

    if (!args.quiet) {
      for (const warning of adviseOnSecret(secret)) {
        stderr.write(`warning: ${warning}\n`);
      }
    }

    const issuer = new TokenIssuer({ secret, createId: options.createId });
    const issued = issuer.issue({ lifetimeSeconds, now: options.now });
    stdout.write(args.format === "json" ? formatJsonReport(issued) : formatTextReport(issued));
    return 0;
  } catch (error) {
    if (error instanceof IssuerError) {
      stderr.write(`${error.message}\n`);
      return 1;
    }
    throw error;
  }
}

export function runMain(options: IssueCommandOptions = {}): number {
  try {
    return runIssueCommand(options);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Failed to issue admin token.";
    (options.stderr ?? process.stderr).write(`${message}\n`);
    return 1;
  }
}
