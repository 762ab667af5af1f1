import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse } from "smol-toml";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { MAX_LIFETIME_SECONDS } from "./token-issuer.js";

export type SettingName = "jwt_secret" | "jwt_expiration";

export type LookupStrategy = () => string | undefined;

export interface ConfigResolverOptions {
  env?: Record<string, string | undefined> | undefined;
  cwd?: string | undefined;
  configFilePath?: string | undefined;
}

export const DEFAULT_CONFIG_FILE = "config/default.toml";
export const DEFAULT_LIFETIME_SECONDS = 3600;

// Primary (APP__ namespaced) name first, then the legacy unprefixed one.
const ENV_NAMES: Record<SettingName, readonly [string, string]> = {
  jwt_secret: ["APP__JWT_SECRET", "JWT_SECRET"],
  jwt_expiration: ["APP__JWT_EXPIRATION", "JWT_EXPIRATION"]
};

const documentSchema = z.record(z.string(), z.unknown());

const fileScalarSchema = z.union([z.string(), z.number(), z.bigint(), z.boolean()]);

const lifetimeSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/)
  .transform((value) => Number.parseInt(value, 10))
  .pipe(z.number().int().positive().max(MAX_LIFETIME_SECONDS));

type ConfigDocument = z.infer<typeof documentSchema>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function parseLifetimeSeconds(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_LIFETIME_SECONDS;
  }
  const parsed = lifetimeSchema.safeParse(raw);
  return parsed.success ? parsed.data : DEFAULT_LIFETIME_SECONDS;
}

export class ConfigResolver {
  private readonly env: Record<string, string | undefined>;
  private readonly configFileLabel: string;
  private readonly configFilePath: string;
  // undefined until first read; null when the file does not exist.
  private document: ConfigDocument | null | undefined;

  constructor(options?: ConfigResolverOptions) {
    this.env = options?.env ?? process.env;
    this.configFileLabel = options?.configFilePath ?? DEFAULT_CONFIG_FILE;
    this.configFilePath = resolve(options?.cwd ?? process.cwd(), this.configFileLabel);
  }

  resolve(setting: SettingName): string | undefined {
    for (const lookup of this.sourcesFor(setting)) {
      const value = lookup();
      if (value) {
        return value;
      }
    }
    return undefined;
  }

  resolveSecret(): string {
    const secret = this.resolve("jwt_secret");
    if (!secret) {
      const [primary, legacy] = ENV_NAMES.jwt_secret;
      throw new ConfigurationError({
        code: "jwt_secret_missing",
        message: `Unable to locate JWT secret. Set ${primary} (or ${legacy}) or add jwt_secret to ${this.configFileLabel}.`
      });
    }
    return secret;
  }

  resolveLifetimeSeconds(): number {
    return parseLifetimeSeconds(this.resolve("jwt_expiration"));
  }

  private sourcesFor(setting: SettingName): LookupStrategy[] {
    const [primary, legacy] = ENV_NAMES[setting];
    return [() => this.env[primary], () => this.env[legacy], () => this.readFileValue(setting)];
  }

  private readFileValue(key: SettingName): string | undefined {
    const document = this.loadDocument();
    if (!document) {
      return undefined;
    }
    const value = fileScalarSchema.safeParse(document[key]);
    return value.success ? String(value.data) : undefined;
  }

  private loadDocument(): ConfigDocument | null {
    if (this.document !== undefined) {
      return this.document;
    }

    let raw: string;
    try {
      raw = readFileSync(this.configFilePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        this.document = null;
        return null;
      }
      throw new ConfigurationError({
        code: "config_file_unreadable",
        message: `Unable to read ${this.configFileLabel}: ${error instanceof Error ? error.message : String(error)}`,
        details: error
      });
    }

    try {
      this.document = documentSchema.parse(parse(raw));
    } catch (error) {
      throw new ConfigurationError({
        code: "config_file_invalid",
        message: `${this.configFileLabel} is not a valid TOML document: ${error instanceof Error ? error.message : String(error)}`,
        details: error
      });
    }
    return this.document;
  }
}
