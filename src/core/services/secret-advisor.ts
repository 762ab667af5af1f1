export const MIN_SECRET_LENGTH = 64;
const MIN_DISTINCT_CHARACTERS = 10;

const PLACEHOLDER_SECRETS = [
  "CHANGE_THIS_SECRET_IN_PRODUCTION",
  "INSECURE_DEFAULT_DO_NOT_USE_IN_PRODUCTION",
  "your-secret-key",
  "default-secret-key"
];

const WEAK_FRAGMENTS = ["changeme", "password", "default", "12345", "abcdef"];

// Mirrors the API server's start-up checks; the server measures length in UTF-8 bytes.
export function adviseOnSecret(secret: string): string[] {
  const trimmed = secret.trim();
  const lower = trimmed.toLowerCase();
  const characters = Array.from(trimmed);
  const warnings: string[] = [];

  const byteLength = Buffer.byteLength(trimmed, "utf8");
  if (byteLength < MIN_SECRET_LENGTH) {
    warnings.push(
      `JWT secret is ${byteLength} bytes long; the API server requires at least ${MIN_SECRET_LENGTH}.`
    );
  }
  if (PLACEHOLDER_SECRETS.some((placeholder) => placeholder.toLowerCase() === lower)) {
    warnings.push("JWT secret is a known placeholder value.");
  }
  const first = characters[0];
  if (first !== undefined && characters.every((character) => character === first)) {
    warnings.push("JWT secret is a single repeated character.");
  }
  const fragment = WEAK_FRAGMENTS.find((candidate) => lower.includes(candidate));
  if (fragment) {
    warnings.push(`JWT secret contains the weak fragment "${fragment}".`);
  }
  const distinct = new Set(characters).size;
  if (distinct < MIN_DISTINCT_CHARACTERS) {
    warnings.push(
      `JWT secret has ${distinct} distinct characters; the API server requires at least ${MIN_DISTINCT_CHARACTERS}.`
    );
  }

  return warnings;
}
