import { createHmac } from "node:crypto";

export function encodeBase64Url(value: string | Buffer): string {
  const bytes = typeof value === "string" ? Buffer.from(value, "utf8") : value;
  return bytes.toString("base64url");
}

export function decodeBase64Url(value: string): string {
  return Buffer.from(value, "base64url").toString("utf8");
}

export function hmacSha256Base64Url(secret: string, input: string): string {
  return createHmac("sha256", Buffer.from(secret, "utf8")).update(input, "utf8").digest("base64url");
}
