export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | readonly CanonicalValue[]
  | { readonly [key: string]: CanonicalValue | undefined };

function isArray(value: CanonicalValue): value is readonly CanonicalValue[] {
  return Array.isArray(value);
}

function compareKeys(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function serialize(value: CanonicalValue, path: string): string {
  if (value === null) {
    return "null";
  }

  if (typeof value === "string" || typeof value === "boolean") {
    return JSON.stringify(value);
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Cannot canonicalize non-finite number at ${path}.`);
    }
    return JSON.stringify(value);
  }

  if (isArray(value)) {
    return `[${value.map((child, index) => serialize(child, `${path}[${index}]`)).join(",")}]`;
  }

  // Keys are ordered here rather than through object iteration, which moves integer-like keys first.
  const parts: string[] = [];
  for (const key of Object.keys(value).sort(compareKeys)) {
    const child = value[key];
    if (child === undefined) {
      continue;
    }
    parts.push(`${JSON.stringify(key)}:${serialize(child, `${path}.${key}`)}`);
  }
  return `{${parts.join(",")}}`;
}

export function canonicalStringify(value: CanonicalValue): string {
  return serialize(value, "$");
}
