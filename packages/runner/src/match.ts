export type Row = Record<string, unknown>;

export function isObj(x: unknown): x is Row {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

export function deepSubsetMatch(actual: unknown, expected: unknown): boolean {
  if (expected === null || typeof expected !== "object") return Object.is(actual, expected);

  if (Array.isArray(expected)) {
    if (!Array.isArray(actual)) return false;
    if (expected.length > actual.length) return false;
    for (let i = 0; i < expected.length; i++) {
      if (!deepSubsetMatch(actual[i], expected[i])) return false;
    }
    return true;
  }

  if (isObj(expected)) {
    if (!isObj(actual)) return false;
    for (const key of Object.keys(expected)) {
      if (!(key in actual)) return false;
      if (!deepSubsetMatch(actual[key], expected[key])) return false;
    }
    return true;
  }

  return false;
}

export function missingFields(value: unknown, fields: readonly string[]): string[] {
  if (!isObj(value)) return [...fields];
  return fields.filter((f) => !(f in value));
}

/** Like missingFields, but a key also counts when it differs only in case. */
export function missingFieldsIgnoringCase(value: unknown, fields: readonly string[]): string[] {
  if (!isObj(value)) return [...fields];
  const keys = new Set(Object.keys(value).map((k) => k.toLowerCase()));
  return fields.filter((f) => !(f in value) && !keys.has(f.toLowerCase()));
}

/** String view of a scalar field; ids arrive as numbers from some endpoints. */
export function str(row: unknown, key: string): string | undefined {
  if (!isObj(row)) return undefined;
  const v = row[key];
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return undefined;
}

export function list(row: unknown, key: string): unknown[] {
  if (!isObj(row)) return [];
  const v = row[key];
  return Array.isArray(v) ? v : [];
}

export function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
