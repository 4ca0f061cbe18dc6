import { isObj, type Row } from "./match.js";

export function b64url(raw: string): string {
  return Buffer.from(raw, "utf-8").toString("base64url");
}

/** Claims of a JWT without verifying it; null when the token is not a readable JWT. */
export function decodeJwtPayload(token: string): Row | null {
  const parts = token.split(".");
  if (parts.length < 2 || !parts[1]) return null;
  try {
    const claims: unknown = JSON.parse(Buffer.from(parts[1], "base64url").toString("utf-8"));
    return isObj(claims) ? claims : null;
  } catch {
    return null;
  }
}

/** A structurally valid JWT whose signature is a placeholder. */
export function unsignedJwt(header: Row, claims: Row, signature = "signature"): string {
  return `${b64url(JSON.stringify(header))}.${b64url(JSON.stringify(claims))}.${signature}`;
}
