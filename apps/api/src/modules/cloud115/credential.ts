import { CredentialParseError } from "../../core/errors.js";

export interface Credential {
  uid: string;
  cid: string;
  seid: string;
}

const REQUIRED_KEYS = ["UID", "CID", "SEID"] as const;

export function parseCookie(cookie: string): Credential {
  const pairs = new Map<string, string>();
  for (const part of cookie.split(";")) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const eq = trimmed.indexOf("=");
    if (eq <= 0) continue;
    pairs.set(trimmed.slice(0, eq).trim(), trimmed.slice(eq + 1).trim());
  }

  const missing = REQUIRED_KEYS.filter((key) => !pairs.get(key));
  if (missing.length > 0) {
    throw new CredentialParseError(`cookie is missing ${missing.join(", ")}`);
  }

  return {
    uid: pairs.get("UID") ?? "",
    cid: pairs.get("CID") ?? "",
    seid: pairs.get("SEID") ?? ""
  };
}

export function formatCookie(credential: Credential): string {
  return `UID=${credential.uid};CID=${credential.cid};SEID=${credential.seid}`;
}

/**
 * Holds the active credential. Writers replace the whole value, so readers
 * never observe a mix of two logins.
 */
export class CredentialCell {
  private current: Readonly<Credential> | null = null;

  get(): Readonly<Credential> | null {
    return this.current;
  }

  set(next: Credential): void {
    this.current = Object.freeze({ ...next });
  }

  clear(): void {
    this.current = null;
  }

  cookie(): string | undefined {
    return this.current ? formatCookie(this.current) : undefined;
  }
}
