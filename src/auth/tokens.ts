/**
 * Opaque bearer tokens accepted by the relay. Membership is the whole check.
 */
export class AuthTokenSet {
  private tokens = new Set<string>();

  constructor(tokens: Iterable<string> = []) {
    for (const token of tokens) {
      this.add(token);
    }
  }

  /** Blank tokens are ignored. Returns whether the token was newly added. */
  add(token: string): boolean {
    const value = token.trim();
    if (!value || this.tokens.has(value)) {
      return false;
    }
    this.tokens.add(value);
    return true;
  }

  remove(token: string): boolean {
    return this.tokens.delete(token.trim());
  }

  isValid(token: string | undefined): boolean {
    if (!token) {
      return false;
    }
    return this.tokens.has(token.trim());
  }

  get size(): number {
    return this.tokens.size;
  }
}

export function extractBearerToken(header: string | string[] | undefined): string | undefined {
  const value = Array.isArray(header) ? header[0] : header;
  if (typeof value !== "string") {
    return undefined;
  }
  const match = /^Bearer\s+(.+)$/i.exec(value.trim());
  const token = match?.[1]?.trim();
  return token ? token : undefined;
}
