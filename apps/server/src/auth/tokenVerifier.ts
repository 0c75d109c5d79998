/**
 * Login token verification
 */

export type VerifyResult =
  | { ok: true; userId: string }
  | { ok: false; reason: string };

export interface TokenVerifier {
  verify(token: string): VerifyResult;
}

/**
 * Verifies tokens against a fixed token → user table (from AUTH_TOKENS)
 */
export class StaticTokenVerifier implements TokenVerifier {
  private tokens: Map<string, string>;

  constructor(tokens: Map<string, string>) {
    this.tokens = new Map(tokens);
  }

  verify(token: string): VerifyResult {
    if (token.length === 0) {
      return { ok: false, reason: "Empty token" };
    }

    const userId = this.tokens.get(token);
    if (!userId) {
      return { ok: false, reason: "Invalid token" };
    }

    return { ok: true, userId };
  }
}
