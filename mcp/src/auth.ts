import { timingSafeEqual } from 'node:crypto';
import { InvalidTokenError } from '@modelcontextprotocol/sdk/server/auth/errors.js';
import type { OAuthTokenVerifier } from '@modelcontextprotocol/sdk/server/auth/provider.js';
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';

// Static tokens do not expire; the SDK still wants an expiry, so it rolls forward
const TOKEN_LIFETIME_SECONDS = 3600;

function sameToken(a: string, b: string): boolean {
  const x = Buffer.from(a, 'utf-8');
  const y = Buffer.from(b, 'utf-8');
  return x.length === y.length && timingSafeEqual(x, y);
}

/**
 * Verifier for a single shared bearer token, used when CONTACT_BOOK_TOKEN
 * is set.
 */
export function createStaticTokenVerifier(expected: string): OAuthTokenVerifier {
  return {
    verifyAccessToken: async (token: string): Promise<AuthInfo> => {
      if (!sameToken(token, expected)) {
        console.error('Rejected bearer token, length:', token.length);
        throw new InvalidTokenError('Invalid access token');
      }
      return {
        token,
        clientId: 'contact-book',
        scopes: [],
        expiresAt: Math.floor(Date.now() / 1000) + TOKEN_LIFETIME_SECONDS,
      };
    },
  };
}
