/**
 * License gate: authorizes inbound calls at the transport boundary.
 *
 * The license is an opaque bearer token with an optional expiry, issued
 * elsewhere. Calls must present `Bearer <token>`; once the expiry passes, every
 * call is refused. With no token configured the gate is open (development).
 */

import { timingSafeEqual } from 'node:crypto';
import { AuthorizationError } from '../core/errors.js';

export interface LicenseConfig {
  /** Token callers must present. Empty or undefined disables the gate. */
  token?: string;
  /** Expiry as epoch milliseconds. */
  expiresAt?: number;
}

function safeCompare(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  // timingSafeEqual throws on differing byte lengths.
  if (left.byteLength !== right.byteLength) return false;
  return timingSafeEqual(left, right);
}

export class LicenseGate {
  constructor(
    private readonly config: LicenseConfig,
    private readonly now: () => number = Date.now
  ) {}

  get enabled(): boolean {
    return Boolean(this.config.token);
  }

  /** Throws AuthorizationError when the call must not reach the core. */
  authorize(authorizationHeader: string | undefined): void {
    const token = this.config.token;
    if (!token) return;

    if (this.config.expiresAt !== undefined && this.config.expiresAt <= this.now()) {
      throw new AuthorizationError('license expired', 'expired');
    }

    if (!authorizationHeader) {
      throw new AuthorizationError('missing bearer token', 'missing_token');
    }

    const [scheme, presented] = authorizationHeader.trim().split(/\s+/);
    if (scheme?.toLowerCase() !== 'bearer' || !presented || !safeCompare(presented, token)) {
      throw new AuthorizationError('invalid bearer token', 'invalid_token');
    }
  }

  /** Milliseconds until expiry, or undefined when the license does not expire. */
  remainingMs(): number | undefined {
    if (this.config.expiresAt === undefined) return undefined;
    return this.config.expiresAt - this.now();
  }
}
