import * as OTPAuth from 'otpauth';

const ISSUER = 'Settlement Gateway';

/**
 * Generate a new TOTP secret for an operator.
 * Returns the raw secret (base32) and the otpauth:// URI for QR code generation.
 */
export function generateTotpSecret(label: string): { secret: string; uri: string } {
  const totp = new OTPAuth.TOTP({
    issuer: ISSUER,
    label,
    algorithm: 'SHA1',
    digits: 6,
    period: 30,
  });

  return {
    secret: totp.secret.base32,
    uri: totp.toString(),
  };
}

/**
 * Verify a 6-digit TOTP token against a base32 secret.
 * Allows a window of 1 (previous/next 30s interval).
 */
export function verifyTotp(secret: string, token: string, timestamp: number = Date.now()): boolean {
  if (!secret || !/^\d{6}$/.test(token)) return false;

  const totp = new OTPAuth.TOTP({
    issuer: ISSUER,
    algorithm: 'SHA1',
    digits: 6,
    period: 30,
    secret: OTPAuth.Secret.fromBase32(secret),
  });

  // validate returns the time step difference (null if invalid)
  const delta = totp.validate({ token, window: 1, timestamp });
  return delta !== null;
}

/** Current token for a secret. Used by the admin CLI and tests. */
export function currentTotp(secret: string, timestamp: number = Date.now()): string {
  return new OTPAuth.TOTP({
    issuer: ISSUER,
    algorithm: 'SHA1',
    digits: 6,
    period: 30,
    secret: OTPAuth.Secret.fromBase32(secret),
  }).generate({ timestamp });
}
