/**
 * Generate the TOTP secret that guards force-complete.
 *
 * Usage:
 *   npx tsx scripts/generate-admin-totp.ts [label]
 *
 * Put the printed secret in ADMIN_TOTP_SECRET and scan the URI into an authenticator.
 */

import { generateTotpSecret } from '../src/services/totp.js';

const label = process.argv[2] ?? 'operator';
const { secret, uri } = generateTotpSecret(label);

console.log(`\nADMIN_TOTP_SECRET=${secret}`);
console.log(`\n${uri}\n`);
