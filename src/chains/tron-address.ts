import { ethers } from 'ethers';

// ─── TRON Address Encoding ──────────────────────────────────────────────────
// A TRON address is base58check(0x41 || last 20 bytes of keccak256(pubkey)),
// i.e. an Ethereum address with a 0x41 version byte.

const TRON_PREFIX = 0x41;

function checksum(payload: Uint8Array): Uint8Array {
  return ethers.getBytes(ethers.sha256(ethers.sha256(payload))).slice(0, 4);
}

/** '0x…' (20 bytes) or '41…' (21 bytes) hex to a T-address. */
export function tronAddressFromHex(hex: string): string {
  const clean = hex.startsWith('0x') ? hex.slice(2) : hex;
  const body = clean.length === 42 ? clean.slice(2) : clean;
  const payload = ethers.getBytes('0x' + TRON_PREFIX.toString(16) + body.toLowerCase());
  return ethers.encodeBase58(ethers.concat([payload, checksum(payload)]));
}

function decode(address: string): Uint8Array | null {
  try {
    const raw = ethers.toBeArray(ethers.decodeBase58(address));
    return raw.length === 25 ? raw : null;
  } catch {
    return null;
  }
}

export function isTronAddress(address: string): boolean {
  if (!/^T[1-9A-HJ-NP-Za-km-z]{33}$/.test(address)) return false;
  const raw = decode(address);
  if (!raw || raw[0] !== TRON_PREFIX) return false;
  const payload = raw.slice(0, 21);
  return ethers.hexlify(checksum(payload)) === ethers.hexlify(raw.slice(21));
}

/** T-address to the 20-byte '0x…' form used in ABI parameters. */
export function tronAddressToEvmHex(address: string): string {
  const raw = decode(address);
  if (!raw) throw new Error(`Invalid TRON address: ${address}`);
  return ethers.hexlify(raw.slice(1, 21));
}

/** T-address to the '41…' hex form TronGrid returns in raw transactions. */
export function tronAddressToHex(address: string): string {
  return '41' + tronAddressToEvmHex(address).slice(2);
}

export function tronAddressFromPrivateKey(privateKey: Uint8Array): string {
  return tronAddressFromHex(ethers.computeAddress(ethers.hexlify(privateKey)));
}
