import { createCipheriv, createDecipheriv, createHmac, randomBytes } from 'node:crypto';
import { ethers } from 'ethers';
import { Keypair } from '@solana/web3.js';
import { env } from '../config/env.js';
import type { Chain } from '../chains/catalog.js';
import type { KeyHandle } from '../chains/types.js';
import { tronAddressFromPrivateKey } from '../chains/tron-address.js';

// ─── AES-256-GCM Encryption ─────────────────────────────────────────────────
// The key comes from WALLET_ENCRYPTION_KEY and is never stored next to the
// ciphertext. Plaintext is the raw private key bytes.

function getEncryptionKey(): Buffer {
  return Buffer.from(env.WALLET_ENCRYPTION_KEY, 'hex');
}

export function encryptPrivateKey(privateKey: Uint8Array, key: Buffer = getEncryptionKey()): string {
  const iv = randomBytes(12);
  const cipher = createCipheriv('aes-256-gcm', key, iv);
  const encrypted = Buffer.concat([cipher.update(privateKey), cipher.final()]);
  const authTag = cipher.getAuthTag();
  // Wire format: base64(iv || authTag || ciphertext)
  return Buffer.concat([iv, authTag, encrypted]).toString('base64');
}

export function decryptPrivateKey(encrypted: string, key: Buffer = getEncryptionKey()): Buffer {
  const buf = Buffer.from(encrypted, 'base64');
  const iv = buf.subarray(0, 12);
  const authTag = buf.subarray(12, 28);
  const ciphertext = buf.subarray(28);
  const decipher = createDecipheriv('aes-256-gcm', key, iv);
  decipher.setAuthTag(authTag);
  return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
}

/**
 * Decrypts into a buffer that lives only while `fn` runs, then zero-fills it,
 * whether `fn` resolves or throws.
 */
export async function withDecryptedKey<T>(
  encrypted: string,
  fn: (privateKey: Uint8Array) => Promise<T>,
  key: Buffer = getEncryptionKey(),
): Promise<T> {
  const plain = decryptPrivateKey(encrypted, key);
  try {
    return await fn(plain);
  } finally {
    plain.fill(0);
  }
}

export function keyHandle(encrypted: string, key: Buffer = getEncryptionKey()): KeyHandle {
  return {
    use: (fn) => withDecryptedKey(encrypted, fn, key),
  };
}

// ─── Derived Wallet Result ──────────────────────────────────────────────────

export interface DerivedWallet {
  address: string;
  encryptedPrivateKey: string;
  derivationPath: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
//  ETHEREUM — BIP-44, keccak256 address via ethers.js
// ═══════════════════════════════════════════════════════════════════════════════

function deriveEthereumWallet(mnemonic: string, index: number, key: Buffer): DerivedWallet {
  const path = `m/44'/60'/0'/0/${index}`;
  const hdNode = ethers.HDNodeWallet.fromPhrase(mnemonic, undefined, path);
  const privateKey = ethers.getBytes(hdNode.privateKey);
  try {
    return {
      address: hdNode.address,
      encryptedPrivateKey: encryptPrivateKey(privateKey, key),
      derivationPath: path,
    };
  } finally {
    privateKey.fill(0);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
//  TRON — BIP-44 coin type 195, same secp256k1 key as Ethereum, base58 address
// ═══════════════════════════════════════════════════════════════════════════════

function deriveTronWallet(mnemonic: string, index: number, key: Buffer): DerivedWallet {
  const path = `m/44'/195'/0'/0/${index}`;
  const hdNode = ethers.HDNodeWallet.fromPhrase(mnemonic, undefined, path);
  const privateKey = ethers.getBytes(hdNode.privateKey);
  try {
    return {
      address: tronAddressFromPrivateKey(privateKey),
      encryptedPrivateKey: encryptPrivateKey(privateKey, key),
      derivationPath: path,
    };
  } finally {
    privateKey.fill(0);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
//  SOLANA — SLIP-0010 ed25519 derivation (NOT BIP-32 secp256k1)
//  All path segments must be hardened.
// ═══════════════════════════════════════════════════════════════════════════════

function deriveSolanaWallet(mnemonic: string, index: number, key: Buffer): DerivedWallet {
  const path = `m/44'/501'/${index}'/0'`;
  const seed = Buffer.from(ethers.Mnemonic.fromPhrase(mnemonic).computeSeed().slice(2), 'hex');

  let I = createHmac('sha512', 'ed25519 seed').update(seed).digest();
  let childKey = I.subarray(0, 32);
  let chainCode = I.subarray(32, 64);

  const segments = path.replace('m/', '').split('/').map((s) => parseInt(s.replace("'", ''), 10) + 0x80000000);

  for (const segment of segments) {
    const data = Buffer.alloc(37);
    data[0] = 0x00; // private key marker for hardened child
    childKey.copy(data, 1);
    data.writeUInt32BE(segment >>> 0, 33);

    I = createHmac('sha512', chainCode).update(data).digest();
    childKey = I.subarray(0, 32);
    chainCode = I.subarray(32, 64);
  }

  const keypair = Keypair.fromSeed(new Uint8Array(childKey));
  const secretKey = keypair.secretKey;
  try {
    return {
      address: keypair.publicKey.toBase58(),
      encryptedPrivateKey: encryptPrivateKey(secretKey, key),
      derivationPath: path,
    };
  } finally {
    secretKey.fill(0);
    I.fill(0);
    seed.fill(0);
  }
}

// ─── Dispatch ────────────────────────────────────────────────────────────────

export function deriveWallet(
  chain: Chain,
  index: number,
  mnemonic: string = env.WALLET_MNEMONIC,
  key: Buffer = getEncryptionKey(),
): DerivedWallet {
  switch (chain) {
    case 'ethereum': return deriveEthereumWallet(mnemonic, index, key);
    case 'tron':     return deriveTronWallet(mnemonic, index, key);
    case 'solana':   return deriveSolanaWallet(mnemonic, index, key);
  }
}
