import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { InvalidCiphertextError, InvalidCredentialsError, InvalidKeySizeError } from "@armada/errors";
import { type GatewayCredentials, GatewayCredentialsSchema } from "./credentials.js";

/** AES-256 key length in bytes */
export const KEY_SIZE = 32;
/** GCM nonce length in bytes */
export const NONCE_SIZE = 12;
/** GCM authentication tag length in bytes */
export const TAG_SIZE = 16;

const ALGORITHM = "aes-256-gcm";

function assertKeySize(key: Uint8Array): void {
  if (key.length !== KEY_SIZE) {
    throw new InvalidKeySizeError(key.length);
  }
}

/**
 * Encrypt a credential record with AES-256-GCM.
 *
 * Output layout: `nonce (12) ‖ ciphertext ‖ tag (16)`. A fresh nonce is drawn
 * per call, so identical inputs never produce identical blobs.
 */
export function encryptCredentials(credentials: GatewayCredentials, key: Uint8Array): Buffer {
  assertKeySize(key);

  const parsed = GatewayCredentialsSchema.safeParse(credentials);
  if (!parsed.success) {
    throw new InvalidCredentialsError(
      `invalid credentials: ${parsed.error.issues.map((i) => i.path.join(".")).join(", ")}`,
    );
  }

  const nonce = randomBytes(NONCE_SIZE);
  const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_SIZE });
  const sealed = Buffer.concat([
    cipher.update(JSON.stringify(parsed.data), "utf8"),
    cipher.final(),
  ]);

  return Buffer.concat([nonce, sealed, cipher.getAuthTag()]);
}

/**
 * Decrypt a blob produced by {@link encryptCredentials}.
 *
 * Short blobs, authentication failures and undecodable plaintext are all
 * reported as the same {@link InvalidCiphertextError}.
 */
export function decryptCredentials(blob: Uint8Array, key: Uint8Array): GatewayCredentials {
  assertKeySize(key);

  if (blob.length < NONCE_SIZE + TAG_SIZE) {
    throw new InvalidCiphertextError();
  }

  const data = Buffer.from(blob);
  const nonce = data.subarray(0, NONCE_SIZE);
  const tag = data.subarray(data.length - TAG_SIZE);
  const ciphertext = data.subarray(NONCE_SIZE, data.length - TAG_SIZE);

  let plaintext: string;
  try {
    const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_SIZE });
    decipher.setAuthTag(tag);
    plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf8");
  } catch {
    throw new InvalidCiphertextError();
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(plaintext);
  } catch {
    throw new InvalidCiphertextError();
  }

  const parsed = GatewayCredentialsSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new InvalidCiphertextError();
  }
  return parsed.data;
}

/**
 * Generate a fresh random 32-byte key. Storage and rotation are the
 * operator's responsibility.
 */
export function generateEncryptionKey(): Buffer {
  return randomBytes(KEY_SIZE);
}

/**
 * Decode a base64 key from configuration.
 *
 * @throws InvalidKeySizeError when the decoded key is not 32 bytes
 */
export function parseEncryptionKey(encoded: string): Buffer {
  const key = Buffer.from(encoded.trim(), "base64");
  assertKeySize(key);
  return key;
}
