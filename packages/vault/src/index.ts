/**
 * @armada/vault
 *
 * AES-256-GCM encryption for gateway credentials at rest.
 */

export { type GatewayCredentials, GatewayCredentialsSchema } from "./credentials.js";
export {
  decryptCredentials,
  encryptCredentials,
  generateEncryptionKey,
  KEY_SIZE,
  NONCE_SIZE,
  parseEncryptionKey,
  TAG_SIZE,
} from "./crypto.js";
