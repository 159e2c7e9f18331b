import { InternalError } from "./bases/internal-error.js";
import { ValidationError } from "./bases/validation-error.js";

/**
 * The encryption key is not exactly 32 bytes.
 */
export class InvalidKeySizeError extends ValidationError<"VAULT_INVALID_KEY_SIZE"> {
  constructor(public readonly actualSize: number) {
    super({
      code: "VAULT_INVALID_KEY_SIZE",
      message: "invalid key size: must be 32 bytes for AES-256",
      metadata: { actualSize: String(actualSize) },
    });
  }
}

/**
 * Decryption failed. Deliberately carries no detail about why: tampering,
 * a wrong key and a truncated blob all look the same to the caller.
 */
export class InvalidCiphertextError extends InternalError<"VAULT_INVALID_CIPHERTEXT"> {
  constructor() {
    super({ code: "VAULT_INVALID_CIPHERTEXT", message: "invalid ciphertext" });
  }
}

/**
 * The credential record handed to the vault is missing or malformed.
 */
export class InvalidCredentialsError extends ValidationError<"VAULT_INVALID_CREDENTIALS"> {
  constructor(message = "credentials cannot be empty") {
    super({ code: "VAULT_INVALID_CREDENTIALS", message });
  }
}
