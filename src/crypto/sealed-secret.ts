import sodium from "libsodium-wrappers";

export class SecretEncryptionError extends Error {
  readonly cause: unknown;

  constructor(message: string, cause: unknown) {
    super(message);
    this.name = "SecretEncryptionError";
    this.cause = cause;
  }
}

/** The API may return keys without trailing base64 padding. */
export function padBase64(value: string): string {
  const remainder = value.length % 4;
  return remainder === 0 ? value : value + "=".repeat(4 - remainder);
}

/**
 * Seals `plaintext` for the holder of the private half of `publicKey`
 * (libsodium `crypto_box_seal`) and returns the ciphertext as standard base64.
 */
export async function encryptSecret(publicKey: string, plaintext: string): Promise<string> {
  await sodium.ready;

  let keyBytes: Uint8Array;
  try {
    keyBytes = sodium.from_base64(padBase64(publicKey), sodium.base64_variants.ORIGINAL);
  } catch (error) {
    throw new SecretEncryptionError("Cannot decode repository public key: expected standard base64.", error);
  }

  if (keyBytes.length !== sodium.crypto_box_PUBLICKEYBYTES) {
    throw new SecretEncryptionError(
      `Invalid repository public key: expected ${sodium.crypto_box_PUBLICKEYBYTES} bytes, got ${keyBytes.length}.`,
      undefined
    );
  }

  let sealed: Uint8Array;
  try {
    sealed = sodium.crypto_box_seal(sodium.from_string(plaintext), keyBytes);
  } catch (error) {
    throw new SecretEncryptionError("Cannot seal secret value with repository public key.", error);
  }

  return sodium.to_base64(sealed, sodium.base64_variants.ORIGINAL);
}
