/*
Game Sage - Fernet symmetric tokens
GPL-2.0-only
*/

import crypto from "node:crypto";
import { AppError, ValidationError } from "../errors.js";

const VERSION = 0x80;
const HEADER_BYTES = 1 + 8 + 16;
const HMAC_BYTES = 32;

export class InvalidTokenError extends AppError {
  constructor(message = "Invalid Fernet token", options?: { cause?: unknown }) {
    super(message, "validation", { code: "invalid_token", ...options });
  }
}

/** URL-safe base64 with padding, the alphabet Fernet keys and tokens use. */
export function toUrlSafeBase64(data: Buffer): string {
  return data.toString("base64").replace(/\+/g, "-").replace(/\//g, "_");
}

export function fromUrlSafeBase64(text: string): Buffer {
  return Buffer.from(text.trim().replace(/-/g, "+").replace(/_/g, "/"), "base64");
}

/**
 * Fernet (version 0x80): AES-128-CBC with PKCS7 padding, authenticated by
 * HMAC-SHA256 over version, timestamp, IV and ciphertext. The 32-byte key is
 * the signing key followed by the encryption key.
 */
export class Fernet {
  private readonly signingKey: Buffer;
  private readonly encryptionKey: Buffer;

  constructor(key: string | Buffer) {
    const raw = typeof key === "string" ? fromUrlSafeBase64(key) : fromUrlSafeBase64(key.toString("ascii"));
    if (raw.length !== 32) {
      throw new ValidationError("Fernet key must be 32 url-safe base64-encoded bytes");
    }
    this.signingKey = raw.subarray(0, 16);
    this.encryptionKey = raw.subarray(16);
  }

  static generateKey(): string {
    return toUrlSafeBase64(crypto.randomBytes(32));
  }

  encrypt(data: Buffer, now: Date = new Date(), iv: Buffer = crypto.randomBytes(16)): string {
    const cipher = crypto.createCipheriv("aes-128-cbc", this.encryptionKey, iv);
    const ciphertext = Buffer.concat([cipher.update(data), cipher.final()]);

    const header = Buffer.alloc(HEADER_BYTES);
    header.writeUInt8(VERSION, 0);
    header.writeBigUInt64BE(BigInt(Math.floor(now.getTime() / 1000)), 1);
    iv.copy(header, 9);

    const body = Buffer.concat([header, ciphertext]);
    const mac = crypto.createHmac("sha256", this.signingKey).update(body).digest();
    return toUrlSafeBase64(Buffer.concat([body, mac]));
  }

  /** Verifies and decrypts a token. `ttlSeconds` rejects tokens older than that. */
  decrypt(token: string | Buffer, options: { ttlSeconds?: number; now?: Date } = {}): Buffer {
    const raw = fromUrlSafeBase64(typeof token === "string" ? token : token.toString("ascii"));
    if (raw.length < HEADER_BYTES + 16 + HMAC_BYTES || raw[0] !== VERSION) {
      throw new InvalidTokenError();
    }

    const body = raw.subarray(0, raw.length - HMAC_BYTES);
    const mac = raw.subarray(raw.length - HMAC_BYTES);
    const expected = crypto.createHmac("sha256", this.signingKey).update(body).digest();
    if (!crypto.timingSafeEqual(mac, expected)) {
      throw new InvalidTokenError();
    }

    if (options.ttlSeconds !== undefined) {
      const issuedAt = Number(raw.readBigUInt64BE(1));
      const nowSeconds = Math.floor((options.now ?? new Date()).getTime() / 1000);
      if (issuedAt + options.ttlSeconds < nowSeconds) {
        throw new InvalidTokenError("Fernet token has expired");
      }
    }

    const iv = raw.subarray(9, HEADER_BYTES);
    const ciphertext = raw.subarray(HEADER_BYTES, raw.length - HMAC_BYTES);
    try {
      const decipher = crypto.createDecipheriv("aes-128-cbc", this.encryptionKey, iv);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch (error) {
      throw new InvalidTokenError("Fernet token could not be decrypted", { cause: error });
    }
  }
}
