import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;
const AUTH_TAG_LENGTH = 16;

function toKey(hexKey: string): Buffer {
    // Key needs to be 64 hex characters for AES-256
    if (!/^[0-9a-fA-F]{64}$/.test(hexKey)) {
        throw new Error('Encryption key must be 64 hex characters (32 bytes)');
    }
    return Buffer.from(hexKey, 'hex');
}

export function encrypt(plaintext: string, hexKey: string): string {
    const key = toKey(hexKey);
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });

    let encrypted = cipher.update(plaintext, 'utf8', 'hex');
    encrypted += cipher.final('hex');

    const authTag = cipher.getAuthTag();

    // Format: iv:authTag:encrypted (all hex)
    return `${iv.toString('hex')}:${authTag.toString('hex')}:${encrypted}`;
}

export function decrypt(ciphertext: string, hexKey: string): string {
    const key = toKey(hexKey);
    const parts = ciphertext.split(':');

    if (parts.length !== 3) {
        throw new Error('Invalid ciphertext format');
    }

    const [ivHex, tagHex, encrypted] = parts;
    const iv = Buffer.from(ivHex, 'hex');
    const authTag = Buffer.from(tagHex, 'hex');

    const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
    decipher.setAuthTag(authTag);

    let decrypted = decipher.update(encrypted, 'hex', 'utf8');
    decrypted += decipher.final('utf8');

    return decrypted;
}

export function isEncrypted(blob: string): boolean {
    return /^[0-9a-f]{32}:[0-9a-f]{32}:[0-9a-f]*$/.test(blob.trim());
}

// Generate a new encryption key
export function generateEncryptionKey(): string {
    return randomBytes(32).toString('hex');
}
