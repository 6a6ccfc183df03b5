import crypto from 'crypto';

const HEX_DIGEST = /^0x[0-9a-f]{64}$/;

export function sha256(data: string | Buffer): string {
    return crypto.createHash('sha256').update(data).digest('hex');
}

export function sha256Bytes(data: Buffer): Buffer {
    return crypto.createHash('sha256').update(data).digest();
}

/**
 * Deterministic 20-byte address for an engine-owned entity (pair, token).
 */
export function deriveAddress(...parts: string[]): string {
    return `0x${sha256(parts.join('|')).substring(0, 40)}`;
}

export function isDigest(value: string): boolean {
    return HEX_DIGEST.test(value.toLowerCase());
}

export function digestToBuffer(digest: string): Buffer {
    return Buffer.from(digest.slice(2), 'hex');
}

export function bufferToDigest(buf: Buffer): string {
    return `0x${buf.toString('hex')}`;
}

/**
 * uint256 → 32-byte big-endian word
 */
export function uint256Word(value: bigint): Buffer {
    return Buffer.from(value.toString(16).padStart(64, '0'), 'hex');
}
