import crypto from 'node:crypto';

export function sha256Hex(input: string | Buffer): string {
    return crypto.createHash('sha256').update(input).digest('hex');
}

export function hmacSha256(key: Buffer, message: string): Buffer {
    return crypto.createHmac('sha256', key).update(message).digest();
}

// Numeric code such as "048213"; leading zeros are kept
export function randomDigits(length: number): string {
    let code = '';
    for (let i = 0; i < length; i += 1) {
        code += String(crypto.randomInt(0, 10));
    }
    return code;
}

export function safeEqualHex(a: string, b: string): boolean {
    const left = Buffer.from(a, 'hex');
    const right = Buffer.from(b, 'hex');
    if (left.length === 0 || left.length !== right.length) return false;
    return crypto.timingSafeEqual(left, right);
}
