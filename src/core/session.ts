import { hmacSha256, safeEqualHex } from './rng.js';
import { unauthorized } from '../errors.js';

export type Session = {
    token: string;
    userId: number;
    expiresAt: number;
};

const HOUR_MS = 60 * 60 * 1000;

// Stateless bearer tokens: "<userId>.<expiresAt>.<hmac-sha256 hex>"
export class SessionSigner {
    private readonly key: Buffer;

    constructor(secret: string, private readonly ttlHours: number) {
        this.key = Buffer.from(secret, 'utf8');
    }

    issue(userId: number, now: number = Date.now()): Session {
        const expiresAt = now + this.ttlHours * HOUR_MS;
        const payload = `${userId}.${expiresAt}`;
        return { token: `${payload}.${this.sign(payload)}`, userId, expiresAt };
    }

    verify(token: string, now: number = Date.now()): Session {
        const parts = token.split('.');
        if (parts.length !== 3) throw unauthorized('Malformed session token');
        const [rawUserId, rawExpiresAt, signature] = parts;
        const userId = Number(rawUserId);
        const expiresAt = Number(rawExpiresAt);
        if (!Number.isSafeInteger(userId) || !Number.isSafeInteger(expiresAt)) {
            throw unauthorized('Malformed session token');
        }
        if (!safeEqualHex(this.sign(`${rawUserId}.${rawExpiresAt}`), signature)) {
            throw unauthorized('Invalid session token');
        }
        if (expiresAt <= now) throw unauthorized('Session expired');
        return { token, userId, expiresAt };
    }

    private sign(payload: string): string {
        return hmacSha256(this.key, payload).toString('hex');
    }
}
