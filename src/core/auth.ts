import bcrypt from 'bcryptjs';
import { ROLES, Clock, User } from '../types.js';
import { conflict, invalidInput, notFound, unauthorized } from '../errors.js';
import type { BetStore } from '../db/index.js';
import type { Notifier } from '../notify/index.js';
import { randomDigits, safeEqualHex, sha256Hex } from './rng.js';
import { isRole } from './roles.js';

const USERNAME_PATTERN = /^[A-Za-z0-9]+$/;
const RESET_CODE_LENGTH = 6;
const MINUTE_MS = 60 * 1000;

export type AccountOptions = {
    adminCode: string;
    startBalance: number;
    resetCodeTtlMinutes: number;
    bcryptRounds?: number;
};

export type RegisterInput = {
    username: string;
    email: string;
    password: string;
    role?: string;
    adminCode?: string;
};

export function hashPassword(password: string, rounds = 10): string {
    return bcrypt.hashSync(password, bcrypt.genSaltSync(rounds));
}

export function checkPassword(password: string, hash: string): boolean {
    return bcrypt.compareSync(password, hash);
}

// An empty configured code never matches, so Admin registration stays closed until one is set
export function adminCodeMatches(expected: string, given: string | undefined): boolean {
    return expected.length > 0 && given === expected;
}

export class AccountService {
    constructor(
        private readonly store: BetStore,
        private readonly notifier: Notifier,
        private readonly options: AccountOptions,
        private readonly now: Clock = Date.now,
    ) {}

    register(input: RegisterInput): User {
        const username = input.username.trim();
        const email = input.email.trim();
        if (!username || !email || !input.password) throw invalidInput('Username, email and password are required');
        if (!USERNAME_PATTERN.test(username)) throw invalidInput('Username may only contain letters and numbers');

        const role = input.role ?? 'Member';
        if (!isRole(role)) throw invalidInput(`Role must be one of ${ROLES.join(', ')}`);
        if (role === 'Admin' && !adminCodeMatches(this.options.adminCode, input.adminCode)) {
            throw unauthorized('Incorrect admin code');
        }
        if (this.store.getUserByUsername(username) || this.store.getUserByEmail(email)) {
            throw conflict('Username or email already exists');
        }

        const user = this.store.createUser({
            username,
            email,
            passwordHash: hashPassword(input.password, this.options.bcryptRounds),
            role,
            balance: this.options.startBalance,
        }, this.now());
        console.log(`[auth] registered ${user.username} (${user.role})`);
        return user;
    }

    authenticate(username: string, password: string): User {
        const user = this.store.getUserByUsername(username.trim());
        if (!user || !checkPassword(password, user.passwordHash)) {
            throw unauthorized('Invalid credentials');
        }
        return user;
    }

    /** Issues a short-lived numeric code and hands it to the notifier. */
    async requestPasswordReset(email: string): Promise<{ expiresAt: number }> {
        const user = this.store.getUserByEmail(email.trim());
        if (!user) throw notFound('No account found for this email');
        const code = randomDigits(RESET_CODE_LENGTH);
        const expiresAt = this.now() + this.options.resetCodeTtlMinutes * MINUTE_MS;
        this.store.setPasswordReset({ email: user.email, codeHash: sha256Hex(code), expiresAt });
        try {
            await this.notifier.sendPasswordResetCode(user, code, expiresAt);
        } catch (error) {
            // Nobody received it
            this.store.clearPasswordReset(user.email);
            throw error;
        }
        return { expiresAt };
    }

    confirmPasswordReset(email: string, code: string, newPassword: string): User {
        if (!newPassword) throw invalidInput('New password is required');
        const user = this.store.getUserByEmail(email.trim());
        const reset = user ? this.store.getPasswordReset(user.email) : undefined;
        if (!user || !reset || reset.expiresAt <= this.now() || !safeEqualHex(reset.codeHash, sha256Hex(code.trim()))) {
            throw unauthorized('Invalid or expired code');
        }
        this.store.transaction(() => {
            this.store.updatePasswordHash(user.id, hashPassword(newPassword, this.options.bcryptRounds));
            this.store.clearPasswordReset(user.email);
        });
        console.log(`[auth] password reset for ${user.username}`);
        return this.requireUser(user.id);
    }

    /** Binds a Telegram account to an existing user after checking credentials. */
    linkTelegram(username: string, password: string, telegramId: number): User {
        const user = this.authenticate(username, password);
        const current = this.store.getUserByTelegramId(telegramId);
        if (current && current.id !== user.id) {
            this.store.setTelegramId(current.id, null);
        }
        this.store.setTelegramId(user.id, telegramId);
        return this.requireUser(user.id);
    }

    requireUser(userId: number): User {
        const user = this.store.getUserById(userId);
        if (!user) throw notFound(`User ${userId} not found`, { userId });
        return user;
    }
}
