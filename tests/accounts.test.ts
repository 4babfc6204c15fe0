import { beforeEach, describe, expect, it } from 'vitest';
import { SessionSigner } from '../src/core/session.js';
import { invalidState } from '../src/errors.js';
import { Notifier } from '../src/notify/index.js';
import { AccountService, adminCodeMatches, checkPassword } from '../src/core/auth.js';
import { ADMIN_CODE, HOUR, PASSWORD, T0, TestContext, addUser, captureAsyncError, captureError, createTestContext } from './helpers.js';

describe('AccountService', () => {
    let ctx: TestContext;

    beforeEach(() => {
        ctx = createTestContext();
    });

    describe('register', () => {
        it('creates a member with a hashed password and the starting balance', () => {
            const user = addUser(ctx, 'alice');
            expect(user).toMatchObject({ username: 'alice', email: 'alice@example.test', role: 'Member', balance: 0, telegramId: null });
            expect(user.passwordHash).not.toBe(PASSWORD);
            expect(checkPassword(PASSWORD, user.passwordHash)).toBe(true);
        });

        it('only accepts letters and digits in usernames', () => {
            const error = captureError(() => ctx.accounts.register({ username: 'al ice', email: 'a@example.test', password: PASSWORD }));
            expect(error.kind).toBe('InvalidInput');
        });

        it('requires every field', () => {
            expect(captureError(() => ctx.accounts.register({ username: 'alice', email: '', password: PASSWORD })).kind).toBe('InvalidInput');
            expect(captureError(() => ctx.accounts.register({ username: 'alice', email: 'a@example.test', password: '' })).kind).toBe('InvalidInput');
        });

        it('rejects unknown roles', () => {
            const error = captureError(() => ctx.accounts.register({ username: 'alice', email: 'a@example.test', password: PASSWORD, role: 'Owner' }));
            expect(error.kind).toBe('InvalidInput');
        });

        it('requires the admin code for admins', () => {
            const input = { username: 'boss', email: 'boss@example.test', password: PASSWORD, role: 'Admin' };
            expect(captureError(() => ctx.accounts.register(input)).kind).toBe('Unauthorized');
            expect(captureError(() => ctx.accounts.register({ ...input, adminCode: 'wrong' })).kind).toBe('Unauthorized');
            expect(ctx.accounts.register({ ...input, adminCode: ADMIN_CODE }).role).toBe('Admin');
        });

        it('rejects a taken username or email', () => {
            addUser(ctx, 'alice');
            expect(captureError(() => ctx.accounts.register({ username: 'alice', email: 'other@example.test', password: PASSWORD })).kind).toBe('Conflict');
            expect(captureError(() => ctx.accounts.register({ username: 'alice2', email: 'alice@example.test', password: PASSWORD })).kind).toBe('Conflict');
        });
    });

    describe('authenticate', () => {
        it('returns the user for the right password', () => {
            const alice = addUser(ctx, 'alice');
            expect(ctx.accounts.authenticate('alice', PASSWORD).id).toBe(alice.id);
        });

        it('fails the same way for a wrong password and an unknown user', () => {
            addUser(ctx, 'alice');
            const wrongPassword = captureError(() => ctx.accounts.authenticate('alice', 'nope'));
            const unknownUser = captureError(() => ctx.accounts.authenticate('mallory', PASSWORD));
            expect([wrongPassword.kind, wrongPassword.message]).toEqual(['Unauthorized', 'Invalid credentials']);
            expect([unknownUser.kind, unknownUser.message]).toEqual(['Unauthorized', 'Invalid credentials']);
        });
    });

    describe('password reset', () => {
        it('delivers a six digit code that sets a new password once', async () => {
            addUser(ctx, 'alice');
            const { expiresAt } = await ctx.accounts.requestPasswordReset('alice@example.test');
            expect(expiresAt).toBe(T0 + 5 * 60 * 1000);

            const [delivery] = ctx.notifier.resetCodes;
            expect(delivery?.email).toBe('alice@example.test');
            const code = delivery?.code ?? '';
            expect(code).toMatch(/^\d{6}$/);

            ctx.accounts.confirmPasswordReset('alice@example.test', code, 'new-password');
            expect(ctx.accounts.authenticate('alice', 'new-password').username).toBe('alice');
            expect(captureError(() => ctx.accounts.authenticate('alice', PASSWORD)).kind).toBe('Unauthorized');
            expect(captureError(() => ctx.accounts.confirmPasswordReset('alice@example.test', code, 'again')).kind).toBe('Unauthorized');
        });

        it('rejects a wrong code', async () => {
            addUser(ctx, 'alice');
            await ctx.accounts.requestPasswordReset('alice@example.test');
            const code = ctx.notifier.resetCodes[0]?.code ?? '';
            const wrong = code === '000000' ? '111111' : '000000';
            const error = captureError(() => ctx.accounts.confirmPasswordReset('alice@example.test', wrong, 'new-password'));
            expect([error.kind, error.message]).toEqual(['Unauthorized', 'Invalid or expired code']);
        });

        it('rejects an expired code', async () => {
            addUser(ctx, 'alice');
            await ctx.accounts.requestPasswordReset('alice@example.test');
            const code = ctx.notifier.resetCodes[0]?.code ?? '';
            ctx.clock.advance(5 * 60 * 1000);
            expect(captureError(() => ctx.accounts.confirmPasswordReset('alice@example.test', code, 'new-password')).kind).toBe('Unauthorized');
        });

        it('drops the code when it cannot be delivered', async () => {
            const undeliverable: Notifier = {
                sendPasswordResetCode: async () => {
                    throw invalidState('No Telegram account is linked to this user, reset codes cannot be delivered');
                },
                announceResolution: async () => undefined,
            };
            const accounts = new AccountService(ctx.store, undeliverable, {
                adminCode: ADMIN_CODE,
                startBalance: 0,
                resetCodeTtlMinutes: 5,
                bcryptRounds: 4,
            }, ctx.clock.now);
            addUser(ctx, 'alice');

            const error = await captureAsyncError(() => accounts.requestPasswordReset('alice@example.test'));
            expect(error.kind).toBe('InvalidState');
            expect(ctx.store.getPasswordReset('alice@example.test')).toBeUndefined();
        });

        it('fails with NotFound for an unknown email', async () => {
            const error = await captureAsyncError(() => ctx.accounts.requestPasswordReset('nobody@example.test'));
            expect(error.kind).toBe('NotFound');
            expect(ctx.notifier.resetCodes).toEqual([]);
        });
    });

    describe('linkTelegram', () => {
        it('moves a Telegram id to the account that links it last', () => {
            const alice = addUser(ctx, 'alice');
            const bob = addUser(ctx, 'bob');
            expect(ctx.accounts.linkTelegram('alice', PASSWORD, 777).telegramId).toBe(777);
            expect(ctx.accounts.linkTelegram('bob', PASSWORD, 777).telegramId).toBe(777);
            expect(ctx.store.getUserById(alice.id)?.telegramId).toBeNull();
            expect(ctx.store.getUserByTelegramId(777)?.id).toBe(bob.id);
        });

        it('checks the password', () => {
            addUser(ctx, 'alice');
            expect(captureError(() => ctx.accounts.linkTelegram('alice', 'nope', 777)).kind).toBe('Unauthorized');
        });
    });
});

describe('adminCodeMatches', () => {
    it('never matches while no code is configured', () => {
        expect(adminCodeMatches('', '')).toBe(false);
        expect(adminCodeMatches('', undefined)).toBe(false);
        expect(adminCodeMatches(ADMIN_CODE, ADMIN_CODE)).toBe(true);
    });
});

describe('SessionSigner', () => {
    const signer = new SessionSigner('test-secret', 1);

    it('verifies the tokens it issues until they expire', () => {
        const session = signer.issue(7, T0);
        expect(session.expiresAt).toBe(T0 + HOUR);
        expect(session.token.startsWith(`7.${T0 + HOUR}.`)).toBe(true);
        expect(signer.verify(session.token, T0 + HOUR - 1)).toEqual(session);
        expect(captureError(() => signer.verify(session.token, T0 + HOUR)).message).toBe('Session expired');
    });

    it('rejects a token whose payload was changed', () => {
        const [, expiresAt, signature] = signer.issue(7, T0).token.split('.');
        const error = captureError(() => signer.verify(`8.${expiresAt}.${signature}`, T0));
        expect([error.kind, error.message]).toEqual(['Unauthorized', 'Invalid session token']);
    });

    it('rejects tokens signed with another secret', () => {
        const other = new SessionSigner('other-secret', 1);
        expect(captureError(() => signer.verify(other.issue(7, T0).token, T0)).message).toBe('Invalid session token');
    });

    it('rejects malformed tokens', () => {
        expect(captureError(() => signer.verify('garbage', T0)).message).toBe('Malformed session token');
        expect(captureError(() => signer.verify('a.b.c', T0)).message).toBe('Malformed session token');
    });
});
