import { afterEach, describe, expect, it, vi } from 'vitest';
import { TelegramNotifier, MessageSender, createNotifier } from '../src/bot/notifier.js';
import { announceResolution } from '../src/services.js';
import { ConsoleNotifier, Notifier } from '../src/notify/index.js';
import { PASSWORD, T0, addUser, captureAsyncError, createTestContext, resolvedBet } from './helpers.js';

class FakeTelegram implements MessageSender {
    readonly sent: { chatId: number; text: string }[] = [];
    failFor = new Set<number>();

    async sendMessage(chatId: number, text: string): Promise<unknown> {
        if (this.failFor.has(chatId)) throw new Error('Forbidden: bot was blocked by the user');
        this.sent.push({ chatId, text });
        return {};
    }
}

describe('TelegramNotifier', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    function setup() {
        const ctx = createTestContext();
        const alice = addUser(ctx, 'alice');
        const bob = addUser(ctx, 'bob');
        const carol = addUser(ctx, 'carol');
        ctx.accounts.linkTelegram('alice', PASSWORD, 1001);
        ctx.accounts.linkTelegram('bob', PASSWORD, 1002);
        const telegram = new FakeTelegram();
        return { ctx, alice, bob, carol, telegram, notifier: new TelegramNotifier(telegram, ctx.store, ctx.clock.now) };
    }

    it('sends reset codes to the linked chat, timed by the service clock', async () => {
        const { ctx, alice, telegram, notifier } = setup();
        const user = ctx.store.getUserById(alice.id);
        if (!user) throw new Error('alice is missing');
        await notifier.sendPasswordResetCode(user, '123456', T0 + 5 * 60 * 1000);
        expect(telegram.sent).toEqual([
            { chatId: 1001, text: 'Your Reedz password reset code is 123456. It expires in 5 minutes.' },
        ]);
    });

    it('cannot deliver a reset code without a linked account', async () => {
        const { carol, notifier } = setup();
        const error = await captureAsyncError(() => notifier.sendPasswordResetCode(carol, '123456', T0));
        expect(error.kind).toBe('InvalidState');
    });

    it('announces results to linked participants', async () => {
        const { alice, bob, carol, telegram, notifier } = setup();
        const bet = { ...resolvedBet('number', '10'), title: 'Goals' };
        await notifier.announceResolution(bet, [
            { betId: 1, userId: alice.id, amount: 8, createdAt: T0 },
            { betId: 1, userId: bob.id, amount: 2, createdAt: T0 },
            { betId: 1, userId: carol.id, amount: 2, createdAt: T0 },
        ]);
        expect(telegram.sent.map((m) => m.chatId)).toEqual([1001, 1002]);
        expect(telegram.sent[0]?.text).toBe('Bet #1 "Goals" is resolved.\nCorrect answer: 10\nYou earned 8 Reedz.');
    });

    it('reports failed deliveries after trying everyone', async () => {
        const { alice, bob, telegram, notifier } = setup();
        telegram.failFor.add(1001);
        const bet = resolvedBet('text', 'Paris');
        await expect(notifier.announceResolution(bet, [
            { betId: 1, userId: alice.id, amount: 7, createdAt: T0 },
            { betId: 1, userId: bob.id, amount: 0, createdAt: T0 },
        ])).rejects.toThrow('1 of 2 resolution messages for bet #1 failed');
        expect(telegram.sent.map((m) => m.chatId)).toEqual([1002]);
    });
});

describe('announceResolution', () => {
    it('logs a failed announcement instead of failing the resolution', async () => {
        const logged = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const failing: Notifier = {
            sendPasswordResetCode: async () => undefined,
            announceResolution: async () => {
                throw new Error('network down');
            },
        };
        announceResolution(failing, { bet: resolvedBet('text', 'Paris'), rewards: [] });
        await vi.waitFor(() => expect(logged).toHaveBeenCalledTimes(1));
        expect(logged.mock.calls[0]?.[0]).toBe('[notify] failed to announce bet #1:');
        logged.mockRestore();
    });
});

describe('createNotifier', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('refuses to fall back to the console in production', () => {
        const { store } = createTestContext();
        expect(() => createNotifier(store, { botToken: '', nodeEnv: 'production' }))
            .toThrow('TELEGRAM_BOT_TOKEN is required in production to deliver password reset codes');
    });

    it('falls back to the console outside production', () => {
        const warned = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const { store } = createTestContext();
        expect(createNotifier(store, { botToken: '', nodeEnv: 'development' })).toBeInstanceOf(ConsoleNotifier);
        expect(warned).toHaveBeenCalledWith('[notify] TELEGRAM_BOT_TOKEN not set, notifications go to the console');
    });

    it('uses Telegram whenever a token is configured', () => {
        const { store } = createTestContext();
        expect(createNotifier(store, { botToken: 'test-token', nodeEnv: 'production' })).toBeInstanceOf(TelegramNotifier);
    });
});
