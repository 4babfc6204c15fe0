import { Telegram } from 'telegraf';
import { Bet, Clock, Reward, User } from '../types.js';
import { invalidState } from '../errors.js';
import type { BetStore } from '../db/index.js';
import { ConsoleNotifier, Notifier } from '../notify/index.js';
import { NODE_ENV, TELEGRAM_BOT_TOKEN } from '../config.js';

export type MessageSender = {
    sendMessage(chatId: number, text: string): Promise<unknown>;
};

// Private chats share the user's Telegram id, so a linked account is directly reachable
export class TelegramNotifier implements Notifier {
    constructor(
        private readonly telegram: MessageSender,
        private readonly store: BetStore,
        private readonly now: Clock = Date.now,
    ) {}

    async sendPasswordResetCode(user: User, code: string, expiresAt: number): Promise<void> {
        if (user.telegramId === null) {
            throw invalidState('No Telegram account is linked to this user, reset codes cannot be delivered');
        }
        const minutes = Math.max(1, Math.round((expiresAt - this.now()) / 60000));
        await this.telegram.sendMessage(user.telegramId, `Your Reedz password reset code is ${code}. It expires in ${minutes} minutes.`);
    }

    async announceResolution(bet: Bet, rewards: Reward[]): Promise<void> {
        const deliveries = rewards.map(async (reward) => {
            const user = this.store.getUserById(reward.userId);
            if (!user || user.telegramId === null) return;
            await this.telegram.sendMessage(user.telegramId, [
                `Bet #${bet.id} "${bet.title}" is resolved.`,
                `Correct answer: ${bet.correctAnswer ?? ''}`,
                `You earned ${reward.amount} Reedz.`,
            ].join('\n'));
        });
        const results = await Promise.allSettled(deliveries);
        const failed = results.filter((result) => result.status === 'rejected').length;
        if (failed > 0) {
            throw new Error(`${failed} of ${rewards.length} resolution messages for bet #${bet.id} failed`);
        }
    }
}

export type NotifierSettings = {
    botToken: string;
    nodeEnv: string;
};

// The console notifier prints reset codes, so production refuses to start without a bot token
export function createNotifier(
    store: BetStore,
    settings: NotifierSettings = { botToken: TELEGRAM_BOT_TOKEN, nodeEnv: NODE_ENV },
): Notifier {
    if (settings.botToken) {
        return new TelegramNotifier(new Telegram(settings.botToken), store);
    }
    if (settings.nodeEnv === 'production') {
        throw new Error('TELEGRAM_BOT_TOKEN is required in production to deliver password reset codes');
    }
    console.warn('[notify] TELEGRAM_BOT_TOKEN not set, notifications go to the console');
    return new ConsoleNotifier();
}
