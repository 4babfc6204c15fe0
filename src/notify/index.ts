import { Bet, Reward, User } from '../types.js';

export interface Notifier {
    sendPasswordResetCode(user: User, code: string, expiresAt: number): Promise<void>;
    announceResolution(bet: Bet, rewards: Reward[]): Promise<void>;
}

// Development fallback: everything goes to stdout
export class ConsoleNotifier implements Notifier {
    async sendPasswordResetCode(user: User, code: string, expiresAt: number): Promise<void> {
        console.log(`[notify] reset code for ${user.email}: ${code} (expires ${new Date(expiresAt).toISOString()})`);
    }

    async announceResolution(bet: Bet, rewards: Reward[]): Promise<void> {
        console.log(`[notify] bet #${bet.id} resolved with "${bet.correctAnswer ?? ''}", ${rewards.length} participants credited`);
    }
}
