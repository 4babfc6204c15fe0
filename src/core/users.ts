import { ROLES, LeaderboardEntry, PredictionHistoryEntry, User, betStatus } from '../types.js';
import { invalidInput, notFound, unauthorized } from '../errors.js';
import type { BetStore } from '../db/index.js';
import { isRole, requireAdmin } from './roles.js';
import { adminCodeMatches } from './auth.js';

export const DEFAULT_LEADERBOARD_SIZE = 50;

export type Profile = {
    user: User;
    predictions: PredictionHistoryEntry[];
};

export class UserAdmin {
    constructor(
        private readonly store: BetStore,
        private readonly adminCode: string,
    ) {}

    leaderboard(limit = DEFAULT_LEADERBOARD_SIZE): LeaderboardEntry[] {
        if (!Number.isInteger(limit) || limit < 1) throw invalidInput('Limit must be a positive integer');
        return this.store.getLeaderboard(limit);
    }

    profile(userId: number): Profile {
        const user = this.require(userId);
        const rewards = new Map(this.store.getRewardsForUser(userId).map((reward) => [reward.betId, reward.amount]));
        const predictions = this.store.getUserPredictions(userId).flatMap((prediction): PredictionHistoryEntry[] => {
            const bet = this.store.getBet(prediction.betId);
            if (!bet) return [];
            return [{
                prediction,
                betTitle: bet.title,
                betStatus: betStatus(bet),
                correctAnswer: bet.isResolved ? bet.correctAnswer : null,
                reward: rewards.get(prediction.betId) ?? null,
            }];
        });
        return { user, predictions };
    }

    listUsers(actor: User): User[] {
        requireAdmin(actor, 'list users');
        return this.store.listUsers();
    }

    // Promotion needs the admin code; demotion doesn't
    changeRole(actor: User, userId: number, role: string, adminCode?: string): User {
        requireAdmin(actor, 'change roles');
        if (!isRole(role)) throw invalidInput(`Role must be one of ${ROLES.join(', ')}`);
        const target = this.require(userId);
        if (role === 'Admin' && !adminCodeMatches(this.adminCode, adminCode)) {
            throw unauthorized('Incorrect admin code');
        }
        this.store.updateRole(target.id, role);
        console.log(`[users] ${actor.username} set role of ${target.username} to ${role}`);
        return this.require(userId);
    }

    adjustBalance(actor: User, userId: number, delta: number): User {
        requireAdmin(actor, 'adjust balances');
        if (!Number.isSafeInteger(delta)) throw invalidInput('Balance delta must be an integer');
        const target = this.require(userId);
        this.store.incrementUserBalance(target.id, delta);
        console.log(`[users] ${actor.username} adjusted ${target.username} by ${delta}`);
        return this.require(userId);
    }

    // Applied as a delta against the current balance so concurrent credits aren't lost
    setBalance(actor: User, userId: number, balance: number): User {
        requireAdmin(actor, 'adjust balances');
        if (!Number.isSafeInteger(balance) || balance < 0) throw invalidInput('Balance must be a non-negative integer');
        return this.store.transaction(() => {
            const target = this.require(userId);
            return this.adjustBalance(actor, target.id, balance - target.balance);
        });
    }

    deleteUser(actor: User, userId: number): void {
        requireAdmin(actor, 'delete users');
        if (actor.id === userId) throw invalidInput('You cannot delete your own account');
        const target = this.require(userId);
        this.store.deleteUser(target.id);
        console.log(`[users] ${actor.username} deleted ${target.username}`);
    }

    /** Deletes every bet, prediction and reward. Users and balances stay. */
    resetSeason(actor: User): void {
        requireAdmin(actor, 'reset the season');
        this.store.resetSeason();
        console.log(`[users] season reset by ${actor.username}`);
    }

    private require(userId: number): User {
        const user = this.store.getUserById(userId);
        if (!user) throw notFound(`User ${userId} not found`, { userId });
        return user;
    }
}
