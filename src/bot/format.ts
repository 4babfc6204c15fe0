import { Bet, LeaderboardEntry, PredictionWithUser, Reward, betStatus } from '../types.js';
import type { Profile } from '../core/users.js';

export function formatHelp(isAdmin: boolean): string {
    const lines = [
        'Commands:',
        '/link <username> <password> — connect this chat to your Reedz account',
        '/bets [open|closed|resolved] — list bets',
        '/predict <bet id> <answer> — place your prediction on an open bet',
        '/predictions <bet id> — everyone\'s predictions on a bet',
        '/leaderboard — top Reedz balances',
        '/me — your balance and prediction history',
    ];
    if (isAdmin) {
        lines.push(
            '',
            'Admin:',
            '/close <bet id> — stop accepting predictions',
            '/resolve <bet id> <correct answer> — resolve and distribute Reedz',
        );
    }
    return lines.join('\n');
}

/**
 * Splits "/cmd a b c d" into the first `count - 1` words and the remainder.
 * The remainder is sliced from the message as typed, inner spacing included.
 */
export function commandArgs(text: string, count: number): string[] {
    let rest = text.trim().replace(/^\S+\s*/, '');
    const args: string[] = [];
    while (rest && args.length < count - 1) {
        const match = /^(\S+)\s*/.exec(rest);
        if (!match) break;
        args.push(match[1]);
        rest = rest.slice(match[0].length);
    }
    if (rest) args.push(rest);
    return args;
}

export function parseBetId(raw: string | undefined): number | undefined {
    if (!raw || !/^\d+$/.test(raw)) return undefined;
    const id = Number.parseInt(raw, 10);
    return id > 0 ? id : undefined;
}

export function formatBet(bet: Bet): string {
    const status = betStatus(bet);
    const head = `#${bet.id} [${bet.answerType}] ${bet.title}`;
    switch (status) {
        case 'open':
            return `${head} — closes ${new Date(bet.closeAt).toISOString()}`;
        case 'closed':
            return `${head} — closed, awaiting answer`;
        case 'resolved':
            return `${head} — answer: ${bet.correctAnswer ?? ''}`;
    }
}

export function formatBets(bets: Bet[]): string {
    return bets.length === 0 ? 'No bets found.' : bets.map(formatBet).join('\n');
}

export function formatPredictions(bet: Bet, predictions: PredictionWithUser[]): string {
    if (predictions.length === 0) return `No predictions for bet #${bet.id} yet.`;
    return [`Predictions for #${bet.id} ${bet.title}:`, ...predictions.map((p) => `${p.username}: ${p.value}`)].join('\n');
}

export function formatLeaderboard(entries: LeaderboardEntry[]): string {
    if (entries.length === 0) return 'No users yet.';
    return ['Leaderboard:', ...entries.map((e) => `${e.rank}. ${e.username} — ${e.balance} Reedz`)].join('\n');
}

export function formatRewards(bet: Bet, rewards: Reward[], usernames: Map<number, string>): string {
    const lines = rewards.map((r) => `${usernames.get(r.userId) ?? `user ${r.userId}`}: +${r.amount}`);
    return [`Bet #${bet.id} resolved with "${bet.correctAnswer ?? ''}".`, ...(lines.length > 0 ? lines : ['No predictions were placed.'])].join('\n');
}

export function formatProfile(profile: Profile): string {
    const { user, predictions } = profile;
    const history = predictions.slice(-10).map((entry) => {
        const outcome = entry.betStatus === 'resolved'
            ? `answer ${entry.correctAnswer ?? ''}, +${entry.reward ?? 0}`
            : entry.betStatus;
        return `#${entry.prediction.betId} ${entry.betTitle}: ${entry.prediction.value} (${outcome})`;
    });
    return [
        `${user.username} (${user.role})`,
        `Balance: ${user.balance} Reedz`,
        '',
        ...(history.length > 0 ? ['Recent predictions:', ...history] : ['No predictions yet.']),
    ].join('\n');
}
