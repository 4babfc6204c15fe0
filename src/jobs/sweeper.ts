import cron, { type ScheduledTask } from 'node-cron';
import type { BetLifecycle } from '../core/lifecycle.js';

export function sweepExpiredBets(bets: BetLifecycle): number {
    const closed = bets.closeExpired();
    for (const bet of closed) {
        console.log(`[sweeper] closed #${bet.id} "${bet.title}" (deadline ${new Date(bet.closeAt).toISOString()})`);
    }
    return closed.length;
}

export function startSweeper(bets: BetLifecycle, expression: string): ScheduledTask {
    if (!cron.validate(expression)) {
        throw new Error(`Invalid CLOSE_SWEEP_CRON expression: ${expression}`);
    }
    return cron.schedule(expression, () => {
        try {
            sweepExpiredBets(bets);
        } catch (error) {
            console.error('[sweeper] sweep failed:', error);
        }
    });
}
