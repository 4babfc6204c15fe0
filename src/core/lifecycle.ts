import { ANSWER_TYPES, AnswerType, Bet, BetStateUpdate, BetStatus, Clock, Prediction, PredictionWithUser, Reward, User } from '../types.js';
import { invalidInput, invalidState, malformedAnswer, notFound, conflict, unauthorized } from '../errors.js';
import type { BetStore } from '../db/index.js';
import { canPredict, requireAdmin } from './roles.js';
import { applyRewards, parseNumericAnswer, scoreBet } from './scoring.js';

export type CreateBetInput = {
    title: string;
    description: string;
    answerType: string;
    closeAt: number;
};

export type Resolution = {
    bet: Bet;
    rewards: Reward[];
};

const CLOSED: BetStateUpdate = {
    isOpen: false,
    isClosed: true,
    isResolved: false,
    correctAnswer: null,
    resolvedAt: null,
    rewardsAppliedAt: null,
};

function isAnswerType(value: string): value is AnswerType {
    return (ANSWER_TYPES as readonly string[]).includes(value);
}

/**
 * Owns the open → closed → resolved transitions of a bet. Every operation
 * receives the acting user; nothing is kept between calls.
 */
export class BetLifecycle {
    constructor(
        private readonly store: BetStore,
        private readonly now: Clock = Date.now,
    ) {}

    create(actor: User, input: CreateBetInput): Bet {
        requireAdmin(actor, 'create bets');
        const title = input.title.trim();
        if (!title) throw invalidInput('Title is required');
        if (!isAnswerType(input.answerType)) {
            throw invalidInput(`Unsupported answer type "${input.answerType}"`, { allowed: ANSWER_TYPES });
        }
        if (!Number.isFinite(input.closeAt) || input.closeAt <= this.now()) {
            throw invalidInput('Close time must be in the future');
        }
        const bet = this.store.createBet({
            createdBy: actor.id,
            title,
            description: input.description.trim(),
            answerType: input.answerType,
            closeAt: input.closeAt,
        }, this.now());
        console.log(`[bets] #${bet.id} "${bet.title}" created by ${actor.username}`);
        return bet;
    }

    placePrediction(actor: User, betId: number, value: string): Prediction {
        if (!canPredict(actor.role)) throw unauthorized('Your role cannot place predictions');
        const bet = this.closeIfExpired(this.require(betId));
        if (!bet.isOpen) throw invalidState(`Bet ${betId} is not open for predictions`, { betId });

        const trimmed = value.trim();
        if (!trimmed) throw invalidInput('Prediction is required');
        if (bet.answerType === 'number' && parseNumericAnswer(trimmed) === undefined) {
            throw malformedAnswer(`"${trimmed}" is not a number`, { betId });
        }
        if (this.store.getUserPrediction(actor.id, betId)) {
            throw conflict(`You already placed a prediction on bet ${betId}`, { betId });
        }
        return this.store.createPrediction({ userId: actor.id, betId, value: trimmed }, this.now());
    }

    // Closing a bet that is already closed (or resolved) succeeds without changes
    close(actor: User, betId: number): Bet {
        requireAdmin(actor, 'close bets');
        const bet = this.require(betId);
        if (!bet.isOpen) return bet;
        const closed = this.markClosed(bet);
        console.log(`[bets] #${betId} closed by ${actor.username}`);
        return closed;
    }

    /**
     * Sets the correct answer and distributes Reedz.
     *
     * Scores are computed before anything is written, so a malformed answer
     * leaves the bet closed and balances untouched. The state change, the
     * credits and the applied marker share one transaction: either all of
     * them land or none do. The state change only applies to a bet that is
     * still closed and unresolved, so a concurrent resolution from another
     * process can't pay out twice.
     */
    resolve(actor: User, betId: number, correctAnswer: string): Resolution {
        requireAdmin(actor, 'resolve bets');
        const bet = this.require(betId);
        if (bet.isResolved) throw invalidState(`Bet ${betId} is already resolved`, { betId });
        if (!bet.isClosed) throw invalidState(`Bet ${betId} must be closed before it is resolved`, { betId });

        const answer = correctAnswer.trim();
        if (!answer) throw invalidInput('Correct answer is required');
        // Checked here too: the scorer skips parsing when nobody predicted
        if (bet.answerType === 'number' && parseNumericAnswer(answer) === undefined) {
            throw malformedAnswer(`Correct answer "${answer}" is not a number`, { betId });
        }

        const resolvedAt = this.now();
        const resolvedBet: Bet = {
            ...bet,
            isOpen: false,
            isClosed: true,
            isResolved: true,
            correctAnswer: answer,
            resolvedAt,
        };
        const predictions = this.store.getPredictionsForBet(betId);
        const scores = scoreBet(resolvedBet, predictions);

        const applied = this.store.transaction(() => {
            const updated = this.store.transitionBet(betId, 'closed', {
                isOpen: false,
                isClosed: true,
                isResolved: true,
                correctAnswer: answer,
                resolvedAt,
                rewardsAppliedAt: resolvedAt,
            });
            if (!updated) throw invalidState(`Bet ${betId} is already resolved`, { betId });
            applyRewards(this.store, betId, scores, resolvedAt);
            return updated;
        });
        console.log(`[bets] #${betId} resolved by ${actor.username} with "${answer}", ${scores.size} rewarded`);
        return { bet: applied, rewards: this.store.getRewardsForBet(betId) };
    }

    /** Closes every open bet whose deadline has passed. */
    closeExpired(): Bet[] {
        const expired = this.store.listExpiredOpenBets(this.now());
        return expired.flatMap((bet) => this.store.transitionBet(bet.id, 'open', CLOSED) ?? []);
    }

    get(betId: number): Bet {
        return this.require(betId);
    }

    list(status?: BetStatus): Bet[] {
        return this.store.listBets(status);
    }

    predictions(betId: number): PredictionWithUser[] {
        this.require(betId);
        return this.store.getPredictionsWithUsernames(betId);
    }

    rewards(betId: number): Reward[] {
        this.require(betId);
        return this.store.getRewardsForBet(betId);
    }

    private require(betId: number): Bet {
        const bet = this.store.getBet(betId);
        if (!bet) throw notFound(`Bet ${betId} not found`, { betId });
        return bet;
    }

    private closeIfExpired(bet: Bet): Bet {
        if (bet.isOpen && bet.closeAt <= this.now()) {
            console.log(`[bets] #${bet.id} passed its deadline, closing`);
            return this.markClosed(bet);
        }
        return bet;
    }

    // Leaves the bet as it is when someone else closed it in the meantime
    private markClosed(bet: Bet): Bet {
        return this.store.transitionBet(bet.id, 'open', CLOSED) ?? this.require(bet.id);
    }
}
