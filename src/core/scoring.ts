import { Bet, Prediction } from '../types.js';
import { invalidState, malformedAnswer } from '../errors.js';
import type { BetStore } from '../db/index.js';

// Awarded on top of rank points for an exact answer
export const PERFECT_BONUS = 5;

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Parses a decimal number, tolerating surrounding whitespace. Returns undefined otherwise. */
export function parseNumericAnswer(raw: string): number | undefined {
    const trimmed = raw.trim();
    if (!DECIMAL.test(trimmed)) return undefined;
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : undefined;
}

export function normalizeTextAnswer(raw: string): string {
    return raw.trim().toLowerCase();
}

export type Scores = Map<number, number>;

/**
 * Rank-based scoring for number bets.
 *
 * Predictions are grouped by absolute error. Walking the groups from the
 * closest, every member gets `n - given` points, where `given` counts the
 * predictors already ranked, so ties share a rank and consume its slots
 * together. An exact answer adds PERFECT_BONUS.
 */
function scoreNumberBet(correctAnswer: string, predictions: Prediction[]): Scores {
    const correct = parseNumericAnswer(correctAnswer);
    if (correct === undefined) {
        throw malformedAnswer(`Correct answer "${correctAnswer}" is not a number`, { correctAnswer });
    }

    const groups = new Map<number, Prediction[]>();
    for (const prediction of predictions) {
        const value = parseNumericAnswer(prediction.value);
        if (value === undefined) {
            throw malformedAnswer(`Prediction ${prediction.id} ("${prediction.value}") is not a number`, {
                predictionId: prediction.id,
                userId: prediction.userId,
            });
        }
        const error = Math.abs(value - correct);
        const group = groups.get(error);
        if (group) group.push(prediction);
        else groups.set(error, [prediction]);
    }

    const total = predictions.length;
    const scores: Scores = new Map();
    let given = 0;
    for (const error of [...groups.keys()].sort((a, b) => a - b)) {
        const members = groups.get(error) ?? [];
        const rankPoints = total - given;
        for (const prediction of members) {
            scores.set(prediction.userId, rankPoints + (error === 0 ? PERFECT_BONUS : 0));
        }
        given += members.length;
    }
    return scores;
}

function scoreTextBet(correctAnswer: string, predictions: Prediction[]): Scores {
    const correct = normalizeTextAnswer(correctAnswer);
    const award = predictions.length + PERFECT_BONUS;
    const scores: Scores = new Map();
    for (const prediction of predictions) {
        scores.set(prediction.userId, normalizeTextAnswer(prediction.value) === correct ? award : 0);
    }
    return scores;
}

/**
 * Computes the Reedz reward of every predicting user of a resolved bet.
 * Pure: nothing is written. Every participant has an entry, zero included.
 */
export function scoreBet(bet: Bet, predictions: Prediction[]): Scores {
    if (!bet.isResolved || bet.correctAnswer === null) {
        throw invalidState(`Bet ${bet.id} is not resolved`, { betId: bet.id });
    }
    if (predictions.length === 0) return new Map();

    switch (bet.answerType) {
        case 'number':
            return scoreNumberBet(bet.correctAnswer, predictions);
        case 'text':
            return scoreTextBet(bet.correctAnswer, predictions);
    }
}

/** Credits each score through the store's atomic increment and records it. */
export function applyRewards(store: BetStore, betId: number, scores: Scores, now: number): void {
    for (const [userId, amount] of scores) {
        store.incrementUserBalance(userId, amount);
        store.recordReward({ betId, userId, amount, createdAt: now });
    }
}
