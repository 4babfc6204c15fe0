import { z } from 'zod';
import { ANSWER_TYPES, ROLES, Bet, LeaderboardEntry, PasswordReset, Prediction, PredictionWithUser, Reward, User } from '../types.js';
import { ReedzError } from '../errors.js';

// sqlite has no boolean type; flags are stored as 0/1
const flag = z.union([z.literal(0), z.literal(1)]).transform((value) => value === 1);
const id = z.number().int().positive();
const timestamp = z.number().int();

export const userRowSchema = z.object({
    id,
    username: z.string(),
    email: z.string(),
    passwordHash: z.string(),
    role: z.enum(ROLES),
    balance: z.number().int(),
    telegramId: z.number().int().nullable(),
    createdAt: timestamp,
});

export const betRowSchema = z.object({
    id,
    createdBy: z.number().int(),
    title: z.string(),
    description: z.string(),
    answerType: z.enum(ANSWER_TYPES),
    isOpen: flag,
    isClosed: flag,
    isResolved: flag,
    createdAt: timestamp,
    closeAt: timestamp,
    correctAnswer: z.string().nullable(),
    resolvedAt: timestamp.nullable(),
    rewardsAppliedAt: timestamp.nullable(),
});

export const predictionRowSchema = z.object({
    id,
    userId: id,
    betId: id,
    value: z.string(),
    createdAt: timestamp,
});

export const predictionWithUserRowSchema = predictionRowSchema.extend({
    username: z.string(),
});

export const rewardRowSchema = z.object({
    betId: id,
    userId: id,
    amount: z.number().int(),
    createdAt: timestamp,
});

export const passwordResetRowSchema = z.object({
    email: z.string(),
    codeHash: z.string(),
    expiresAt: timestamp,
});

export const leaderboardRowSchema = z.object({
    userId: id,
    username: z.string(),
    balance: z.number().int(),
});

function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, table: string, row: unknown): T {
    const result = schema.safeParse(row);
    if (!result.success) {
        throw new ReedzError('PersistenceFailure', `Malformed ${table} row`, { issues: result.error.issues });
    }
    return result.data;
}

export const parseUser = (row: unknown): User => parseRow(userRowSchema, 'users', row);
export const parseBet = (row: unknown): Bet => parseRow(betRowSchema, 'bets', row);
export const parsePrediction = (row: unknown): Prediction => parseRow(predictionRowSchema, 'predictions', row);
export const parsePredictionWithUser = (row: unknown): PredictionWithUser => parseRow(predictionWithUserRowSchema, 'predictions', row);
export const parseReward = (row: unknown): Reward => parseRow(rewardRowSchema, 'rewards', row);
export const parsePasswordReset = (row: unknown): PasswordReset => parseRow(passwordResetRowSchema, 'password_resets', row);

export function parseLeaderboard(rows: unknown[]): LeaderboardEntry[] {
    return rows.map((row, index) => ({ rank: index + 1, ...parseRow(leaderboardRowSchema, 'users', row) }));
}
