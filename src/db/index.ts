import Database from 'better-sqlite3';
import { BetStateUpdate, BetStatus, Bet, LeaderboardEntry, NewBet, PasswordReset, Prediction, PredictionWithUser, Reward, Role, User } from '../types.js';
import { ReedzError, notFound } from '../errors.js';
import { parseBet, parseLeaderboard, parsePasswordReset, parsePrediction, parsePredictionWithUser, parseReward, parseUser } from './rows.js';

export type NewUser = Pick<User, 'username' | 'email' | 'passwordHash' | 'role' | 'balance'>;
export type NewPrediction = Pick<Prediction, 'userId' | 'betId' | 'value'>;

/**
 * Persistence collaborator used by the lifecycle manager, the scorer and the
 * account services. Every read returns validated records; every write either
 * succeeds or throws a ReedzError (PersistenceFailure, Conflict or NotFound).
 */
export interface BetStore {
    transaction<T>(fn: () => T): T;

    createUser(user: NewUser, now: number): User;
    getUserById(userId: number): User | undefined;
    getUserByUsername(username: string): User | undefined;
    getUserByEmail(email: string): User | undefined;
    getUserByTelegramId(telegramId: number): User | undefined;
    listUsers(): User[];
    getLeaderboard(limit: number): LeaderboardEntry[];
    updatePasswordHash(userId: number, passwordHash: string): void;
    updateRole(userId: number, role: Role): void;
    setTelegramId(userId: number, telegramId: number | null): void;
    deleteUser(userId: number): void;
    /** Atomic signed increment; returns the new balance. */
    incrementUserBalance(userId: number, delta: number): number;

    createBet(bet: NewBet, now: number): Bet;
    getBet(betId: number): Bet | undefined;
    listBets(status?: BetStatus): Bet[];
    listExpiredOpenBets(now: number): Bet[];
    /**
     * Moves a bet out of `from` into `state` only if it is still in `from`.
     * Returns undefined when another writer got there first.
     */
    transitionBet(betId: number, from: BetStatus, state: BetStateUpdate): Bet | undefined;

    createPrediction(prediction: NewPrediction, now: number): Prediction;
    getPredictionsForBet(betId: number): Prediction[];
    getPredictionsWithUsernames(betId: number): PredictionWithUser[];
    getUserPrediction(userId: number, betId: number): Prediction | undefined;
    getUserPredictions(userId: number): Prediction[];

    recordReward(reward: Reward): void;
    getRewardsForBet(betId: number): Reward[];
    getRewardsForUser(userId: number): Reward[];

    setPasswordReset(reset: PasswordReset): void;
    getPasswordReset(email: string): PasswordReset | undefined;
    clearPasswordReset(email: string): void;

    resetSeason(): void;
    close(): void;
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  username TEXT NOT NULL UNIQUE,
  email TEXT NOT NULL UNIQUE,
  password_hash TEXT NOT NULL,
  role TEXT NOT NULL CHECK (role IN ('Admin', 'Member')),
  balance INTEGER NOT NULL DEFAULT 0,
  telegram_id INTEGER UNIQUE,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS bets (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  created_by INTEGER NOT NULL,
  title TEXT NOT NULL,
  description TEXT NOT NULL,
  answer_type TEXT NOT NULL CHECK (answer_type IN ('number', 'text')),
  is_open INTEGER NOT NULL,
  is_closed INTEGER NOT NULL,
  is_resolved INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  close_at INTEGER NOT NULL,
  correct_answer TEXT,
  resolved_at INTEGER,
  rewards_applied_at INTEGER
);

CREATE TABLE IF NOT EXISTS predictions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL,
  bet_id INTEGER NOT NULL,
  prediction TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  UNIQUE (user_id, bet_id),
  FOREIGN KEY(user_id) REFERENCES users(id) ON DELETE CASCADE,
  FOREIGN KEY(bet_id) REFERENCES bets(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS rewards (
  bet_id INTEGER NOT NULL,
  user_id INTEGER NOT NULL,
  amount INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  PRIMARY KEY (bet_id, user_id),
  FOREIGN KEY(bet_id) REFERENCES bets(id) ON DELETE CASCADE,
  FOREIGN KEY(user_id) REFERENCES users(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS password_resets (
  email TEXT PRIMARY KEY,
  code_hash TEXT NOT NULL,
  expires_at INTEGER NOT NULL
);
`;

const USER_COLUMNS = `id, username, email, password_hash as passwordHash, role, balance,
  telegram_id as telegramId, created_at as createdAt`;

const BET_COLUMNS = `id, created_by as createdBy, title, description, answer_type as answerType,
  is_open as isOpen, is_closed as isClosed, is_resolved as isResolved, created_at as createdAt,
  close_at as closeAt, correct_answer as correctAnswer, resolved_at as resolvedAt,
  rewards_applied_at as rewardsAppliedAt`;

const PREDICTION_COLUMNS = `p.id, p.user_id as userId, p.bet_id as betId, p.prediction as value, p.created_at as createdAt`;

const STATUS_FILTER: Record<BetStatus, string> = {
    open: 'is_open = 1',
    closed: 'is_closed = 1 AND is_resolved = 0',
    resolved: 'is_resolved = 1',
};

function isSqliteError(error: unknown): error is Error & { code: string } {
    return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

// Wraps driver failures so callers only ever see ReedzError
function guard<T>(operation: string, fn: () => T): T {
    try {
        return fn();
    } catch (error) {
        if (error instanceof ReedzError) throw error;
        if (isSqliteError(error) && (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')) {
            throw new ReedzError('Conflict', `${operation}: record already exists`, undefined, { cause: error });
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new ReedzError('PersistenceFailure', `${operation} failed: ${message}`, undefined, { cause: error });
    }
}

export class SqliteBetStore implements BetStore {
    private readonly db: Database.Database;

    constructor(path: string) {
        this.db = new Database(path);
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');
        this.db.exec(SCHEMA);
    }

    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    // ── Users ──────────────────────────────────────────────────

    createUser(user: NewUser, now: number): User {
        return guard('createUser', () => {
            const result = this.db.prepare(
                `INSERT INTO users (username, email, password_hash, role, balance, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
            ).run(user.username, user.email, user.passwordHash, user.role, user.balance, now);
            return this.requireUser(Number(result.lastInsertRowid));
        });
    }

    getUserById(userId: number): User | undefined {
        return this.findUser('id = ?', userId);
    }

    getUserByUsername(username: string): User | undefined {
        return this.findUser('username = ?', username);
    }

    getUserByEmail(email: string): User | undefined {
        return this.findUser('email = ?', email);
    }

    getUserByTelegramId(telegramId: number): User | undefined {
        return this.findUser('telegram_id = ?', telegramId);
    }

    listUsers(): User[] {
        return guard('listUsers', () =>
            this.db.prepare(`SELECT ${USER_COLUMNS} FROM users ORDER BY id`).all().map(parseUser)
        );
    }

    getLeaderboard(limit: number): LeaderboardEntry[] {
        return guard('getLeaderboard', () =>
            parseLeaderboard(
                this.db.prepare(`SELECT id as userId, username, balance FROM users ORDER BY balance DESC, username ASC LIMIT ?`).all(limit)
            )
        );
    }

    updatePasswordHash(userId: number, passwordHash: string): void {
        this.updateUser('updatePasswordHash', userId, 'password_hash = ?', passwordHash);
    }

    updateRole(userId: number, role: Role): void {
        this.updateUser('updateRole', userId, 'role = ?', role);
    }

    setTelegramId(userId: number, telegramId: number | null): void {
        this.updateUser('setTelegramId', userId, 'telegram_id = ?', telegramId);
    }

    deleteUser(userId: number): void {
        guard('deleteUser', () => {
            const result = this.db.prepare(`DELETE FROM users WHERE id = ?`).run(userId);
            if (result.changes === 0) throw notFound(`User ${userId} not found`, { userId });
        });
    }

    incrementUserBalance(userId: number, delta: number): number {
        return guard('incrementUserBalance', () => {
            const result = this.db.prepare(`UPDATE users SET balance = balance + ? WHERE id = ?`).run(delta, userId);
            if (result.changes === 0) throw notFound(`User ${userId} not found`, { userId });
            return this.requireUser(userId).balance;
        });
    }

    // ── Bets ───────────────────────────────────────────────────

    createBet(bet: NewBet, now: number): Bet {
        return guard('createBet', () => {
            const result = this.db.prepare(
                `INSERT INTO bets (created_by, title, description, answer_type, is_open, is_closed, is_resolved, created_at, close_at)
         VALUES (?, ?, ?, ?, 1, 0, 0, ?, ?)`
            ).run(bet.createdBy, bet.title, bet.description, bet.answerType, now, bet.closeAt);
            return this.requireBet(Number(result.lastInsertRowid));
        });
    }

    getBet(betId: number): Bet | undefined {
        return guard('getBet', () => {
            const row = this.db.prepare(`SELECT ${BET_COLUMNS} FROM bets WHERE id = ?`).get(betId);
            return row === undefined ? undefined : parseBet(row);
        });
    }

    listBets(status?: BetStatus): Bet[] {
        const where = status ? `WHERE ${STATUS_FILTER[status]}` : '';
        return guard('listBets', () =>
            this.db.prepare(`SELECT ${BET_COLUMNS} FROM bets ${where} ORDER BY id`).all().map(parseBet)
        );
    }

    listExpiredOpenBets(now: number): Bet[] {
        return guard('listExpiredOpenBets', () =>
            this.db.prepare(`SELECT ${BET_COLUMNS} FROM bets WHERE is_open = 1 AND close_at <= ? ORDER BY id`).all(now).map(parseBet)
        );
    }

    transitionBet(betId: number, from: BetStatus, state: BetStateUpdate): Bet | undefined {
        return guard('transitionBet', () => {
            const result = this.db.prepare(
                `UPDATE bets SET is_open = ?, is_closed = ?, is_resolved = ?, correct_answer = ?, resolved_at = ?, rewards_applied_at = ?
          WHERE id = ? AND ${STATUS_FILTER[from]}`
            ).run(
                state.isOpen ? 1 : 0,
                state.isClosed ? 1 : 0,
                state.isResolved ? 1 : 0,
                state.correctAnswer,
                state.resolvedAt,
                state.rewardsAppliedAt,
                betId
            );
            const bet = this.requireBet(betId);
            return result.changes === 0 ? undefined : bet;
        });
    }

    // ── Predictions ────────────────────────────────────────────

    createPrediction(prediction: NewPrediction, now: number): Prediction {
        return guard('createPrediction', () => {
            const result = this.db.prepare(
                `INSERT INTO predictions (user_id, bet_id, prediction, created_at) VALUES (?, ?, ?, ?)`
            ).run(prediction.userId, prediction.betId, prediction.value, now);
            const row = this.db.prepare(`SELECT ${PREDICTION_COLUMNS} FROM predictions p WHERE p.id = ?`).get(Number(result.lastInsertRowid));
            return parsePrediction(row);
        });
    }

    getPredictionsForBet(betId: number): Prediction[] {
        return guard('getPredictionsForBet', () =>
            this.db.prepare(`SELECT ${PREDICTION_COLUMNS} FROM predictions p WHERE p.bet_id = ? ORDER BY p.id`).all(betId).map(parsePrediction)
        );
    }

    getPredictionsWithUsernames(betId: number): PredictionWithUser[] {
        return guard('getPredictionsWithUsernames', () =>
            this.db.prepare(
                `SELECT ${PREDICTION_COLUMNS}, u.username FROM predictions p
           JOIN users u ON u.id = p.user_id
          WHERE p.bet_id = ? ORDER BY p.id`
            ).all(betId).map(parsePredictionWithUser)
        );
    }

    getUserPrediction(userId: number, betId: number): Prediction | undefined {
        return guard('getUserPrediction', () => {
            const row = this.db.prepare(`SELECT ${PREDICTION_COLUMNS} FROM predictions p WHERE p.user_id = ? AND p.bet_id = ?`).get(userId, betId);
            return row === undefined ? undefined : parsePrediction(row);
        });
    }

    getUserPredictions(userId: number): Prediction[] {
        return guard('getUserPredictions', () =>
            this.db.prepare(`SELECT ${PREDICTION_COLUMNS} FROM predictions p WHERE p.user_id = ? ORDER BY p.id`).all(userId).map(parsePrediction)
        );
    }

    // ── Rewards ────────────────────────────────────────────────

    recordReward(reward: Reward): void {
        guard('recordReward', () => {
            this.db.prepare(`INSERT INTO rewards (bet_id, user_id, amount, created_at) VALUES (?, ?, ?, ?)`)
                .run(reward.betId, reward.userId, reward.amount, reward.createdAt);
        });
    }

    getRewardsForBet(betId: number): Reward[] {
        return guard('getRewardsForBet', () =>
            this.db.prepare(
                `SELECT bet_id as betId, user_id as userId, amount, created_at as createdAt FROM rewards WHERE bet_id = ? ORDER BY amount DESC, user_id`
            ).all(betId).map(parseReward)
        );
    }

    getRewardsForUser(userId: number): Reward[] {
        return guard('getRewardsForUser', () =>
            this.db.prepare(
                `SELECT bet_id as betId, user_id as userId, amount, created_at as createdAt FROM rewards WHERE user_id = ? ORDER BY bet_id`
            ).all(userId).map(parseReward)
        );
    }

    // ── Password resets ────────────────────────────────────────

    setPasswordReset(reset: PasswordReset): void {
        guard('setPasswordReset', () => {
            this.db.prepare(`INSERT INTO password_resets (email, code_hash, expires_at) VALUES (?, ?, ?)
              ON CONFLICT(email) DO UPDATE SET code_hash=excluded.code_hash, expires_at=excluded.expires_at`)
                .run(reset.email, reset.codeHash, reset.expiresAt);
        });
    }

    getPasswordReset(email: string): PasswordReset | undefined {
        return guard('getPasswordReset', () => {
            const row = this.db.prepare(
                `SELECT email, code_hash as codeHash, expires_at as expiresAt FROM password_resets WHERE email = ?`
            ).get(email);
            return row === undefined ? undefined : parsePasswordReset(row);
        });
    }

    clearPasswordReset(email: string): void {
        guard('clearPasswordReset', () => {
            this.db.prepare(`DELETE FROM password_resets WHERE email = ?`).run(email);
        });
    }

    // Bets cascade to predictions and rewards; users and balances stay
    resetSeason(): void {
        guard('resetSeason', () => {
            this.db.prepare(`DELETE FROM bets`).run();
        });
    }

    close(): void {
        this.db.close();
    }

    private findUser(where: string, value: string | number): User | undefined {
        return guard('getUser', () => {
            const row = this.db.prepare(`SELECT ${USER_COLUMNS} FROM users WHERE ${where}`).get(value);
            return row === undefined ? undefined : parseUser(row);
        });
    }

    private requireUser(userId: number): User {
        const user = this.getUserById(userId);
        if (!user) throw notFound(`User ${userId} not found`, { userId });
        return user;
    }

    private requireBet(betId: number): Bet {
        const bet = this.getBet(betId);
        if (!bet) throw notFound(`Bet ${betId} not found`, { betId });
        return bet;
    }

    private updateUser(operation: string, userId: number, assignment: string, value: string | number | null): void {
        guard(operation, () => {
            const result = this.db.prepare(`UPDATE users SET ${assignment} WHERE id = ?`).run(value, userId);
            if (result.changes === 0) throw notFound(`User ${userId} not found`, { userId });
        });
    }
}

export function openStore(path: string): SqliteBetStore {
    return new SqliteBetStore(path);
}
