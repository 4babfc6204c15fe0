export const ROLES = ['Admin', 'Member'] as const;
export type Role = (typeof ROLES)[number];

export const ANSWER_TYPES = ['number', 'text'] as const;
export type AnswerType = (typeof ANSWER_TYPES)[number];

export type BetStatus = 'open' | 'closed' | 'resolved';

// Milliseconds since epoch; injected so services can be driven in tests
export type Clock = () => number;

export type User = {
    id: number;
    username: string;
    email: string;
    passwordHash: string; // bcrypt
    role: Role;
    balance: number; // Reedz, integer
    telegramId: number | null;
    createdAt: number;
};

// What leaves the service boundary: no credential material
export type PublicUser = Omit<User, 'passwordHash'>;

export type Bet = {
    id: number;
    createdBy: number; // admin user id
    title: string;
    description: string;
    answerType: AnswerType;
    isOpen: boolean;
    isClosed: boolean;
    isResolved: boolean;
    createdAt: number;
    closeAt: number; // deadline, ms epoch
    correctAnswer: string | null;
    resolvedAt: number | null;
    rewardsAppliedAt: number | null;
};

export type NewBet = Pick<Bet, 'createdBy' | 'title' | 'description' | 'answerType' | 'closeAt'>;

export type BetStateUpdate = Pick<Bet, 'isOpen' | 'isClosed' | 'isResolved' | 'correctAnswer' | 'resolvedAt' | 'rewardsAppliedAt'>;

export type Prediction = {
    id: number;
    userId: number;
    betId: number;
    value: string; // raw text, interpreted per answerType at resolution
    createdAt: number;
};

export type PredictionWithUser = Prediction & { username: string };

export type Reward = {
    betId: number;
    userId: number;
    amount: number;
    createdAt: number;
};

export type PasswordReset = {
    email: string;
    codeHash: string; // sha256 hex of the code
    expiresAt: number;
};

export type LeaderboardEntry = {
    rank: number;
    userId: number;
    username: string;
    balance: number;
};

export type PredictionHistoryEntry = {
    prediction: Prediction;
    betTitle: string;
    betStatus: BetStatus;
    correctAnswer: string | null;
    reward: number | null;
};

export function betStatus(bet: Pick<Bet, 'isOpen' | 'isClosed' | 'isResolved'>): BetStatus {
    if (bet.isResolved) return 'resolved';
    if (bet.isClosed) return 'closed';
    return 'open';
}

export function toPublicUser(user: User): PublicUser {
    const { passwordHash: _passwordHash, ...rest } = user;
    return rest;
}
