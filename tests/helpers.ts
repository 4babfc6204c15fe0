import { Bet, Reward, Role, User } from '../src/types.js';
import { ReedzError } from '../src/errors.js';
import { SqliteBetStore } from '../src/db/index.js';
import { Notifier } from '../src/notify/index.js';
import { Services, createServices } from '../src/services.js';

export const T0 = Date.UTC(2026, 0, 15, 12, 0, 0);
export const HOUR = 60 * 60 * 1000;
export const DAY = 24 * HOUR;
export const ADMIN_CODE = 'test-admin-code';
export const PASSWORD = 'test-password';

export class TestClock {
    current = T0;
    readonly now = (): number => this.current;

    advance(ms: number): void {
        this.current += ms;
    }
}

export class RecordingNotifier implements Notifier {
    readonly resetCodes: { email: string; code: string; expiresAt: number }[] = [];
    readonly resolutions: { bet: Bet; rewards: Reward[] }[] = [];

    async sendPasswordResetCode(user: User, code: string, expiresAt: number): Promise<void> {
        this.resetCodes.push({ email: user.email, code, expiresAt });
    }

    async announceResolution(bet: Bet, rewards: Reward[]): Promise<void> {
        this.resolutions.push({ bet, rewards });
    }
}

export type TestContext = Services & {
    clock: TestClock;
    notifier: RecordingNotifier;
};

export function createTestContext(store: SqliteBetStore = new SqliteBetStore(':memory:')): TestContext {
    const clock = new TestClock();
    const notifier = new RecordingNotifier();
    const services = createServices({
        store,
        notifier,
        adminCode: ADMIN_CODE,
        sessionSecret: 'test-secret',
        sessionTtlHours: 1,
        startBalance: 0,
        resetCodeTtlMinutes: 5,
        bcryptRounds: 4,
        now: clock.now,
    });
    return { ...services, clock, notifier };
}

export function addUser(ctx: TestContext, username: string, role: Role = 'Member'): User {
    return ctx.accounts.register({
        username,
        email: `${username.toLowerCase()}@example.test`,
        password: PASSWORD,
        role,
        adminCode: role === 'Admin' ? ADMIN_CODE : undefined,
    });
}

export function captureError(fn: () => unknown): ReedzError {
    try {
        fn();
    } catch (error) {
        if (error instanceof ReedzError) return error;
        throw error;
    }
    throw new Error('Expected the call to throw a ReedzError');
}

export async function captureAsyncError(fn: () => Promise<unknown>): Promise<ReedzError> {
    try {
        await fn();
    } catch (error) {
        if (error instanceof ReedzError) return error;
        throw error;
    }
    throw new Error('Expected the call to reject with a ReedzError');
}

export function resolvedBet(answerType: Bet['answerType'], correctAnswer: string): Bet {
    return {
        id: 1,
        createdBy: 1,
        title: 'test bet',
        description: '',
        answerType,
        isOpen: false,
        isClosed: true,
        isResolved: true,
        createdAt: T0,
        closeAt: T0 + DAY,
        correctAnswer,
        resolvedAt: T0 + 2 * DAY,
        rewardsAppliedAt: null,
    };
}
