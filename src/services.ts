import { Clock } from './types.js';
import { BetStore, openStore } from './db/index.js';
import { AccountService } from './core/auth.js';
import { BetLifecycle, Resolution } from './core/lifecycle.js';
import { SessionSigner } from './core/session.js';
import { UserAdmin } from './core/users.js';
import { Notifier } from './notify/index.js';
import {
    ADMIN_CODE,
    DB_PATH,
    RESET_CODE_TTL_MINUTES,
    SESSION_SECRET,
    SESSION_TTL_HOURS,
    START_BALANCE,
} from './config.js';

export type ServiceOptions = {
    store: BetStore;
    notifier: Notifier;
    adminCode: string;
    sessionSecret: string;
    sessionTtlHours: number;
    startBalance: number;
    resetCodeTtlMinutes: number;
    bcryptRounds?: number;
    now?: Clock;
};

export type Services = {
    store: BetStore;
    notifier: Notifier;
    bets: BetLifecycle;
    accounts: AccountService;
    users: UserAdmin;
    sessions: SessionSigner;
};

export function createServices(options: ServiceOptions): Services {
    const now = options.now ?? Date.now;
    return {
        store: options.store,
        notifier: options.notifier,
        bets: new BetLifecycle(options.store, now),
        accounts: new AccountService(options.store, options.notifier, {
            adminCode: options.adminCode,
            startBalance: options.startBalance,
            resetCodeTtlMinutes: options.resetCodeTtlMinutes,
            bcryptRounds: options.bcryptRounds,
        }, now),
        users: new UserAdmin(options.store, options.adminCode),
        sessions: new SessionSigner(options.sessionSecret, options.sessionTtlHours),
    };
}

export function servicesFromConfig(makeNotifier: (store: BetStore) => Notifier): Services {
    if (SESSION_SECRET === 'change_me') {
        console.warn('[config] SESSION_SECRET is not set, using the development default');
    }
    const store = openStore(DB_PATH);
    return createServices({
        store,
        notifier: makeNotifier(store),
        adminCode: ADMIN_CODE,
        sessionSecret: SESSION_SECRET,
        sessionTtlHours: SESSION_TTL_HOURS,
        startBalance: START_BALANCE,
        resetCodeTtlMinutes: RESET_CODE_TTL_MINUTES,
    });
}

// Runs after the resolution has committed; a failed delivery is only logged
export function announceResolution(notifier: Notifier, resolution: Resolution): void {
    notifier.announceResolution(resolution.bet, resolution.rewards).catch((error: unknown) => {
        console.error(`[notify] failed to announce bet #${resolution.bet.id}:`, error);
    });
}
