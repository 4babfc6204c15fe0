import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { z, ZodError } from 'zod';
import { ANSWER_TYPES, User, toPublicUser } from '../types.js';
import { ErrorKind, isReedzError, unauthorized } from '../errors.js';
import { Services, announceResolution } from '../services.js';

// Set by requireSession
declare global {
    namespace Express {
        interface Request {
            actor?: User;
        }
    }
}

const DAY_MS = 24 * 60 * 60 * 1000;

const STATUS_BY_KIND: Record<ErrorKind, number> = {
    Unauthorized: 403,
    InvalidState: 409,
    NotFound: 404,
    MalformedAnswer: 400,
    PersistenceFailure: 500,
    InvalidInput: 400,
    Conflict: 409,
};

const idParam = z.coerce.number().int().positive();

const registerBody = z.object({
    username: z.string(),
    email: z.string().email(),
    password: z.string().min(1),
    role: z.string().optional(),
    adminCode: z.string().optional(),
});

const loginBody = z.object({
    username: z.string(),
    password: z.string(),
});

const resetRequestBody = z.object({ email: z.string() });

const resetConfirmBody = z.object({
    email: z.string(),
    code: z.string(),
    newPassword: z.string().min(1),
});

// Either an explicit deadline or a number of days from now (1 day when omitted)
const createBetBody = z.object({
    title: z.string().min(1),
    description: z.string().default(''),
    answerType: z.enum(ANSWER_TYPES),
    closeAt: z.union([z.number().int(), z.string().datetime({ offset: true }).transform((value) => Date.parse(value))]).optional(),
    closeInDays: z.number().int().min(1).max(30).optional(),
});

const predictionBody = z.object({ value: z.string() });
const resolveBody = z.object({ correctAnswer: z.string() });
const roleBody = z.object({ role: z.string(), adminCode: z.string().optional() });
const balanceBody = z.union([
    z.object({ delta: z.number().int() }),
    z.object({ balance: z.number().int().min(0) }),
]);

const betsQuery = z.object({ status: z.enum(['open', 'closed', 'resolved']).optional() });
const leaderboardQuery = z.object({ limit: z.coerce.number().int().min(1).max(500).optional() });

type Handler = (req: express.Request, res: express.Response) => void | Promise<void>;

// Sync throws and rejected promises both reach the error middleware
function route(handler: Handler): express.RequestHandler {
    return (req, res, next) => {
        try {
            Promise.resolve(handler(req, res)).catch(next);
        } catch (error) {
            next(error);
        }
    };
}

function actorOf(req: express.Request): User {
    if (!req.actor) throw unauthorized('Login required');
    return req.actor;
}

export type AppOptions = {
    corsOrigins: string[];
};

export function createApp(services: Services, options: AppOptions): express.Express {
    const { bets, accounts, users, sessions, notifier } = services;
    const app = express();

    app.use(helmet());
    app.use(cors({ origin: options.corsOrigins, credentials: false }));
    app.use(express.json());

    // Bearer session → fresh user record, so role changes apply immediately
    const requireSession: express.RequestHandler = (req, res, next) => {
        const header = req.headers.authorization ?? '';
        if (!header.startsWith('Bearer ')) {
            res.status(401).json({ error: 'Missing session token', kind: 'Unauthorized' });
            return;
        }
        try {
            const session = sessions.verify(header.slice('Bearer '.length));
            req.actor = accounts.requireUser(session.userId);
            next();
        } catch (error) {
            if (isReedzError(error) && (error.kind === 'Unauthorized' || error.kind === 'NotFound')) {
                res.status(401).json({ error: error.message, kind: 'Unauthorized' });
                return;
            }
            next(error);
        }
    };

    app.get('/api/health', (req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    // ── Accounts ───────────────────────────────────────────────

    app.post('/api/auth/register', route((req, res) => {
        const user = accounts.register(registerBody.parse(req.body));
        res.status(201).json({ user: toPublicUser(user) });
    }));

    app.post('/api/auth/login', route((req, res) => {
        const { username, password } = loginBody.parse(req.body);
        const user = accounts.authenticate(username, password);
        const session = sessions.issue(user.id);
        res.json({ token: session.token, expiresAt: session.expiresAt, user: toPublicUser(user) });
    }));

    app.post('/api/auth/password-reset', route(async (req, res) => {
        const { email } = resetRequestBody.parse(req.body);
        const { expiresAt } = await accounts.requestPasswordReset(email);
        res.status(202).json({ expiresAt });
    }));

    app.post('/api/auth/password-reset/confirm', route((req, res) => {
        const { email, code, newPassword } = resetConfirmBody.parse(req.body);
        accounts.confirmPasswordReset(email, code, newPassword);
        res.json({ success: true });
    }));

    app.get('/api/me', requireSession, route((req, res) => {
        const profile = users.profile(actorOf(req).id);
        res.json({ user: toPublicUser(profile.user), predictions: profile.predictions });
    }));

    app.get('/api/leaderboard', requireSession, route((req, res) => {
        const { limit } = leaderboardQuery.parse(req.query);
        res.json(users.leaderboard(limit));
    }));

    // ── Bets ───────────────────────────────────────────────────

    app.get('/api/bets', requireSession, route((req, res) => {
        const { status } = betsQuery.parse(req.query);
        res.json(bets.list(status));
    }));

    app.post('/api/bets', requireSession, route((req, res) => {
        const body = createBetBody.parse(req.body);
        const closeAt = body.closeAt ?? Date.now() + (body.closeInDays ?? 1) * DAY_MS;
        const bet = bets.create(actorOf(req), { ...body, closeAt });
        res.status(201).json(bet);
    }));

    app.get('/api/bets/:id', requireSession, route((req, res) => {
        res.json(bets.get(idParam.parse(req.params.id)));
    }));

    app.get('/api/bets/:id/predictions', requireSession, route((req, res) => {
        res.json(bets.predictions(idParam.parse(req.params.id)));
    }));

    app.post('/api/bets/:id/predictions', requireSession, route((req, res) => {
        const { value } = predictionBody.parse(req.body);
        const prediction = bets.placePrediction(actorOf(req), idParam.parse(req.params.id), value);
        res.status(201).json(prediction);
    }));

    app.post('/api/bets/:id/close', requireSession, route((req, res) => {
        res.json(bets.close(actorOf(req), idParam.parse(req.params.id)));
    }));

    app.post('/api/bets/:id/resolve', requireSession, route((req, res) => {
        const { correctAnswer } = resolveBody.parse(req.body);
        const resolution = bets.resolve(actorOf(req), idParam.parse(req.params.id), correctAnswer);
        announceResolution(notifier, resolution);
        res.json(resolution);
    }));

    app.get('/api/bets/:id/rewards', requireSession, route((req, res) => {
        res.json(bets.rewards(idParam.parse(req.params.id)));
    }));

    // ── User management ────────────────────────────────────────

    app.get('/api/users', requireSession, route((req, res) => {
        res.json(users.listUsers(actorOf(req)).map(toPublicUser));
    }));

    app.patch('/api/users/:id/role', requireSession, route((req, res) => {
        const { role, adminCode } = roleBody.parse(req.body);
        const user = users.changeRole(actorOf(req), idParam.parse(req.params.id), role, adminCode);
        res.json(toPublicUser(user));
    }));

    app.post('/api/users/:id/balance', requireSession, route((req, res) => {
        const body = balanceBody.parse(req.body);
        const userId = idParam.parse(req.params.id);
        const user = 'delta' in body
            ? users.adjustBalance(actorOf(req), userId, body.delta)
            : users.setBalance(actorOf(req), userId, body.balance);
        res.json(toPublicUser(user));
    }));

    app.delete('/api/users/:id', requireSession, route((req, res) => {
        users.deleteUser(actorOf(req), idParam.parse(req.params.id));
        res.status(204).end();
    }));

    app.post('/api/season/reset', requireSession, route((req, res) => {
        users.resetSeason(actorOf(req));
        res.json({ success: true });
    }));

    // Unknown routes answer in JSON too
    app.use((req, res) => {
        res.status(404).json({ error: 'Not found', kind: 'NotFound' });
    });

    const errorHandler: express.ErrorRequestHandler = (error, req, res, next) => {
        if (res.headersSent) {
            next(error);
            return;
        }
        if (error instanceof ZodError) {
            const issue = error.issues[0];
            const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
            res.status(400).json({ error: `${where}${issue?.message ?? 'Invalid request'}`, kind: 'InvalidInput' });
            return;
        }
        if (isReedzError(error)) {
            if (error.kind === 'PersistenceFailure') console.error(`[api] ${req.method} ${req.path}:`, error);
            res.status(STATUS_BY_KIND[error.kind]).json({ error: error.message, kind: error.kind });
            return;
        }
        if (error instanceof SyntaxError) {
            res.status(400).json({ error: 'Malformed JSON body', kind: 'InvalidInput' });
            return;
        }
        console.error(`[api] ${req.method} ${req.path}:`, error);
        res.status(500).json({ error: 'Internal server error' });
    };
    app.use(errorHandler);

    return app;
}
