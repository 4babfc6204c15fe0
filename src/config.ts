import dotenv from 'dotenv';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function listFromEnv(name: string, fallback: string[]): string[] {
    const raw = process.env[name];
    if (!raw) return fallback;
    return raw.split(',').map((item) => item.trim()).filter(Boolean);
}

export const NODE_ENV = process.env.NODE_ENV ?? 'development';
export const PORT = intFromEnv('PORT', 3000);
export const DB_PATH = process.env.DB_PATH ?? './reedz.sqlite';
export const CORS_ORIGINS = listFromEnv('CORS_ORIGINS', ['http://localhost:5173']);

// Required to register as (or promote someone to) Admin
export const ADMIN_CODE = process.env.ADMIN_CODE ?? '';
export const SESSION_SECRET = process.env.SESSION_SECRET ?? 'change_me';
export const SESSION_TTL_HOURS = intFromEnv('SESSION_TTL_HOURS', 24);

export const START_BALANCE = intFromEnv('START_BALANCE', 0);
export const RESET_CODE_TTL_MINUTES = intFromEnv('RESET_CODE_TTL_MINUTES', 5);

export const TELEGRAM_BOT_TOKEN = process.env.TELEGRAM_BOT_TOKEN ?? '';
// node-cron expression with seconds field
export const CLOSE_SWEEP_CRON = process.env.CLOSE_SWEEP_CRON ?? '*/30 * * * * *';
