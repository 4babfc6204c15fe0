import { Telegraf, Context } from 'telegraf';
import { BetStatus, User } from '../types.js';
import { isReedzError } from '../errors.js';
import { canManageBets } from '../core/roles.js';
import { Services, announceResolution } from '../services.js';
import {
    commandArgs,
    formatBets,
    formatHelp,
    formatLeaderboard,
    formatPredictions,
    formatProfile,
    formatRewards,
    parseBetId,
} from './format.js';

const STATUSES: readonly string[] = ['open', 'closed', 'resolved'] satisfies BetStatus[];

export const COMMANDS = ['help', 'link', 'bets', 'predict', 'predictions', 'leaderboard', 'me', 'close', 'resolve'] as const;
export type CommandName = 'start' | (typeof COMMANDS)[number];

// The slice of a telegraf update the handlers read
export type CommandContext = {
    from: { id: number; firstName: string } | undefined;
    chatType: string | undefined;
    text: string;
    reply(text: string): Promise<unknown>;
};

export type CommandHandler = (ctx: CommandContext) => Promise<void>;

function isBetStatus(value: string): value is BetStatus {
    return STATUSES.includes(value);
}

function messageText(ctx: Context): string {
    return ctx.message && 'text' in ctx.message ? ctx.message.text : '';
}

function toCommandContext(ctx: Context): CommandContext {
    return {
        from: ctx.from ? { id: ctx.from.id, firstName: ctx.from.first_name } : undefined,
        chatType: ctx.chat?.type,
        text: messageText(ctx),
        reply: (text) => ctx.reply(text),
    };
}

// Domain errors become replies; anything else goes to bot.catch
async function guarded(ctx: CommandContext, action: () => Promise<unknown>): Promise<void> {
    try {
        await action();
    } catch (error) {
        if (!isReedzError(error)) throw error;
        await ctx.reply(`Error: ${error.message}`);
    }
}

export function createCommandHandlers(services: Services): Record<CommandName, CommandHandler> {
    const { store, bets, accounts, users, notifier } = services;

    function linkedUser(ctx: CommandContext): User | undefined {
        return ctx.from ? store.getUserByTelegramId(ctx.from.id) : undefined;
    }

    function withUser(action: (ctx: CommandContext, user: User) => Promise<unknown>): CommandHandler {
        return async (ctx) => {
            const user = linkedUser(ctx);
            if (!user) {
                await ctx.reply('This chat is not linked yet. Send /link <username> <password> in a private chat.');
                return;
            }
            await guarded(ctx, () => action(ctx, user));
        };
    }

    return {
        start: async (ctx) => {
            const user = linkedUser(ctx);
            const greeting = user
                ? `Welcome back, ${user.username}! Balance: ${user.balance} Reedz`
                : `Welcome to Reedz, ${ctx.from?.firstName ?? 'player'}! Link your account with /link <username> <password>.`;
            await ctx.reply([greeting, '', formatHelp(user ? canManageBets(user.role) : false)].join('\n'));
        },

        help: async (ctx) => {
            const user = linkedUser(ctx);
            await ctx.reply(formatHelp(user ? canManageBets(user.role) : false));
        },

        link: async (ctx) => {
            const from = ctx.from;
            if (!from) return;
            if (ctx.chatType !== 'private') {
                await ctx.reply('Link your account in a private chat with the bot.');
                return;
            }
            const [username, password] = commandArgs(ctx.text, 2);
            if (!username || !password) {
                await ctx.reply('Usage: /link <username> <password>');
                return;
            }
            await guarded(ctx, async () => {
                const user = accounts.linkTelegram(username, password, from.id);
                await ctx.reply(`Linked to ${user.username} (${user.role}). Balance: ${user.balance} Reedz`);
            });
        },

        bets: withUser(async (ctx) => {
            const [raw] = commandArgs(ctx.text, 1);
            if (raw !== undefined && !isBetStatus(raw)) {
                await ctx.reply('Usage: /bets [open|closed|resolved]');
                return;
            }
            await ctx.reply(formatBets(bets.list(raw)));
        }),

        predict: withUser(async (ctx, user) => {
            const [rawId, value] = commandArgs(ctx.text, 2);
            const betId = parseBetId(rawId);
            if (betId === undefined || !value) {
                await ctx.reply('Usage: /predict <bet id> <answer>');
                return;
            }
            const prediction = bets.placePrediction(user, betId, value);
            await ctx.reply(`Prediction "${prediction.value}" placed on bet #${betId}.`);
        }),

        predictions: withUser(async (ctx) => {
            const betId = parseBetId(commandArgs(ctx.text, 1)[0]);
            if (betId === undefined) {
                await ctx.reply('Usage: /predictions <bet id>');
                return;
            }
            await ctx.reply(formatPredictions(bets.get(betId), bets.predictions(betId)));
        }),

        leaderboard: withUser(async (ctx) => {
            await ctx.reply(formatLeaderboard(users.leaderboard(10)));
        }),

        me: withUser(async (ctx, user) => {
            await ctx.reply(formatProfile(users.profile(user.id)));
        }),

        close: withUser(async (ctx, user) => {
            const betId = parseBetId(commandArgs(ctx.text, 1)[0]);
            if (betId === undefined) {
                await ctx.reply('Usage: /close <bet id>');
                return;
            }
            const bet = bets.close(user, betId);
            await ctx.reply(`Bet #${bet.id} is closed.`);
        }),

        resolve: withUser(async (ctx, user) => {
            const [rawId, answer] = commandArgs(ctx.text, 2);
            const betId = parseBetId(rawId);
            if (betId === undefined || !answer) {
                await ctx.reply('Usage: /resolve <bet id> <correct answer>');
                return;
            }
            const resolution = bets.resolve(user, betId, answer);
            const usernames = new Map(resolution.rewards.map((reward) => [reward.userId, store.getUserById(reward.userId)?.username ?? '']));
            announceResolution(notifier, resolution);
            await ctx.reply(formatRewards(resolution.bet, resolution.rewards, usernames));
        }),
    };
}

export function registerCommands(bot: Telegraf<Context>, services: Services): void {
    const handlers = createCommandHandlers(services);
    bot.start((ctx) => handlers.start(toCommandContext(ctx)));
    for (const name of COMMANDS) {
        bot.command(name, (ctx) => handlers[name](toCommandContext(ctx)));
    }
}
