import { Telegraf } from 'telegraf';
import { TELEGRAM_BOT_TOKEN } from '../config.js';
import { servicesFromConfig } from '../services.js';
import { registerCommands } from './commands.js';
import { TelegramNotifier } from './notifier.js';

if (!TELEGRAM_BOT_TOKEN) {
    console.error('Missing TELEGRAM_BOT_TOKEN in environment');
    process.exit(1);
}

const bot = new Telegraf(TELEGRAM_BOT_TOKEN);
const services = servicesFromConfig((store) => new TelegramNotifier(bot.telegram, store));
registerCommands(bot, services);

bot.catch((error, ctx) => {
    console.error(`[bot] update ${ctx.update.update_id} failed:`, error);
});

bot.launch().catch((error: unknown) => {
    console.error('[bot] launch failed:', error);
    process.exit(1);
});
console.log('Reedz bot is running');

function stop(signal: string): void {
    bot.stop(signal);
    services.store.close();
}

process.once('SIGINT', () => stop('SIGINT'));
process.once('SIGTERM', () => stop('SIGTERM'));
