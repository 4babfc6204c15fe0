import { CLOSE_SWEEP_CRON } from '../config.js';
import { ConsoleNotifier } from '../notify/index.js';
import { servicesFromConfig } from '../services.js';
import { startSweeper } from './sweeper.js';

const services = servicesFromConfig(() => new ConsoleNotifier());
const task = startSweeper(services.bets, CLOSE_SWEEP_CRON);

console.log(`Deadline sweeper started (${CLOSE_SWEEP_CRON})`);

function shutdown(signal: string): void {
    console.log(`Shutting down deadline sweeper (${signal})...`);
    task.stop();
    services.store.close();
    process.exit(0);
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
