import { CORS_ORIGINS, PORT } from '../config.js';
import { createNotifier } from '../bot/notifier.js';
import { servicesFromConfig } from '../services.js';
import { createApp } from './app.js';

const services = servicesFromConfig((store) => createNotifier(store));
const app = createApp(services, { corsOrigins: CORS_ORIGINS });

const server = app.listen(PORT, () => {
    console.log(`Reedz API running on port ${PORT}`);
});

function shutdown(signal: string): void {
    console.log(`Shutting down (${signal})...`);
    server.close(() => {
        services.store.close();
        process.exit(0);
    });
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
