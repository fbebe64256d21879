import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { SQLiteRepository } from './db/sqlite.js';
import { seedIfEmpty } from './db/seed.js';

const config = loadConfig(process.env);
const logger = createLogger(config);

// Initialize repository
const repo = new SQLiteRepository(config.databasePath);
repo.init();
logger.info({ path: repo.name }, 'SQLite database initialized');

const seeded = seedIfEmpty(repo);
if (seeded > 0) logger.info({ count: seeded }, 'Seeded empty collection with sample media');

const app = createApp({ repo, logger });

const server = app.listen(config.port, '0.0.0.0', () => {
    logger.info(`Media Shelf API running on http://localhost:${config.port} (docs at /docs)`);
});

function shutdown(signal: NodeJS.Signals): void {
    logger.info({ signal }, 'Shutting down');
    server.close((err) => {
        repo.close();
        if (err) {
            logger.error({ err }, 'HTTP server did not close cleanly');
            process.exit(1);
        }
        process.exit(0);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
