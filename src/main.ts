// main.ts
import { config as loadDotenv } from 'dotenv';
import { InMemoryAnalysisStore } from './analysisStore.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { createApp, createRecognizer } from './server.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const log = createLogger('Server');

loadDotenv();

process.on('unhandledRejection', (reason) => {
    log.error('Unhandled rejection:', reason);
});

const config = loadConfig();
setLogLevel(config.logLevel);

const recognizer = createRecognizer(config.ocr);
const app = createApp(config, { store: new InMemoryAnalysisStore(), recognizer });

const server = app.listen(config.port, () => {
    log.info(`UX Analyzer API listening on port ${config.port} (profile: ${config.pipeline.profileName}, OCR: ${config.ocr.engine})`);
});

async function shutdown(signal: string): Promise<void> {
    log.info(`${signal} received, shutting down`);
    server.close();
    await recognizer.reset?.();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
        shutdown(signal)
            .catch(err => log.error(`Shutdown failed: ${errorMessage(err)}`))
            .finally(() => process.exit(0));
    });
}
