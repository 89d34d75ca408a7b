// server.ts
import express from 'express';
import type { Express } from 'express';
import type { AnalysisStore } from './analysisStore.js';
import type { AppConfig, OcrConfig } from './config.js';
import { errorHandler, setupMiddleware } from './middleware.js';
import { createAnalysisRouter } from './routes.js';
import { TesseractRecognizer } from './tesseractRecognizer.js';
import { DisabledRecognizer, type TextRecognizer } from './textAnalyzer.js';

export type AppDeps = {
    store: AnalysisStore;
    recognizer: TextRecognizer;
};

export function createRecognizer(ocr: OcrConfig): TextRecognizer {
    if (ocr.engine === 'none') return new DisabledRecognizer();
    return new TesseractRecognizer({ language: ocr.language, langPath: ocr.langPath, cachePath: ocr.cachePath });
}

export function createApp(config: Pick<AppConfig, 'corsOrigins' | 'bodyLimit' | 'pipeline'>, deps: AppDeps): Express {
    const app = express();
    app.disable('x-powered-by');

    setupMiddleware(app, { corsOrigins: config.corsOrigins, bodyLimit: config.bodyLimit });
    app.use('/api', createAnalysisRouter({ config: config.pipeline, ...deps }));
    app.use('/api', (_req, res) => {
        res.status(404).json({ error: 'Not found' });
    });
    app.use(errorHandler);

    return app;
}
