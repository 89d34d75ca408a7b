// analysisService.ts
import { analyzeScreenshot, type PipelineDeps } from './analysisPipeline.js';
import type { AnalysisStore } from './analysisStore.js';
import { PersistenceError, errorMessage } from './errors.js';
import type { AnalysisResult } from './types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Analysis');

export type AnalyzeRequest = {
    image: string;
    image_name?: string | undefined;
};

export type ServiceDeps = PipelineDeps & { store: AnalysisStore };

/**
 * Analyzes and records one screenshot. Saving is best effort: when the store
 * fails the analysis is still returned, just without `analysis_id`.
 */
export async function recordAnalysis(request: AnalyzeRequest, deps: ServiceDeps): Promise<AnalysisResult> {
    const result = await analyzeScreenshot(request.image, deps);

    try {
        const id = await deps.store.save(result, request.image_name ?? 'screenshot');
        return { ...result, analysis_id: id };
    } catch (err) {
        const failure = new PersistenceError(`Could not save analysis: ${errorMessage(err)}`, { cause: err });
        log.error(failure.message);
        return result;
    }
}
