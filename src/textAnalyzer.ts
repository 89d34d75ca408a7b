// textAnalyzer.ts
import type { AnalyzerSettings } from './config.js';
import { RecognitionError, errorMessage } from './errors.js';
import type { Dimensions, Position, RasterImage, TextAnalysis } from './types.js';
import { createLogger } from './utils/logger.js';
import { TimeoutError, withTimeout } from './utils/timeout.js';

const log = createLogger('OCR');

export type RecognizedWord = {
    text: string;
    /** 0-100 */
    confidence: number;
    position: Position;
    dimensions: Dimensions;
};

/** OCR primitive. May reject; the text analyzer absorbs the failure. */
export interface TextRecognizer {
    recognize(image: RasterImage): Promise<RecognizedWord[]>;
    /** Abandons in-flight work so the next call starts clean. Called after a timeout. */
    reset?(): Promise<void>;
}

/** Stand-in used when OCR is switched off: every call fails, so the section degrades. */
export class DisabledRecognizer implements TextRecognizer {
    async recognize(): Promise<RecognizedWord[]> {
        throw new RecognitionError('Text recognition is disabled');
    }
}

async function discardStalledWork(recognizer: TextRecognizer): Promise<void> {
    if (!recognizer.reset) return;
    try {
        await recognizer.reset();
    } catch (err) {
        log.warn(`Recognizer reset failed: ${errorMessage(err)}`);
    }
}

export async function analyzeText(
    image: RasterImage,
    recognizer: TextRecognizer,
    settings: Pick<AnalyzerSettings, 'minTextConfidence' | 'maxTextFragments'>,
    timeoutMs: number
): Promise<TextAnalysis> {
    try {
        const words = await withTimeout(
            recognizer.recognize(image),
            timeoutMs,
            `Text recognition timed out after ${timeoutMs}ms`
        );
        const kept = words.filter(word => word.confidence > settings.minTextConfidence);
        return {
            text_elements_count: kept.length,
            text_elements: kept.slice(0, settings.maxTextFragments).map(word => ({
                text: word.text,
                confidence: word.confidence,
                position: { ...word.position },
                dimensions: { ...word.dimensions },
            })),
        };
    } catch (err) {
        if (err instanceof TimeoutError) await discardStalledWork(recognizer);
        const failure = err instanceof RecognitionError
            ? err
            : new RecognitionError(errorMessage(err), { cause: err });
        log.warn(`Text analysis degraded: ${failure.message}`);
        return {
            text_elements_count: 0,
            text_elements: [],
            error: `OCR error: ${failure.message}`,
        };
    }
}
