import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_ANALYZER_SETTINGS } from '../src/config.js';
import { analyzeText, DisabledRecognizer, type RecognizedWord, type TextRecognizer } from '../src/textAnalyzer.js';
import { solidRaster } from './helpers.js';

const image = solidRaster(10, 10);

function word(text: string, confidence: number, x = 0): RecognizedWord {
    return { text, confidence, position: { x, y: 5 }, dimensions: { width: 20, height: 8 } };
}

function stub(words: RecognizedWord[]): TextRecognizer {
    return { recognize: vi.fn().mockResolvedValue(words) };
}

describe('analyzeText', () => {
    it('keeps only words above 30% confidence', async () => {
        const result = await analyzeText(
            image,
            stub([word('Login', 95), word('noise', 30), word('Email', 31), word('~', 10)]),
            DEFAULT_ANALYZER_SETTINGS,
            1000
        );

        expect(result).toEqual({
            text_elements_count: 2,
            text_elements: [word('Login', 95), word('Email', 31)],
        });
    });

    it('counts every kept word but returns the first ten in recognizer order', async () => {
        const words = Array.from({ length: 15 }, (_, i) => word(`w${i}`, 90, i * 10));

        const result = await analyzeText(image, stub(words), DEFAULT_ANALYZER_SETTINGS, 1000);

        expect(result.text_elements_count).toBe(15);
        expect(result.text_elements.map(w => w.text)).toEqual(words.slice(0, 10).map(w => w.text));
    });

    it('degrades instead of failing when the engine throws', async () => {
        const recognizer: TextRecognizer = { recognize: vi.fn().mockRejectedValue(new Error('engine crashed')) };

        const result = await analyzeText(image, recognizer, DEFAULT_ANALYZER_SETTINGS, 1000);

        expect(result).toEqual({ text_elements_count: 0, text_elements: [], error: 'OCR error: engine crashed' });
    });

    it('degrades when recognition exceeds the timeout', async () => {
        const recognizer: TextRecognizer = { recognize: () => new Promise<RecognizedWord[]>(() => {}) };

        const result = await analyzeText(image, recognizer, DEFAULT_ANALYZER_SETTINGS, 20);

        expect(result.text_elements_count).toBe(0);
        expect(result.error).toBe('OCR error: Text recognition timed out after 20ms');
    });

    it('resets a recognizer that timed out so the next call is not stuck behind it', async () => {
        const reset = vi.fn().mockResolvedValue(undefined);
        const recognize = vi.fn()
            .mockReturnValueOnce(new Promise<RecognizedWord[]>(() => {}))
            .mockResolvedValueOnce([word('Next', 88)]);
        const recognizer: TextRecognizer = { recognize, reset };

        const first = await analyzeText(image, recognizer, DEFAULT_ANALYZER_SETTINGS, 20);
        const second = await analyzeText(image, recognizer, DEFAULT_ANALYZER_SETTINGS, 1000);

        expect(first.error).toBe('OCR error: Text recognition timed out after 20ms');
        expect(reset).toHaveBeenCalledTimes(1);
        expect(second).toEqual({ text_elements_count: 1, text_elements: [word('Next', 88)] });
    });

    it('does not reset a recognizer that failed outright', async () => {
        const reset = vi.fn().mockResolvedValue(undefined);
        const recognizer: TextRecognizer = { recognize: vi.fn().mockRejectedValue(new Error('bad image')), reset };

        await analyzeText(image, recognizer, DEFAULT_ANALYZER_SETTINGS, 1000);

        expect(reset).not.toHaveBeenCalled();
    });

    it('reports a disabled recognizer as a degraded section', async () => {
        const result = await analyzeText(image, new DisabledRecognizer(), DEFAULT_ANALYZER_SETTINGS, 1000);

        expect(result.error).toBe('OCR error: Text recognition is disabled');
    });
});
