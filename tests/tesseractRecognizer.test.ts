import path from 'node:path';
import { beforeEach, describe, it, expect, vi } from 'vitest';
import { RecognitionError } from '../src/errors.js';
import { TesseractRecognizer, resolveLanguageDataPath } from '../src/tesseractRecognizer.js';
import { solidRaster } from './helpers.js';

const { createWorker } = vi.hoisted(() => ({ createWorker: vi.fn() }));

vi.mock('tesseract.js', () => ({ createWorker, OEM: { LSTM_ONLY: 1 } }));

type FakeWord = { text: string; confidence: number; bbox: { x0: number; y0: number; x1: number; y1: number } };

function fakeWorker(words: FakeWord[] = []) {
    return {
        recognize: vi.fn().mockResolvedValue({ data: { words } }),
        terminate: vi.fn().mockResolvedValue(undefined),
    };
}

const image = solidRaster(8, 8, [255, 255, 255]);
const options = { language: 'eng', langPath: '/data/tess', cachePath: '/tmp/ocr-cache' };

beforeEach(() => {
    createWorker.mockReset();
});

describe('TesseractRecognizer', () => {
    it('starts the worker from local language data and maps word boxes', async () => {
        createWorker.mockResolvedValueOnce(
            fakeWorker([{ text: 'Save', confidence: 91.6, bbox: { x0: 10, y0: 20, x1: 50, y1: 32 } }])
        );

        const words = await new TesseractRecognizer(options).recognize(image);

        expect(createWorker).toHaveBeenCalledWith('eng', 1, { langPath: '/data/tess', cachePath: '/tmp/ocr-cache' });
        expect(words).toEqual([
            { text: 'Save', confidence: 92, position: { x: 10, y: 20 }, dimensions: { width: 40, height: 12 } },
        ]);
    });

    it('reuses one worker across calls', async () => {
        createWorker.mockResolvedValue(fakeWorker());
        const recognizer = new TesseractRecognizer(options);

        await recognizer.recognize(image);
        await recognizer.recognize(image);

        expect(createWorker).toHaveBeenCalledTimes(1);
    });

    it('terminates the worker on reset and starts a fresh one afterwards', async () => {
        const first = fakeWorker();
        const second = fakeWorker();
        createWorker.mockResolvedValueOnce(first).mockResolvedValueOnce(second);
        const recognizer = new TesseractRecognizer(options);

        await recognizer.recognize(image);
        await recognizer.reset();
        await recognizer.recognize(image);

        expect(first.terminate).toHaveBeenCalledTimes(1);
        expect(second.recognize).toHaveBeenCalledTimes(1);
        expect(createWorker).toHaveBeenCalledTimes(2);
    });

    it('retries the worker start after a failed one', async () => {
        createWorker.mockRejectedValueOnce(new Error('no wasm')).mockResolvedValueOnce(fakeWorker());
        const recognizer = new TesseractRecognizer(options);

        await expect(recognizer.recognize(image)).rejects.toThrow('Tesseract failed: no wasm');
        await expect(recognizer.recognize(image)).resolves.toEqual([]);
    });
});

describe('resolveLanguageDataPath', () => {
    it('points at the traineddata directory of the installed language package', () => {
        expect(resolveLanguageDataPath('eng').endsWith(path.join('@tesseract.js-data', 'eng', '4.0.0_best_int'))).toBe(true);
    });

    it('requires an explicit path for combined languages', () => {
        expect(() => resolveLanguageDataPath('eng+deu')).toThrow(RecognitionError);
    });

    it('reports a language whose data package is missing', () => {
        expect(() => resolveLanguageDataPath('zzz')).toThrow('Language data for "zzz" is not installed');
    });
});
