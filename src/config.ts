// config.ts
import { z } from 'zod';
import type { LogLevel } from './utils/logger.js';

export type ProfileName = 'strict' | 'lenient';

/** Thresholds the recommendation rules compare analyzer output against. */
export type RecommendationProfile = {
    minContrastScore: number;
    maxElementsPerScreen: number;
    maxDensity: number;
    maxLowContrastAreas: number;
    minButtonSize: number;
    /** Low-severity navigation hint; `null` disables the rule. */
    navigationElementThreshold: number | null;
    sortBySeverity: boolean;
};

export const PROFILES = {
    strict: {
        minContrastScore: 30,
        maxElementsPerScreen: 15,
        maxDensity: 0.3,
        maxLowContrastAreas: 5,
        minButtonSize: 44,
        navigationElementThreshold: null,
        sortBySeverity: false,
    },
    lenient: {
        minContrastScore: 50,
        maxElementsPerScreen: 12,
        maxDensity: 0.25,
        maxLowContrastAreas: 2,
        minButtonSize: 44,
        navigationElementThreshold: 8,
        sortBySeverity: true,
    },
} as const satisfies Record<ProfileName, RecommendationProfile>;

export type AnalyzerSettings = {
    edgeLowThreshold: number;
    edgeHighThreshold: number;
    minElementArea: number;
    maxElementsReported: number;
    maxDominantColors: number;
    minTextConfidence: number;
    maxTextFragments: number;
    blockSize: number;
    lowContrastBlockStd: number;
    maxLowContrastAreasReported: number;
};

export const DEFAULT_ANALYZER_SETTINGS: AnalyzerSettings = {
    edgeLowThreshold: 50,
    edgeHighThreshold: 150,
    minElementArea: 100,
    maxElementsReported: 20,
    maxDominantColors: 10,
    minTextConfidence: 30,
    maxTextFragments: 10,
    blockSize: 50,
    lowContrastBlockStd: 20,
    maxLowContrastAreasReported: 10,
};

export type PipelineConfig = {
    profileName: ProfileName;
    profile: RecommendationProfile;
    analyzers: AnalyzerSettings;
    maxImageDimension: number;
    maxImagePixels: number;
    ocrTimeoutMs: number;
};

export type OcrEngine = 'tesseract' | 'none';

export type OcrConfig = {
    engine: OcrEngine;
    /** tesseract language code(s), e.g. `eng` or `eng+deu`. */
    language: string;
    /** Directory holding `<lang>.traineddata.gz`; resolved from `@tesseract.js-data/<lang>` when unset. */
    langPath: string | undefined;
    cachePath: string;
};

export type AppConfig = {
    port: number;
    corsOrigins: string[];
    bodyLimit: string;
    logLevel: LogLevel;
    ocr: OcrConfig;
    pipeline: PipelineConfig;
};

export function buildPipelineConfig(
    profileName: ProfileName = 'strict',
    overrides: Partial<RecommendationProfile> = {},
    extra: Partial<Omit<PipelineConfig, 'profileName' | 'profile'>> = {}
): PipelineConfig {
    return {
        profileName,
        profile: { ...PROFILES[profileName], ...overrides },
        analyzers: extra.analyzers ?? DEFAULT_ANALYZER_SETTINGS,
        maxImageDimension: extra.maxImageDimension ?? 2000,
        maxImagePixels: extra.maxImagePixels ?? 50_000_000,
        ocrTimeoutMs: extra.ocrTimeoutMs ?? 15000,
    };
}

const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalPositive = z.preprocess(blankToUndefined, z.coerce.number().positive().optional());
const optionalNonNegative = z.preprocess(blankToUndefined, z.coerce.number().nonnegative().optional());

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3001),
    CORS_ORIGINS: z
        .string()
        .default('http://localhost:3000,http://localhost:3001,http://localhost:5173')
        .transform(value => value.split(',').map(origin => origin.trim()).filter(Boolean)),
    BODY_LIMIT: z.string().default('15mb'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    ANALYSIS_PROFILE: z.enum(['strict', 'lenient']).default('strict'),
    MIN_CONTRAST_SCORE: optionalNonNegative,
    MAX_ELEMENTS_PER_SCREEN: optionalNonNegative,
    MAX_DENSITY: optionalNonNegative,
    MAX_LOW_CONTRAST_AREAS: optionalNonNegative,
    MIN_BUTTON_SIZE: optionalPositive,
    SORT_BY_SEVERITY: z.enum(['true', 'false']).optional(),
    OCR_ENGINE: z.enum(['tesseract', 'none']).default('tesseract'),
    OCR_LANGUAGE: z.string().min(1).default('eng'),
    OCR_LANG_PATH: z.preprocess(blankToUndefined, z.string().optional()),
    OCR_CACHE_PATH: z.string().min(1).default('.ocr-cache'),
    OCR_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    MAX_IMAGE_DIMENSION: z.coerce.number().int().positive().default(2000),
    MAX_IMAGE_PIXELS: z.coerce.number().int().positive().default(50_000_000),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration: ${issues.join('; ')}`);
    }
    const vars = parsed.data;

    const overrides: Partial<RecommendationProfile> = {};
    if (vars.MIN_CONTRAST_SCORE !== undefined) overrides.minContrastScore = vars.MIN_CONTRAST_SCORE;
    if (vars.MAX_ELEMENTS_PER_SCREEN !== undefined) overrides.maxElementsPerScreen = vars.MAX_ELEMENTS_PER_SCREEN;
    if (vars.MAX_DENSITY !== undefined) overrides.maxDensity = vars.MAX_DENSITY;
    if (vars.MAX_LOW_CONTRAST_AREAS !== undefined) overrides.maxLowContrastAreas = vars.MAX_LOW_CONTRAST_AREAS;
    if (vars.MIN_BUTTON_SIZE !== undefined) overrides.minButtonSize = vars.MIN_BUTTON_SIZE;
    if (vars.SORT_BY_SEVERITY !== undefined) overrides.sortBySeverity = vars.SORT_BY_SEVERITY === 'true';

    return {
        port: vars.PORT,
        corsOrigins: vars.CORS_ORIGINS,
        bodyLimit: vars.BODY_LIMIT,
        logLevel: vars.LOG_LEVEL,
        ocr: {
            engine: vars.OCR_ENGINE,
            language: vars.OCR_LANGUAGE,
            langPath: vars.OCR_LANG_PATH,
            cachePath: vars.OCR_CACHE_PATH,
        },
        pipeline: buildPipelineConfig(vars.ANALYSIS_PROFILE, overrides, {
            maxImageDimension: vars.MAX_IMAGE_DIMENSION,
            maxImagePixels: vars.MAX_IMAGE_PIXELS,
            ocrTimeoutMs: vars.OCR_TIMEOUT_MS,
        }),
    };
}
