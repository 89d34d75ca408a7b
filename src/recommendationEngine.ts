// recommendationEngine.ts
import type { RecommendationProfile } from './config.js';
import type { AnalysisResult, Recommendation, Severity } from './types.js';

export type RecommendationInput = Pick<
    AnalysisResult,
    'color_analysis' | 'element_detection' | 'text_analysis' | 'layout_analysis' | 'accessibility_analysis'
>;

type Rule = {
    name: string;
    evaluate: (input: RecommendationInput, profile: RecommendationProfile) => Recommendation[];
};

// A single-colour canvas has no foreground, so contrast findings would be noise.
const hasForeground = (input: RecommendationInput) => input.color_analysis.color_diversity > 1;

export const RULES: readonly Rule[] = [
    {
        name: 'low-contrast',
        evaluate: (input, profile) => {
            const { color_analysis } = input;
            if (!hasForeground(input)) return [];
            if (color_analysis.contrast_score >= profile.minContrastScore) return [];
            return [{
                type: 'contrast',
                severity: 'high',
                title: 'Insufficient contrast',
                description: `The overall contrast score is ${color_analysis.contrast_score.toFixed(1)}, below the recommended minimum of ${profile.minContrastScore}.`,
                suggestion: 'Increase the contrast between text and background by using more distinct colors.',
                fix: 'Adjust element colors so text reaches a contrast ratio of at least 4.5:1 (WCAG 2.1 AA).',
            }];
        },
    },
    {
        name: 'overcrowded',
        evaluate: ({ element_detection }, profile) => {
            if (element_detection.total_elements <= profile.maxElementsPerScreen) return [];
            return [{
                type: 'complexity',
                severity: 'medium',
                title: 'Too many elements on screen',
                description: `The screen contains ${element_detection.total_elements} elements, more than the recommended ${profile.maxElementsPerScreen}, which can cause cognitive overload.`,
                suggestion: 'Reduce the number of simultaneously visible elements or organize them into groups.',
                fix: 'Use tabs, accordions or separate screens to reduce visual complexity.',
            }];
        },
    },
    {
        name: 'small-button',
        evaluate: ({ element_detection }, profile) => {
            const min = profile.minButtonSize;
            return element_detection.elements
                .filter(el => el.type === 'button' && (el.dimensions.width < min || el.dimensions.height < min))
                .map((el): Recommendation => ({
                    type: 'button_size',
                    severity: 'medium',
                    title: 'Button too small',
                    description: `A ${el.dimensions.width}x${el.dimensions.height}px button is too small for comfortable touch interaction.`,
                    suggestion: `Increase the button size to at least ${min}x${min}px.`,
                    fix: `Resize the button at position (${el.position.x}, ${el.position.y}).`,
                    position: { ...el.position },
                }));
        },
    },
    {
        name: 'dense-layout',
        evaluate: ({ layout_analysis }, profile) => {
            if (layout_analysis.overall_density <= profile.maxDensity) return [];
            return [{
                type: 'layout',
                severity: 'medium',
                title: 'Interface too dense',
                description: `Edges cover ${(layout_analysis.overall_density * 100).toFixed(1)}% of the screen, which hurts clarity.`,
                suggestion: 'Add more spacing between elements and leave breathing room (whitespace).',
                fix: 'Increase margins and padding between components.',
            }];
        },
    },
    {
        name: 'low-contrast-areas',
        evaluate: (input, profile) => {
            const { accessibility_analysis } = input;
            if (!hasForeground(input)) return [];
            if (accessibility_analysis.low_contrast_areas_count <= profile.maxLowContrastAreas) return [];
            return [{
                type: 'accessibility',
                severity: 'high',
                title: 'Accessibility issues detected',
                description: `${accessibility_analysis.low_contrast_areas_count} areas with insufficient contrast were detected.`,
                suggestion: 'Improve contrast in the identified areas to meet WCAG accessibility guidelines.',
                fix: 'Change the colors in the affected areas to reach a contrast ratio of at least 4.5:1.',
            }];
        },
    },
    {
        name: 'navigation',
        evaluate: ({ element_detection }, profile) => {
            const threshold = profile.navigationElementThreshold;
            if (threshold === null || element_detection.total_elements <= threshold) return [];
            return [{
                type: 'navigation',
                severity: 'low',
                title: 'Navigation could be simplified',
                description: `With ${element_detection.total_elements} elements on screen, navigation could be clearer.`,
                suggestion: 'Group related elements logically and add visual cues to guide the user.',
                fix: 'Use separators, control groups and a clear hierarchy to structure navigation.',
            }];
        },
    },
];

const SEVERITY_ORDER: Record<Severity, number> = { high: 0, medium: 1, low: 2 };

/** Stable: equal severities keep rule order, then discovery order. */
export function sortBySeverity(recommendations: Recommendation[]): Recommendation[] {
    return [...recommendations].sort((a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]);
}

export function generateRecommendations(
    input: RecommendationInput,
    profile: RecommendationProfile
): Recommendation[] {
    const recommendations = RULES.flatMap(rule => rule.evaluate(input, profile));
    return profile.sortBySeverity ? sortBySeverity(recommendations) : recommendations;
}
