// types.ts
// Wire-facing shapes keep the snake_case field names the dashboard reads.

export type RasterImage = {
    readonly width: number;
    readonly height: number;
    /** RGB, 3 bytes per pixel, row-major */
    readonly data: Uint8Array;
};

export type Position = { x: number; y: number };
export type Dimensions = { width: number; height: number };
export type RgbTriple = [number, number, number];

export type ColorProfile = {
    dominant_colors: RgbTriple[];
    contrast_score: number;
    color_diversity: number;
    dominant_contrast_ratio: number | null;
};

export type ElementType =
    | 'icon'
    | 'text_field'
    | 'vertical_element'
    | 'button'
    | 'container'
    | 'generic_element';

export type UIElement = {
    type: ElementType;
    position: Position;
    dimensions: Dimensions;
    area: number;
};

export type ElementDetection = {
    total_elements: number;
    elements: UIElement[];
};

export type TextFragment = {
    text: string;
    confidence: number;
    position: Position;
    dimensions: Dimensions;
};

export type TextAnalysis = {
    text_elements_count: number;
    text_elements: TextFragment[];
    error?: string;
};

export type ZoneName = 'top' | 'middle' | 'bottom' | 'left' | 'center' | 'right';

export type LayoutProfile = {
    image_dimensions: Dimensions;
    zone_densities: Record<ZoneName, number>;
    overall_density: number;
};

export type LowContrastArea = {
    position: Position;
    contrast_score: number;
};

export type AccessibilityProfile = {
    overall_contrast_variance: number;
    low_contrast_areas_count: number;
    low_contrast_areas: LowContrastArea[];
};

export type Severity = 'high' | 'medium' | 'low';

export type RecommendationType =
    | 'contrast'
    | 'complexity'
    | 'button_size'
    | 'layout'
    | 'accessibility'
    | 'navigation';

export type Recommendation = {
    type: RecommendationType;
    severity: Severity;
    title: string;
    description: string;
    suggestion: string;
    fix: string;
    position?: Position | undefined;
};

export type AnalysisResult = {
    timestamp: string;
    image_dimensions: Dimensions;
    profile: string;
    color_analysis: ColorProfile;
    element_detection: ElementDetection;
    text_analysis: TextAnalysis;
    layout_analysis: LayoutProfile;
    accessibility_analysis: AccessibilityProfile;
    recommendations: Recommendation[];
    analysis_id?: number | undefined;
};

export type AnalysisStatistics = {
    total_issues: number;
    severity_high: number;
    severity_medium: number;
    severity_low: number;
};

export type AnalysisRecord = {
    id: number;
    timestamp: string;
    image_name: string;
    image_dimensions: Dimensions;
    color_analysis: ColorProfile;
    element_detection: ElementDetection;
    text_analysis: TextAnalysis;
    layout_analysis: LayoutProfile;
    accessibility_analysis: AccessibilityProfile;
    recommendations: Recommendation[];
    statistics: AnalysisStatistics;
};

export type AnalysisStats = {
    total_analyses: number;
    avg_issues_per_analysis: number;
    most_common_issue_types: { type: string; count: number }[];
};
