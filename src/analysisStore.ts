// analysisStore.ts
import type { AnalysisRecord, AnalysisResult, AnalysisStatistics, AnalysisStats } from './types.js';

export interface AnalysisStore {
    save(result: AnalysisResult, imageName: string): Promise<number>;
    /** Most recent first. */
    getRecent(limit: number): Promise<AnalysisRecord[]>;
    getById(id: number): Promise<AnalysisRecord | undefined>;
    getStats(): Promise<AnalysisStats>;
}

export function deriveStatistics(result: AnalysisResult): AnalysisStatistics {
    const { recommendations } = result;
    return {
        total_issues: recommendations.length,
        severity_high: recommendations.filter(r => r.severity === 'high').length,
        severity_medium: recommendations.filter(r => r.severity === 'medium').length,
        severity_low: recommendations.filter(r => r.severity === 'low').length,
    };
}

function deepFreeze<T>(value: T): T {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) deepFreeze(child);
    }
    return value;
}

export function computeStats(records: readonly AnalysisRecord[]): AnalysisStats {
    if (records.length === 0) {
        return { total_analyses: 0, avg_issues_per_analysis: 0, most_common_issue_types: [] };
    }

    const totalIssues = records.reduce((sum, r) => sum + r.statistics.total_issues, 0);
    const typeCounts = new Map<string, number>();
    for (const record of records) {
        for (const rec of record.recommendations) {
            typeCounts.set(rec.type, (typeCounts.get(rec.type) ?? 0) + 1);
        }
    }

    return {
        total_analyses: records.length,
        avg_issues_per_analysis: Math.round((totalIssues / records.length) * 100) / 100,
        most_common_issue_types: [...typeCounts.entries()]
            .sort((a, b) => b[1] - a[1])
            .slice(0, 5)
            .map(([type, count]) => ({ type, count })),
    };
}

/** Append-only history kept in process memory. */
export class InMemoryAnalysisStore implements AnalysisStore {
    private readonly records: AnalysisRecord[] = [];
    private nextId = 1;

    async save(result: AnalysisResult, imageName: string): Promise<number> {
        // Later edits to `result` must not reach the stored record.
        const snapshot = structuredClone(result);
        const record: AnalysisRecord = {
            id: this.nextId++,
            timestamp: snapshot.timestamp,
            image_name: imageName,
            image_dimensions: snapshot.image_dimensions,
            color_analysis: snapshot.color_analysis,
            element_detection: snapshot.element_detection,
            text_analysis: snapshot.text_analysis,
            layout_analysis: snapshot.layout_analysis,
            accessibility_analysis: snapshot.accessibility_analysis,
            recommendations: snapshot.recommendations,
            statistics: deriveStatistics(snapshot),
        };
        this.records.push(deepFreeze(record));
        return record.id;
    }

    async getRecent(limit: number): Promise<AnalysisRecord[]> {
        if (limit <= 0) return [];
        return this.records.slice(-limit).reverse();
    }

    async getById(id: number): Promise<AnalysisRecord | undefined> {
        return this.records.find(r => r.id === id);
    }

    async getStats(): Promise<AnalysisStats> {
        return computeStats(this.records);
    }
}
