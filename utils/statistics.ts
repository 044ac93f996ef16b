/**
 * Basic descriptive statistics over score lists. Every function returns 0 for an
 * empty list.
 */

export function calculateAverage(scores: number[]): number {
    if (scores.length === 0) return 0;
    return scores.reduce((acc, score) => acc + score, 0) / scores.length;
}

/**
 * Middle value; the mean of the two middle values for an even count.
 *
 * @example
 * calculateMedian([1, 2, 3, 4]) // 2.5
 */
export function calculateMedian(scores: number[]): number {
    if (scores.length === 0) return 0;

    const sorted = [...scores].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/** Population standard deviation. */
export function calculateStdDev(scores: number[]): number {
    if (scores.length === 0) return 0;

    const mean = calculateAverage(scores);
    const variance = scores.reduce((acc, score) => acc + (score - mean) ** 2, 0) / scores.length;
    return Math.sqrt(variance);
}

export const calculateMin = (scores: number[]) => (scores.length === 0 ? 0 : Math.min(...scores));

export const calculateMax = (scores: number[]) => (scores.length === 0 ? 0 : Math.max(...scores));

export const roundTo = (value: number, digits = 2) => {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
};

export interface ScoreRange {
    label: string;
    min: number;
    max: number;
}

/** Percentage bands. A value belongs to the last band whose `min` it reaches. */
export const DEFAULT_RANGES: ScoreRange[] = [
    { label: '0-59', min: 0, max: 59 },
    { label: '60-69', min: 60, max: 69 },
    { label: '70-79', min: 70, max: 79 },
    { label: '80-89', min: 80, max: 89 },
    { label: '90-100', min: 90, max: 100 },
];

export interface ScoreDistributionEntry extends ScoreRange {
    count: number;
    percentage: number;
}

export function calculateDistribution(values: number[], ranges: ScoreRange[] = DEFAULT_RANGES): ScoreDistributionEntry[] {
    const counts = ranges.map(() => 0);

    for (const value of values) {
        let bucket = -1;
        ranges.forEach((range, index) => {
            if (value >= range.min) bucket = index;
        });
        if (bucket >= 0) counts[bucket]++;
    }

    return ranges.map((range, index) => ({
        ...range,
        count: counts[index],
        percentage: values.length === 0 ? 0 : roundTo((counts[index] / values.length) * 100),
    }));
}
