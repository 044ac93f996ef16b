import type { GradingSession } from '../types.js';
import {
    calculateAverage,
    calculateDistribution,
    calculateMax,
    calculateMedian,
    calculateMin,
    calculateStdDev,
    roundTo,
    type ScoreDistributionEntry,
} from '../utils/statistics.js';

export interface StudentScore {
    student: string;
    averageScore: number;
}

export interface QuestionStatistics {
    id: string;
    averageScore: number;
    attempts: number;
}

export interface SubjectStatistics {
    subject: string;
    sessionCount: number;
    averageScore: number;
    medianScore: number;
    averagePercentage: number;
    highest?: StudentScore;
    lowest?: StudentScore;
    questions: QuestionStatistics[];
}

export interface StatisticsView {
    sessionCount: number;
    studentCount: number;
    subjectCount: number;
    averageScore: number;
    medianScore: number;
    minScore: number;
    maxScore: number;
    stdDev: number;
    averagePercentage: number;
    distribution: ScoreDistributionEntry[];
    subjects: SubjectStatistics[];
}

function questionStatistics(sessions: GradingSession[]): QuestionStatistics[] {
    const scores = new Map<string, number[]>();
    for (const session of sessions) {
        for (const question of session.questions) {
            const list = scores.get(question.id) ?? [];
            list.push(question.score);
            scores.set(question.id, list);
        }
    }
    return [...scores].map(([id, list]) => ({
        id,
        averageScore: roundTo(calculateAverage(list)),
        attempts: list.length,
    }));
}

function subjectStatistics(subject: string, sessions: GradingSession[]): SubjectStatistics {
    const averages = sessions.map((session) => session.averageScore);
    const ranked = [...sessions].sort((a, b) => b.averageScore - a.averageScore || a.student.localeCompare(b.student));
    const top = ranked[0];
    const bottom = ranked[ranked.length - 1];

    return {
        subject,
        sessionCount: sessions.length,
        averageScore: roundTo(calculateAverage(averages)),
        medianScore: roundTo(calculateMedian(averages)),
        averagePercentage: roundTo(calculateAverage(sessions.map((session) => session.percentage))),
        highest: top && { student: top.student, averageScore: top.averageScore },
        lowest: bottom && { student: bottom.student, averageScore: bottom.averageScore },
        questions: questionStatistics(sessions),
    };
}

/**
 * Summarises every stored session. Scores are per-session aggregate scores
 * (mean question score, 0-10); the distribution is over session percentages.
 */
export function computeStatistics(sessions: GradingSession[]): StatisticsView {
    const averages = sessions.map((session) => session.averageScore);
    const percentages = sessions.map((session) => session.percentage);

    const bySubject = new Map<string, GradingSession[]>();
    for (const session of sessions) {
        bySubject.set(session.subject, [...(bySubject.get(session.subject) ?? []), session]);
    }

    return {
        sessionCount: sessions.length,
        studentCount: new Set(sessions.map((session) => session.student)).size,
        subjectCount: bySubject.size,
        averageScore: roundTo(calculateAverage(averages)),
        medianScore: roundTo(calculateMedian(averages)),
        minScore: calculateMin(averages),
        maxScore: calculateMax(averages),
        stdDev: roundTo(calculateStdDev(averages)),
        averagePercentage: roundTo(calculateAverage(percentages)),
        distribution: calculateDistribution(percentages),
        subjects: [...bySubject.keys()]
            .sort((a, b) => a.localeCompare(b))
            .map((subject) => subjectStatistics(subject, bySubject.get(subject) ?? [])),
    };
}
