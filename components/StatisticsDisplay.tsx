import React from 'react';
import type { SkippedRecord } from '../services/resultStore.js';
import type { StatisticsView, SubjectStatistics } from '../services/statisticsAggregator.js';

interface StatisticsDisplayProps {
    statistics: StatisticsView;
    skipped: SkippedRecord[];
}

const StatCard: React.FC<{ label: string; value: string }> = ({ label, value }) => (
    <div className="p-4 bg-white dark:bg-gray-800 rounded-lg shadow-sm text-center">
        <p className="text-sm text-gray-500 dark:text-gray-400">{label}</p>
        <p className="text-2xl font-bold text-gray-900 dark:text-white">{value}</p>
    </div>
);

const Distribution: React.FC<{ statistics: StatisticsView }> = ({ statistics }) => (
    <ul className="space-y-2">
        {statistics.distribution.map((band) => (
            <li key={band.label} className="flex items-center gap-3">
                <span className="w-16 text-sm text-gray-600 dark:text-gray-400">{`${band.label}%`}</span>
                <div className="flex-1 h-4 bg-gray-200 dark:bg-gray-700 rounded">
                    <div className="h-4 bg-indigo-500 rounded" style={{ width: `${band.percentage}%` }} />
                </div>
                <span className="w-20 text-right text-sm">{`${band.count} (${band.percentage}%)`}</span>
            </li>
        ))}
    </ul>
);

const SubjectTable: React.FC<{ subject: SubjectStatistics }> = ({ subject }) => (
    <div className="p-4 bg-white dark:bg-gray-800 rounded-lg space-y-3">
        <h3 className="text-xl font-semibold">{subject.subject}</h3>
        <p className="text-sm text-gray-600 dark:text-gray-400">
            {`${subject.sessionCount} script(s), mean ${subject.averageScore}, median ${subject.medianScore}, average ${subject.averagePercentage}%`}
        </p>
        {subject.highest && subject.lowest && (
            <p className="text-sm">{`Highest: ${subject.highest.student} (${subject.highest.averageScore}), lowest: ${subject.lowest.student} (${subject.lowest.averageScore})`}</p>
        )}
        <table className="w-full text-sm">
            <thead>
                <tr className="text-left border-b border-gray-200 dark:border-gray-700">
                    <th className="py-1">Question</th>
                    <th className="py-1">Mean score</th>
                    <th className="py-1">Answered</th>
                </tr>
            </thead>
            <tbody>
                {subject.questions.map((question) => (
                    <tr key={question.id}>
                        <td className="py-1">{question.id}</td>
                        <td className="py-1">{`${question.averageScore} / 10`}</td>
                        <td className="py-1">{question.attempts}</td>
                    </tr>
                ))}
            </tbody>
        </table>
    </div>
);

export const StatisticsDisplay: React.FC<StatisticsDisplayProps> = ({ statistics, skipped }) => {
    if (statistics.sessionCount === 0) {
        return <p className="p-10 text-center text-gray-500">No graded scripts have been saved yet.</p>;
    }

    return (
        <div className="p-6 md:p-10 space-y-8">
            <div className="grid grid-cols-2 md:grid-cols-4 gap-4">
                <StatCard label="Scripts" value={String(statistics.sessionCount)} />
                <StatCard label="Students" value={String(statistics.studentCount)} />
                <StatCard label="Mean score" value={`${statistics.averageScore} / 10`} />
                <StatCard label="Median score" value={`${statistics.medianScore} / 10`} />
                <StatCard label="Lowest" value={String(statistics.minScore)} />
                <StatCard label="Highest" value={String(statistics.maxScore)} />
                <StatCard label="Std. deviation" value={String(statistics.stdDev)} />
                <StatCard label="Mean percentage" value={`${statistics.averagePercentage}%`} />
            </div>
            <div>
                <h2 className="text-xl font-semibold mb-3 border-b-2 border-gray-200 dark:border-gray-700 pb-2">Score Distribution</h2>
                <Distribution statistics={statistics} />
            </div>
            <div className="space-y-4">
                {statistics.subjects.map((subject) => (
                    <SubjectTable key={subject.subject} subject={subject} />
                ))}
            </div>
            {skipped.length > 0 && (
                <details className="bg-yellow-50 rounded-lg p-3">
                    <summary className="cursor-pointer text-yellow-800">{`${skipped.length} stored record(s) could not be read`}</summary>
                    <ul className="mt-2 text-sm font-mono">
                        {skipped.map((record) => (
                            <li key={record.location}>{`${record.location}: ${record.reason}`}</li>
                        ))}
                    </ul>
                </details>
            )}
        </div>
    );
};
