import React from 'react';
import { Header } from './components/Header.js';
import { ResultDisplay } from './components/ResultDisplay.js';
import { StatisticsDisplay } from './components/StatisticsDisplay.js';
import type { GradingBatch } from './services/gradingPipeline.js';
import type { SkippedRecord } from './services/resultStore.js';
import type { StatisticsView } from './services/statisticsAggregator.js';

export type ReportView =
    | { kind: 'grading'; batch: GradingBatch }
    | { kind: 'statistics'; statistics: StatisticsView; skipped: SkippedRecord[]; subject?: string };

const titleFor = (view: ReportView) =>
    view.kind === 'grading'
        ? `Grading report: ${view.batch.subject}`
        : `Statistics: ${view.subject ?? 'all subjects'}`;

const GradingSummary: React.FC<{ batch: GradingBatch }> = ({ batch }) => {
    const graded = batch.scripts.filter((script) => script.status === 'graded').length;

    return (
        <div className="p-6 md:p-10 space-y-2 text-center">
            <p className="text-lg">{`Answer key ${batch.answerKeyName}: ${batch.questionIds.length} question(s)`}</p>
            {batch.wholeTextKey && (
                <p className="text-yellow-700">The answer key has no question numbering and was graded as one answer.</p>
            )}
            {batch.answerKeyFailedPages.length > 0 && (
                <p className="p-4 rounded-lg bg-yellow-100 text-yellow-800">
                    {`Answer key pages ${batch.answerKeyFailedPages.join(', ')} could not be read; their questions were not graded.`}
                </p>
            )}
            <p className="text-gray-500">{`${graded} of ${batch.scripts.length} script(s) graded`}</p>
        </div>
    );
};

export default function App({ view }: { view: ReportView }) {
    const title = titleFor(view);

    return (
        <html lang="en">
            <head>
                <meta charSet="utf-8" />
                <meta name="viewport" content="width=device-width, initial-scale=1" />
                <title>{title}</title>
                <script src="https://cdn.tailwindcss.com" />
            </head>
            <body className="bg-gray-100 dark:bg-gray-900 text-gray-800 dark:text-gray-200">
                <Header subtitle={title} />
                <main className="container mx-auto px-4 md:px-8 py-8 space-y-8">
                    {view.kind === 'grading' ? (
                        <>
                            <GradingSummary batch={view.batch} />
                            {view.batch.scripts.map((outcome) => (
                                <ResultDisplay key={outcome.student} outcome={outcome} />
                            ))}
                        </>
                    ) : (
                        <StatisticsDisplay statistics={view.statistics} skipped={view.skipped} />
                    )}
                </main>
            </body>
        </html>
    );
}
