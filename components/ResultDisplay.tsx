import React from 'react';
import type { ScriptOutcome } from '../services/gradingPipeline.js';
import type { GradingSession, QuestionResult } from '../types.js';

interface ResultDisplayProps {
    outcome: ScriptOutcome;
}

const getScoreColor = (score: number, maxScore: number = 100) => {
    const percentage = maxScore > 0 ? (score / maxScore) * 100 : 0;
    if (percentage >= 90) return 'text-green-500';
    if (percentage >= 70) return 'text-yellow-500';
    if (percentage >= 50) return 'text-orange-500';
    return 'text-red-500';
};

const getScoreBgColor = (score: number, maxScore: number = 100) => {
    const percentage = maxScore > 0 ? (score / maxScore) * 100 : 0;
    if (percentage >= 90) return 'bg-green-500';
    if (percentage >= 70) return 'bg-yellow-500';
    if (percentage >= 50) return 'bg-orange-500';
    return 'bg-red-500';
};

export const ScoreCircle: React.FC<{ percentage: number }> = ({ percentage }) => {
    const circumference = 2 * Math.PI * 45;
    const offset = circumference - (percentage / 100) * circumference;
    const color = getScoreColor(percentage);

    return (
        <div className="relative w-32 h-32">
            <svg className="w-full h-full" viewBox="0 0 100 100">
                <circle
                    className="text-gray-200 dark:text-gray-700"
                    strokeWidth="10"
                    stroke="currentColor"
                    fill="transparent"
                    r="45"
                    cx="50"
                    cy="50"
                />
                <circle
                    className={color}
                    strokeWidth="10"
                    strokeDasharray={circumference}
                    strokeDashoffset={offset}
                    strokeLinecap="round"
                    stroke="currentColor"
                    fill="transparent"
                    r="45"
                    cx="50"
                    cy="50"
                    transform="rotate(-90 50 50)"
                />
            </svg>
            <div className={`absolute inset-0 flex items-center justify-center text-2xl font-bold ${color}`}>
                {`${Math.round(percentage)}%`}
            </div>
        </div>
    );
};

const QuestionItem: React.FC<{ question: QuestionResult }> = ({ question }) => (
    <li className="p-3 bg-white dark:bg-gray-800 rounded-lg space-y-2">
        <div className="flex items-center justify-between">
            <p className="font-semibold text-gray-700 dark:text-gray-300 flex-1 pr-4">{`Question ${question.id}`}</p>
            <div className={`flex items-center justify-center font-bold text-white text-sm rounded-full px-3 py-1 ${getScoreBgColor(question.score, 10)}`}>
                {`${question.score} / 10`}
            </div>
        </div>
        <p className={question.status === 'graded' ? 'text-gray-600 dark:text-gray-400' : 'text-red-600 dark:text-red-400'}>
            {question.feedback}
        </p>
        <details>
            <summary className="cursor-pointer text-sm text-gray-500">Answers</summary>
            <div className="grid grid-cols-1 md:grid-cols-2 gap-4 mt-2 font-mono text-sm whitespace-pre-wrap">
                <div>
                    <h4 className="font-semibold">Reference</h4>
                    <p>{question.referenceAnswer}</p>
                </div>
                <div>
                    <h4 className="font-semibold">Student</h4>
                    <p>{question.studentAnswer || <span className="text-gray-500">No answer written.</span>}</p>
                </div>
            </div>
        </details>
    </li>
);

const SessionDisplay: React.FC<{ session: GradingSession }> = ({ session }) => (
    <div className="grid grid-cols-1 lg:grid-cols-3 gap-8">
        <div className="flex flex-col items-center space-y-2">
            <ScoreCircle percentage={session.percentage} />
            <p className="text-lg font-semibold">{`${session.totalScore} / ${session.maxScore}`}</p>
            <p className="text-sm text-gray-500">{`Average ${session.averageScore} per question`}</p>
        </div>
        <div className="lg:col-span-2 space-y-6">
            <div>
                <h3 className="text-xl font-semibold mb-3 border-b-2 border-gray-200 dark:border-gray-700 pb-2">Overall Feedback</h3>
                <div className="p-4 bg-white dark:bg-gray-800 rounded-lg whitespace-pre-wrap">{session.overallFeedback}</div>
            </div>
            <div>
                <h3 className="text-xl font-semibold mb-3 border-b-2 border-gray-200 dark:border-gray-700 pb-2">Question Breakdown</h3>
                {session.questions.length === 0 ? (
                    <p className="text-gray-500">No question in this script matched the answer key.</p>
                ) : (
                    <ul className="space-y-2">
                        {session.questions.map((question) => (
                            <QuestionItem key={question.id} question={question} />
                        ))}
                    </ul>
                )}
            </div>
        </div>
    </div>
);

export const ResultDisplay: React.FC<ResultDisplayProps> = ({ outcome }) => {
    return (
        <section className="p-6 md:p-10 space-y-6 bg-gray-50 dark:bg-gray-900 rounded-xl">
            <div className="text-center">
                <h2 className="text-2xl md:text-3xl font-bold text-indigo-600 dark:text-indigo-400 mb-1">{outcome.student}</h2>
                <p className="text-sm text-gray-500">{outcome.fileName}</p>
            </div>
            {outcome.status === 'skipped' ? (
                <p className="p-4 rounded-lg bg-red-100 text-red-700">{`Not graded: ${outcome.error.message}`}</p>
            ) : (
                <>
                    {!outcome.saved && (
                        <p className="p-4 rounded-lg bg-yellow-100 text-yellow-800">{`Not saved: ${outcome.persistenceError.message}`}</p>
                    )}
                    {outcome.failedPages.length > 0 && (
                        <p className="p-4 rounded-lg bg-yellow-100 text-yellow-800">
                            {`Pages ${outcome.failedPages.join(', ')} could not be read and were treated as blank.`}
                        </p>
                    )}
                    <SessionDisplay session={outcome.session} />
                </>
            )}
        </section>
    );
};
