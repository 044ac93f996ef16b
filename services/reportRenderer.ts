import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import App, { type ReportView } from '../App.js';
import type { GradingBatch } from './gradingPipeline.js';
import type { SkippedRecord } from './resultStore.js';
import type { StatisticsView } from './statisticsAggregator.js';

const renderPage = (view: ReportView) => `<!DOCTYPE html>${renderToStaticMarkup(createElement(App, { view }))}`;

export const renderGradingReport = (batch: GradingBatch) => renderPage({ kind: 'grading', batch });

export const renderStatisticsReport = (statistics: StatisticsView, skipped: SkippedRecord[], subject?: string) =>
    renderPage({ kind: 'statistics', statistics, skipped, subject });
