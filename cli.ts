#!/usr/bin/env node
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';
import * as dotenv from 'dotenv';
import { loadConfig, requireApiKey, type GraderConfig } from './config.js';
import { GraderError, describeError, fail, ok, type Result } from './errors.js';
import { GeminiModelClient } from './services/geminiService.js';
import { gradeScripts, type ScriptSubmission } from './services/gradingPipeline.js';
import { renderGradingReport, renderStatisticsReport } from './services/reportRenderer.js';
import { JsonFileResultStore, exportSubject, findSession } from './services/resultStore.js';
import { computeStatistics } from './services/statisticsAggregator.js';
import type { UploadedFile } from './types.js';

const USAGE = `Usage: answer-grader <command> [options]

Commands:
  grade --key <file> --subject <name> [--student <id>] [--report <html>] <script...>
  stats [--subject <name>] [--report <html>]
  show --student <id> --subject <name>
  export --subject <name> [--out <file>]
  models`;

const OPTIONS = {
    key: { type: 'string' },
    subject: { type: 'string' },
    student: { type: 'string' },
    report: { type: 'string' },
    out: { type: 'string' },
    help: { type: 'boolean', short: 'h' },
} as const;

type Options = ReturnType<typeof parseCommandLine>['values'];

const parseCommandLine = (args: string[]) =>
    parseArgs({ args, options: OPTIONS, allowPositionals: true, strict: true });

const invalid = (message: string) => fail(new GraderError('InvalidInput', message));

async function readUpload(file: string): Promise<Result<UploadedFile>> {
    try {
        const data = await readFile(file);
        return ok({ name: path.basename(file), data: new Uint8Array(data) });
    } catch (error) {
        return invalid(`Could not read ${file}: ${describeError(error)}`);
    }
}

async function writeOutput(file: string, content: string): Promise<Result<void>> {
    try {
        await writeFile(file, content, 'utf8');
        console.log(`Wrote ${file}`);
        return ok(undefined);
    } catch (error) {
        return fail(new GraderError('PersistenceFailure', `Could not write ${file}: ${describeError(error)}`, { cause: error }));
    }
}

const createModel = (config: GraderConfig): Result<GeminiModelClient> => {
    const apiKey = requireApiKey(config);
    if (!apiKey.ok) return apiKey;
    return ok(new GeminiModelClient({ apiKey: apiKey.value, gradingModel: config.gradingModel, ocrModel: config.ocrModel }));
};

async function grade(config: GraderConfig, options: Options, scripts: string[]): Promise<Result<void>> {
    if (!options.key) return invalid('grade needs --key <answer key file>.');
    if (!options.subject) return invalid('grade needs --subject <name>.');
    if (scripts.length === 0) return invalid('grade needs at least one student script.');
    if (options.student && scripts.length > 1) return invalid('--student can only be used with a single script.');

    const model = createModel(config);
    if (!model.ok) return model;

    const answerKey = await readUpload(options.key);
    if (!answerKey.ok) return answerKey;

    const uploads: ScriptSubmission[] = [];
    for (const script of scripts) {
        const upload = await readUpload(script);
        if (!upload.ok) return upload;
        uploads.push({ file: upload.value, student: options.student });
    }

    const batch = await gradeScripts(
        { subject: options.subject, answerKey: answerKey.value, scripts: uploads },
        {
            model: model.value,
            store: new JsonFileResultStore(config.resultsDir),
            concurrency: config.concurrency,
            maxScriptsPerBatch: config.maxScriptsPerBatch,
            loader: { renderDpi: config.pdfRenderDpi },
        },
    );
    if (!batch.ok) return batch;

    for (const outcome of batch.value.scripts) {
        if (outcome.status === 'skipped') {
            console.log(`${outcome.student}: not graded (${outcome.error.message})`);
        } else {
            const { session } = outcome;
            const note = outcome.saved ? '' : ' [not saved]';
            console.log(`${outcome.student}: ${session.totalScore}/${session.maxScore} (${session.percentage}%), average ${session.averageScore}${note}`);
        }
    }

    return options.report ? writeOutput(options.report, renderGradingReport(batch.value)) : ok(undefined);
}

async function stats(config: GraderConfig, options: Options): Promise<Result<void>> {
    const subjectFilter = options.subject?.trim() || undefined;
    const store = new JsonFileResultStore(config.resultsDir);
    const { sessions, skipped } = await store.list({ subject: subjectFilter });
    const view = computeStatistics(sessions);

    console.log(`${view.sessionCount} session(s), ${view.studentCount} student(s), ${view.subjectCount} subject(s)`);
    console.log(`mean ${view.averageScore}, median ${view.medianScore}, min ${view.minScore}, max ${view.maxScore}, std dev ${view.stdDev}`);
    for (const subject of view.subjects) {
        console.log(`  ${subject.subject}: ${subject.sessionCount} script(s), mean ${subject.averageScore}, ${subject.averagePercentage}%`);
    }
    if (skipped.length > 0) console.warn(`${skipped.length} stored record(s) could not be read.`);

    return options.report
        ? writeOutput(options.report, renderStatisticsReport(view, skipped, subjectFilter))
        : ok(undefined);
}

async function show(config: GraderConfig, options: Options): Promise<Result<void>> {
    if (!options.student || !options.subject) return invalid('show needs --student <id> and --subject <name>.');

    const session = await findSession(new JsonFileResultStore(config.resultsDir), options.student, options.subject);
    if (!session.ok) return session;

    console.log(JSON.stringify(session.value, null, 2));
    return ok(undefined);
}

async function exportResults(config: GraderConfig, options: Options): Promise<Result<void>> {
    if (!options.subject) return invalid('export needs --subject <name>.');

    const exported = await exportSubject(new JsonFileResultStore(config.resultsDir), options.subject);
    const json = `${JSON.stringify(exported, null, 2)}\n`;
    if (options.out) return writeOutput(options.out, json);

    process.stdout.write(json);
    return ok(undefined);
}

async function models(config: GraderConfig): Promise<Result<void>> {
    const model = createModel(config);
    if (!model.ok) return model;

    try {
        for (const info of await model.value.listModels()) {
            console.log(info.displayName ? `${info.name}  ${info.displayName}` : info.name);
        }
        return ok(undefined);
    } catch (error) {
        return fail(new GraderError('ConfigurationError', describeError(error), { cause: error }));
    }
}

async function main(argv: string[]): Promise<number> {
    let parsed: ReturnType<typeof parseCommandLine>;
    try {
        parsed = parseCommandLine(argv);
    } catch (error) {
        console.error(describeError(error));
        console.error(USAGE);
        return 1;
    }

    const [command, ...rest] = parsed.positionals;
    if (!command || parsed.values.help) {
        console.log(USAGE);
        return command || parsed.values.help ? 0 : 1;
    }

    dotenv.config();
    const config = loadConfig(process.env);
    if (!config.ok) {
        console.error(config.error.message);
        return 1;
    }

    let result: Result<void>;
    switch (command) {
        case 'grade':
            result = await grade(config.value, parsed.values, rest);
            break;
        case 'stats':
            result = await stats(config.value, parsed.values);
            break;
        case 'show':
            result = await show(config.value, parsed.values);
            break;
        case 'export':
            result = await exportResults(config.value, parsed.values);
            break;
        case 'models':
            result = await models(config.value);
            break;
        default:
            console.error(`Unknown command "${command}".`);
            console.error(USAGE);
            return 1;
    }

    if (!result.ok) {
        console.error(`Error (${result.error.kind}): ${result.error.message}`);
        return 1;
    }
    return 0;
}

main(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error(describeError(error));
        process.exitCode = 1;
    });
