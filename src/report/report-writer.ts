import * as path from 'node:path';
import { mkdir, writeFile } from 'node:fs/promises';
import { errorMessage } from '../command/handlers/shared.js';
import { scopedLogger } from '../lib/logger.js';
import { summarizeRun, type TestSummary } from '../lib/summary.js';
import type { TestRun } from '../lib/test-runner.js';
import { ReportException } from './exception/report-exception.js';
import { buildCsvReport } from './csv-report.js';
import { buildJsonReport } from './json-report.js';
import { buildTextReport } from './text-report.js';

export type ReportFormat = 'json' | 'csv' | 'text';

export const REPORT_FORMATS: ReportFormat[] = [ 'json', 'csv', 'text' ];

const logger = scopedLogger('report-writer');

const renderers: Record<ReportFormat, { extension: string; render: (run: TestRun, summary: TestSummary) => string }> = {
	json: { extension: 'json', render: buildJsonReport },
	csv: { extension: 'csv', render: run => buildCsvReport(run) },
	text: { extension: 'txt', render: buildTextReport },
};

export const reportFileName = (format: ReportFormat, date: Date): string => {
	const stamp = date.toISOString().replace(/\.\d+Z$/, 'Z').replace(/[:]/g, '-');
	return `netdiag-report-${stamp}.${renderers[format].extension}`;
};

export const renderReport = (format: ReportFormat, run: TestRun, summary: TestSummary = summarizeRun(run)): string => renderers[format].render(run, summary);

export async function writeReports (run: TestRun, formats: ReportFormat[], directory: string): Promise<string[]> {
	const summary = summarizeRun(run);
	const written: string[] = [];

	try {
		await mkdir(directory, { recursive: true });
	} catch (error: unknown) {
		throw new ReportException(directory, errorMessage(error));
	}

	for (const format of formats) {
		const filePath = path.join(directory, reportFileName(format, run.completedAt));

		try {
			await writeFile(filePath, renderReport(format, run, summary), 'utf8');
		} catch (error: unknown) {
			throw new ReportException(filePath, errorMessage(error));
		}

		logger.debug(`Wrote the ${format} report.`, { filePath });
		written.push(filePath);
	}

	return written;
}
