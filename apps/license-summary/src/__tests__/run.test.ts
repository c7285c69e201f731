import { access, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import ExcelJS from 'exceljs';
import type { CellValue } from 'exceljs';
import { createLogger } from '@license-summary/logging';
import type { RunOptions } from '../cli.js';
import { summaryOutputPath } from '../output-path.js';
import { runLicenseSummaryCommand } from '../run.js';
import { SUMMARY_SHEET } from '../workbook/summary-writer.js';

const logger = createLogger({ level: 'silent', serviceName: 'test' });

async function writeSheet(path: string, rows: CellValue[][]): Promise<void> {
	const workbook = new ExcelJS.Workbook();
	workbook.addWorksheet('Sheet1').addRows(rows);
	await workbook.xlsx.writeFile(path);
}

async function exists(path: string): Promise<boolean> {
	return access(path).then(
		() => true,
		() => false,
	);
}

const ROLES = [
	['Role', 'Finance', 'SCM', 'Commerce', 'Project', 'HR'],
	['Sales', 1, null, null, null, null],
	['Support', null, null, 1, null, null],
];

/** User license report: one section per user, identifiers in D, roles in F */
const REPORT = [
	['User license report'],
	[null, null, null, 'Alias', 'Name'],
	[null, null, null, 'ann@example.com', 'Ann'],
	[null, null, null, null, null, 'Security Role'],
	[null, null, null, null, null, 'Sales'],
	[null, null, null, 'Alias', 'Name'],
	[null, null, null, 'bob@example.com', 'Bob'],
	[null, null, null, null, null, 'Security Role'],
	[null, null, null, null, null, 'Sales, Support'],
	[null, null, null, 'Alias', 'Name'],
	[null, null, null, 'cid@example.com', 'Cid'],
	[null, null, null, null, null, 'Security Role'],
	[null, null, null, null, null, 'Support'],
	[null, null, null, 'Alias', 'Name'],
	[null, null, null, 'dee@example.com', 'Dee'],
	[null, null, null, null, null, 'Security Role'],
	[null, null, null, null, null, 'Sales'],
];

describe('runLicenseSummaryCommand', () => {
	let dir: string;
	let options: RunOptions;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'license-summary-run-'));
		options = {
			reportPath: join(dir, 'License Report.xlsx'),
			rolesPath: join(dir, 'Roles.xlsx'),
			verbose: false,
			layout: { layout: 'sectioned', userColumn: 4, roleColumn: 6, headerRows: 1 },
			delimiters: [';', ',', '\n'],
			rolesHeaderRows: 1,
		};
		await writeSheet(options.rolesPath, ROLES);
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it('should write the summary beside the report', async () => {
		await writeSheet(options.reportPath, REPORT);

		const summary = (await runLicenseSummaryCommand(options, logger))._unsafeUnwrap();

		const outputPath = join(dir, 'License Report_summary.xlsx');
		expect(summary).toEqual({ outputPath, combinations: 3, users: 4, skippedRows: 0 });

		const workbook = new ExcelJS.Workbook();
		await workbook.xlsx.readFile(outputPath);
		const sheet = workbook.getWorksheet(SUMMARY_SHEET);
		const first = sheet?.getRow(2);
		expect(first?.getCell(1).value).toBe(2);
		expect(first?.getCell(2).value).toBe('Sales');
		expect(first?.getCell(3).value).toBe(1);
		expect(first?.getCell(4).value).toBeNull();
		expect(first?.getCell(8).value).toBe('Finance');
		expect(sheet?.getRow(5).getCell(1).value).toBe(4);
		expect(sheet?.getRow(5).getCell(3).value).toBe(2);
	});

	it('should honour an explicit output path', async () => {
		await writeSheet(options.reportPath, REPORT);
		const outputPath = join(dir, 'custom.xlsx');

		const summary = (await runLicenseSummaryCommand({ ...options, outputPath }, logger))._unsafeUnwrap();

		expect(summary.outputPath).toBe(outputPath);
		expect(await exists(outputPath)).toBe(true);
	});

	it('should abort on an unknown role without writing a file', async () => {
		await writeSheet(options.reportPath, [...REPORT, [null, null, null, null, null, 'Auditor']]);

		const error = (await runLicenseSummaryCommand(options, logger))._unsafeUnwrapErr();

		expect(error).toEqual({ type: 'unknown_role', roleName: 'Auditor', combination: 'Auditor + Sales' });
		expect(await exists(summaryOutputPath(options.reportPath))).toBe(false);
	});

	it('should fail on a missing input before processing', async () => {
		const error = (await runLicenseSummaryCommand(options, logger))._unsafeUnwrapErr();

		expect(error).toMatchObject({ type: 'input_file', path: options.reportPath, reason: 'not_found' });
		expect(await exists(summaryOutputPath(options.reportPath))).toBe(false);
	});

	it('should fail on a malformed roles file', async () => {
		await writeSheet(options.reportPath, REPORT);
		await writeSheet(options.rolesPath, [...ROLES, ['Buyer', 'yes']]);

		const error = (await runLicenseSummaryCommand(options, logger))._unsafeUnwrapErr();

		expect(error).toEqual({
			type: 'malformed_role_row',
			rowNumber: 4,
			column: 2,
			reason: 'Finance flag of role "Buyer" must be 0 or 1, got "yes"',
		});
	});

	it('should reject a tabular report read with the sectioned layout', async () => {
		await writeSheet(options.reportPath, [
			['User', 'Roles'],
			['ann', 'Sales'],
			['bob', 'Sales'],
		]);

		const error = (await runLicenseSummaryCommand(options, logger))._unsafeUnwrapErr();

		expect(error).toEqual({
			type: 'input_file',
			path: options.reportPath,
			reason: 'wrong_shape',
			message: 'no "Alias" user section in column 4; is it a tabular report?',
		});
		expect(await exists(summaryOutputPath(options.reportPath))).toBe(false);
	});

	it('should reject a tabular report without data rows', async () => {
		await writeSheet(options.reportPath, [['User', 'Roles']]);

		const error = (
			await runLicenseSummaryCommand(
				{ ...options, layout: { layout: 'tabular', userColumn: 1, roleColumn: 2, headerRows: 1 } },
				logger,
			)
		)._unsafeUnwrapErr();

		expect(error).toMatchObject({ type: 'input_file', reason: 'wrong_shape', path: options.reportPath });
		expect(await exists(summaryOutputPath(options.reportPath))).toBe(false);
	});

	it('should reject a roles file with only a header row', async () => {
		await writeSheet(options.reportPath, REPORT);
		await writeSheet(options.rolesPath, [ROLES[0] ?? []]);

		const error = (await runLicenseSummaryCommand(options, logger))._unsafeUnwrapErr();

		expect(error).toEqual({
			type: 'input_file',
			path: options.rolesPath,
			reason: 'wrong_shape',
			message: 'no role rows after 1 header row(s)',
		});
		expect(await exists(summaryOutputPath(options.reportPath))).toBe(false);
	});

	it('should count skipped rows in a tabular report', async () => {
		await writeSheet(options.reportPath, [
			['User', 'Roles'],
			['ann', 'Sales'],
			[null, 'Support'],
			['bob', 'Sales;Support'],
		]);

		const summary = (
			await runLicenseSummaryCommand(
				{ ...options, layout: { layout: 'tabular', userColumn: 1, roleColumn: 2, headerRows: 1 } },
				logger,
			)
		)._unsafeUnwrap();

		expect(summary).toMatchObject({ combinations: 2, users: 2, skippedRows: 1 });
	});
});

describe('summaryOutputPath', () => {
	it('should add _summary to the report stem', () => {
		expect(summaryOutputPath(join('reports', 'License Report.xlsx'))).toBe(join('reports', 'License Report_summary.xlsx'));
		expect(summaryOutputPath('report.csv')).toBe('report_summary.xlsx');
	});
});
