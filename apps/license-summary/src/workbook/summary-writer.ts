import { rename, rm, writeFile } from 'node:fs/promises';
import ExcelJS from 'exceljs';
import type { Fill, Font, Row, Workbook, Worksheet } from 'exceljs';
import { ResultAsync } from 'neverthrow';
import { LICENSE_CATEGORIES, type Diagnostic, type SummaryReport } from '@license-summary/license-core';
import { causeMessage, AppErrors, type OutputFileError } from '../errors.js';

export const SUMMARY_SHEET = 'Summary';
export const PROFILES_SHEET = 'License Profiles';
export const DIAGNOSTICS_SHEET = 'Diagnostics';

// Fixed document dates so identical reports render identical workbooks
const DOCUMENT_DATE = new Date(Date.UTC(2000, 0, 1));

const HEADER_FONT: Partial<Font> = { bold: true, color: { argb: 'FFFFFFFF' } };
const HEADER_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF000080' } };
const TOTAL_FONT: Partial<Font> = { bold: true };
const TOTAL_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFD9D9D9' } };

function styleHeader(sheet: Worksheet): void {
	sheet.getRow(1).eachCell((cell) => {
		cell.font = HEADER_FONT;
		cell.fill = HEADER_FILL;
		cell.alignment = { horizontal: 'center' };
	});
	sheet.views = [{ state: 'frozen', ySplit: 1 }];
}

function styleTotal(row: Row, columns: number, topBorder: boolean): void {
	for (let column = 1; column <= columns; column++) {
		const cell = row.getCell(column);
		cell.font = TOTAL_FONT;
		cell.fill = TOTAL_FILL;
		cell.alignment = { horizontal: 'center' };
		if (topBorder) {
			cell.border = { top: { style: 'medium' } };
		}
	}
}

function addSummarySheet(workbook: Workbook, report: SummaryReport): void {
	const sheet = workbook.addWorksheet(SUMMARY_SHEET);
	sheet.columns = [
		{ header: 'Count', key: 'count', width: 10 },
		{ header: 'Role Combination', key: 'combination', width: 60 },
		...LICENSE_CATEGORIES.map((category) => ({ header: category, key: category, width: 10 })),
		{ header: 'License Profile', key: 'profile', width: 30 },
	];
	styleHeader(sheet);
	const columnCount = LICENSE_CATEGORIES.length + 3;

	for (const row of report.rows) {
		const added = sheet.addRow([
			row.memberCount,
			row.label,
			...LICENSE_CATEGORIES.map((category) => (row.licenses[category] ? 1 : null)),
			row.profile,
		]);
		added.getCell(1).alignment = { horizontal: 'center' };
		for (let column = 3; column < columnCount; column++) {
			added.getCell(column).alignment = { horizontal: 'center' };
		}
	}

	const { totals } = report;
	const total = sheet.addRow([
		totals.userCount,
		'Total',
		...LICENSE_CATEGORIES.map((category) => totals.combinationsRequiring[category]),
		`${totals.combinationCount} combinations`,
	]);
	styleTotal(total, columnCount, true);

	const users = sheet.addRow([
		null,
		'Users Requiring',
		...LICENSE_CATEGORIES.map((category) => totals.usersRequiring[category]),
		null,
	]);
	styleTotal(users, columnCount, false);
}

function addProfilesSheet(workbook: Workbook, report: SummaryReport): void {
	const sheet = workbook.addWorksheet(PROFILES_SHEET);
	sheet.columns = [
		{ header: 'License Profile', key: 'profile', width: 30 },
		{ header: 'Combinations', key: 'combinations', width: 14 },
		{ header: 'Users', key: 'users', width: 10 },
	];
	styleHeader(sheet);

	for (const profile of report.profiles) {
		sheet.addRow([profile.profile, profile.combinationCount, profile.userCount]);
	}

	const total = sheet.addRow(['Total', report.totals.combinationCount, report.totals.userCount]);
	styleTotal(total, 3, true);
}

function addDiagnosticsSheet(workbook: Workbook, diagnostics: readonly Diagnostic[]): void {
	const sheet = workbook.addWorksheet(DIAGNOSTICS_SHEET);
	sheet.columns = [
		{ header: 'Report Row', key: 'row', width: 12 },
		{ header: 'Skipped Because', key: 'reason', width: 20 },
		{ header: 'User', key: 'user', width: 40 },
	];
	styleHeader(sheet);

	for (const diagnostic of diagnostics) {
		sheet.addRow([diagnostic.rowNumber, diagnostic.reason.replace('_', ' '), diagnostic.user ?? null]);
	}
}

/**
 * Lay the report out as a workbook: the summary, the license profiles,
 * and the skipped rows when there are any.
 */
export function renderSummaryWorkbook(report: SummaryReport, diagnostics: readonly Diagnostic[] = []): Workbook {
	const workbook = new ExcelJS.Workbook();
	workbook.creator = 'license-summary';
	workbook.created = DOCUMENT_DATE;
	workbook.modified = DOCUMENT_DATE;

	addSummarySheet(workbook, report);
	addProfilesSheet(workbook, report);
	if (diagnostics.length > 0) {
		addDiagnosticsSheet(workbook, diagnostics);
	}

	return workbook;
}

async function writeReplacing(path: string, data: Uint8Array): Promise<void> {
	// Written beside the target and renamed, so a failed write leaves no file
	const tempPath = `${path}.${process.pid}.tmp`;
	try {
		await writeFile(tempPath, data);
		await rename(tempPath, path);
	} catch (error) {
		await rm(tempPath, { force: true });
		throw error;
	}
}

export function writeSummaryWorkbook(workbook: Workbook, path: string): ResultAsync<string, OutputFileError> {
	return ResultAsync.fromPromise(
		workbook.xlsx.writeBuffer().then((buffer) => writeReplacing(path, new Uint8Array(buffer))),
		(cause) => AppErrors.output(path, causeMessage(cause)),
	).map(() => path);
}
