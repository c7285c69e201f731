import { access, constants } from 'node:fs/promises';
import { extname } from 'node:path';
import ExcelJS from 'exceljs';
import type { Worksheet } from 'exceljs';
import { errAsync, okAsync, ResultAsync } from 'neverthrow';
import { isBlankRow, type CellValue, type SheetRow } from '@license-summary/license-core';
import { causeMessage, AppErrors, type InputFileError } from '../errors.js';
import { toCellValue } from './cell-values.js';

export const SPREADSHEET_EXTENSIONS = ['.xlsx', '.xlsm', '.csv'] as const;

/**
 * Non-blank rows of a worksheet, keeping their sheet row numbers.
 */
export function sheetRowsFromWorksheet(worksheet: Worksheet): SheetRow[] {
	const rows: SheetRow[] = [];
	worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
		const cells: CellValue[] = [];
		for (let column = 1; column <= row.cellCount; column++) {
			cells.push(toCellValue(row.getCell(column).value));
		}
		const sheetRow = { rowNumber, cells };
		if (!isBlankRow(sheetRow)) {
			rows.push(sheetRow);
		}
	});
	return rows;
}

function isMissingFile(cause: unknown): boolean {
	return typeof cause === 'object' && cause !== null && 'code' in cause && cause.code === 'ENOENT';
}

async function loadWorksheet(path: string, extension: string): Promise<Worksheet | undefined> {
	const workbook = new ExcelJS.Workbook();
	if (extension === '.csv') {
		// Keep csv values as text: ids like 007 and 7 are different users
		return workbook.csv.readFile(path, { map: (value: unknown) => (value === '' ? null : value) });
	}
	await workbook.xlsx.readFile(path);
	return workbook.worksheets[0];
}

/**
 * Read the first worksheet of an xlsx workbook, or a csv file, as rows.
 */
export function readSheetRows(path: string): ResultAsync<SheetRow[], InputFileError> {
	const extension = extname(path).toLowerCase();
	if (!SPREADSHEET_EXTENSIONS.some((supported) => supported === extension)) {
		return errAsync(
			AppErrors.input(
				path,
				'unsupported_format',
				`expected one of ${SPREADSHEET_EXTENSIONS.join(', ')}, got "${extension || 'no extension'}"`,
			),
		);
	}

	return ResultAsync.fromPromise(access(path, constants.R_OK), (cause) =>
		AppErrors.input(path, isMissingFile(cause) ? 'not_found' : 'unreadable', causeMessage(cause)),
	)
		.andThen(() =>
			ResultAsync.fromPromise(loadWorksheet(path, extension), (cause) =>
				AppErrors.input(path, 'unreadable', causeMessage(cause)),
			),
		)
		.andThen((worksheet) => {
			if (worksheet === undefined) {
				return errAsync(AppErrors.input(path, 'no_worksheet', 'workbook has no worksheet'));
			}
			const rows = sheetRowsFromWorksheet(worksheet);
			if (rows.length === 0) {
				return errAsync(AppErrors.input(path, 'empty', 'worksheet has no data'));
			}
			return okAsync(rows);
		});
}
