import type { CellValue as ExcelCellValue } from 'exceljs';
import type { CellValue } from '@license-summary/license-core';

/**
 * Reduce an exceljs cell value to a plain value: rich text and hyperlinks
 * become their text, formulas their cached result, errors their code.
 */
export function toCellValue(value: ExcelCellValue): CellValue {
	if (value === null || value === undefined) return null;
	if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
	if (value instanceof Date) return value;
	if ('error' in value) return value.error;
	if ('richText' in value) return value.richText.map((run) => run.text).join('');
	if ('hyperlink' in value) return value.text;
	return toCellValue(value.result ?? null);
}
