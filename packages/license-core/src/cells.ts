import { z } from 'zod/v4';

/**
 * Loosely typed value of a spreadsheet cell, as handed over by a reader.
 */
export type CellValue = string | number | boolean | Date | null | undefined;

/**
 * A spreadsheet row. `cells[0]` is column 1; `rowNumber` is 1-based and
 * refers to the source sheet so diagnostics can point back at it.
 */
export interface SheetRow {
	readonly rowNumber: number;
	readonly cells: readonly CellValue[];
}

/**
 * Value of a 1-based column, or undefined when the row is shorter.
 */
export function cellAt(row: SheetRow, column: number): CellValue {
	return row.cells[column - 1];
}

export function isBlankCell(value: CellValue): boolean {
	return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

export function isBlankRow(row: SheetRow): boolean {
	return row.cells.every(isBlankCell);
}

/**
 * Text cells and numeric identifiers, trimmed; anything else is not a name.
 */
export const nameCellSchema = z
	.union([z.string(), z.number().transform(String)])
	.transform((v) => v.trim())
	.pipe(z.string().min(1));

/**
 * License flag cells: 1/0, TRUE/FALSE, or blank for "not required".
 */
export const flagCellSchema = z.union([
	z.boolean(),
	z.literal(1).transform(() => true),
	z.literal(0).transform(() => false),
	z
		.string()
		.trim()
		.pipe(z.enum(['', '0', '1']))
		.transform((v) => v === '1'),
	z.null().transform(() => false),
	z.undefined().transform(() => false),
]);

/**
 * Read a cell as a trimmed, non-empty name.
 */
export function readName(value: CellValue): string | undefined {
	const parsed = nameCellSchema.safeParse(value);
	return parsed.success ? parsed.data : undefined;
}

export function describeCell(value: CellValue): string {
	if (value instanceof Date) return value.toISOString();
	if (value === undefined) return 'undefined';
	return JSON.stringify(value);
}
