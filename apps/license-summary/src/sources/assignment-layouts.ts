import {
	cellAt,
	isBlankCell,
	type CellValue,
	type RoleAssignmentRow,
	type SheetRow,
} from '@license-summary/license-core';

/**
 * How users and roles are laid out in the role assignment report.
 *
 * - `sectioned`: the ERP user license report. Each user section starts
 *   with an `Alias` marker in the user column, the identifier is on the
 *   next row, and role cells follow a `Security Role` marker in the role
 *   column.
 * - `tabular`: header rows, then one row per user and role cell.
 */
export type ReportLayout = 'sectioned' | 'tabular';

export const REPORT_LAYOUTS: readonly ReportLayout[] = ['sectioned', 'tabular'];

export interface AssignmentLayoutOptions {
	readonly layout: ReportLayout;
	/** 1-based column of the user identifier */
	readonly userColumn: number;
	/** 1-based column of the role cell */
	readonly roleColumn: number;
	/** Header rows before the data, tabular layout only */
	readonly headerRows: number;
}

export const LAYOUT_COLUMNS: Readonly<Record<ReportLayout, { userColumn: number; roleColumn: number }>> = {
	sectioned: { userColumn: 4, roleColumn: 6 },
	tabular: { userColumn: 1, roleColumn: 2 },
};

export const USER_SECTION_MARKER = 'Alias';
export const ROLE_LIST_MARKER = 'Security Role';

function isMarker(value: CellValue, marker: string): boolean {
	return typeof value === 'string' && value.trim() === marker;
}

function sectionedAssignments(rows: readonly SheetRow[], options: AssignmentLayoutOptions): RoleAssignmentRow[] {
	const assignments: RoleAssignmentRow[] = [];
	let section: { user: CellValue; rowNumber: number; hasRoles: boolean } | undefined;
	let expectingUser = false;
	let inRoleList = false;

	const closeSection = () => {
		// A user with no role cells still shows up, as a row without roles
		if (section !== undefined && !section.hasRoles) {
			assignments.push({ rowNumber: section.rowNumber, user: section.user, roles: null });
		}
		section = undefined;
	};

	for (const row of rows) {
		const userCell = cellAt(row, options.userColumn);
		const roleCell = cellAt(row, options.roleColumn);

		if (isMarker(userCell, USER_SECTION_MARKER)) {
			closeSection();
			expectingUser = true;
			inRoleList = false;
			continue;
		}

		if (expectingUser) {
			expectingUser = false;
			if (isMarker(roleCell, ROLE_LIST_MARKER)) {
				// The identifier row was blank and dropped by the reader
				section = { user: null, rowNumber: row.rowNumber, hasRoles: false };
				inRoleList = true;
			} else {
				section = { user: userCell, rowNumber: row.rowNumber, hasRoles: false };
			}
			continue;
		}

		if (section === undefined) continue;

		if (isMarker(roleCell, ROLE_LIST_MARKER)) {
			inRoleList = true;
			continue;
		}

		if (inRoleList && !isBlankCell(roleCell)) {
			assignments.push({ rowNumber: row.rowNumber, user: section.user, roles: roleCell });
			section.hasRoles = true;
		}
	}
	closeSection();

	return assignments;
}

function tabularAssignments(rows: readonly SheetRow[], options: AssignmentLayoutOptions): RoleAssignmentRow[] {
	return rows
		.filter((row) => row.rowNumber > options.headerRows)
		.map((row) => ({
			rowNumber: row.rowNumber,
			user: cellAt(row, options.userColumn),
			roles: cellAt(row, options.roleColumn),
		}));
}

/**
 * Turn the rows of the role assignment report into (user, role cell) rows.
 */
export function toAssignmentRows(rows: readonly SheetRow[], options: AssignmentLayoutOptions): RoleAssignmentRow[] {
	switch (options.layout) {
		case 'sectioned':
			return sectionedAssignments(rows, options);
		case 'tabular':
			return tabularAssignments(rows, options);
	}
}

/**
 * Role mapping rows without the header rows.
 */
export function toRoleMappingRows(rows: readonly SheetRow[], headerRows: number): SheetRow[] {
	return rows.filter((row) => row.rowNumber > headerRows);
}
