import { readName, type CellValue } from './cells.js';
import type { SkippedAssignmentRow } from './errors.js';

/**
 * One row of the role assignment report: a user and a cell holding one
 * or more role names.
 */
export interface RoleAssignmentRow {
	readonly rowNumber: number;
	readonly user: CellValue;
	readonly roles: CellValue;
}

export interface ExtractOptions {
	/** Single characters separating role names inside one cell */
	readonly delimiters: readonly string[];
}

export const DEFAULT_ROLE_DELIMITERS: readonly string[] = [';', ',', '\n'];

export type UserRoles = ReadonlyMap<string, ReadonlySet<string>>;

export interface UserRoleExtraction {
	/** Users in first-seen order with their role names */
	readonly userRoles: UserRoles;
	readonly skipped: readonly SkippedAssignmentRow[];
	readonly rowCount: number;
}

/**
 * Split a role cell into trimmed, non-empty role names.
 */
export function splitRoleCell(value: CellValue, delimiters: readonly string[]): string[] {
	const text = typeof value === 'number' ? String(value) : typeof value === 'string' ? value : '';
	if (delimiters.length === 0) {
		const single = text.trim();
		return single === '' ? [] : [single];
	}

	const pattern = new RegExp(`[${delimiters.map(escapeForCharacterClass).join('')}]`, 'u');
	return text
		.split(pattern)
		.map((token) => token.trim())
		.filter((token) => token !== '');
}

function escapeForCharacterClass(delimiter: string): string {
	return delimiter.replace(/[\\\]\[^-]/g, '\\$&');
}

/**
 * Collect the role names assigned to each user.
 *
 * Rows without a user identifier or without any role name are skipped and
 * reported; repeated (user, role) pairs collapse into one.
 */
export function extractUserRoles(
	rows: readonly RoleAssignmentRow[],
	options: ExtractOptions = { delimiters: DEFAULT_ROLE_DELIMITERS },
): UserRoleExtraction {
	const userRoles = new Map<string, Set<string>>();
	const skipped: SkippedAssignmentRow[] = [];

	for (const row of rows) {
		const user = readName(row.user);
		if (user === undefined) {
			skipped.push({ type: 'skipped_assignment_row', rowNumber: row.rowNumber, reason: 'missing_user' });
			continue;
		}

		const roles = splitRoleCell(row.roles, options.delimiters);
		if (roles.length === 0) {
			skipped.push({ type: 'skipped_assignment_row', rowNumber: row.rowNumber, reason: 'missing_roles', user });
			continue;
		}

		let assigned = userRoles.get(user);
		if (assigned === undefined) {
			assigned = new Set<string>();
			userRoles.set(user, assigned);
		}
		for (const role of roles) {
			assigned.add(role);
		}
	}

	return { userRoles, skipped, rowCount: rows.length };
}
