/**
 * License summary error types using discriminated unions for neverthrow
 */

/**
 * Fatal errors raised by the core pipeline
 */
export type LicenseSummaryError =
	| { type: 'malformed_role_row'; rowNumber: number; column: number; reason: string }
	| { type: 'duplicate_role'; roleName: string; firstRowNumber: number; rowNumber: number }
	| { type: 'unknown_role'; roleName: string; combination?: string }
	| { type: 'member_count_mismatch'; expected: number; actual: number };

export type MalformedRoleRow = Extract<LicenseSummaryError, { type: 'malformed_role_row' }>;
export type DuplicateRole = Extract<LicenseSummaryError, { type: 'duplicate_role' }>;
export type UnknownRole = Extract<LicenseSummaryError, { type: 'unknown_role' }>;
export type MemberCountMismatch = Extract<LicenseSummaryError, { type: 'member_count_mismatch' }>;

export type CatalogError = MalformedRoleRow | DuplicateRole;

/**
 * Helper to create license summary errors
 */
export const LicenseSummaryErrors = {
	malformedRoleRow: (rowNumber: number, column: number, reason: string): MalformedRoleRow => ({
		type: 'malformed_role_row',
		rowNumber,
		column,
		reason,
	}),
	duplicateRole: (roleName: string, firstRowNumber: number, rowNumber: number): DuplicateRole => ({
		type: 'duplicate_role',
		roleName,
		firstRowNumber,
		rowNumber,
	}),
	unknownRole: (roleName: string, combination?: string): UnknownRole =>
		combination === undefined
			? { type: 'unknown_role', roleName }
			: { type: 'unknown_role', roleName, combination },
	memberCountMismatch: (expected: number, actual: number): MemberCountMismatch => ({
		type: 'member_count_mismatch',
		expected,
		actual,
	}),
};

/**
 * One-line, human readable description of a fatal error.
 */
export function describeLicenseSummaryError(error: LicenseSummaryError): string {
	switch (error.type) {
		case 'malformed_role_row':
			return `Malformed role row ${error.rowNumber} (column ${error.column}): ${error.reason}`;
		case 'duplicate_role':
			return `Duplicate role "${error.roleName}" on row ${error.rowNumber} conflicts with row ${error.firstRowNumber}`;
		case 'unknown_role':
			return error.combination === undefined
				? `Unknown role "${error.roleName}": not present in the roles mapping`
				: `Unknown role "${error.roleName}" in combination "${error.combination}": not present in the roles mapping`;
		case 'member_count_mismatch':
			return `Combination member counts add up to ${error.actual}, expected ${error.expected} users`;
	}
}

/**
 * Non-fatal diagnostic: an assignment row that could not be attributed
 */
export interface SkippedAssignmentRow {
	readonly type: 'skipped_assignment_row';
	readonly rowNumber: number;
	readonly reason: 'missing_user' | 'missing_roles';
	readonly user?: string;
}

export type Diagnostic = SkippedAssignmentRow;
