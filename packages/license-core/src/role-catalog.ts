import { ok, err, type Result } from 'neverthrow';
import { cellAt, describeCell, flagCellSchema, nameCellSchema, type SheetRow } from './cells.js';
import { LicenseSummaryErrors, type CatalogError, type UnknownRole } from './errors.js';
import { LICENSE_CATEGORIES, licenseVector, sameLicenses, type LicenseVector } from './license.js';

/** Column holding the role name in the mapping table */
export const ROLE_NAME_COLUMN = 1;
/** First of the five flag columns, in LICENSE_CATEGORIES order */
export const FIRST_FLAG_COLUMN = 2;

/**
 * A role and the license categories it requires
 */
export interface RoleDefinition {
	readonly name: string;
	readonly licenses: LicenseVector;
	/** Row of the mapping table the role was first defined on */
	readonly rowNumber: number;
}

/**
 * Immutable role name → license flags table.
 *
 * Built once from the role mapping rows and handed to the stages that
 * need it; lookups are exact (case-sensitive, trimmed names).
 */
export class RoleCatalog {
	private readonly roles: ReadonlyMap<string, RoleDefinition>;

	private constructor(roles: Map<string, RoleDefinition>) {
		this.roles = roles;
	}

	/**
	 * Validate mapping rows into a catalog.
	 *
	 * A role listed twice with identical flags is kept once; conflicting
	 * flags are a `duplicate_role` error.
	 */
	static load(rows: readonly SheetRow[]): Result<RoleCatalog, CatalogError> {
		const roles = new Map<string, RoleDefinition>();

		for (const row of rows) {
			const parsed = parseRoleRow(row);
			if (parsed.isErr()) {
				return err(parsed.error);
			}

			const role = parsed.value;
			const existing = roles.get(role.name);
			if (existing === undefined) {
				roles.set(role.name, role);
			} else if (!sameLicenses(existing.licenses, role.licenses)) {
				return err(LicenseSummaryErrors.duplicateRole(role.name, existing.rowNumber, role.rowNumber));
			}
		}

		return ok(new RoleCatalog(roles));
	}

	get size(): number {
		return this.roles.size;
	}

	has(roleName: string): boolean {
		return this.roles.has(roleName);
	}

	/**
	 * License flags for a role; unknown roles are an error, never an
	 * empty vector.
	 */
	licensesFor(roleName: string): Result<LicenseVector, UnknownRole> {
		const role = this.roles.get(roleName);
		if (role === undefined) {
			return err(LicenseSummaryErrors.unknownRole(roleName));
		}
		return ok(role.licenses);
	}

	/** Roles in the order they were defined */
	definitions(): RoleDefinition[] {
		return [...this.roles.values()];
	}
}

function parseRoleRow(row: SheetRow): Result<RoleDefinition, CatalogError> {
	const nameCell = cellAt(row, ROLE_NAME_COLUMN);
	const name = nameCellSchema.safeParse(nameCell);
	if (!name.success) {
		return err(
			LicenseSummaryErrors.malformedRoleRow(
				row.rowNumber,
				ROLE_NAME_COLUMN,
				`role name must be a non-empty text, got ${describeCell(nameCell)}`,
			),
		);
	}

	const flags: boolean[] = [];
	for (const [index, category] of LICENSE_CATEGORIES.entries()) {
		const column = FIRST_FLAG_COLUMN + index;
		const value = cellAt(row, column);
		const flag = flagCellSchema.safeParse(value);
		if (!flag.success) {
			return err(
				LicenseSummaryErrors.malformedRoleRow(
					row.rowNumber,
					column,
					`${category} flag of role "${name.data}" must be 0 or 1, got ${describeCell(value)}`,
				),
			);
		}
		flags.push(flag.data);
	}

	return ok({ name: name.data, licenses: licenseVector(flags), rowNumber: row.rowNumber });
}
