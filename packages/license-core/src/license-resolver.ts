import { ok, err, type Result } from 'neverthrow';
import type { RoleCombination } from './combination-aggregator.js';
import { LicenseSummaryErrors, type UnknownRole } from './errors.js';
import { combineLicenses, licenseProfile, NO_LICENSES, type LicenseVector } from './license.js';
import type { RoleCatalog } from './role-catalog.js';

export interface ResolvedCombination extends RoleCombination {
	readonly licenses: LicenseVector;
	/** Required license names, e.g. `Finance, HR` */
	readonly profile: string;
}

/**
 * OR together the license flags of every role in a combination.
 *
 * The first role missing from the catalog aborts resolution; no partial
 * vector is ever returned.
 */
export function resolveLicenses(combination: RoleCombination, catalog: RoleCatalog): Result<LicenseVector, UnknownRole> {
	let licenses = NO_LICENSES;
	for (const role of combination.key.roles) {
		const roleLicenses = catalog.licensesFor(role);
		if (roleLicenses.isErr()) {
			return err(LicenseSummaryErrors.unknownRole(role, combination.key.label));
		}
		licenses = combineLicenses(licenses, roleLicenses.value);
	}
	return ok(licenses);
}

/**
 * Resolve every combination, stopping at the first unknown role.
 */
export function resolveCombinations(
	combinations: readonly RoleCombination[],
	catalog: RoleCatalog,
): Result<ResolvedCombination[], UnknownRole> {
	const resolved: ResolvedCombination[] = [];
	for (const combination of combinations) {
		const licenses = resolveLicenses(combination, catalog);
		if (licenses.isErr()) {
			return err(licenses.error);
		}
		resolved.push({ ...combination, licenses: licenses.value, profile: licenseProfile(licenses.value) });
	}
	return ok(resolved);
}
