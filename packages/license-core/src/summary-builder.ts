import { ok, err, type Result } from 'neverthrow';
import { LicenseSummaryErrors, type MemberCountMismatch } from './errors.js';
import { LICENSE_CATEGORIES, zeroCounts, type LicenseCounts, type LicenseVector } from './license.js';
import type { ResolvedCombination } from './license-resolver.js';

export interface SummaryRow {
	/** Role names joined with ` + ` */
	readonly label: string;
	readonly roles: readonly string[];
	readonly memberCount: number;
	readonly members: readonly string[];
	readonly licenses: LicenseVector;
	readonly profile: string;
}

export interface LicenseProfileSummary {
	readonly profile: string;
	readonly licenses: LicenseVector;
	readonly combinationCount: number;
	readonly userCount: number;
}

export interface SummaryTotals {
	readonly userCount: number;
	readonly combinationCount: number;
	/** Distinct combinations requiring each license */
	readonly combinationsRequiring: LicenseCounts;
	/** Users whose combination requires each license */
	readonly usersRequiring: LicenseCounts;
}

export interface SummaryReport {
	readonly rows: readonly SummaryRow[];
	readonly totals: SummaryTotals;
	readonly profiles: readonly LicenseProfileSummary[];
}

/**
 * Presentation order: most members first, ties in first-seen order.
 */
export function compareCombinations(a: ResolvedCombination, b: ResolvedCombination): number {
	return b.memberCount - a.memberCount || a.firstSeen - b.firstSeen;
}

/**
 * Assemble the report and its totals.
 *
 * `expectedUserCount` is the number of users extracted from the
 * assignment report; member counts must add up to it.
 */
export function buildSummary(
	combinations: readonly ResolvedCombination[],
	expectedUserCount: number,
): Result<SummaryReport, MemberCountMismatch> {
	const ordered = [...combinations].sort(compareCombinations);

	const combinationsRequiring = zeroCounts();
	const usersRequiring = zeroCounts();
	const profiles = new Map<string, { licenses: LicenseVector; combinationCount: number; userCount: number }>();
	let userCount = 0;

	for (const combination of ordered) {
		userCount += combination.memberCount;

		for (const category of LICENSE_CATEGORIES) {
			if (combination.licenses[category]) {
				combinationsRequiring[category] += 1;
				usersRequiring[category] += combination.memberCount;
			}
		}

		const profile = profiles.get(combination.profile);
		if (profile === undefined) {
			profiles.set(combination.profile, {
				licenses: combination.licenses,
				combinationCount: 1,
				userCount: combination.memberCount,
			});
		} else {
			profile.combinationCount += 1;
			profile.userCount += combination.memberCount;
		}
	}

	if (userCount !== expectedUserCount) {
		return err(LicenseSummaryErrors.memberCountMismatch(expectedUserCount, userCount));
	}

	return ok({
		rows: ordered.map((combination) => ({
			label: combination.key.label,
			roles: combination.key.roles,
			memberCount: combination.memberCount,
			members: combination.members,
			licenses: combination.licenses,
			profile: combination.profile,
		})),
		totals: {
			userCount,
			combinationCount: ordered.length,
			combinationsRequiring,
			usersRequiring,
		},
		profiles: [...profiles.entries()]
			.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
			.map(([profile, summary]) => ({ profile, ...summary })),
	});
}
