/**
 * License categories, in the column order used by the role mapping table
 * and the summary report.
 */
export const LICENSE_CATEGORIES = ['Finance', 'SCM', 'Commerce', 'Project', 'HR'] as const;

export type LicenseCategory = (typeof LICENSE_CATEGORIES)[number];

/**
 * One requirement flag per license category.
 */
export type LicenseVector = Readonly<Record<LicenseCategory, boolean>>;

export type LicenseCounts = Readonly<Record<LicenseCategory, number>>;

export const NO_LICENSES: LicenseVector = Object.freeze({
	Finance: false,
	SCM: false,
	Commerce: false,
	Project: false,
	HR: false,
});

/**
 * Build a vector from flags given in category order.
 */
export function licenseVector(flags: readonly boolean[]): LicenseVector {
	const vector: Record<LicenseCategory, boolean> = { ...NO_LICENSES };
	LICENSE_CATEGORIES.forEach((category, index) => {
		vector[category] = flags[index] ?? false;
	});
	return Object.freeze(vector);
}

/**
 * Logical OR of two vectors.
 */
export function combineLicenses(a: LicenseVector, b: LicenseVector): LicenseVector {
	return licenseVector(LICENSE_CATEGORIES.map((category) => a[category] || b[category]));
}

export function sameLicenses(a: LicenseVector, b: LicenseVector): boolean {
	return LICENSE_CATEGORIES.every((category) => a[category] === b[category]);
}

export function requiredLicenses(vector: LicenseVector): LicenseCategory[] {
	return LICENSE_CATEGORIES.filter((category) => vector[category]);
}

export const NO_LICENSE_PROFILE = 'None';

/**
 * Label naming the licenses a vector requires, e.g. `Finance, Commerce`.
 */
export function licenseProfile(vector: LicenseVector): string {
	const required = requiredLicenses(vector);
	return required.length > 0 ? required.join(', ') : NO_LICENSE_PROFILE;
}

export function zeroCounts(): Record<LicenseCategory, number> {
	return { Finance: 0, SCM: 0, Commerce: 0, Project: 0, HR: 0 };
}
