/**
 * Canonical identity of a set of role names: the names deduplicated and
 * sorted by code unit, so {A, B} and {B, A} produce the same key.
 */
export class CombinationKey {
	/** Separator used in the display label */
	static readonly LABEL_SEPARATOR = ' + ';

	readonly roles: readonly string[];
	/** Unambiguous string form, safe to use as a map key */
	readonly value: string;

	private constructor(roles: readonly string[]) {
		this.roles = Object.freeze([...roles]);
		// Role names cannot contain NUL, so joining on it never collides
		this.value = roles.join('\u0000');
	}

	static of(roles: Iterable<string>): CombinationKey {
		const canonical = [...new Set(roles)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
		return new CombinationKey(canonical);
	}

	get label(): string {
		return this.roles.join(CombinationKey.LABEL_SEPARATOR);
	}

	equals(other: CombinationKey): boolean {
		return this.value === other.value;
	}

	toString(): string {
		return this.label;
	}
}
