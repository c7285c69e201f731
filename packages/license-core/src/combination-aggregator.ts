import { CombinationKey } from './combination-key.js';
import type { UserRoles } from './user-role-extractor.js';

/**
 * Users sharing exactly the same set of roles
 */
export interface RoleCombination {
	readonly key: CombinationKey;
	readonly memberCount: number;
	/** Member user identifiers, in first-seen order */
	readonly members: readonly string[];
	/** Position at which the combination was first encountered */
	readonly firstSeen: number;
}

/**
 * Group users by their canonical role set.
 *
 * Which users end up in which group depends only on their role sets; the
 * iteration order of `userRoles` only decides `firstSeen`.
 */
export function aggregateCombinations(userRoles: UserRoles): RoleCombination[] {
	const groups = new Map<string, { key: CombinationKey; members: string[]; firstSeen: number }>();

	for (const [user, roles] of userRoles) {
		if (roles.size === 0) continue;

		const key = CombinationKey.of(roles);
		const group = groups.get(key.value);
		if (group === undefined) {
			groups.set(key.value, { key, members: [user], firstSeen: groups.size });
		} else {
			group.members.push(user);
		}
	}

	return [...groups.values()].map((group) => ({
		key: group.key,
		memberCount: group.members.length,
		members: group.members,
		firstSeen: group.firstSeen,
	}));
}
