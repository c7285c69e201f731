/**
 * License Summary
 *
 * Works out which license categories (Finance, SCM, Commerce, Project,
 * HR) each distinct combination of security roles requires, from a role
 * assignment report and a role to license mapping table.
 */

import { main } from './main.js';

export { main };

const isEntry =
	process.argv[1] !== undefined &&
	(process.argv[1].endsWith('/index.ts') ||
		process.argv[1].endsWith('/index.js') ||
		process.argv[1].endsWith('license-summary'));

if (isEntry) {
	process.exitCode = await main(process.argv.slice(2));
}
