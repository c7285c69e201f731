import type { Result } from 'neverthrow';
import { componentLogger, timed, type Logger } from '@license-summary/logging';
import type { SheetRow } from './cells.js';
import { aggregateCombinations } from './combination-aggregator.js';
import type { Diagnostic, LicenseSummaryError } from './errors.js';
import { licenseProfile } from './license.js';
import { resolveCombinations } from './license-resolver.js';
import { RoleCatalog } from './role-catalog.js';
import { buildSummary, type SummaryReport } from './summary-builder.js';
import {
	DEFAULT_ROLE_DELIMITERS,
	extractUserRoles,
	type ExtractOptions,
	type RoleAssignmentRow,
} from './user-role-extractor.js';

export interface PipelineInput {
	/** Role mapping rows, header already removed */
	readonly roleRows: readonly SheetRow[];
	readonly assignmentRows: readonly RoleAssignmentRow[];
}

export interface PipelineOutcome {
	readonly catalog: RoleCatalog;
	readonly report: SummaryReport;
	readonly diagnostics: readonly Diagnostic[];
}

/**
 * Run catalog load → extraction → aggregation → resolution → summary.
 *
 * Stages run strictly in order and the first fatal error ends the run;
 * skipped assignment rows are collected and returned with the report.
 */
export function runLicenseSummary(
	input: PipelineInput,
	logger: Logger,
	options: ExtractOptions = { delimiters: DEFAULT_ROLE_DELIMITERS },
): Result<PipelineOutcome, LicenseSummaryError> {
	const log = componentLogger(logger, 'LicenseSummaryPipeline');

	return timed(log, 'load-catalog', () => RoleCatalog.load(input.roleRows)).andThen((catalog) => {
		log.info({ roles: catalog.size }, 'Role catalog loaded');
		for (const role of catalog.definitions()) {
			log.debug({ role: role.name, licenses: licenseProfile(role.licenses), row: role.rowNumber }, 'Role');
		}

		const extraction = timed(log, 'extract-user-roles', () => extractUserRoles(input.assignmentRows, options));
		log.info(
			{ rows: extraction.rowCount, users: extraction.userRoles.size, skipped: extraction.skipped.length },
			'User roles extracted',
		);
		for (const [user, roles] of extraction.userRoles) {
			log.debug({ user, roles: [...roles] }, 'User roles');
		}

		const combinations = timed(log, 'aggregate-combinations', () => aggregateCombinations(extraction.userRoles));
		log.info({ combinations: combinations.length }, 'Role combinations aggregated');

		return timed(log, 'resolve-licenses', () => resolveCombinations(combinations, catalog))
			.andThen((resolved) => timed(log, 'build-summary', () => buildSummary(resolved, extraction.userRoles.size)))
			.map((report) => {
				for (const skipped of extraction.skipped) {
					log.debug({ row: skipped.rowNumber, reason: skipped.reason, user: skipped.user }, 'Skipped assignment row');
				}
				if (extraction.skipped.length > 0) {
					log.warn({ skipped: extraction.skipped.length }, 'Assignment rows skipped');
				}
				return { catalog, report, diagnostics: extraction.skipped };
			});
	});
}
