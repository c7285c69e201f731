import { err, ok, ResultAsync, type Result } from 'neverthrow';
import { componentLogger, type Logger } from '@license-summary/logging';
import { runLicenseSummary, type PipelineInput, type SheetRow } from '@license-summary/license-core';
import type { RunOptions } from './cli.js';
import { AppErrors, type InputFileError, type RunError } from './errors.js';
import { summaryOutputPath } from './output-path.js';
import { toAssignmentRows, toRoleMappingRows, USER_SECTION_MARKER } from './sources/assignment-layouts.js';
import { readSheetRows } from './workbook/reader.js';
import { renderSummaryWorkbook, writeSummaryWorkbook } from './workbook/summary-writer.js';

export interface RunSummary {
	readonly outputPath: string;
	readonly combinations: number;
	readonly users: number;
	readonly skippedRows: number;
}

/**
 * Apply the layouts to both sheets. A sheet that yields nothing to work on
 * is the wrong file or the wrong layout, never an empty summary.
 */
export function toPipelineInput(
	roleSheet: readonly SheetRow[],
	reportSheet: readonly SheetRow[],
	options: RunOptions,
): Result<PipelineInput, InputFileError> {
	const roleRows = toRoleMappingRows(roleSheet, options.rolesHeaderRows);
	if (roleRows.length === 0) {
		return err(
			AppErrors.input(options.rolesPath, 'wrong_shape', `no role rows after ${options.rolesHeaderRows} header row(s)`),
		);
	}

	const assignmentRows = toAssignmentRows(reportSheet, options.layout);
	if (assignmentRows.length === 0) {
		const message =
			options.layout.layout === 'sectioned'
				? `no "${USER_SECTION_MARKER}" user section in column ${options.layout.userColumn}; is it a tabular report?`
				: `no assignment rows after ${options.layout.headerRows} header row(s)`;
		return err(AppErrors.input(options.reportPath, 'wrong_shape', message));
	}

	return ok({ roleRows, assignmentRows });
}

/**
 * Read both inputs, run the pipeline and write the summary workbook.
 *
 * Both files are read before any processing; the workbook is only
 * written once every stage has succeeded.
 */
export function runLicenseSummaryCommand(options: RunOptions, logger: Logger): ResultAsync<RunSummary, RunError> {
	const log = componentLogger(logger, 'LicenseSummaryCommand');
	const outputPath = options.outputPath ?? summaryOutputPath(options.reportPath);

	log.info({ report: options.reportPath, roles: options.rolesPath, layout: options.layout.layout }, 'Reading inputs');

	return ResultAsync.combine([readSheetRows(options.rolesPath), readSheetRows(options.reportPath)])
		.andThen(([roleSheet, reportSheet]) => toPipelineInput(roleSheet, reportSheet, options))
		.andThen((input) => runLicenseSummary(input, logger, { delimiters: options.delimiters }))
		.andThen((outcome) =>
			writeSummaryWorkbook(renderSummaryWorkbook(outcome.report, outcome.diagnostics), outputPath).map(
				(written): RunSummary => ({
					outputPath: written,
					combinations: outcome.report.totals.combinationCount,
					users: outcome.report.totals.userCount,
					skippedRows: outcome.diagnostics.length,
				}),
			),
		)
		.map((summary) => {
			log.info(summary, 'License summary written');
			return summary;
		});
}
