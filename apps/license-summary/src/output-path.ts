import { basename, dirname, extname, join } from 'node:path';

export const SUMMARY_SUFFIX = '_summary';

/**
 * `<dir>/<stem>_summary.xlsx` beside the license report.
 */
export function summaryOutputPath(reportPath: string): string {
	const stem = basename(reportPath, extname(reportPath));
	return join(dirname(reportPath), `${stem}${SUMMARY_SUFFIX}.xlsx`);
}
