import { err, ok, type Result } from 'neverthrow';
import { unescapeControlCharacters } from '@license-summary/config';
import { AppErrors, type UsageError } from './errors.js';
import type { LicenseSummaryEnv } from './env.js';
import { LAYOUT_COLUMNS, REPORT_LAYOUTS, type AssignmentLayoutOptions, type ReportLayout } from './sources/assignment-layouts.js';

export const VERSION = '0.1.0';

export function usage(): string {
	return `license-summary v${VERSION}

Usage: license-summary [options] <license-report> <roles>

Summarises which licenses each combination of security roles requires.

Arguments:
  license-report   Role assignment report (.xlsx, .xlsm or .csv)
  roles            Role to license mapping: role name, then Finance, SCM,
                   Commerce, Project and HR flags (1 = required)

Options:
  -v, --verbose             Log the role catalog, user roles and step timing
  -o, --output <path>       Output workbook (default: <report>_summary.xlsx)
      --layout <name>       Report layout: sectioned (default) or tabular
      --user-column <n>     1-based column of the user identifier
      --role-column <n>     1-based column of the security roles
      --delimiters <chars>  Characters separating roles in one cell (default: ";,\\n")
  -h, --help                Show this help message
      --version             Print version and exit

Environment:
  LOG_LEVEL, LOG_PRETTY, ROLE_DELIMITERS, REPORT_LAYOUT, REPORT_USER_COLUMN,
  REPORT_ROLE_COLUMN, REPORT_HEADER_ROWS, ROLES_HEADER_ROWS`;
}

export interface RunOptions {
	readonly reportPath: string;
	readonly rolesPath: string;
	readonly outputPath?: string;
	readonly verbose: boolean;
	readonly layout: AssignmentLayoutOptions;
	readonly delimiters: readonly string[];
	readonly rolesHeaderRows: number;
}

export type CliCommand = { kind: 'help' } | { kind: 'version' } | { kind: 'run'; options: RunOptions };

const VALUE_FLAGS: Record<string, string> = {
	'-o': 'output',
	'--output': 'output',
	'--layout': 'layout',
	'--user-column': 'user-column',
	'--role-column': 'role-column',
	'--delimiters': 'delimiters',
};

function parseColumn(flag: string, value: string | undefined): Result<number | undefined, UsageError> {
	if (value === undefined) return ok(undefined);
	const column = Number(value);
	if (!Number.isInteger(column) || column < 1) {
		return err(AppErrors.usage(`--${flag} must be a positive integer, got "${value}"`));
	}
	return ok(column);
}

function isReportLayout(value: string): value is ReportLayout {
	return REPORT_LAYOUTS.some((layout) => layout === value);
}

/**
 * Parse command line arguments (without the node and script entries),
 * falling back to the environment for anything not given.
 */
export function parseCliArgs(args: readonly string[], env: LicenseSummaryEnv): Result<CliCommand, UsageError> {
	const positional: string[] = [];
	const values: Record<string, string> = {};
	let verbose = false;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? '';

		if (arg === '-h' || arg === '--help') return ok({ kind: 'help' });
		if (arg === '--version') return ok({ kind: 'version' });
		if (arg === '-v' || arg === '--verbose') {
			verbose = true;
			continue;
		}

		// --flag=value
		const parts: string[] = arg.startsWith('--') && arg.includes('=') ? arg.split(/=(.*)/s, 2) : [arg];
		const flag = parts[0] ?? arg;
		const inline = parts[1];
		const name = VALUE_FLAGS[flag];
		if (name !== undefined) {
			const value = inline ?? args[++i];
			if (value === undefined) {
				return err(AppErrors.usage(`${flag} requires a value`));
			}
			values[name] = value;
			continue;
		}

		if (arg.startsWith('-')) {
			return err(AppErrors.usage(`Unknown option: ${arg}`));
		}
		positional.push(arg);
	}

	const [reportPath, rolesPath, ...extra] = positional;
	if (reportPath === undefined || rolesPath === undefined) {
		return err(AppErrors.usage('Expected a license report and a roles file'));
	}
	if (extra.length > 0) {
		return err(AppErrors.usage(`Unexpected argument: ${extra.join(' ')}`));
	}

	const layoutName = values['layout'] ?? env.REPORT_LAYOUT;
	if (!isReportLayout(layoutName)) {
		return err(AppErrors.usage(`--layout must be one of ${REPORT_LAYOUTS.join(', ')}, got "${layoutName}"`));
	}

	const delimiters =
		values['delimiters'] === undefined
			? env.ROLE_DELIMITERS
			: [...new Set(unescapeControlCharacters(values['delimiters']))];
	if (delimiters.length === 0) {
		return err(AppErrors.usage('--delimiters needs at least one character'));
	}

	return parseColumn('user-column', values['user-column']).andThen((userColumn) =>
		parseColumn('role-column', values['role-column']).map(
			(roleColumn): CliCommand => ({
				kind: 'run',
				options: {
					reportPath,
					rolesPath,
					...(values['output'] === undefined ? {} : { outputPath: values['output'] }),
					verbose,
					layout: {
						layout: layoutName,
						userColumn: userColumn ?? env.REPORT_USER_COLUMN ?? LAYOUT_COLUMNS[layoutName].userColumn,
						roleColumn: roleColumn ?? env.REPORT_ROLE_COLUMN ?? LAYOUT_COLUMNS[layoutName].roleColumn,
						headerRows: env.REPORT_HEADER_ROWS,
					},
					delimiters,
					rolesHeaderRows: env.ROLES_HEADER_ROWS,
				},
			}),
		),
	);
}
