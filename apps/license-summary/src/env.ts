import { CommonEnvSchemas, parseEnv, z } from '@license-summary/config';

/**
 * License summary environment configuration
 */
export const envSchema = z.object({
	// Logging
	LOG_LEVEL: CommonEnvSchemas.logLevel,
	LOG_PRETTY: CommonEnvSchemas.booleanDefaultTrue,

	/**
	 * Characters separating role names inside one report cell.
	 * Every character counts; `\n`, `\r` and `\t` escapes are understood.
	 */
	ROLE_DELIMITERS: CommonEnvSchemas.delimiters.prefault(';,\\n'),

	// Role assignment report
	REPORT_LAYOUT: z.enum(['sectioned', 'tabular']).default('sectioned'),
	/** Defaults to the layout's user column */
	REPORT_USER_COLUMN: CommonEnvSchemas.positiveInt.optional(),
	/** Defaults to the layout's role column */
	REPORT_ROLE_COLUMN: CommonEnvSchemas.positiveInt.optional(),
	REPORT_HEADER_ROWS: CommonEnvSchemas.nonNegativeInt.prefault('1'),

	// Role mapping table
	ROLES_HEADER_ROWS: CommonEnvSchemas.nonNegativeInt.prefault('1'),
});

export type LicenseSummaryEnv = z.infer<typeof envSchema>;

export function loadEnv(env: Record<string, string | undefined> = process.env): LicenseSummaryEnv {
	return parseEnv(envSchema, env);
}
