import 'dotenv/config';
import { z } from 'zod/v4';

export { z } from 'zod/v4';

/**
 * Parse environment variables with Zod schema validation.
 * Throws a descriptive error if validation fails.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);

	if (!result.success) {
		const errors = result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
		throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
	}

	return result.data;
}

/**
 * Turn `\n`, `\r` and `\t` escapes typed into an environment variable or
 * a command line flag into the characters they stand for.
 */
export function unescapeControlCharacters(value: string): string {
	return value.replace(/\\([nrt])/g, (_, ch: string) => (ch === 'n' ? '\n' : ch === 'r' ? '\r' : '\t'));
}

/**
 * Common environment variable schemas for reuse.
 *
 * Note: In zod v4, .default() on a transformed schema expects the OUTPUT type.
 * Use .prefault() to provide an INPUT default (applied before parsing).
 */
export const CommonEnvSchemas = {
	/** Log level enum */
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

	/** Boolean from string, false unless set */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	/** Boolean from string, true unless explicitly disabled */
	booleanDefaultTrue: z
		.string()
		.transform((v) => !(v === 'false' || v === '0'))
		.prefault('true'),

	/** Positive integer from string */
	positiveInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive()),

	/** Non-negative integer from string */
	nonNegativeInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().min(0)),

	/** Set of single-character delimiters, escapes allowed */
	delimiters: z
		.string()
		.transform((v) => [...new Set(unescapeControlCharacters(v))])
		.pipe(z.array(z.string()).min(1, 'at least one delimiter is required')),
};

/**
 * Type helper to extract config type from schema
 */
export type ConfigType<T extends z.ZodObject<z.ZodRawShape>> = z.infer<T>;
