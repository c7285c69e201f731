import { createLogger, type LogLevel } from '@license-summary/logging';
import { parseCliArgs, usage, VERSION } from './cli.js';
import { loadEnv, type LicenseSummaryEnv } from './env.js';
import { describeRunError } from './errors.js';
import { runLicenseSummaryCommand } from './run.js';

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function main(
	args: readonly string[],
	variables: Record<string, string | undefined> = process.env,
): Promise<number> {
	let env: LicenseSummaryEnv;
	try {
		env = loadEnv(variables);
	} catch (error) {
		console.error(error instanceof Error ? error.message : String(error));
		return 1;
	}

	const parsed = parseCliArgs(args, env);
	if (parsed.isErr()) {
		console.error(`${parsed.error.message}\n`);
		console.error(usage());
		return 2;
	}

	const command = parsed.value;
	if (command.kind === 'help') {
		console.log(usage());
		return 0;
	}
	if (command.kind === 'version') {
		console.log(`license-summary v${VERSION}`);
		return 0;
	}

	const level: LogLevel = command.options.verbose ? 'debug' : env.LOG_LEVEL;
	const logger = createLogger({ level, serviceName: 'license-summary', pretty: env.LOG_PRETTY });

	const result = await runLicenseSummaryCommand(command.options, logger);
	if (result.isErr()) {
		const message = describeRunError(result.error);
		logger.error({ error: result.error }, message);
		console.error(message);
		return 1;
	}

	const { outputPath, combinations, users, skippedRows } = result.value;
	console.log(`Results written to: ${outputPath}`);
	console.log(`${combinations} role combinations, ${users} users, ${skippedRows} skipped rows`);
	return 0;
}

