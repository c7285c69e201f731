import { describeLicenseSummaryError, type LicenseSummaryError } from '@license-summary/license-core';

/**
 * File access errors using discriminated unions for neverthrow
 */
export type InputFileError = {
	type: 'input_file';
	path: string;
	reason: 'not_found' | 'unreadable' | 'unsupported_format' | 'no_worksheet' | 'empty' | 'wrong_shape';
	message: string;
};

export type OutputFileError = { type: 'output_file'; path: string; message: string };

export type UsageError = { type: 'usage'; message: string };

/**
 * Every fatal error a run can end with
 */
export type RunError = LicenseSummaryError | InputFileError | OutputFileError;

/**
 * Helper to create application errors
 */
export const AppErrors = {
	input: (path: string, reason: InputFileError['reason'], message: string): InputFileError => ({
		type: 'input_file',
		path,
		reason,
		message,
	}),
	output: (path: string, message: string): OutputFileError => ({ type: 'output_file', path, message }),
	usage: (message: string): UsageError => ({ type: 'usage', message }),
};

export function causeMessage(cause: unknown): string {
	return cause instanceof Error ? cause.message : String(cause);
}

export function describeRunError(error: RunError): string {
	switch (error.type) {
		case 'input_file':
			return `Cannot read ${error.path}: ${error.message}`;
		case 'output_file':
			return `Cannot write ${error.path}: ${error.message}`;
		default:
			return describeLicenseSummaryError(error);
	}
}
