import { describe, it, expect } from 'vitest';
import { createLogger } from '@license-summary/logging';
import { runLicenseSummary, type PipelineInput } from '../pipeline.js';
import type { RoleAssignmentRow } from '../user-role-extractor.js';

const logger = createLogger({ level: 'silent', serviceName: 'test' });

const roleRows: PipelineInput['roleRows'] = [
	{ rowNumber: 2, cells: ['Sales', 1, 0, 0, 0, 0] },
	{ rowNumber: 3, cells: ['Support', 0, 0, 1, 0, 0] },
];

const assignments = (...entries: Array<[string | null, string]>): RoleAssignmentRow[] =>
	entries.map(([user, roles], index) => ({ rowNumber: index + 2, user, roles }));

describe('runLicenseSummary', () => {
	it('should summarise users by role combination', () => {
		const outcome = runLicenseSummary(
			{
				roleRows,
				assignmentRows: assignments(
					['ann', 'Sales'],
					['bob', 'Sales'],
					['cid', 'Sales'],
					['cid', 'Support'],
					['dee', 'Support'],
				),
			},
			logger,
		)._unsafeUnwrap();

		expect(
			outcome.report.rows.map((r) => ({ label: r.label, count: r.memberCount, licenses: r.licenses })),
		).toEqual([
			{ label: 'Sales', count: 2, licenses: { Finance: true, SCM: false, Commerce: false, Project: false, HR: false } },
			{
				label: 'Sales + Support',
				count: 1,
				licenses: { Finance: true, SCM: false, Commerce: true, Project: false, HR: false },
			},
			{ label: 'Support', count: 1, licenses: { Finance: false, SCM: false, Commerce: true, Project: false, HR: false } },
		]);
		expect(outcome.report.totals.userCount).toBe(4);
		expect(outcome.report.totals.combinationsRequiring).toEqual({ Finance: 2, SCM: 0, Commerce: 2, Project: 0, HR: 0 });
		expect(outcome.diagnostics).toEqual([]);
	});

	it('should abort with unknown_role when a user holds an unmapped role', () => {
		const result = runLicenseSummary(
			{ roleRows, assignmentRows: assignments(['ann', 'Sales'], ['bob', 'Auditor']) },
			logger,
		);

		expect(result._unsafeUnwrapErr()).toEqual({ type: 'unknown_role', roleName: 'Auditor', combination: 'Auditor' });
	});

	it('should stop at a malformed catalog before reading assignments', () => {
		const result = runLicenseSummary(
			{
				roleRows: [{ rowNumber: 2, cells: ['Sales', 'x'] }],
				assignmentRows: assignments(['ann', 'Ghost']),
			},
			logger,
		);

		expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'malformed_role_row', rowNumber: 2, column: 2 });
	});

	it('should report skipped rows and count only extracted users', () => {
		const outcome = runLicenseSummary(
			{ roleRows, assignmentRows: assignments(['ann', 'Sales'], [null, 'Sales'], ['bob', '']) },
			logger,
		)._unsafeUnwrap();

		expect(outcome.report.totals.userCount).toBe(1);
		expect(outcome.diagnostics).toEqual([
			{ type: 'skipped_assignment_row', rowNumber: 3, reason: 'missing_user' },
			{ type: 'skipped_assignment_row', rowNumber: 4, reason: 'missing_roles', user: 'bob' },
		]);
	});

	it('should produce the same report for the same input', () => {
		const input: PipelineInput = {
			roleRows,
			assignmentRows: assignments(['ann', 'Support;Sales'], ['bob', 'Sales'], ['cid', 'Sales,Support']),
		};

		const first = runLicenseSummary(input, logger)._unsafeUnwrap().report;
		const second = runLicenseSummary(input, logger)._unsafeUnwrap().report;

		expect(JSON.stringify(second)).toBe(JSON.stringify(first));
		expect(first.rows.map((r) => [r.label, r.memberCount])).toEqual([
			['Sales + Support', 2],
			['Sales', 1],
		]);
	});

	it('should group identically whatever the row order', () => {
		const rows = assignments(['ann', 'Sales'], ['bob', 'Support'], ['ann', 'Support'], ['cid', 'Sales'], ['dee', 'Support']);
		const groups = (input: RoleAssignmentRow[]) =>
			runLicenseSummary({ roleRows, assignmentRows: input }, logger)
				._unsafeUnwrap()
				.report.rows.map((r) => `${r.label}:${r.memberCount}`)
				.sort();

		expect(groups([...rows].reverse())).toEqual(groups(rows));
	});

	it('should honour the configured delimiters', () => {
		const outcome = runLicenseSummary(
			{ roleRows, assignmentRows: assignments(['ann', 'Sales/Support']) },
			logger,
			{ delimiters: ['/'] },
		)._unsafeUnwrap();

		expect(outcome.report.rows.map((r) => r.label)).toEqual(['Sales + Support']);
	});
});
