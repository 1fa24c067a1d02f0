import { FormatError } from '@perfvault/core';
import { describe, expect, it } from 'vitest';
import { parseSummary } from '../summary.js';

const bytes = (value: unknown) => new Uint8Array(Buffer.from(JSON.stringify(value), 'utf-8'));

describe('parseSummary', () => {
	it('reads a summary nested under "summary"', () => {
		const summary = parseSummary(
			bytes({
				core: 'core-a',
				summary: {
					totalCycles: 400,
					totalInstructions: 300,
					workloads: [{ name: 'a.elf', cycles: 400, instructions: 300 }],
				},
			}),
		);

		expect(summary).toEqual({
			totalCycles: 400,
			totalInstructions: 300,
			ipc: 0.75,
			workloads: [{ name: 'a.elf', cycles: 400, instructions: 300 }],
		});
	});

	it('reads a top-level summary and defaults the workload list', () => {
		expect(parseSummary(bytes({ totalCycles: 10 }))).toEqual({ totalCycles: 10, workloads: [] });
	});

	it('keeps an ipc the report already gives', () => {
		expect(parseSummary(bytes({ totalCycles: 10, totalInstructions: 5, ipc: 2 })).ipc).toBe(2);
	});

	it('does not divide by zero cycles', () => {
		expect(parseSummary(bytes({ totalCycles: 0, totalInstructions: 5 })).ipc).toBeUndefined();
	});

	it('accepts a result package', () => {
		const data = bytes({ totalCycles: 1 });
		expect(parseSummary({ jobId: 'job-1', data, size: data.length, sha256: 'x' }).totalCycles).toBe(1);
	});

	it('rejects non-JSON results', () => {
		expect(() => parseSummary(new Uint8Array([0x50, 0x4b, 0x03]))).toThrow('Result is not a JSON report');
	});

	it('names the offending field', () => {
		expect(() => parseSummary(bytes({ summary: { totalCycles: -1 } }))).toThrow(
			'Invalid result summary at totalCycles',
		);
		expect(() => parseSummary(bytes({ summary: { totalCycles: 1 } }))).not.toThrow();
		expect(() => parseSummary(bytes([1, 2]))).toThrow(FormatError);
	});
});
