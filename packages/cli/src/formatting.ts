import type { ExperimentSummary } from '@perfvault/core';

// ---------------------------------------------------------------------------
// Shared formatting utilities for the CLI.
// ---------------------------------------------------------------------------

const BYTE_UNITS = ['B', 'KiB', 'MiB', 'GiB'];

export function formatBytes(bytes: number): string {
	let value = bytes;
	let unit = 0;
	while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
		value /= 1024;
		unit += 1;
	}
	return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

/** `1h 2m`, `3m 4s`, `5s`, `120ms`. Negative durations read as `expired`. */
export function formatDuration(ms: number): string {
	if (ms < 0) return 'expired';
	if (ms < 1_000) return `${Math.round(ms)}ms`;
	const totalSeconds = Math.floor(ms / 1_000);
	const hours = Math.floor(totalSeconds / 3_600);
	const minutes = Math.floor((totalSeconds % 3_600) / 60);
	const seconds = totalSeconds % 60;
	if (hours > 0) return `${hours}h ${minutes}m`;
	if (minutes > 0) return `${minutes}m ${seconds}s`;
	return `${seconds}s`;
}

/** Groups thousands: 1234567 -> 1,234,567. */
export function formatCount(value: number): string {
	return value.toLocaleString('en-US');
}

/** Plain-text summary lines, two-space indented. */
export function summaryLines(summary: ExperimentSummary): string[] {
	const lines = [`  Total cycles:       ${formatCount(summary.totalCycles)}`];
	if (summary.totalInstructions !== undefined) {
		lines.push(`  Total instructions: ${formatCount(summary.totalInstructions)}`);
	}
	if (summary.ipc !== undefined) {
		lines.push(`  IPC:                ${summary.ipc.toFixed(3)}`);
	}
	for (const workload of summary.workloads) {
		lines.push(`    ${workload.name.padEnd(24)} ${formatCount(workload.cycles)} cycles`);
	}
	return lines;
}
