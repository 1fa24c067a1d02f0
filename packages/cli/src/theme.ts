import { JobState } from '@perfvault/core';
import chalk, { type ChalkInstance } from 'chalk';

// ---------------------------------------------------------------------------
// Terminal palette. Colour only carries meaning: green, amber, red.
// ---------------------------------------------------------------------------

export const success: ChalkInstance = chalk.green;
export const warn: ChalkInstance = chalk.yellow;
export const danger: ChalkInstance = chalk.red;
export const accent: ChalkInstance = chalk.cyan;
export const dim: ChalkInstance = chalk.dim;
export const bold: ChalkInstance = chalk.bold;

export function stateColor(state: JobState): string {
	switch (state) {
		case JobState.SUCCEEDED:
			return success(state);
		case JobState.RUNNING:
		case JobState.QUEUED:
		case JobState.UPLOADING:
			return warn(state);
		case JobState.FAILED:
		case JobState.EXPIRED:
			return danger(state);
		default:
			return dim(state);
	}
}

export function successMark(text: string): string {
	return `${success('✓')} ${text}`;
}

export function failMark(text: string): string {
	return `${danger('✕')} ${text}`;
}

export const BRAND_LINE = `${bold('perfvault')} ${dim('encrypted workload analysis')}`;

export function section(label: string): void {
	console.log('');
	console.log(`  ${bold(label)}`);
	console.log(dim(`  ${'-'.repeat(40)}`));
}
