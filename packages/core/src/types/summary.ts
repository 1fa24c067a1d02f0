export interface WorkloadSummary {
	readonly name: string;
	readonly cycles: number;
	readonly instructions?: number;
}

export interface ExperimentSummary {
	readonly totalCycles: number;
	readonly totalInstructions?: number;
	readonly ipc?: number;
	readonly workloads: readonly WorkloadSummary[];
}
