export interface WorkloadEntry {
	readonly name: string;
	readonly size: number;
	readonly sha256: string;
	readonly dataBase64: string;
}

/** Plaintext packed and encrypted for upload. Serialized as UTF-8 JSON. */
export interface WorkloadBundle {
	readonly version: 1;
	readonly targetCore: string;
	readonly createdAt: string;
	readonly workloads: readonly WorkloadEntry[];
}
