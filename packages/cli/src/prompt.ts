import { stdin, stdout } from 'node:process';
import { createInterface } from 'node:readline/promises';
import { Writable } from 'node:stream';

/** Ask one question on the terminal. Returns the trimmed answer. */
export async function promptLine(question: string): Promise<string> {
	const rl = createInterface({ input: stdin, output: stdout });
	try {
		return (await rl.question(question)).trim();
	} finally {
		rl.close();
	}
}

/**
 * Prompt for hidden input (API key, shared secret).
 * Characters typed are not echoed to the terminal.
 */
export async function promptHidden(question: string): Promise<string> {
	let muted = false;
	const output = new Writable({
		write(chunk, encoding, callback) {
			if (!muted) stdout.write(chunk, encoding);
			callback();
		},
	});

	const rl = createInterface({ input: stdin, output, terminal: true });
	stdout.write(question);
	muted = true;
	try {
		return await rl.question('');
	} finally {
		muted = false;
		rl.close();
		stdout.write('\n');
	}
}
