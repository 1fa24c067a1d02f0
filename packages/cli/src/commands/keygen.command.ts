import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { type RecipientKeyType, generateRecipientKeyPair } from '@perfvault/client';
import { Command, Option } from 'commander';
import { expandHome } from '../client-factory.js';
import { bold, danger, dim, successMark } from '../theme.js';

const KEY_TYPES: readonly RecipientKeyType[] = ['x25519', 'p256', 'rsa'];

interface KeygenFlags {
	readonly type: string;
	readonly out: string;
	readonly force?: boolean;
}

function isKeyType(value: string): value is RecipientKeyType {
	return KEY_TYPES.some((type) => type === value);
}

export function keygenCommand(): Command {
	return new Command('keygen')
		.description('Generate a key pair to receive results with')
		.addOption(
			new Option('-t, --type <type>', 'Key type').choices([...KEY_TYPES]).default('x25519'),
		)
		.option('-o, --out <prefix>', 'Output path prefix', 'perfvault-result')
		.option('-f, --force', 'Overwrite existing files')
		.action(async (flags: KeygenFlags) => {
			if (!isKeyType(flags.type)) {
				console.error(danger(`\n  Error: Unknown key type: ${flags.type}\n`));
				process.exitCode = 1;
				return;
			}

			const prefix = expandHome(flags.out);
			const privatePath = `${prefix}.key.pem`;
			const publicPath = `${prefix}.pub.pem`;

			if (!flags.force && (existsSync(privatePath) || existsSync(publicPath))) {
				console.error(danger(`\n  Error: ${privatePath} or ${publicPath} already exists. Use --force to overwrite.\n`));
				process.exitCode = 1;
				return;
			}

			const pair = generateRecipientKeyPair(flags.type);
			await writeFile(privatePath, pair.privateKeyPem, { encoding: 'utf-8', mode: 0o600 });
			await writeFile(publicPath, pair.publicKeyPem, { encoding: 'utf-8', mode: 0o644 });

			console.log('');
			console.log(`  ${successMark(`Generated ${bold(flags.type)} key pair`)}`);
			console.log(dim(`  Private: ${privatePath}`));
			console.log(dim(`  Public:  ${publicPath}\n`));
		});
}
