#!/usr/bin/env node

import { isatty } from 'node:tty';
import { runCli } from './index.js';

// No arguments on a terminal: show help rather than nothing.
if (process.argv.length <= 2 && isatty(0)) {
	process.argv.push('--help');
}

await runCli();
