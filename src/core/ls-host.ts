import {spawnSync} from 'node:child_process';
import {splitSwitches} from './listing.js';
import type {DirectoryView, ListingHost} from './types.js';

export interface LsHostOptions {
	command?: string;
}

interface LsRun {
	ok: boolean;
	lines: string[];
	message: string;
}

const toLines = (output: string): string[] =>
	output.split('\n').filter(line => line.length > 0);

const runLs = (command: string, args: string[], cwd?: string): LsRun => {
	const result = spawnSync(command, args, {cwd, encoding: 'utf8'});
	if (result.error) {
		return {ok: false, lines: [], message: result.error.message};
	}

	if (result.status !== 0) {
		const stderr = typeof result.stderr === 'string' ? result.stderr : '';
		return {
			ok: false,
			lines: [],
			message: stderr.trim() || `exited with code ${String(result.status)}`,
		};
	}

	const stdout = typeof result.stdout === 'string' ? result.stdout : '';
	return {ok: true, lines: toLines(stdout), message: ''};
};

export const createLsHost = ({
	command = 'ls',
}: LsHostOptions = {}): ListingHost => ({
	redraw(view: DirectoryView, switches: string) {
		const run = runLs(command, [
			...splitSwitches(switches),
			'--',
			view.directory,
		]);
		view.lines = run.ok
			? [`${view.directory}:`, ...run.lines]
			: [`${view.directory}:`, `ls: ${run.message}`];
	},
	describeParent(directory: string) {
		const run = runLs(command, ['-ld', '..'], directory);
		if (!run.ok) return null;
		return run.lines[0] ?? null;
	},
});
