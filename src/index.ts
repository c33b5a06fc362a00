import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import {cancel, intro, isCancel, log, note, outro, text} from '@clack/prompts';
import {COMMAND_TABLE, findCommandByKey} from './core/commands.js';
import {invokeCommand} from './core/dispatch.js';
import {formatListing, formatModeLine} from './core/format.js';
import {createLsHost} from './core/ls-host.js';
import {moveCursorByLines} from './core/listing.js';
import type {
	CommandContext,
	DirectoryView,
	SortConfig,
	SortMode,
} from './core/types.js';
import {closeView, createWorkspace, visitDirectory} from './core/workspace.js';
import {createClackPrompter} from './ui/prompter.js';

export interface RuntimeProps {
	cwd?: string;
	config: SortConfig;
	sortMode?: SortMode;
}

const COMMAND_HINT = [
	...COMMAND_TABLE.map(entry => entry.keyHint),
	'j/k move',
	'cd <dir>',
	'close',
	'q quit',
].join('  ');

const isDirectory = async (target: string): Promise<boolean> => {
	try {
		const stats = await fs.stat(target);
		return stats.isDirectory();
	} catch {
		return false;
	}
};

const renderView = (view: DirectoryView): void => {
	note(
		[...formatListing(view), '', formatModeLine(view)].join('\n'),
		view.directory,
	);
};

export const runInteractiveApp = async ({
	cwd = process.cwd(),
	config,
	sortMode,
}: RuntimeProps): Promise<void> => {
	intro('dired-sort');

	const host = createLsHost();
	const context: CommandContext = {host, prompter: createClackPrompter()};
	const workspace = createWorkspace(config, sortMode);
	let view: DirectoryView | undefined = visitDirectory(workspace, cwd, host);

	while (view) {
		renderView(view);

		const input = await text({
			message: 'Command:',
			placeholder: COMMAND_HINT,
		});
		if (isCancel(input)) {
			cancel('Closed.');
			return;
		}

		const command = (input ?? '').trim();
		if (command === 'q') break;

		if (command === 'j' || command === 'k') {
			moveCursorByLines(view, command === 'j' ? 1 : -1);
			continue;
		}

		if (command === 'close') {
			view = closeView(workspace, view.directory, host);
			continue;
		}

		if (command.startsWith('cd ')) {
			const target = path.resolve(view.directory, command.slice(3).trim());
			if (!(await isDirectory(target))) {
				log.warn(`Not a directory: ${target}`);
				continue;
			}

			view = visitDirectory(workspace, target, host);
			continue;
		}

		const entry = findCommandByKey(command);
		if (!entry) {
			log.warn(`Unknown command: ${command}`);
			continue;
		}

		await invokeCommand(entry, view, context);
	}

	outro('Bye.');
};
