#!/usr/bin/env node

import process from 'node:process';
import path from 'node:path';
import meow from 'meow';
import {loadConfig} from './core/config.js';
import {formatListing} from './core/format.js';
import {computeSwitches} from './core/listing.js';
import {createLsHost} from './core/ls-host.js';
import {renderNumberedMenu} from './core/menu.js';
import {
	SORT_MODES,
	createDirectoryView,
	createViewState,
	isSortMode,
} from './core/sort-state.js';
import type {SortConfig, SortMode} from './core/types.js';
import {createWorkspace, visitDirectory} from './core/workspace.js';
import {runInteractiveApp} from './index.js';

const cli = meow(
	`
	Usage
	  $ dired-sort [options]

	Description
	  Browse a directory listing and switch its sort order
	  (name, date, extension, each reversible) and hidden-file visibility.

	Options
	  --cwd=<path>    Directory to open (default: current working dir)
	  --all, -a       Show hidden files
	  --sort=<mode>   Initial sort mode: ${SORT_MODES.join(', ')}
	  --print         Print the listing once, then exit
	  --switches      Print the ls switches for the chosen mode, then exit
	  --menu          Print the numbered sort menu, then exit

	Examples
	  $ dired-sort
	  $ dired-sort --sort=date-reverse --print
	  $ dired-sort -a --cwd=./src
	`,
	{
		importMeta: import.meta,
		booleanDefault: undefined,
		flags: {
			cwd: {
				type: 'string',
			},
			all: {
				type: 'boolean',
				shortFlag: 'a',
			},
			sort: {
				type: 'string',
			},
			print: {
				type: 'boolean',
				default: false,
			},
			switches: {
				type: 'boolean',
				default: false,
			},
			menu: {
				type: 'boolean',
				default: false,
			},
		},
	},
);

const writeLines = (lines: readonly string[]): void => {
	process.stdout.write(`${lines.join('\n')}\n`);
};

const main = async (): Promise<void> => {
	const cwd = cli.flags.cwd ? path.resolve(cli.flags.cwd) : process.cwd();
	const sortFlag = cli.flags.sort;
	let sortMode: SortMode | undefined;
	if (typeof sortFlag === 'string') {
		if (!isSortMode(sortFlag)) {
			process.stderr.write(
				`Invalid --sort value: "${sortFlag}". Expected one of: ${SORT_MODES.join(', ')}\n`,
			);
			process.exitCode = 1;
			return;
		}

		sortMode = sortFlag;
	}

	const loadedConfig = await loadConfig(cwd);
	const config: SortConfig = {
		showHidden:
			typeof cli.flags.all === 'boolean'
				? cli.flags.all
				: loadedConfig.showHidden,
	};

	if (cli.flags.switches || cli.flags.menu) {
		const view = createDirectoryView(cwd, createViewState(config, sortMode));
		writeLines(
			cli.flags.menu
				? renderNumberedMenu(view)
				: [computeSwitches(view.state)],
		);
		return;
	}

	if (cli.flags.print) {
		const workspace = createWorkspace(config, sortMode);
		const view = visitDirectory(workspace, cwd, createLsHost());
		writeLines(formatListing(view, {showCursor: false}));
		return;
	}

	await runInteractiveApp({cwd, config, sortMode});
};

await main();
