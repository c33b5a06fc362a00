import type {CommandEntry, DirectoryView} from './types.js';

const defineCommand = (entry: CommandEntry): CommandEntry =>
	Object.freeze({...entry, action: Object.freeze({...entry.action})});

export const COMMAND_TABLE: readonly CommandEntry[] = Object.freeze([
	defineCommand({
		id: 'sort-name',
		keyHint: 'n',
		description: 'Sort by name',
		action: {type: 'sort', mode: 'name'},
	}),
	defineCommand({
		id: 'sort-name-reverse',
		keyHint: 'N',
		description: 'Sort by name, reversed',
		action: {type: 'sort', mode: 'name-reverse'},
	}),
	defineCommand({
		id: 'sort-date',
		keyHint: 'd',
		description: 'Sort by date, oldest first',
		action: {type: 'sort', mode: 'date'},
	}),
	defineCommand({
		id: 'sort-date-reverse',
		keyHint: 'D',
		description: 'Sort by date, newest first',
		action: {type: 'sort', mode: 'date-reverse'},
	}),
	defineCommand({
		id: 'sort-extension',
		keyHint: 'x',
		description: 'Sort by extension',
		action: {type: 'sort', mode: 'extension'},
	}),
	defineCommand({
		id: 'sort-extension-reverse',
		keyHint: 'X',
		description: 'Sort by extension, reversed',
		action: {type: 'sort', mode: 'extension-reverse'},
	}),
	defineCommand({
		id: 'toggle-hidden',
		keyHint: '.',
		description: 'Toggle hidden files',
		action: {type: 'toggle-hidden'},
	}),
	defineCommand({
		id: 'show-menu',
		keyHint: 'm',
		description: 'Show sort menu',
		action: {type: 'menu', menu: 'numbered'},
	}),
	defineCommand({
		id: 'show-completion',
		keyHint: '/',
		description: 'Search sort commands',
		action: {type: 'menu', menu: 'completion'},
	}),
]);

export const isActive = (entry: CommandEntry, view: DirectoryView): boolean => {
	switch (entry.action.type) {
		case 'sort':
			return view.state.sortMode === entry.action.mode;
		case 'toggle-hidden':
			return view.state.showHidden;
		case 'menu':
			return false;
	}
};

export const findCommandByKey = (key: string): CommandEntry | undefined =>
	COMMAND_TABLE.find(entry => entry.keyHint === key);
