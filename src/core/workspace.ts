import path from 'node:path';
import {autoReapply} from './listing.js';
import {
	DEFAULT_SORT_MODE,
	createDirectoryView,
	createViewState,
} from './sort-state.js';
import type {DirectoryView, ListingHost, SortConfig, SortMode} from './types.js';

export interface Workspace {
	config: SortConfig;
	initialSortMode: SortMode;
	views: Map<string, DirectoryView>;
	history: string[];
}

export const createWorkspace = (
	config: SortConfig,
	initialSortMode: SortMode = DEFAULT_SORT_MODE,
): Workspace => ({
	config,
	initialSortMode,
	views: new Map<string, DirectoryView>(),
	history: [],
});

export const getCurrentView = (
	workspace: Workspace,
): DirectoryView | undefined => {
	const directory = workspace.history.at(-1);
	return directory === undefined ? undefined : workspace.views.get(directory);
};

export const visitDirectory = (
	workspace: Workspace,
	directory: string,
	host: ListingHost,
): DirectoryView => {
	const resolved = path.resolve(directory);
	let view = workspace.views.get(resolved);
	if (!view) {
		view = createDirectoryView(
			resolved,
			createViewState(workspace.config, workspace.initialSortMode),
		);
		workspace.views.set(resolved, view);
	}

	workspace.history = [
		...workspace.history.filter(entry => entry !== resolved),
		resolved,
	];
	autoReapply(view, host);
	return view;
};

export const closeView = (
	workspace: Workspace,
	directory: string,
	host: ListingHost,
): DirectoryView | undefined => {
	const resolved = path.resolve(directory);
	workspace.views.delete(resolved);
	workspace.history = workspace.history.filter(entry => entry !== resolved);

	const next = getCurrentView(workspace);
	if (next) autoReapply(next, host);
	return next;
};
