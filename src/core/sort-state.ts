import type {DirectoryView, SortConfig, SortMode, ViewState} from './types.js';

export const SORT_MODES: readonly SortMode[] = [
	'name',
	'name-reverse',
	'date',
	'date-reverse',
	'extension',
	'extension-reverse',
];

export const DEFAULT_SORT_MODE: SortMode = 'name';

export const isSortMode = (value: unknown): value is SortMode =>
	typeof value === 'string' && SORT_MODES.some(mode => mode === value);

export const createViewState = (
	config: SortConfig,
	sortMode: SortMode = DEFAULT_SORT_MODE,
): ViewState => ({
	sortMode,
	showHidden: config.showHidden,
	dirty: true,
	applying: false,
});

export const createDirectoryView = (
	directory: string,
	state: ViewState,
): DirectoryView => ({
	kind: 'directory',
	directory,
	state,
	lines: [],
	cursor: 0,
});

export const setSortMode = (view: DirectoryView, mode: SortMode): void => {
	view.state.sortMode = mode;
	view.state.dirty = true;
};

export const toggleVisibility = (view: DirectoryView): void => {
	view.state.showHidden = !view.state.showHidden;
	view.state.dirty = true;
};
