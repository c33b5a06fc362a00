import type {
	DirectoryView,
	EditorBuffer,
	ListingHost,
	SortMode,
	ViewState,
} from './types.js';

export const VISIBLE_SWITCHES = '-Alh --group-directories-first';
export const HIDDEN_SWITCHES = '-lh --group-directories-first';
export const HEADER_LINE_COUNT = 2;

export const SORT_SWITCHES: Record<SortMode, string> = {
	name: '',
	'name-reverse': '-r',
	date: '-t -r',
	'date-reverse': '-t',
	extension: '-X',
	'extension-reverse': '-X -r',
};

export const computeSwitches = (
	state: Pick<ViewState, 'showHidden' | 'sortMode'>,
): string => {
	const base = state.showHidden ? VISIBLE_SWITCHES : HIDDEN_SWITCHES;
	return `${base} ${SORT_SWITCHES[state.sortMode]}`;
};

export const splitSwitches = (switches: string): string[] =>
	switches.split(/\s+/).filter(token => token.length > 0);

export const getBufferEnd = (lines: readonly string[]): number =>
	lines.join('\n').length;

export const getCursorLine = (view: DirectoryView): number => {
	let offset = 0;
	for (const [index, line] of view.lines.entries()) {
		offset += line.length + 1;
		if (view.cursor < offset) return index;
	}

	return Math.max(0, view.lines.length - 1);
};

export const moveCursorByLines = (view: DirectoryView, delta: number): void => {
	if (view.lines.length === 0) {
		view.cursor = 0;
		return;
	}

	const target = Math.max(
		0,
		Math.min(view.lines.length - 1, getCursorLine(view) + delta),
	);
	let offset = 0;
	for (let index = 0; index < target; index++) {
		offset += view.lines[index].length + 1;
	}

	view.cursor = offset;
};

const insertParentEntry = (view: DirectoryView, host: ListingHost): void => {
	const parentLine = host.describeParent(view.directory);
	if (!parentLine) return;

	const insertAt = Math.min(HEADER_LINE_COUNT, view.lines.length);
	view.lines.splice(insertAt, 0, parentLine);
};

/**
 * Redraws the view with switches derived from its state. When hidden files are
 * suppressed, ls omits `..`, so its metadata line is inserted after the header.
 * Returns false when a redraw for this view is already in progress.
 */
export const applyListing = (
	view: DirectoryView,
	host: ListingHost,
): boolean => {
	if (view.state.applying) return false;

	view.state.applying = true;
	try {
		const capturedCursor = view.cursor;
		host.redraw(view, computeSwitches(view.state));
		if (!view.state.showHidden) {
			insertParentEntry(view, host);
		}

		view.cursor = Math.max(
			0,
			Math.min(capturedCursor, getBufferEnd(view.lines)),
		);
		view.state.dirty = false;
	} finally {
		view.state.applying = false;
	}

	return true;
};

export const autoReapply = (
	buffer: EditorBuffer,
	host: ListingHost,
): boolean => {
	if (buffer.kind !== 'directory') return false;
	return applyListing(buffer, host);
};
