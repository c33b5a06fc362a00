import {SORT_SWITCHES, getCursorLine} from './listing.js';
import type {DirectoryView, SortMode} from './types.js';

const SORT_LABELS: Record<SortMode, string> = {
	name: 'name',
	'name-reverse': 'name (reversed)',
	date: 'date (oldest first)',
	'date-reverse': 'date (newest first)',
	extension: 'extension',
	'extension-reverse': 'extension (reversed)',
};

export const formatListing = (
	view: DirectoryView,
	{showCursor = true}: {showCursor?: boolean} = {},
): string[] => {
	if (!showCursor) return [...view.lines];

	const cursorLine = getCursorLine(view);
	return view.lines.map(
		(line, index) => `${index === cursorLine ? '>' : ' '} ${line}`,
	);
};

export const formatModeLine = (view: DirectoryView): string => {
	const hidden = view.state.showHidden ? 'shown' : 'hidden';
	const fragment = SORT_SWITCHES[view.state.sortMode];
	const switches = fragment ? ` [${fragment}]` : '';
	return `Sort: ${SORT_LABELS[view.state.sortMode]}${switches} | Hidden files: ${hidden}`;
};
