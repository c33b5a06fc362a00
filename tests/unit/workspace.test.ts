import {expect, test} from 'vitest';
import {setSortMode} from '../../src/core/sort-state.js';
import type {ListingHost} from '../../src/core/types.js';
import {
	closeView,
	createWorkspace,
	getCurrentView,
	visitDirectory,
} from '../../src/core/workspace.js';

const createFakeHost = () => {
	const redraws: Array<[string, string]> = [];
	const host: ListingHost = {
		redraw(view, switches) {
			redraws.push([view.directory, switches]);
			view.lines = [`${view.directory}:`, 'total 0'];
		},
		describeParent: () => 'drwxr-xr-x 3 dev dev 4.0K Jan  1 00:00 ..',
	};
	return {host, redraws};
};

test('visitDirectory creates one view per directory and applies it', () => {
	const {host, redraws} = createFakeHost();
	const workspace = createWorkspace({showHidden: false});

	const view = visitDirectory(workspace, '/tmp/alpha', host);

	expect(view.directory).toBe('/tmp/alpha');
	expect(view.lines).toEqual([
		'/tmp/alpha:',
		'total 0',
		'drwxr-xr-x 3 dev dev 4.0K Jan  1 00:00 ..',
	]);
	expect(redraws).toEqual([['/tmp/alpha', '-lh --group-directories-first ']]);
	expect(getCurrentView(workspace)).toBe(view);
});

test('views keep their own state across buffer switches', () => {
	const {host, redraws} = createFakeHost();
	const workspace = createWorkspace({showHidden: false});

	const alpha = visitDirectory(workspace, '/tmp/alpha', host);
	setSortMode(alpha, 'date-reverse');
	const beta = visitDirectory(workspace, '/tmp/beta', host);
	const again = visitDirectory(workspace, '/tmp/alpha', host);

	expect(again).toBe(alpha);
	expect(beta.state).not.toBe(alpha.state);
	expect(beta.state.sortMode).toBe('name');
	expect(redraws).toEqual([
		['/tmp/alpha', '-lh --group-directories-first '],
		['/tmp/beta', '-lh --group-directories-first '],
		['/tmp/alpha', '-lh --group-directories-first -t'],
	]);
	expect(workspace.history).toEqual(['/tmp/beta', '/tmp/alpha']);
});

test('new views take the configured visibility and initial sort mode', () => {
	const {host, redraws} = createFakeHost();
	const workspace = createWorkspace({showHidden: true}, 'extension');

	const view = visitDirectory(workspace, '/tmp/alpha', host);

	expect(view.state.showHidden).toBe(true);
	expect(view.state.sortMode).toBe('extension');
	expect(view.lines).toEqual(['/tmp/alpha:', 'total 0']);
	expect(redraws).toEqual([['/tmp/alpha', '-Alh --group-directories-first -X']]);
});

test('closeView discards the view and re-applies the previous one', () => {
	const {host, redraws} = createFakeHost();
	const workspace = createWorkspace({showHidden: false});

	const alpha = visitDirectory(workspace, '/tmp/alpha', host);
	visitDirectory(workspace, '/tmp/beta', host);

	expect(closeView(workspace, '/tmp/beta', host)).toBe(alpha);
	expect(workspace.views.has('/tmp/beta')).toBe(false);
	expect(redraws).toHaveLength(3);

	expect(closeView(workspace, '/tmp/alpha', host)).toBeUndefined();
	expect(workspace.views.size).toBe(0);
	expect(getCurrentView(workspace)).toBeUndefined();
});
