import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {expect, test} from 'vitest';
import {createLsHost} from '../../src/core/ls-host.js';
import {
	createDirectoryView,
	createViewState,
} from '../../src/core/sort-state.js';

const createTempDirectory = async (): Promise<string> =>
	fs.mkdtemp(path.join(os.tmpdir(), 'dired-sort-ls-'));

test('describeParent returns the metadata line of the parent directory', async () => {
	const cwd = await createTempDirectory();

	const line = createLsHost().describeParent(cwd);

	expect(line).not.toBeNull();
	expect(line?.startsWith('d')).toBe(true);
	expect(line?.endsWith(' ..')).toBe(true);
});

test('describeParent returns null when ls cannot run', () => {
	const missing = path.join(os.tmpdir(), 'dired-sort-missing', 'nowhere');

	expect(createLsHost().describeParent(missing)).toBeNull();
	expect(
		createLsHost({command: 'dired-sort-no-such-ls'}).describeParent(
			os.tmpdir(),
		),
	).toBeNull();
});

test('redraw writes a header line followed by the ls output', async () => {
	const cwd = await createTempDirectory();
	await fs.writeFile(path.join(cwd, 'notes.txt'), 'hello');
	const view = createDirectoryView(cwd, createViewState({showHidden: false}));

	createLsHost().redraw(view, '-l');

	expect(view.lines[0]).toBe(`${cwd}:`);
	expect(view.lines[1].startsWith('total')).toBe(true);
	expect(view.lines).toHaveLength(3);
	expect(view.lines[2].endsWith(' notes.txt')).toBe(true);
});

test('redraw reports a failing ls in the buffer', () => {
	const view = createDirectoryView(
		os.tmpdir(),
		createViewState({showHidden: false}),
	);

	createLsHost({command: 'dired-sort-no-such-ls'}).redraw(view, '-l');

	expect(view.lines).toHaveLength(2);
	expect(view.lines[0]).toBe(`${os.tmpdir()}:`);
	expect(view.lines[1].startsWith('ls: ')).toBe(true);
});
