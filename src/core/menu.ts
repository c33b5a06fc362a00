import {COMMAND_TABLE, isActive} from './commands.js';
import type {CommandEntry, CompletionCandidate, DirectoryView} from './types.js';

interface ColumnWidths {
	index: number;
	description: number;
	keyHint: number;
}

const measureColumns = (entries: readonly CommandEntry[]): ColumnWidths => ({
	index: String(entries.length).length,
	description: Math.max(0, ...entries.map(entry => entry.description.length)),
	keyHint: Math.max(0, ...entries.map(entry => entry.keyHint.length)),
});

export const renderNumberedMenu = (
	view: DirectoryView,
	entries: readonly CommandEntry[] = COMMAND_TABLE,
): string[] => {
	const widths = measureColumns(entries);
	return entries.map((entry, index) => {
		const number = String(index + 1).padStart(widths.index);
		const marker = isActive(entry, view) ? '*' : ' ';
		const description = entry.description.padEnd(widths.description);
		const keyHint = entry.keyHint.padEnd(widths.keyHint);
		return `${number}  [${marker}] ${description}  ${keyHint}`;
	});
};

export const renderCompletionCandidates = (
	view: DirectoryView,
	entries: readonly CommandEntry[] = COMMAND_TABLE,
): CompletionCandidate[] => {
	const widths = measureColumns(entries);
	return entries.map((entry, index) => {
		const number = String(index + 1).padStart(widths.index);
		const description = entry.description.padEnd(widths.description);
		return {
			label: `${number}. ${description} (${entry.keyHint})`,
			entry,
			active: isActive(entry, view),
		};
	});
};

export const parseMenuChoice = (
	input: string,
	entryCount: number = COMMAND_TABLE.length,
): number | null => {
	const trimmed = input.trim();
	if (!/^[+-]?\d+$/.test(trimmed)) return null;

	const choice = Number.parseInt(trimmed, 10);
	if (choice < 1 || choice > entryCount) return null;
	return choice;
};
