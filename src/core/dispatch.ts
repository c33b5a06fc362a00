import {COMMAND_TABLE} from './commands.js';
import {applyListing} from './listing.js';
import {
	parseMenuChoice,
	renderCompletionCandidates,
	renderNumberedMenu,
} from './menu.js';
import {setSortMode, toggleVisibility} from './sort-state.js';
import type {
	CommandContext,
	CommandEntry,
	DirectoryView,
	MenuOutcome,
} from './types.js';

export const invokeCommand = async (
	entry: CommandEntry,
	view: DirectoryView,
	context: CommandContext,
): Promise<void> => {
	switch (entry.action.type) {
		case 'sort':
			setSortMode(view, entry.action.mode);
			break;
		case 'toggle-hidden':
			toggleVisibility(view);
			break;
		case 'menu':
			if (entry.action.menu === 'numbered') {
				await showMenu(view, context);
			} else {
				await showCompletion(view, context);
			}
			return;
	}

	if (view.state.dirty) {
		applyListing(view, context.host);
	}
};

export const showMenu = async (
	view: DirectoryView,
	context: CommandContext,
): Promise<MenuOutcome> => {
	const input = await context.prompter.chooseNumber(renderNumberedMenu(view));
	if (input === null) return {kind: 'cancelled'};

	const choice = parseMenuChoice(input, COMMAND_TABLE.length);
	if (choice === null) {
		context.prompter.notify(`Invalid selection: ${input.trim()}`);
		return {kind: 'invalid', input};
	}

	const entry = COMMAND_TABLE[choice - 1];
	await invokeCommand(entry, view, context);
	return {kind: 'invoked', entry};
};

export const showCompletion = async (
	view: DirectoryView,
	context: CommandContext,
): Promise<MenuOutcome> => {
	const entry = await context.prompter.chooseCandidate(
		renderCompletionCandidates(view),
	);
	if (entry === null) return {kind: 'cancelled'};

	await invokeCommand(entry, view, context);
	return {kind: 'invoked', entry};
};
