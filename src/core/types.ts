export type SortMode =
	| 'name'
	| 'name-reverse'
	| 'date'
	| 'date-reverse'
	| 'extension'
	| 'extension-reverse';

export interface SortConfig {
	showHidden: boolean;
}

export interface ViewState {
	sortMode: SortMode;
	showHidden: boolean;
	dirty: boolean;
	applying: boolean;
}

export interface DirectoryView {
	kind: 'directory';
	directory: string;
	state: ViewState;
	lines: string[];
	// Character offset into lines joined with '\n'.
	cursor: number;
}

export interface TextBuffer {
	kind: 'text';
	name: string;
}

export type EditorBuffer = DirectoryView | TextBuffer;

export interface ListingHost {
	redraw: (view: DirectoryView, switches: string) => void;
	describeParent: (directory: string) => string | null;
}

export type CommandAction =
	| {
			type: 'sort';
			mode: SortMode;
	  }
	| {
			type: 'toggle-hidden';
	  }
	| {
			type: 'menu';
			menu: 'numbered' | 'completion';
	  };

export type CommandId =
	| 'sort-name'
	| 'sort-name-reverse'
	| 'sort-date'
	| 'sort-date-reverse'
	| 'sort-extension'
	| 'sort-extension-reverse'
	| 'toggle-hidden'
	| 'show-menu'
	| 'show-completion';

export interface CommandEntry {
	readonly id: CommandId;
	readonly keyHint: string;
	readonly description: string;
	readonly action: CommandAction;
}

export interface CompletionCandidate {
	label: string;
	entry: CommandEntry;
	active: boolean;
}

export interface MenuPrompter {
	chooseNumber: (lines: readonly string[]) => Promise<string | null>;
	chooseCandidate: (
		candidates: readonly CompletionCandidate[],
	) => Promise<CommandEntry | null>;
	notify: (message: string) => void;
}

export interface CommandContext {
	host: ListingHost;
	prompter: MenuPrompter;
}

export type MenuOutcome =
	| {
			kind: 'invoked';
			entry: CommandEntry;
	  }
	| {
			kind: 'invalid';
			input: string;
	  }
	| {
			kind: 'cancelled';
	  };
