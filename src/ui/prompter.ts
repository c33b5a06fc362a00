import {autocomplete, isCancel, log, note, text} from '@clack/prompts';
import type {CommandId, MenuPrompter} from '../core/types.js';

export const createClackPrompter = (): MenuPrompter => ({
	async chooseNumber(lines) {
		note(lines.join('\n'), 'Sort menu');
		const answer = await text({
			message: `Choose an entry (1-${lines.length}):`,
			placeholder: 'Press Esc to cancel',
		});
		if (isCancel(answer)) return null;
		return answer ?? '';
	},
	async chooseCandidate(candidates) {
		const picked = await autocomplete<CommandId>({
			message: 'Sort command:',
			placeholder: 'Type to filter',
			maxItems: candidates.length,
			options: candidates.map(candidate => ({
				value: candidate.entry.id,
				label: candidate.label,
				hint: candidate.active ? 'active' : undefined,
			})),
		});
		if (isCancel(picked)) return null;

		const match = candidates.find(candidate => candidate.entry.id === picked);
		return match?.entry ?? null;
	},
	notify(message) {
		log.warn(message);
	},
});
