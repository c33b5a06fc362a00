import fs from 'node:fs/promises';
import path from 'node:path';
import type {SortConfig} from './types.js';

export const CONFIG_PACKAGE_KEY = 'dired-sort';
export const CONFIG_RC_FILE = '.dired-sortrc.json';
export const DEFAULT_SHOW_HIDDEN = false;

export const DEFAULT_CONFIG: SortConfig = {
	showHidden: DEFAULT_SHOW_HIDDEN,
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const parseBoolean = (value: unknown, fallback = false): boolean =>
	typeof value === 'boolean' ? value : fallback;

export const normalizeConfig = (value: unknown): SortConfig => {
	const raw = isRecord(value) ? value : {};

	return {
		showHidden: parseBoolean(raw.showHidden, DEFAULT_SHOW_HIDDEN),
	};
};

const readJson = async (filePath: string): Promise<Record<string, unknown>> => {
	try {
		const content = await fs.readFile(filePath, 'utf8');
		const parsed = JSON.parse(content) as unknown;
		return isRecord(parsed) ? parsed : {};
	} catch {
		return {};
	}
};

export const loadConfig = async (cwd: string): Promise<SortConfig> => {
	const packageJson = await readJson(path.join(cwd, 'package.json'));
	const packageSection = packageJson[CONFIG_PACKAGE_KEY];
	const packageConfig = isRecord(packageSection) ? packageSection : {};
	const rcConfig = await readJson(path.join(cwd, CONFIG_RC_FILE));

	return normalizeConfig({
		...DEFAULT_CONFIG,
		...packageConfig,
		...rcConfig,
	});
};
