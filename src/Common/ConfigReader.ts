/**
 * Reads configuration documents from disk.
 * This is a generic config reader, not tied to the application event bus or any specific runtime.
 */
import { readFile } from 'fs/promises';
import { ValidationError } from './Errors.js';

/**
 * Loads and parses a config file (JSON or YAML). Does not emit any application events.
 * @param configPath string - Path to config file (e.g. './config/config.json')
 * @returns Promise<unknown> - Parsed document, still unvalidated
 * @throws ValidationError for an unsupported extension; read and parse errors propagate
 * @example
 * const raw = await readConfigFile('./config/config.yaml');
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
    const raw = await readFile(configPath, `utf-8`);
    return parseConfigText(raw, configPath);
}

/**
 * Parses config text, choosing the format from the file extension.
 * @example
 * parseConfigText('backend: memory', 'config.yml'); // { backend: 'memory' }
 */
export async function parseConfigText(raw: string, configPath: string): Promise<unknown> {
    const lower = configPath.toLowerCase();

    if (lower.endsWith(`.json`)) {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
    }
    if (lower.endsWith(`.yaml`) || lower.endsWith(`.yml`)) {
        // Lazy-load yaml parser only if needed
        const yaml = await import(`js-yaml`);
        return yaml.load(raw);
    }
    throw new ValidationError(`Unsupported config file format. Use .json or .yaml`, { path: configPath });
}
