/**
 * Local Settings Store
 *
 * Single JSON record at <FACES_DIR>/settings.json, cached in memory after the
 * first read. Saving replaces the whole record.
 */

import fs from 'fs/promises';
import path from 'path';
import { ISettingsStore } from '../interfaces/storage.interface.js';
import {
    DEFAULT_SETTINGS,
    ServerSettings,
    getEffectiveSettings,
    storedSettingsSchema,
    toStoredSettings,
} from '../../types/settings.js';
import { StorageWriteError, errorMessage } from '../errors.js';
import { readFileOrNull } from './fs-helpers.js';

export class LocalSettingsStore implements ISettingsStore {
    private readonly settingsPath: string;
    private cached: ServerSettings | null = null;

    constructor(
        baseDir: string,
        private readonly defaults: ServerSettings = DEFAULT_SETTINGS
    ) {
        this.settingsPath = path.join(baseDir, 'settings.json');
    }

    async load(): Promise<ServerSettings> {
        if (this.cached) {
            return { ...this.cached };
        }

        const raw = await readFileOrNull(this.settingsPath);
        let settings = getEffectiveSettings(null, this.defaults);

        if (raw) {
            try {
                const parsed = storedSettingsSchema.safeParse(JSON.parse(raw.toString('utf8')));
                if (parsed.success) {
                    settings = getEffectiveSettings(parsed.data, this.defaults);
                } else {
                    console.warn(`[SETTINGS] Ignoring invalid settings file ${this.settingsPath}, using defaults`);
                }
            } catch (error) {
                console.warn(`[SETTINGS] Could not parse ${this.settingsPath}, using defaults: ${errorMessage(error)}`);
            }
        }

        this.cached = settings;
        return { ...settings };
    }

    async save(settings: ServerSettings): Promise<ServerSettings> {
        const next: ServerSettings = { ...settings, webhookUrl: settings.webhookUrl.trim() };

        try {
            await fs.mkdir(path.dirname(this.settingsPath), { recursive: true });
            await fs.writeFile(this.settingsPath, JSON.stringify(toStoredSettings(next), null, 2));
        } catch (error) {
            throw new StorageWriteError(`Failed to save settings: ${errorMessage(error)}`, { cause: error });
        }

        this.cached = next;
        console.log(
            `[SETTINGS] Settings updated: webhook_enabled=${next.webhookEnabled}, ` +
            `webhook_url=${next.webhookUrl ? '*'.repeat(20) : 'empty'}, tolerance=${next.tolerance}`
        );
        return { ...next };
    }
}
