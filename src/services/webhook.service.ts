/**
 * Webhook Notification Service
 *
 * Calls the configured webhook with the names recognised in one request:
 *   GET <webhookUrl>?tag=Alice,Bob
 *
 * Fire-and-forget: failures are logged and never reach the caller.
 */

import axios, { AxiosInstance } from 'axios';
import { ISettingsStore } from './interfaces/storage.interface.js';
import { isWebhookActive } from '../types/settings.js';
import { errorMessage } from './errors.js';

export type WebhookOutcome = 'sent' | 'skipped' | 'failed';

/** Deduplicated names in ascending order */
export function uniqueSortedNames(names: string[]): string[] {
    return [...new Set(names.filter((name) => name !== ''))].sort();
}

export class WebhookService {
    private client: AxiosInstance;

    constructor(
        private readonly settingsStore: ISettingsStore,
        timeoutMs: number,
        client?: AxiosInstance
    ) {
        this.client = client ?? axios.create({
            timeout: timeoutMs,
            headers: { 'User-Agent': 'Face-Registry-Webhook/1.0' },
        });
    }

    async notify(names: string[]): Promise<WebhookOutcome> {
        const tags = uniqueSortedNames(names);
        if (tags.length === 0) return 'skipped';

        try {
            const settings = await this.settingsStore.load();
            if (!isWebhookActive(settings)) return 'skipped';

            const webhookUrl = settings.webhookUrl.trim();
            const response = await this.client.get(webhookUrl, { params: { tag: tags.join(',') } });
            console.log(`[WEBHOOK] Webhook called successfully: url=${webhookUrl}, status=${response.status}`);
            return 'sent';
        } catch (error) {
            console.warn(`[WEBHOOK] Webhook call failed (non-blocking): ${errorMessage(error)}`);
            return 'failed';
        }
    }
}
