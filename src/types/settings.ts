/**
 * Server Settings Types
 *
 * One settings record per server, replaced wholesale on update.
 */

import { z } from 'zod';

export interface ServerSettings {
    webhookUrl: string;
    webhookEnabled: boolean;
    /** Maximum Euclidean distance accepted as a match */
    tolerance: number;
}

export const DEFAULT_TOLERANCE = 0.75;

export const DEFAULT_SETTINGS: ServerSettings = {
    webhookUrl: '',
    webhookEnabled: false,
    tolerance: DEFAULT_TOLERANCE,
};

// -------------------------------------------------------------------
// VALIDATION - shared by the settings route and the file reader
// -------------------------------------------------------------------

export const settingsSchema = z.object({
    webhookUrl: z.string().trim().max(2048).refine(
        (value) => value === '' || /^https?:\/\//i.test(value),
        'Webhook URL must start with http:// or https://'
    ),
    webhookEnabled: z.boolean(),
    tolerance: z.number().finite().nonnegative(),
});

/** On-disk shape (snake_case keys, every key optional) */
export const storedSettingsSchema = z.object({
    webhook_url: z.string().optional(),
    webhook_enabled: z.boolean().optional(),
    tolerance: z.number().finite().nonnegative().optional(),
});

export type StoredSettings = z.infer<typeof storedSettingsSchema>;

/**
 * Merge stored JSON with defaults to fill missing keys.
 * Never assume keys exist in stored JSON.
 */
export function getEffectiveSettings(
    stored: StoredSettings | null,
    defaults: ServerSettings = DEFAULT_SETTINGS
): ServerSettings {
    if (!stored) return { ...defaults };

    return {
        webhookUrl: stored.webhook_url ?? defaults.webhookUrl,
        webhookEnabled: stored.webhook_enabled ?? defaults.webhookEnabled,
        tolerance: stored.tolerance ?? defaults.tolerance,
    };
}

export function toStoredSettings(settings: ServerSettings): Required<StoredSettings> {
    return {
        webhook_url: settings.webhookUrl,
        webhook_enabled: settings.webhookEnabled,
        tolerance: settings.tolerance,
    };
}

/** Webhook is only attempted when enabled and the URL is non-blank. */
export function isWebhookActive(settings: ServerSettings): boolean {
    return settings.webhookEnabled && settings.webhookUrl.trim() !== '';
}
