import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().catch(fallback);

const CmsEnvSchema = z.object({
    DATABASE_URL: z.string().min(1).optional(),
    CMS_PROPERTY_LANGUAGE_ID: positiveInt(1),
    CMS_FALLBACK_LANGUAGE_ID: positiveInt(2),
    CMS_VERSION_RETENTION_KEEP: positiveInt(10),
    CMS_VERSION_CREATE_RETRIES: positiveInt(3),
    CMS_TIMEZONE: z.string().min(1).catch('UTC'),
});

export type CmsConfig = {
    databaseUrl: string | null;
    /** Reserved language holding structural (untranslated) section properties. */
    propertyLanguageId: number;
    /** Used when neither the request nor the preferences name a language. */
    fallbackLanguageId: number;
    retentionKeep: number;
    versionCreateRetries: number;
    timezone: string;
};

export function parseCmsConfig(env: Record<string, string | undefined>): CmsConfig {
    const parsed = CmsEnvSchema.parse({
        DATABASE_URL: env.DATABASE_URL || undefined,
        CMS_PROPERTY_LANGUAGE_ID: env.CMS_PROPERTY_LANGUAGE_ID ?? 1,
        CMS_FALLBACK_LANGUAGE_ID: env.CMS_FALLBACK_LANGUAGE_ID ?? 2,
        CMS_VERSION_RETENTION_KEEP: env.CMS_VERSION_RETENTION_KEEP ?? 10,
        CMS_VERSION_CREATE_RETRIES: env.CMS_VERSION_CREATE_RETRIES ?? 3,
        CMS_TIMEZONE: env.CMS_TIMEZONE ?? 'UTC',
    });

    return {
        databaseUrl: parsed.DATABASE_URL ?? null,
        propertyLanguageId: parsed.CMS_PROPERTY_LANGUAGE_ID,
        fallbackLanguageId: parsed.CMS_FALLBACK_LANGUAGE_ID,
        retentionKeep: parsed.CMS_VERSION_RETENTION_KEEP,
        versionCreateRetries: parsed.CMS_VERSION_CREATE_RETRIES,
        timezone: parsed.CMS_TIMEZONE,
    };
}

let _config: CmsConfig | null = null;

export function getCmsConfig(): CmsConfig {
    if (!_config) {
        _config = parseCmsConfig(process.env);
    }
    return _config;
}
