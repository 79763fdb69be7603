/**
 * Command-line configuration
 *
 * Values come from the environment and are overridden by flags; the merged
 * result is validated with zod.
 */

import { z } from 'zod';
import { createConfigError } from './types/errors.js';
import { DEFAULTS } from './types/options.js';

export const cliConfigSchema = z.object({
    residuePolicy: z.enum(['ignore', 'warn', 'error']).default(DEFAULTS.residuePolicy)
        .describe("What to do with unconsumed triples: 'ignore', 'warn' (default) or 'error'"),
    format: z.enum(['json', 'summary']).default(DEFAULTS.format)
        .describe("Output format: 'json' or 'summary' (default)"),
    baseIri: z.string().url().optional()
        .describe('Base IRI for relative references in the input document'),
});

export type CliConfig = z.infer<typeof cliConfigSchema>;

/**
 * Raw string values, as they arrive from flags or the environment.
 */
export type CliConfigOverrides = Partial<Record<keyof CliConfig, string>>;

export const ENV_KEYS: Record<keyof CliConfig, string> = {
    residuePolicy: 'OWL_RDF_RESIDUE_POLICY',
    format: 'OWL_RDF_FORMAT',
    baseIri: 'OWL_RDF_BASE_IRI',
};

export function loadConfig(
    overrides: CliConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env
): CliConfig {
    const pick = (key: keyof CliConfig): string | undefined => {
        const value = overrides[key] ?? env[ENV_KEYS[key]];
        return value === '' ? undefined : value;
    };

    const parsed = cliConfigSchema.safeParse({
        residuePolicy: pick('residuePolicy'),
        format: pick('format'),
        baseIri: pick('baseIri'),
    });
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }));
        throw createConfigError(issues.map(issue => `${issue.path}: ${issue.message}`).join('; '), { issues });
    }
    return parsed.data;
}
