/**
 * @module
 * Build options from the command line and the environment.
 */
import {
    ConfigError,
} from './errors';
import {
    z,
} from 'zod';
import path = require('path');

export const defaultManifestPath = 'workspace.json';

const buildOptionsSchema = z.object({
    artifacts: z.string().min(1).optional(),
    buildNumber: z.string().regex(/^\d+$/, 'build number must only contain digits').optional(),
    configuration: z.string().regex(/^[A-Za-z][\w-]*$/, 'configuration must be a name such as Debug or Release'),
    manifestPath: z.string().min(1),
    versionSuffix: z.string().regex(/^[0-9A-Za-z-]+$/, 'version suffix must only contain letters, digits and hyphens').optional(),
});

/**
 * Options that apply to a whole build.
 */
export type BuildOptions = z.infer<typeof buildOptionsSchema>;

/**
 * Options given on the command line. They win over the environment.
 */
export interface BuildOptionOverrides {
    /** Relative to the directory wsbuild runs in. */
    artifacts?: string;
    buildNumber?: string;
    configuration?: string;
    manifestPath?: string;
}

/**
 * Resolve build options.
 *
 * - `configuration`: override, `BUILD_CONFIGURATION`, then `Debug`.
 * - `buildNumber`: override, then `BUILD_NUMBER`.
 * - `versionSuffix`: `VERSION_SUFFIX`, else `build` and the build number
 *   padded to five digits, else none.
 * - `artifacts`: the override, resolved against `cwd`.
 */
export function loadBuildOptions(
    env: NodeJS.ProcessEnv = process.env,
    overrides: BuildOptionOverrides = {},
    cwd: string = process.cwd(),
): BuildOptions {
    const buildNumber = nonEmpty(overrides.buildNumber) || nonEmpty(env.BUILD_NUMBER);
    let versionSuffix = nonEmpty(env.VERSION_SUFFIX);
    if (!versionSuffix && buildNumber)
        versionSuffix = `build${buildNumber.padStart(5, '0')}`;

    const artifacts = nonEmpty(overrides.artifacts);
    const result = buildOptionsSchema.safeParse({
        artifacts: artifacts && path.resolve(cwd, artifacts),
        buildNumber,
        configuration: nonEmpty(overrides.configuration) || nonEmpty(env.BUILD_CONFIGURATION) || 'Debug',
        manifestPath: nonEmpty(overrides.manifestPath) || defaultManifestPath,
        versionSuffix,
    });
    if (!result.success)
        throw new ConfigError(result.error.issues.map(x => `${x.path.join('.')}: ${x.message}`));
    return result.data;
}

function nonEmpty(x: string | undefined): string | undefined {
    return x && x.trim() ? x.trim() : undefined;
}
