/**
 * @module
 * Workspace and project manifests.
 */
import {
    describeError,
    ManifestError,
} from './errors';
import {
    z,
} from 'zod';
import createDebug = require('debug');
import fs = require('fs-extra');
import path = require('path');

const debug = createDebug('wsbuild:manifest');

/** File name of a project manifest inside its project directory. */
export const projectManifestFile = 'project.json';

const toolsSchema = z.object({
    build: z.string().min(1),
    coverage: z.string().min(1),
    package: z.string().min(1),
}).partial().strict();

const feedSchema = z.object({
    apiKeyVariable: z.string()
        .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'apiKeyVariable must be an environment variable name')
        .default('NUGET_API_KEY'),
    source: z.string().min(1, 'source cannot be empty'),
    symbolSource: z.string().min(1).optional(),
}).strict();

export const workspaceManifestSchema = z.object({
    artifacts: z.string().min(1, 'artifacts cannot be empty').default('artifacts'),
    feed: feedSchema.optional(),
    projects: z.array(z.string().min(1)).min(1, 'projects must list at least one location'),
    tools: toolsSchema.default({}),
}).strict();

/**
 * Contents of `workspace.json`.
 */
export type WorkspaceManifest = z.infer<typeof workspaceManifestSchema>;

const dependencySchema = z.union([
    z.string(),
    z.object({
        target: z.enum(['project', 'package']).optional(),
        type: z.string().optional(),
        version: z.string().optional(),
    }).passthrough(),
]);

export const projectManifestSchema = z.object({
    buildOptions: z.object({
        emitEntryPoint: z.boolean().optional(),
    }).passthrough().optional(),
    dependencies: z.record(z.string(), dependencySchema).default({}),
    description: z.string().optional(),
    name: z.string().min(1).optional(),
    packable: z.boolean().optional(),
    testRunner: z.string().min(1).optional(),
    version: z.string().min(1).default('1.0.0'),
}).passthrough();

/**
 * Contents of a `project.json`.
 */
export type ProjectManifest = z.infer<typeof projectManifestSchema>;

export type ProjectKind = 'library' | 'application' | 'test';

/**
 * A dependency as declared in a project manifest.
 */
export interface DependencyDeclaration {
    name: string;
    /** Absent for project references declared without a version. */
    version?: string;
    target?: 'project' | 'package';
}

/**
 * A discovered workspace project.
 */
export interface Project {
    name: string;
    /** Absolute project directory. */
    dir: string;
    manifestPath: string;
    version: string;
    description?: string;
    kind: ProjectKind;
    packable: boolean;
    dependencies: DependencyDeclaration[];
    manifest: ProjectManifest;
}

/**
 * Reads `file` as JSON and validates it against `schema`.
 */
export async function readManifest<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    let text: string;
    try {
        text = await fs.readFile(file, 'utf-8');
    } catch (e) {
        throw new ManifestError(file, `cannot read manifest: ${describeError(e)}`, [], e);
    }
    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (e) {
        throw new ManifestError(file, `invalid JSON: ${describeError(e)}`, [], e);
    }
    const result = schema.safeParse(json);
    if (!result.success)
        throw new ManifestError(file, 'invalid manifest', formatIssues(result.error.issues));
    return result.data;
}

function formatIssues(issues: z.ZodIssue[]): string[] {
    return issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Project category, which decides the actions a project takes part in.
 */
export function classify(manifest: ProjectManifest): ProjectKind {
    if (manifest.testRunner)
        return 'test';
    if (manifest.buildOptions && manifest.buildOptions.emitEntryPoint)
        return 'application';
    return 'library';
}

/**
 * Normalizes the `dependencies` map of a project manifest.
 */
export function dependencyDeclarations(manifest: ProjectManifest): DependencyDeclaration[] {
    return Object.entries(manifest.dependencies).map(([name, value]) => {
        if (typeof value === 'string')
            return { name, version: value };
        return { name, target: value.target, version: value.version };
    });
}

/**
 * Reads the project in `dir`.
 */
export async function readProject(dir: string): Promise<Project> {
    const manifestPath = path.join(dir, projectManifestFile);
    const manifest = await readManifest(manifestPath, projectManifestSchema);
    const kind = classify(manifest);
    return {
        dependencies: dependencyDeclarations(manifest),
        description: manifest.description,
        dir,
        kind,
        manifest,
        manifestPath,
        name: manifest.name || path.basename(dir),
        packable: manifest.packable === undefined ? kind === 'library' : manifest.packable,
        version: manifest.version,
    };
}

/**
 * Finds the projects listed by a workspace manifest.
 *
 * A location holding a project manifest is a project, any other location is
 * searched one level deep. Projects come in location order, then name order.
 *
 * @param root directory `locations` are relative to.
 * @param manifestPath the workspace manifest, for error messages.
 */
export async function discoverProjects(root: string, locations: string[], manifestPath: string): Promise<Project[]> {
    const projects: Project[] = [];
    const seenDirs = new Set<string>();
    const names = new Map<string, string>();

    for (const location of locations) {
        const dir = path.resolve(root, location);
        if (!(await isDirectory(dir)))
            throw new ManifestError(manifestPath, `project location ${location} is not a directory`);

        let dirs: string[];
        if (await fs.pathExists(path.join(dir, projectManifestFile))) {
            dirs = [dir];
        } else {
            dirs = [];
            for (const entry of (await fs.readdir(dir)).sort()) {
                const child = path.join(dir, entry);
                if (await isDirectory(child) && await fs.pathExists(path.join(child, projectManifestFile)))
                    dirs.push(child);
            }
        }

        for (const projectDir of dirs) {
            if (seenDirs.has(projectDir))
                continue; // reachable from two locations
            seenDirs.add(projectDir);
            const project = await readProject(projectDir);
            const other = names.get(project.name);
            if (other !== undefined)
                throw new ManifestError(manifestPath, `project name ${project.name} is used by both ${other} and ${projectDir}`);
            names.set(project.name, projectDir);
            debug('found %s project %s in %s', project.kind, project.name, projectDir);
            projects.push(project);
        }
    }
    return projects;
}

async function isDirectory(dir: string): Promise<boolean> {
    try {
        return (await fs.stat(dir)).isDirectory();
    } catch (e) {
        return false;
    }
}
