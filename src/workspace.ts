/**
 * @module
 * The workspace: its manifest and the projects it lists.
 */
import {
    ManifestError,
    WsbuildError,
} from './errors';
import {
    dependencyOrder,
} from './graph';
import {
    DependencyDeclaration,
    discoverProjects,
    Project,
    ProjectKind,
    readManifest,
    WorkspaceManifest,
    workspaceManifestSchema,
} from './manifest';
import path = require('path');

/**
 * A package declared with different versions by different projects.
 */
export interface DependencyConflict {
    name: string;
    versions: {
        version: string;
        projects: string[];
    }[];
}

export class Workspace {
    /** Directory holding the workspace manifest. */
    readonly root: string;
    readonly manifestPath: string;
    readonly manifest: WorkspaceManifest;
    readonly projects: Project[];
    private readonly projectsByName: Map<string, Project>;

    constructor(manifestPath: string, manifest: WorkspaceManifest, projects: Project[]) {
        this.manifestPath = path.resolve(manifestPath);
        this.root = path.dirname(this.manifestPath);
        this.manifest = manifest;
        this.projects = projects;
        this.projectsByName = new Map(projects.map((x): [string, Project] => [x.name, x]));
    }

    get artifactsDir(): string {
        return this.resolveArtifactsDir(this.manifest.artifacts);
    }

    /**
     * Resolves `dir` against the workspace root. `clean` removes the result,
     * so it must lie strictly below the root or outside of it.
     */
    resolveArtifactsDir(dir: string): string {
        const resolved = path.resolve(this.root, dir);
        const fromArtifacts = path.relative(resolved, this.root);
        if (!fromArtifacts || (!fromArtifacts.startsWith('..') && !path.isAbsolute(fromArtifacts)))
            throw new WsbuildError(`artifacts directory ${resolved} contains the workspace root ${this.root}`);
        return resolved;
    }

    project(name: string): Project | undefined {
        return this.projectsByName.get(name);
    }

    byKind(kind: ProjectKind): Project[] {
        return this.projects.filter(x => x.kind === kind);
    }

    packable(): Project[] {
        return this.projects.filter(x => x.packable);
    }

    /**
     * True if `dep` names another workspace project rather than a package.
     */
    isProjectReference(dep: DependencyDeclaration): boolean {
        if (dep.target)
            return dep.target === 'project';
        return this.projectsByName.has(dep.name);
    }

    projectReferences(project: Project): string[] {
        return project.dependencies.filter(x => this.isProjectReference(x)).map(x => x.name);
    }

    /**
     * Projects ordered so that every project comes after the projects it references.
     */
    buildOrder(): Project[] {
        return dependencyOrder(
            this.projects.map(x => x.name),
            name => this.project(name),
            project => this.projectReferences(project),
            (name, requiredBy) => new ManifestError(this.manifestPath, `project ${requiredBy} references unknown project ${name}`),
        );
    }

    /**
     * Package dependencies declared with more than one version, by package name.
     */
    dependencyConflicts(): DependencyConflict[] {
        const packages = new Map<string, Map<string, string[]>>();
        for (const project of this.projects) {
            for (const dep of project.dependencies) {
                if (this.isProjectReference(dep) || dep.version === undefined)
                    continue;
                let versions = packages.get(dep.name);
                if (!versions) {
                    versions = new Map();
                    packages.set(dep.name, versions);
                }
                const users = versions.get(dep.version);
                if (users)
                    users.push(project.name);
                else
                    versions.set(dep.version, [project.name]);
            }
        }

        const conflicts: DependencyConflict[] = [];
        for (const [name, versions] of packages) {
            if (versions.size < 2)
                continue;
            conflicts.push({
                name,
                versions: [...versions].map(([version, projects]) => ({ projects, version })),
            });
        }
        return conflicts.sort((a, b) => a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
    }
}

/**
 * Reads the workspace manifest at `manifestPath` and discovers its projects.
 * Project references are checked for unknown names and cycles.
 */
export async function loadWorkspace(manifestPath: string): Promise<Workspace> {
    const resolved = path.resolve(manifestPath);
    const manifest = await readManifest(resolved, workspaceManifestSchema);
    const projects = await discoverProjects(path.dirname(resolved), manifest.projects, resolved);
    const workspace = new Workspace(resolved, manifest, projects);
    workspace.buildOrder();
    return workspace;
}
