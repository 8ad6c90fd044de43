/**
 * @module
 * Dependency ordering.
 */
import {
    CircularDependencyError,
    TaskNotFoundError,
} from './errors';

/**
 * Returns the dependency closure of `roots`, dependencies first.
 *
 * Nodes are visited depth-first in declared order and each node appears once,
 * however many paths lead to it.
 *
 * @param lookup returns the node called `name`, or undefined if there is none.
 * @param depsOf returns the names of the nodes `node` depends on.
 * @param notFound builds the error thrown for an unknown name.
 */
export function dependencyOrder<T>(
    roots: Iterable<string>,
    lookup: (name: string) => T | undefined,
    depsOf: (node: T) => Iterable<string>,
    notFound: (name: string, requiredBy?: string) => Error = (name, requiredBy) => new TaskNotFoundError(name, requiredBy),
): T[] {
    const order: T[] = [];
    const done = new Set<string>();
    const stack: string[] = [];

    for (const root of roots)
        visit(root, undefined);

    return order;

    function visit(name: string, requiredBy: string | undefined): void {
        if (done.has(name))
            return;
        const pos = stack.indexOf(name);
        if (pos >= 0)
            throw new CircularDependencyError([...stack.slice(pos), name]);
        const node = lookup(name);
        if (node === undefined)
            throw notFound(name, requiredBy);
        stack.push(name);
        for (const dep of depsOf(node))
            visit(dep, name);
        stack.pop();
        done.add(name);
        order.push(node);
    }
}
