import { err, ok, type Result } from 'neverthrow';

import { CyclicDependencyError } from '../errors.js';

/**
 * Directed graph of "must come before" edges with a stable topological
 * sort (Kahn): among nodes that are ready at the same time, the one added
 * first wins.
 */
export class DependencyGraph<T> {
  private readonly index = new Map<T, number>();
  private readonly nodes: T[] = [];
  private readonly dependents = new Map<T, Set<T>>();
  private readonly prerequisites = new Map<T, Set<T>>();

  addNode(node: T): void {
    if (this.index.has(node)) return;
    this.index.set(node, this.nodes.length);
    this.nodes.push(node);
    this.dependents.set(node, new Set());
    this.prerequisites.set(node, new Set());
  }

  /**
   * Require `prerequisite` to be ordered before `dependent`. Both are added
   * as nodes when missing; self edges are ignored.
   */
  addDependency(dependent: T, prerequisite: T): void {
    if (dependent === prerequisite) return;
    this.addNode(dependent);
    this.addNode(prerequisite);
    this.dependents.get(prerequisite)?.add(dependent);
    this.prerequisites.get(dependent)?.add(prerequisite);
  }

  get size(): number {
    return this.nodes.length;
  }

  sort(describe: (node: T) => string = String): Result<T[], CyclicDependencyError> {
    const pending = new Map<T, number>();
    const ready: number[] = [];

    for (const node of this.nodes) {
      const count = this.prerequisites.get(node)?.size ?? 0;
      pending.set(node, count);
      if (count === 0) ready.push(this.position(node));
    }

    const order: T[] = [];
    while (ready.length > 0) {
      ready.sort((a, b) => a - b);
      const position = ready.shift();
      const node = position === undefined ? undefined : this.nodes[position];
      if (node === undefined) break;
      order.push(node);

      for (const dependent of this.dependents.get(node) ?? []) {
        const remaining = (pending.get(dependent) ?? 0) - 1;
        pending.set(dependent, remaining);
        if (remaining === 0) ready.push(this.position(dependent));
      }
    }

    if (order.length < this.nodes.length) {
      const blocked = this.nodes.filter((node) => (pending.get(node) ?? 0) > 0);
      return err(new CyclicDependencyError(this.findCycle(blocked).map(describe)));
    }

    return ok(order);
  }

  private position(node: T): number {
    return this.index.get(node) ?? -1;
  }

  /**
   * Walk prerequisite edges inside the blocked set until a node repeats.
   * Every blocked node has a blocked prerequisite, so the walk always closes.
   */
  private findCycle(blocked: T[]): T[] {
    const inBlocked = new Set(blocked);
    const path: T[] = [];
    const seenAt = new Map<T, number>();
    let current = blocked[0];

    while (current !== undefined && !seenAt.has(current)) {
      seenAt.set(current, path.length);
      path.push(current);
      current = [...(this.prerequisites.get(current) ?? [])].find((candidate) => inBlocked.has(candidate));
    }

    if (current === undefined) return blocked;
    const cycle = path.slice(seenAt.get(current));
    // prerequisites were followed backwards; report in execution direction
    cycle.reverse();
    const first = cycle[0];
    return first === undefined ? cycle : [...cycle, first];
  }
}
