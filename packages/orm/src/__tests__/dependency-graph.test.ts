import { describe, expect, it } from 'vitest';

import { CyclicDependencyError } from '../errors.js';
import { DependencyGraph } from '../graph/dependency-graph.js';

describe('DependencyGraph', () => {
  it('keeps insertion order among independent nodes', () => {
    const graph = new DependencyGraph<string>();
    for (const node of ['c', 'a', 'b']) graph.addNode(node);

    expect(graph.sort()._unsafeUnwrap()).toEqual(['c', 'a', 'b']);
  });

  it('orders prerequisites first', () => {
    const graph = new DependencyGraph<string>();
    graph.addNode('line');
    graph.addNode('order');
    graph.addNode('customer');
    graph.addDependency('line', 'order');
    graph.addDependency('order', 'customer');

    expect(graph.sort()._unsafeUnwrap()).toEqual(['customer', 'order', 'line']);
  });

  it('releases dependants in insertion order', () => {
    const graph = new DependencyGraph<string>();
    for (const node of ['b', 'a', 'root']) graph.addNode(node);
    graph.addDependency('b', 'root');
    graph.addDependency('a', 'root');

    expect(graph.sort()._unsafeUnwrap()).toEqual(['root', 'b', 'a']);
  });

  it('ignores self edges and duplicate nodes', () => {
    const graph = new DependencyGraph<number>();
    graph.addNode(1);
    graph.addNode(1);
    graph.addDependency(1, 1);

    expect(graph.size).toBe(1);
    expect(graph.sort()._unsafeUnwrap()).toEqual([1]);
  });

  it('reports the nodes of a cycle', () => {
    const graph = new DependencyGraph<string>();
    graph.addNode('free');
    graph.addDependency('a', 'b');
    graph.addDependency('b', 'a');

    const error = graph.sort()._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(CyclicDependencyError);
    expect(error.cycle).toEqual(['b', 'a', 'b']);
    expect(error.message).toBe('Cyclic dependency between b -> a -> b');
  });

  it('describes nodes with the given function', () => {
    const graph = new DependencyGraph<{ id: number }>();
    const first = { id: 1 };
    const second = { id: 2 };
    const third = { id: 3 };
    graph.addDependency(first, second);
    graph.addDependency(second, third);
    graph.addDependency(third, first);

    const error = graph.sort((node) => `#${node.id}`)._unsafeUnwrapErr();
    expect(error.cycle).toHaveLength(4);
    expect(new Set(error.cycle)).toEqual(new Set(['#1', '#2', '#3']));
  });
});
