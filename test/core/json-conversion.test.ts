/**
 * JSON-to-graph extraction tests
 */

import { describe, it, expect } from 'vitest';
import { extractGraph } from '../../src/core/json-conversion.js';

describe('extractGraph', () => {
  it('should collect nodes and edges from a nested result', () => {
    const graph = extractGraph({
      q: [
        {
          id: 1,
          name: 'Alice',
          type: ['Person', 'Employee'],
          friend: [{ id: 2, name: 'Bob' }],
          tags: ['a', 'b'],
          boss: { id: 3, name: 'Carol' },
        },
      ],
    });

    expect(graph.nodes).toEqual({
      '1': {
        id: 1,
        name: 'Alice',
        type: 'Person',
        tags: ['a', 'b'],
        boss: { id: 3, name: 'Carol' },
      },
      '2': { id: 2, name: 'Bob' },
      '3': { id: 3, name: 'Carol' },
    });
    expect(graph.edges).toEqual([
      { src: '1', dst: '2', type: 'friend' },
      { src: '1', dst: '3', type: 'boss' },
    ]);
  });

  it('should merge attributes of a node seen twice', () => {
    const graph = extractGraph({
      q: [
        { id: 'a', name: 'Alice', age: 30 },
        { id: 'a', age: 31, city: 'Paris' },
      ],
    });

    expect(graph.nodes).toEqual({ a: { id: 'a', name: 'Alice', age: 31, city: 'Paris' } });
    expect(graph.edges).toEqual([]);
  });

  it('should not create edges from objects without an id', () => {
    const graph = extractGraph({
      q: [{ name: 'anonymous', friend: [{ id: 5, name: 'Eve' }] }],
    });

    expect(graph.nodes).toEqual({ '5': { id: 5, name: 'Eve' } });
    expect(graph.edges).toEqual([]);
  });

  it('should skip the extensions object', () => {
    const graph = extractGraph({
      q: [{ id: 1 }],
      extensions: { server: { id: 99, latency: 12 } },
    });

    expect(Object.keys(graph.nodes)).toEqual(['1']);
  });

  it('should ignore empty lists and type lists of anonymous objects', () => {
    const graph = extractGraph({ q: [{ id: 1, friend: [] }, { type: ['Ghost'] }] });

    expect(graph.nodes).toEqual({ '1': { id: 1 } });
  });

  it('should return an empty graph for non-object input', () => {
    expect(extractGraph(null)).toEqual({ nodes: {}, edges: [] });
    expect(extractGraph([{ id: 1 }])).toEqual({ nodes: {}, edges: [] });
    expect(extractGraph('text')).toEqual({ nodes: {}, edges: [] });
  });
});
