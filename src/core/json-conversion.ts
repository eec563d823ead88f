/**
 * JSON-to-graph extraction
 *
 * Turns a decoded query result into a node table and an edge list. Objects
 * carrying an `id` field are nodes; an object with an `id` nested under another
 * object with an `id` becomes an edge typed by the predicate that links them.
 *
 * Rules:
 * - attributes of a node seen in several places are merged (last write wins)
 * - a `type` list assigns its first element as the node's `type`
 * - a list of scalars is attached to the enclosing node as-is
 * - the `extensions` object of a response is ignored
 *
 * @example
 * ```typescript
 * const data = JSON.parse(response.json);
 * const { nodes, edges } = extractGraph(data);
 * ```
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Attributes collected for a node, keyed by predicate
 */
export type NodeProperties = Record<string, unknown>;

/**
 * A relationship between two nodes
 */
export interface GraphEdge {
  src: string;
  dst: string;
  /** Predicate linking `src` to `dst` */
  type: string;
}

/**
 * Nodes keyed by id, plus the edges between them
 */
export interface ExtractedGraph {
  nodes: Record<string, NodeProperties>;
  edges: GraphEdge[];
}

type JsonObject = Record<string, unknown>;

// ============================================================================
// Helpers
// ============================================================================

const IGNORED_FIELD = 'extensions';

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nodeIdOf(value: JsonObject): string | undefined {
  if (!('id' in value)) {
    return undefined;
  }
  return String(value['id']);
}

function ensureNode(nodes: Record<string, NodeProperties>, id: string): NodeProperties {
  let node = nodes[id];
  if (!node) {
    node = {};
    nodes[id] = node;
  }
  return node;
}

/**
 * Copy every non-list attribute onto the node. Lists are handled by the walk.
 */
function updateNode(nodes: Record<string, NodeProperties>, id: string, value: JsonObject): void {
  const node = ensureNode(nodes, id);
  for (const [key, attr] of Object.entries(value)) {
    if (!Array.isArray(attr)) {
      node[key] = attr;
    }
  }
}

function walk(
  graph: ExtractedGraph,
  data: JsonObject,
  parent: JsonObject | undefined,
  predicate: string | undefined
): void {
  if (predicate === IGNORED_FIELD) {
    return;
  }

  const id = nodeIdOf(data);
  if (id !== undefined) {
    updateNode(graph.nodes, id, data);
    const parentId = parent ? nodeIdOf(parent) : undefined;
    if (parentId !== undefined && predicate !== undefined) {
      graph.edges.push({ src: parentId, dst: id, type: predicate });
    }
  }

  for (const [key, value] of Object.entries(data)) {
    if (isJsonObject(value)) {
      walk(graph, value, data, key);
      continue;
    }
    if (!Array.isArray(value) || value.length === 0) {
      continue;
    }

    const [first] = value;
    if (key === 'type') {
      if (id !== undefined) {
        ensureNode(graph.nodes, id)['type'] = first;
      }
      continue;
    }

    if (isJsonObject(first)) {
      for (const item of value) {
        if (isJsonObject(item)) {
          walk(graph, item, data, key);
        }
      }
    } else if (id !== undefined) {
      ensureNode(graph.nodes, id)[key] = value;
    }
  }
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Extract nodes and edges from a decoded query result.
 *
 * Non-object input yields an empty graph.
 */
export function extractGraph(data: unknown): ExtractedGraph {
  const graph: ExtractedGraph = { nodes: {}, edges: [] };
  if (isJsonObject(data)) {
    walk(graph, data, undefined, undefined);
  }
  return graph;
}
