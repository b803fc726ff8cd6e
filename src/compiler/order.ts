import { CycleDetectedError } from "../graph/errors.js";
import type { FlatGraph } from "./inline.js";

function insertSorted(queue: string[], identity: string): void {
  let low = 0;
  let high = queue.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    const current = queue[middle];
    if (current !== undefined && current < identity) {
      low = middle + 1;
    } else {
      high = middle;
    }
  }
  queue.splice(low, 0, identity);
}

/**
 * Kahn's algorithm over the flattened graph. Among the nodes ready at any
 * step the smallest identity goes first, so the order only depends on the
 * graph contents.
 */
export function topologicalOrder(graph: FlatGraph): string[] {
  const indegree = new Map<string, number>();
  const consumers = new Map<string, string[]>();
  for (const node of graph.nodes.values()) {
    indegree.set(node.identity, indegree.get(node.identity) ?? 0);
    const seen = new Set<string>();
    for (const input of node.inputs) {
      if (input.kind !== "node" || seen.has(input.identity) || !graph.nodes.has(input.identity)) {
        continue;
      }
      seen.add(input.identity);
      indegree.set(node.identity, (indegree.get(node.identity) ?? 0) + 1);
      const list = consumers.get(input.identity) ?? [];
      list.push(node.identity);
      consumers.set(input.identity, list);
    }
  }

  const ready: string[] = [];
  for (const [identity, degree] of indegree) {
    if (degree === 0) {
      insertSorted(ready, identity);
    }
  }

  const order: string[] = [];
  while (ready.length > 0) {
    const identity = ready.shift();
    if (identity === undefined) {
      break;
    }
    order.push(identity);
    for (const consumer of consumers.get(identity) ?? []) {
      const remaining = (indegree.get(consumer) ?? 0) - 1;
      indegree.set(consumer, remaining);
      if (remaining === 0) {
        insertSorted(ready, consumer);
      }
    }
  }

  if (order.length !== indegree.size) {
    const placed = new Set(order);
    const stuck = Array.from(indegree.keys())
      .filter((identity) => !placed.has(identity))
      .sort();
    throw new CycleDetectedError(stuck);
  }
  return order;
}
