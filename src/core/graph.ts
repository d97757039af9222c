import type { StageSpec } from "./spec-types.js";
import { CyclicPipelineError } from "./errors.js";

export interface PipelineGraph {
  /** Stage ids in declaration order */
  nodes: string[];

  /** Declaration index per stage, used for tie-breaking */
  position: Map<string, number>;

  /** producer -> consumers */
  consumers: Map<string, string[]>;

  /** consumer -> producers */
  producers: Map<string, string[]>;
}

export function buildGraph(stages: StageSpec[], deps: Map<string, Set<string>>): PipelineGraph {
  const nodes = stages.map((s) => s.id);
  const position = new Map(nodes.map((id, i) => [id, i]));
  const consumers = new Map<string, string[]>(nodes.map((id) => [id, []]));
  const producers = new Map<string, string[]>(nodes.map((id) => [id, []]));

  for (const id of nodes) {
    for (const dep of deps.get(id) ?? []) {
      consumers.get(dep)?.push(id);
      producers.get(id)?.push(dep);
    }
  }
  return { nodes, position, consumers, producers };
}

/** Min-heap keyed by declaration index. */
class ReadyQueue {
  private heap: string[] = [];

  constructor(private readonly position: Map<string, number>) {}

  get size(): number {
    return this.heap.length;
  }

  push(id: string): void {
    const heap = this.heap;
    heap.push(id);
    let i = heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.rank(heap[parent]) <= this.rank(heap[i])) break;
      [heap[parent], heap[i]] = [heap[i], heap[parent]];
      i = parent;
    }
  }

  pop(): string | undefined {
    const heap = this.heap;
    const top = heap[0];
    const last = heap.pop();
    if (heap.length > 0 && last !== undefined) {
      heap[0] = last;
      let i = 0;
      for (;;) {
        const l = 2 * i + 1;
        const r = l + 1;
        let min = i;
        if (l < heap.length && this.rank(heap[l]) < this.rank(heap[min])) min = l;
        if (r < heap.length && this.rank(heap[r]) < this.rank(heap[min])) min = r;
        if (min === i) break;
        [heap[min], heap[i]] = [heap[i], heap[min]];
        i = min;
      }
    }
    return top;
  }

  private rank(id: string): number {
    return this.position.get(id) ?? Number.MAX_SAFE_INTEGER;
  }
}

/**
 * Kahn's algorithm. Among ready stages the earliest declared runs first, so
 * the same pipeline always yields the same order.
 */
export function topoSort(graph: PipelineGraph): string[] {
  const inDegree = new Map<string, number>();
  for (const id of graph.nodes) inDegree.set(id, graph.producers.get(id)?.length ?? 0);

  const ready = new ReadyQueue(graph.position);
  for (const id of graph.nodes) {
    if (inDegree.get(id) === 0) ready.push(id);
  }

  const order: string[] = [];
  while (ready.size > 0) {
    const cur = ready.pop();
    if (cur === undefined) break;
    order.push(cur);
    for (const next of graph.consumers.get(cur) ?? []) {
      const deg = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, deg);
      if (deg === 0) ready.push(next);
    }
  }

  if (order.length < graph.nodes.length) {
    throw new CyclicPipelineError(cycleMembers(graph));
  }
  return order;
}

/**
 * Stages lying on at least one cycle (Tarjan's strongly connected components
 * of size > 1, plus self-loops), in declaration order.
 */
export function cycleMembers(graph: PipelineGraph): string[] {
  const index = new Map<string, number>();
  const low = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const members = new Set<string>();
  let counter = 0;

  const visit = (id: string): void => {
    index.set(id, counter);
    low.set(id, counter);
    counter += 1;
    stack.push(id);
    onStack.add(id);

    for (const next of graph.consumers.get(id) ?? []) {
      if (!index.has(next)) {
        visit(next);
        low.set(id, Math.min(low.get(id) ?? 0, low.get(next) ?? 0));
      } else if (onStack.has(next)) {
        low.set(id, Math.min(low.get(id) ?? 0, index.get(next) ?? 0));
      }
    }

    if (low.get(id) === index.get(id)) {
      const component: string[] = [];
      let member: string | undefined;
      do {
        member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        component.push(member);
      } while (member !== id);

      const selfLoop = component.length === 1 && (graph.consumers.get(id) ?? []).includes(id);
      if (component.length > 1 || selfLoop) component.forEach((m) => members.add(m));
    }
  };

  for (const id of graph.nodes) {
    if (!index.has(id)) visit(id);
  }
  return graph.nodes.filter((id) => members.has(id));
}

/** Group stages into dependency layers; each layer depends only on earlier ones. */
export function topoLayers(graph: PipelineGraph): string[][] {
  const order = topoSort(graph);
  const depth = new Map<string, number>();
  const layers: string[][] = [];
  for (const id of order) {
    const d = Math.max(-1, ...(graph.producers.get(id) ?? []).map((p) => depth.get(p) ?? 0)) + 1;
    depth.set(id, d);
    (layers[d] ??= []).push(id);
  }
  return layers;
}
