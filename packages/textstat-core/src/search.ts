export interface SearchProblem<S, A> {
  readonly initialState: S;
  actions(state: S): Iterable<A>;
  result(state: S, action: A): S;
  goalTest(state: S): boolean;
  /** Identifies equal states; without it every node counts as distinct. */
  stateKey?(state: S): string;
}

export type SearchNode<S, A> = {
  state: S;
  parent: SearchNode<S, A> | null;
  action: A | null;
  depth: number;
  value: number;
};

export type SearchOutcome<S, A> = {
  node: SearchNode<S, A> | null;
  expanded: number;
};

type Entry<S, A> = {
  node: SearchNode<S, A>;
  key: string | null;
  seq: number;
};

/** Binary min-heap on (value, insertion order). */
class Frontier<S, A> {
  private heap: Array<Entry<S, A>> = [];

  get length(): number {
    return this.heap.length;
  }

  push(entry: Entry<S, A>): void {
    const heap = this.heap;
    heap.push(entry);
    let i = heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(heap[i], heap[parent])) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  pop(): Entry<S, A> | undefined {
    const heap = this.heap;
    const top = heap[0];
    const last = heap.pop();
    if (heap.length > 0 && last) {
      heap[0] = last;
      let i = 0;
      for (;;) {
        const l = 2 * i + 1;
        const r = l + 1;
        let m = i;
        if (l < heap.length && this.less(heap[l], heap[m])) m = l;
        if (r < heap.length && this.less(heap[r], heap[m])) m = r;
        if (m === i) break;
        [heap[i], heap[m]] = [heap[m], heap[i]];
        i = m;
      }
    }
    return top;
  }

  private less(a: Entry<S, A>, b: Entry<S, A>): boolean {
    return a.node.value < b.node.value || (a.node.value === b.node.value && a.seq < b.seq);
  }
}

/**
 * Expands the frontier node with the lowest `evaluate` value first, ties in
 * insertion order. A goal is reported when it is popped, not when generated.
 */
export function bestFirstGraphSearch<S, A>(
  problem: SearchProblem<S, A>,
  evaluate: (state: S) => number
): SearchOutcome<S, A> {
  const keyOf = (state: S): string | null => (problem.stateKey ? problem.stateKey(state) : null);
  const frontier = new Frontier<S, A>();
  const queued = new Map<string, number>();
  const explored = new Set<string>();
  let seq = 0;
  let expanded = 0;

  const enqueue = (node: SearchNode<S, A>): void => {
    const key = keyOf(node.state);
    if (key !== null) {
      if (explored.has(key)) return;
      const known = queued.get(key);
      if (known !== undefined && known <= node.value) return;
      queued.set(key, node.value);
    }
    frontier.push({ node, key, seq: seq++ });
  };

  const root = problem.initialState;
  enqueue({ state: root, parent: null, action: null, depth: 0, value: evaluate(root) });

  while (frontier.length > 0) {
    const entry = frontier.pop();
    if (!entry) break;
    const { node, key } = entry;
    if (key !== null) {
      // A better copy of this state was queued later; this entry is stale.
      if (explored.has(key) || queued.get(key) !== node.value) continue;
      queued.delete(key);
    }
    if (problem.goalTest(node.state)) return { node, expanded };
    if (key !== null) explored.add(key);
    expanded += 1;
    for (const action of problem.actions(node.state)) {
      const state = problem.result(node.state, action);
      enqueue({ state, parent: node, action, depth: node.depth + 1, value: evaluate(state) });
    }
  }
  return { node: null, expanded };
}

export function path<S, A>(node: SearchNode<S, A>): A[] {
  const out: A[] = [];
  for (let n: SearchNode<S, A> | null = node; n && n.action !== null; n = n.parent) {
    out.push(n.action);
  }
  return out.reverse();
}
