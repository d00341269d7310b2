import { SchemaError } from '../errors';

/**
 * Owns the wrappers of one parse. Nodes refer to each other by id (parent id,
 * child ids) instead of holding live references.
 */
export class WrapperArena<N> {
  private readonly nodes: N[] = [];

  add(create: (id: number) => N): N {
    const node = create(this.nodes.length);
    this.nodes.push(node);
    return node;
  }

  get(id: number): N {
    if (!Number.isInteger(id) || id < 0 || id >= this.nodes.length) {
      throw new SchemaError(`no wrapper with id ${id}`);
    }
    return this.nodes[id];
  }
}
