import type { DependencyNode } from "./types.js";

export interface DepthFirstVisitor {
  /**
   * Called when the walk arrives at a node.
   * Returns the children to descend into, or null to stop at this occurrence.
   */
  enter(node: DependencyNode, depth: number): readonly DependencyNode[] | null;
  /** Called after every child of a descended node has been walked. */
  leave?(node: DependencyNode, depth: number): void;
}

interface Frame {
  node: DependencyNode;
  depth: number;
  children: readonly DependencyNode[];
  next: number;
}

/**
 * Pre-order depth-first walk from root using an explicit stack.
 * Arrival and departure order match the recursive form: children are visited
 * in the order `enter` returned them, and `leave` fires once they are done.
 */
export function depthFirst(root: DependencyNode, visitor: DepthFirstVisitor): void {
  const stack: Frame[] = [];

  const arrive = (node: DependencyNode, depth: number): void => {
    const children = visitor.enter(node, depth);
    if (children !== null) {
      stack.push({ node, depth, children, next: 0 });
    }
  };

  arrive(root, 0);

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.next < frame.children.length) {
      const child = frame.children[frame.next];
      frame.next += 1;
      arrive(child, frame.depth + 1);
    } else {
      stack.pop();
      visitor.leave?.(frame.node, frame.depth);
    }
  }
}
