/**
 * @module order-tree
 * Order-maintenance AVL tree: positional insertion at both ends, O(1)
 * neighbours through threading, O(log N) split and merge.
 */

export { AVLTree, TreeNodeIterator, TreeValuesIterator } from './avl-tree';
export { AVLTreeNode } from './avl-tree-node';
export {
    ConcurrentModificationError,
    InvalidArgumentError,
    UnsupportedOperationError,
} from './errors';
