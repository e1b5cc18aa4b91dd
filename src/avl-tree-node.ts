/**
 * @module avl-tree-node
 * @description
 * Storage unit of the order-maintenance AVL tree.
 *
 * Apart from the structural pointers (parent / left / right) every node keeps:
 * - `successor` / `predecessor`: a threaded list equal to the in-order traversal.
 * - `height`, `subtreeSize`: balance and size metadata.
 * - `subtreeMin`, `subtreeMax`: cached extreme nodes of the subtree.
 *
 * Only the tree writes these fields. The `_`-prefixed members are package
 * internals and are public purely so that `AVLTree` can reach them.
 */

import assert from 'node:assert';

export class AVLTreeNode<T> {
    /** @internal */ _parent: AVLTreeNode<T> | null = null;
    /** @internal */ _left: AVLTreeNode<T> | null = null;
    /** @internal */ _right: AVLTreeNode<T> | null = null;
    /** @internal */ _successor: AVLTreeNode<T> | null = null;
    /** @internal */ _predecessor: AVLTreeNode<T> | null = null;
    /** @internal Leaf = 1. Null = 0. */ _height: number = 1;
    /** @internal */ _subtreeSize: number = 1;
    /** @internal */ _subtreeMin: AVLTreeNode<T> = this;
    /** @internal */ _subtreeMax: AVLTreeNode<T> = this;

    readonly #value: [T] | [];

    /** Created by `AVLTree` only. Without an argument this creates the sentinel. */
    constructor(...value: [T] | []) {
        this.#value = value;
    }

    get value(): T {
        const v = this.#value;
        if (v.length === 0) throw new Error('InvalidOperation: the sentinel node holds no value');
        return v[0];
    }

    /** The tree's hidden virtual root. */
    get isSentinel(): boolean { return this.#value.length === 0; }

    /** `null` for the root: the sentinel above it is never handed out. */
    get parent(): AVLTreeNode<T> | null {
        const p = this._parent;
        return p && !p.isSentinel ? p : null;
    }
    get left(): AVLTreeNode<T> | null { return this._left; }
    get right(): AVLTreeNode<T> | null { return this._right; }
    get successor(): AVLTreeNode<T> | null { return this._successor; }
    get predecessor(): AVLTreeNode<T> | null { return this._predecessor; }
    get height(): number { return this._height; }
    get subtreeSize(): number { return this._subtreeSize; }
    get subtreeMin(): AVLTreeNode<T> { return this._subtreeMin; }
    get subtreeMax(): AVLTreeNode<T> { return this._subtreeMax; }

    /**
     * Root of the tree this node belongs to.
     * Walks up to the sentinel (the only node without a parent) and returns its left child.
     * Complexity: O(log N).
     */
    get root(): AVLTreeNode<T> | null {
        let current: AVLTreeNode<T> = this;
        while (current._parent) current = current._parent;
        return current._left;
    }

    get treeMin(): AVLTreeNode<T> | null { return this.root?._subtreeMin ?? null; }
    get treeMax(): AVLTreeNode<T> | null { return this.root?._subtreeMax ?? null; }

    get leftHeight(): number { return this._left ? this._left._height : 0; }
    get rightHeight(): number { return this._right ? this._right._height : 0; }
    get leftSubtreeSize(): number { return this._left ? this._left._subtreeSize : 0; }
    get rightSubtreeSize(): number { return this._right ? this._right._subtreeSize : 0; }

    get isLeftDoubleHeavy(): boolean { return this.leftHeight > this.rightHeight + 1; }
    get isRightDoubleHeavy(): boolean { return this.rightHeight > this.leftHeight + 1; }
    get isLeftHeavy(): boolean { return this.leftHeight > this.rightHeight; }
    get isRightHeavy(): boolean { return this.rightHeight > this.leftHeight; }
    get isLeftChild(): boolean { return this._parent !== null && this === this._parent._left; }
    get isRightChild(): boolean { return this._parent !== null && this === this._parent._right; }

    /** True if the node is in the state `reset()` leaves it in. */
    get isDetached(): boolean {
        return this._parent === null && this._left === null && this._right === null
            && this._successor === null && this._predecessor === null;
    }

    // --- Threading ---

    /** @internal Links `node` after this one; the reciprocal side is set as well. */
    setSuccessor(node: AVLTreeNode<T> | null) {
        this._successor = node;
        if (node) node._predecessor = this;
    }

    /** @internal Links `node` before this one; the reciprocal side is set as well. */
    setPredecessor(node: AVLTreeNode<T> | null) {
        this._predecessor = node;
        if (node) node._successor = this;
    }

    // --- Link primitives ---

    /**
     * @internal
     * Replaces the left child and refreshes `predecessor` and `subtreeMin`.
     * Height and size are left to `updateHeightAndSubtreeSize()`.
     */
    setLeftChild(node: AVLTreeNode<T> | null) {
        this._left = node;
        if (node) {
            node._parent = this;
            this.setPredecessor(node._subtreeMax);
            this._subtreeMin = node._subtreeMin;
        } else {
            this._subtreeMin = this;
            this._predecessor = null;
        }
    }

    /** @internal Mirror of `setLeftChild()` for `successor` and `subtreeMax`. */
    setRightChild(node: AVLTreeNode<T> | null) {
        this._right = node;
        if (node) {
            node._parent = this;
            this.setSuccessor(node._subtreeMin);
            this._subtreeMax = node._subtreeMax;
        } else {
            this._successor = null;
            this._subtreeMax = this;
        }
    }

    /** @internal `prev` must be exactly one of this node's children. */
    substituteChild(prev: AVLTreeNode<T>, next: AVLTreeNode<T> | null) {
        assert(this._left === prev || this._right === prev, 'substituteChild: node is not a child');
        assert(this._left !== this._right, 'substituteChild: node is both children');
        if (this._left === prev) this.setLeftChild(next);
        else this.setRightChild(next);
    }

    /**
     * @internal
     * Must be called whenever a child changes (rotation, merge, removal).
     *
     * $$Height(n) = 1 + \max(Height(n.left), Height(n.right))$$
     * $$Size(n) = 1 + Size(n.left) + Size(n.right)$$
     */
    updateHeightAndSubtreeSize() {
        const lh = this.leftHeight;
        const rh = this.rightHeight;
        this._height = (lh > rh ? lh : rh) + 1;
        this._subtreeSize = this.leftSubtreeSize + this.rightSubtreeSize + 1;
    }

    /** @internal Back to an unlinked singleton. */
    reset() {
        this._height = 1;
        this._subtreeSize = 1;
        this._subtreeMin = this;
        this._subtreeMax = this;
        this._parent = null;
        this._left = null;
        this._right = null;
        this._predecessor = null;
        this._successor = null;
    }

    toString(): string {
        const v = (n: AVLTreeNode<T> | null) => (n ? n.#label() : 'null');
        return `{${this.#label()}}: `
            + `[parent = ${v(this._parent)}, left = ${v(this._left)}, right = ${v(this._right)}], `
            + `[subtreeMin = ${v(this._subtreeMin)}, subtreeMax = ${v(this._subtreeMax)}], `
            + `[predecessor = ${v(this._predecessor)}, successor = ${v(this._successor)}], `
            + `[height = ${this._height}, subtreeSize = ${this._subtreeSize}]`;
    }

    #label(): string {
        const v = this.#value;
        return v.length === 0 ? 'sentinel' : String(v[0]);
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
