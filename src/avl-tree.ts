/**
 * @module avl-tree
 * @description
 * Order-maintenance AVL tree.
 *
 * The tree never compares values: the order of the elements is their position.
 * Elements enter at either end (`addMin` / `addMax`), whole trees are cut
 * (`splitAfter` / `splitBefore`) and joined (`mergeAfter` / `mergeBefore`) in
 * O(log N), and neighbours are found in O(1) through the threading links kept
 * by every `AVLTreeNode`.
 *
 * * Layout:
 * - A hidden sentinel ("virtual root") is the parent of the real root, so the
 *   root is just the sentinel's left child and needs no special casing.
 * - `#modCount` is bumped by every mutating call; iterators fail fast on it.
 *
 * * Contracts:
 * - Node handles returned by the tree may be kept and passed back, but their
 *   links must only ever change through the tree.
 * - Not safe for concurrent mutation; everything here is synchronous.
 */

import assert from 'node:assert';
import { AVLTreeNode } from './avl-tree-node';
import {
    ConcurrentModificationError,
    InvalidArgumentError,
    UnsupportedOperationError,
    requireNode,
} from './errors';

export class AVLTree<T> implements Iterable<T> {
    readonly #virtualRoot = new AVLTreeNode<T>();
    #modCount: number = 0;

    /**
     * Builds a perfectly balanced tree holding `values` in the given order.
     * Complexity: O(N) (Linear time).
     */
    static fromArray<U>(values: ReadonlyArray<U>): AVLTree<U> {
        function build(start: number, end: number): AVLTreeNode<U> | null {
            if (start > end) return null;
            const mid = (start + end) >>> 1;
            const node = new AVLTreeNode(values[mid]);
            node.setLeftChild(build(start, mid - 1));
            node.setRightChild(build(mid + 1, end));
            node.updateHeightAndSubtreeSize();
            return node;
        }
        return AVLTree.#fromRoot(build(0, values.length - 1));
    }

    static #fromRoot<U>(root: AVLTreeNode<U> | null): AVLTree<U> {
        const tree = new AVLTree<U>();
        tree.#makeRoot(root);
        return tree;
    }

    get root(): AVLTreeNode<T> | null { return this.#virtualRoot._left; }
    get min(): AVLTreeNode<T> | null { return this.root?._subtreeMin ?? null; }
    get max(): AVLTreeNode<T> | null { return this.root?._subtreeMax ?? null; }
    get size(): number { return this.root?._subtreeSize ?? 0; }
    get height(): number { return this.root?._height ?? 0; }

    /** Bumped by every mutating call. */
    get modCount(): number { return this.#modCount; }

    isEmpty(): boolean { return this.#virtualRoot._left === null; }

    // --- Extremal insertion ---

    /** Appends `value` after the current maximum. Complexity: O(log N). */
    addMax(value: T): AVLTreeNode<T> {
        const node = new AVLTreeNode(value);
        this.addMaxNode(node);
        return node;
    }

    /**
     * Appends a detached node (e.g. one returned by `removeMin()`) after the current maximum.
     * Throws `InvalidArgumentError` if the node is still linked into a tree.
     */
    addMaxNode(node: AVLTreeNode<T>) {
        const newMax = this.#requireDetached(node, 'addMaxNode');
        this.#registerModification();
        const max = this.max;
        if (max === null) {
            this.#makeRoot(newMax);
        } else {
            max.setRightChild(newMax);
            this.#balance(max);
        }
    }

    /** Prepends `value` before the current minimum. Complexity: O(log N). */
    addMin(value: T): AVLTreeNode<T> {
        const node = new AVLTreeNode(value);
        this.addMinNode(node);
        return node;
    }

    /** Mirror of `addMaxNode()`. */
    addMinNode(node: AVLTreeNode<T>) {
        const newMin = this.#requireDetached(node, 'addMinNode');
        this.#registerModification();
        const min = this.min;
        if (min === null) {
            this.#makeRoot(newMin);
        } else {
            min.setLeftChild(newMin);
            this.#balance(min);
        }
    }

    // --- Extremal removal ---

    /**
     * Detaches the minimum and returns it in reset state, or `null` if the tree is empty.
     * The minimum has no left child, so its right child simply takes its place.
     */
    removeMin(): AVLTreeNode<T> | null {
        this.#registerModification();
        const min = this.min;
        if (min === null) return null;

        const parent = min._parent;
        assert(parent, 'removeMin: attached node without parent');
        if (parent === this.#virtualRoot) this.#makeRoot(min._right);
        else parent.setLeftChild(min._right);

        this.#balance(parent);
        min.reset();
        return min;
    }

    /** Mirror of `removeMin()`. */
    removeMax(): AVLTreeNode<T> | null {
        this.#registerModification();
        const max = this.max;
        if (max === null) return null;

        const parent = max._parent;
        assert(parent, 'removeMax: attached node without parent');
        if (parent === this.#virtualRoot) this.#makeRoot(max._left);
        else parent.setRightChild(max._left);

        this.#balance(parent);
        max.reset();
        return max;
    }

    /**
     * Drops every element. The nodes themselves are not unlinked, so they cannot
     * be re-added to another tree.
     */
    clear() {
        this.#registerModification();
        this.#virtualRoot._left = null;
    }

    // --- Neighbours ---

    /** Next node in tree order, `null` for the maximum. Complexity: O(1). */
    successor(node: AVLTreeNode<T>): AVLTreeNode<T> | null {
        return requireNode(node, 'successor')._successor;
    }

    /** Previous node in tree order, `null` for the minimum. Complexity: O(1). */
    predecessor(node: AVLTreeNode<T>): AVLTreeNode<T> | null {
        return requireNode(node, 'predecessor')._predecessor;
    }

    // --- Split ---

    /**
     * Cuts the tree behind `node`.
     * Everything up to and including `node` stays here, everything after it is
     * returned as a new tree.
     *
     * `node` is pulled out and re-attached as the maximum of its own left
     * subtree. Then, walking up from its former parent, every ancestor becomes
     * the junction of one merge: into the left part when the walk comes up from
     * a right child, into the right part when it comes up from a left child.
     * Complexity: O(log N).
     */
    splitAfter(node: AVLTreeNode<T>): AVLTree<T> {
        const target = this.#requireMember(node, 'splitAfter');
        this.#registerModification();

        const parent = target._parent;
        assert(parent, 'splitAfter: attached node without parent');
        const nextMove = target.isLeftChild;
        let left = target._left;
        const right = target._right;

        parent.substituteChild(target, null);
        target.reset();
        if (left) left._parent = null;
        if (right) right._parent = null;

        if (left === null) {
            left = target;
        } else {
            // re-attach target as the maximum of its left subtree
            let t = left;
            while (t._right) t = t._right;
            t.setRightChild(target);
            while (t !== left) {
                const p = t._parent;
                assert(p, 'splitAfter: broken right spine');
                p.substituteChild(t, this.#balanceNode(t));
                t = p;
            }
            left = this.#balanceNode(left);
        }

        return this.#split(left, right, parent, nextMove);
    }

    /**
     * Cuts the tree in front of `node`; `node` goes to the returned tree.
     * If `node` is the minimum the whole content moves and this tree ends up empty.
     */
    splitBefore(node: AVLTreeNode<T>): AVLTree<T> {
        const target = this.#requireMember(node, 'splitBefore');
        this.#registerModification();

        const predecessor = target._predecessor;
        if (predecessor === null) {
            const tree = new AVLTree<T>();
            this.#swap(tree);
            return tree;
        }
        return this.splitAfter(predecessor);
    }

    #split(
        left: AVLTreeNode<T>,
        right: AVLTreeNode<T> | null,
        p: AVLTreeNode<T>,
        leftMove: boolean,
    ): AVLTree<T> {
        while (p !== this.#virtualRoot) {
            const nextMove = p.isLeftChild;
            const nextP = p._parent;
            assert(nextP, 'split: ancestor chain does not reach the sentinel');

            nextP.substituteChild(p, null);
            p._parent = null;

            if (leftMove) right = this.#merge(p, right, p._right);
            else left = this.#merge(p, p._left, left);

            p = nextP;
            leftMove = nextMove;
        }

        this.#makeRoot(left);
        return AVLTree.#fromRoot(right);
    }

    // --- Merge ---

    /**
     * Appends all elements of `other` behind the elements of this tree.
     * `other` is left empty. Complexity: O(log N).
     */
    mergeAfter(other: AVLTree<T>) {
        const tree = this.#requireOther(other, 'mergeAfter');
        this.#registerModification();

        if (tree.isEmpty()) return;
        if (tree.size === 1) {
            const single = tree.removeMin();
            assert(single, 'mergeAfter: non-empty tree returned no minimum');
            this.addMaxNode(single);
            return;
        }

        const junction = tree.removeMin();
        assert(junction, 'mergeAfter: non-empty tree returned no minimum');
        const treeRoot = tree.root;
        tree.clear();

        this.#makeRoot(this.#merge(junction, this.root, treeRoot));
    }

    /** Prepends all elements of `other`; `other` is left empty. */
    mergeBefore(other: AVLTree<T>) {
        const tree = this.#requireOther(other, 'mergeBefore');
        this.#registerModification();
        tree.mergeAfter(this);
        this.#swap(tree);
    }

    /**
     * AVL join: `left`, then `junction`, then `right`.
     * Descends along the inner spine of the taller tree until the heights are
     * within one, hangs `junction` there and rebalances on the way back.
     *
     * @returns The root of the joined subtree.
     */
    #merge(junction: AVLTreeNode<T>, left: AVLTreeNode<T> | null, right: AVLTreeNode<T> | null): AVLTreeNode<T> {
        if (left === null) {
            if (right === null) {
                junction.reset();
                return junction;
            }
            right.setLeftChild(this.#merge(junction, null, right._left));
            return this.#balanceNode(right);
        }
        if (right === null) {
            left.setRightChild(this.#merge(junction, left._right, null));
            return this.#balanceNode(left);
        }
        if (left._height > right._height + 1) {
            left.setRightChild(this.#merge(junction, left._right, right));
            return this.#balanceNode(left);
        }
        if (right._height > left._height + 1) {
            right.setLeftChild(this.#merge(junction, left, right._left));
            return this.#balanceNode(right);
        }
        junction.setLeftChild(left);
        junction.setRightChild(right);
        return this.#balanceNode(junction);
    }

    #swap(tree: AVLTree<T>) {
        const t = this.#virtualRoot._left;
        this.#makeRoot(tree.#virtualRoot._left);
        tree.#makeRoot(t);
    }

    // --- Balancing ---

    /**
     * Hangs `node` under the sentinel and cuts the threading at both ends.
     */
    #makeRoot(node: AVLTreeNode<T> | null) {
        this.#virtualRoot._left = node;
        if (node) {
            node._subtreeMax.setSuccessor(null);
            node._subtreeMin.setPredecessor(null);
            node._parent = this.#virtualRoot;
        }
    }

    /**
     * Performs a Right Rotation and returns the new subtree root.
     *
     * Transformation:
     *     node          left
     *     / \           / \
     *   left  C  -->   A  node
     *   / \               / \
     *  A   B             B   C
     */
    #rotateRight(node: AVLTreeNode<T>): AVLTreeNode<T> {
        const left = node._left;
        assert(left, 'rotateRight: no left child');
        left._parent = null;

        node.setLeftChild(left._right);
        left.setRightChild(node);

        node.updateHeightAndSubtreeSize();
        left.updateHeightAndSubtreeSize();
        return left;
    }

    /** Mirror of `#rotateRight()`. */
    #rotateLeft(node: AVLTreeNode<T>): AVLTreeNode<T> {
        const right = node._right;
        assert(right, 'rotateLeft: no right child');
        right._parent = null;

        node.setRightChild(right._left);
        right.setLeftChild(node);

        node.updateHeightAndSubtreeSize();
        right.updateHeightAndSubtreeSize();
        return right;
    }

    /**
     * Rebalances `node` and every ancestor up to the sentinel, hanging each
     * (possibly rotated) subtree back into its parent.
     */
    #balance(node: AVLTreeNode<T>) {
        let current = node;
        while (current !== this.#virtualRoot) {
            const parent = current._parent;
            assert(parent, 'balance: ancestor chain does not reach the sentinel');
            if (parent === this.#virtualRoot) this.#makeRoot(this.#balanceNode(current));
            else parent.substituteChild(current, this.#balanceNode(current));
            current = parent;
        }
    }

    /**
     * Refreshes the metadata of `node` and fixes a height difference of two.
     * A zig-zag (left child right-heavy, or the mirror) takes a double rotation.
     *
     * @returns The root of the subtree after rotation.
     */
    #balanceNode(node: AVLTreeNode<T>): AVLTreeNode<T> {
        node.updateHeightAndSubtreeSize();
        if (node.isLeftDoubleHeavy) {
            const left = node._left;
            assert(left, 'balanceNode: left-heavy node without left child');
            if (left.isRightHeavy) node.setLeftChild(this.#rotateLeft(left));
            return this.#rotateRight(node);
        }
        if (node.isRightDoubleHeavy) {
            const right = node._right;
            assert(right, 'balanceNode: right-heavy node without right child');
            if (right.isLeftHeavy) node.setRightChild(this.#rotateRight(right));
            return this.#rotateLeft(node);
        }
        return node;
    }

    #registerModification() { ++this.#modCount; }

    // --- Argument checks ---

    #requireDetached(node: AVLTreeNode<T>, op: string): AVLTreeNode<T> {
        const n = requireNode(node, op);
        if (n.isSentinel || !n.isDetached) {
            throw new InvalidArgumentError(`${op}() requires a detached node`);
        }
        return n;
    }

    #requireMember(node: AVLTreeNode<T>, op: string): AVLTreeNode<T> {
        const n = requireNode(node, op);
        // nodes dropped by clear() still reach the sentinel, but through a stale root
        let top = n;
        let below = n;
        while (top._parent) {
            below = top;
            top = top._parent;
        }
        if (top !== this.#virtualRoot || below !== this.#virtualRoot._left || n === top) {
            throw new InvalidArgumentError(`${op}() got a node that does not belong to this tree`);
        }
        return n;
    }

    #requireOther(other: AVLTree<T>, op: string): AVLTree<T> {
        const tree = requireNode(other, op);
        if (tree === this) throw new InvalidArgumentError(`${op}() cannot merge a tree with itself`);
        return tree;
    }

    // --- Iteration ---

    /** Values in tree order. Fails fast if the tree is modified meanwhile. */
    [Symbol.iterator](): TreeValuesIterator<T> { return new TreeValuesIterator(this); }

    values(): TreeValuesIterator<T> { return new TreeValuesIterator(this); }

    /** Nodes in tree order. Fails fast if the tree is modified meanwhile. */
    nodes(): TreeNodeIterator<T> { return new TreeNodeIterator(this); }

    /** Returns elements as an array in tree order. Complexity: O(N). */
    toArray(): T[] { return Array.from(this); }

    toString(): string { return Array.from(this.nodes(), n => n.toString()).join('\n'); }
    [Symbol.for('nodejs.util.inspect.custom')]() { return `AVLTree[${this.toArray().join(', ')}]`; }
}

/**
 * Walks the threading from the minimum.
 * The modification counter is captured here, at construction, and compared on every step.
 */
export class TreeNodeIterator<T> implements IterableIterator<AVLTreeNode<T>> {
    readonly #tree: AVLTree<T>;
    readonly #expectedModCount: number;
    #nextNode: AVLTreeNode<T> | null;

    constructor(tree: AVLTree<T>) {
        this.#tree = tree;
        this.#expectedModCount = tree.modCount;
        this.#nextNode = tree.min;
    }

    next(): IteratorResult<AVLTreeNode<T>> {
        if (this.#expectedModCount !== this.#tree.modCount) throw new ConcurrentModificationError();
        const node = this.#nextNode;
        if (node === null) return { done: true, value: undefined };
        this.#nextNode = node._successor;
        return { done: false, value: node };
    }

    /** Not supported: request a new iterator from the tree instead. */
    reset(): never { throw new UnsupportedOperationError('iterator reset'); }

    [Symbol.iterator](): this { return this; }
}

export class TreeValuesIterator<T> implements IterableIterator<T> {
    readonly #nodes: TreeNodeIterator<T>;

    constructor(tree: AVLTree<T>) {
        this.#nodes = new TreeNodeIterator(tree);
    }

    next(): IteratorResult<T> {
        const r = this.#nodes.next();
        return r.done ? { done: true, value: undefined } : { done: false, value: r.value.value };
    }

    reset(): never { return this.#nodes.reset(); }

    [Symbol.iterator](): this { return this; }
}
