import { AVLTree, ConcurrentModificationError, UnsupportedOperationError } from '../src/index';
import { assert, assertEqual, assertThrows, range } from './harness';

console.log('=== AVLTree Test Suite: iteration ===\n');

console.log('--- Test 1: Lazy, restartable iteration ---');
const tree = AVLTree.fromArray(['a', 'b', 'c', 'd']);
assertEqual([...tree], ['a', 'b', 'c', 'd'], 'Spread yields values in order');
assertEqual([...tree], ['a', 'b', 'c', 'd'], 'Every call starts a new pass');
assertEqual(Array.from(tree.values()), ['a', 'b', 'c', 'd'], 'values() matches the default iterator');
assertEqual(Array.from(tree.nodes(), n => n.value), ['a', 'b', 'c', 'd'], 'nodes() walks the same order');
assertEqual([...new AVLTree<string>()], [], 'Empty tree yields nothing');

const it = tree[Symbol.iterator]();
const step = it.next();
assert(!step.done && step.value === 'a', 'First step yields the minimum');
console.log();

console.log('--- Test 2: Fail-fast on modification ---');
const live = AVLTree.fromArray(range(1, 5));
const walking = live.values();
walking.next();
live.addMax(6);
assertThrows(() => walking.next(), ConcurrentModificationError, 'addMax between steps is detected');

const early = live.nodes();
live.removeMin();
assertThrows(() => early.next(), ConcurrentModificationError, 'Modification before the first step is detected');

const exhausted = live.values();
while (!exhausted.next().done) { /* consume */ }
live.removeMax();
assertThrows(() => exhausted.next(), ConcurrentModificationError, 'Modification after the end is detected');

const other = AVLTree.fromArray([100, 200]);
const consumed = other.values();
consumed.next();
live.mergeAfter(other);
assertThrows(() => consumed.next(), ConcurrentModificationError, 'Being merged away counts as a modification');

const splitting = live.values();
const pivot = live.min;
if (pivot) live.splitAfter(pivot);
assertThrows(() => splitting.next(), ConcurrentModificationError, 'Splitting counts as a modification');

const untouched = live.values();
const emptyRemoval = new AVLTree<number>();
emptyRemoval.removeMin();
assert(untouched.next().done === false, 'Mutating another tree does not affect the iterator');
assert(emptyRemoval.modCount === 1, 'Removal from an empty tree still counts as a modification');

let caught: unknown = null;
try {
    for (const v of live) {
        if (v === 2) live.addMin(0);
    }
} catch (e) {
    caught = e;
}
assert(caught instanceof ConcurrentModificationError, 'for...of surfaces the modification');
assert(caught instanceof Error && caught.message.startsWith('ConcurrentModification:'), 'Message carries the error kind');
console.log();

console.log('--- Test 3: Reset is unsupported ---');
const resettable = AVLTree.fromArray([1, 2]).values();
assertThrows(() => resettable.reset(), UnsupportedOperationError, 'Value iterator reset is rejected');
assertThrows(() => AVLTree.fromArray([1]).nodes().reset(), UnsupportedOperationError, 'Node iterator reset is rejected');

console.log('\n=== All iteration tests passed ===');
