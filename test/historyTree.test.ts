// test/historyTree.test.ts

import { Entity, point2, vec2 } from '../src/history/entities.js';
import { HistoryChange, HistoryTree } from '../src/history/historyTree.js';
import { Operation } from '../src/history/operation.js';
import { OperationIdGenerator } from '../src/history/operationId.js';
import { createEntity, deleteEntity, modifyVariable, moveEntities } from '../src/history/operations.js';

const clock = () => new Date('2024-01-01T00:00:00.000Z');
let ids: OperationIdGenerator;

beforeEach(() => {
    ids = new OperationIdGenerator();
});

const ctx = () => ({ ids, clock });
const newTree = (maxOperations?: number) => new HistoryTree({ ids, clock, maxOperations, checkInvariants: true });

const line = (id: number): Entity => ({ id, geometry: { type: 'line', start: point2(0, 0), end: point2(id, id) } });
const draw = (entityId: number, description = `Draw line ${entityId}`): Operation =>
    createEntity(line(entityId), description, ctx());

const idsOf = (ops: ReadonlyArray<Operation>) => ops.map(op => op.id);

describe('HistoryTree.addOperation', () => {
    it('makes the first operation the root and current', () => {
        const tree = newTree();
        const op = draw(10);
        expect(tree.addOperation(op).failed).toBeUndefined();

        expect(tree.rootId).toBe(op.id);
        expect(tree.currentId).toBe(op.id);
        expect(tree.findNode(op.id)).toEqual({
            id: op.id, operation: op, parent: null, children: [], depth: 0, isActive: true,
        });
    });

    it('builds a chain with increasing depth', () => {
        const tree = newTree();
        for (let i = 0; i < 5; i++) tree.addOperation(draw(i));

        expect(tree.findNode(5)?.depth).toBe(4);
        expect(tree.stats().currentDepth).toBe(4);
        expect(tree.stats().totalOperations).toBe(5);
        expect(tree.stats().nodeCount).toBe(5);
        expect(tree.stats().lastOperationTime).toEqual(clock());
        expect(tree.undoStack()).toEqual([1, 2, 3, 4, 5]);
    });

    it('forks when an edit follows an undo', () => {
        const tree = newTree();
        tree.addOperation(draw(1)); // 1
        tree.addOperation(draw(2)); // 2
        tree.undo();
        tree.addOperation(draw(3)); // 3

        expect(tree.findNode(1)?.children).toEqual([2, 3]);
        expect(tree.currentId).toBe(3);
        expect(tree.findNode(2)?.isActive).toBe(false);
        expect(tree.findNode(3)?.isActive).toBe(true);
        expect(idsOf(tree.currentOperations())).toEqual([1, 3]);
    });

    it('clears redo on a new edit', () => {
        const tree = newTree();
        tree.addOperation(draw(1));
        tree.addOperation(draw(2));
        expect(tree.undo()?.id).toBe(2);
        expect(tree.redoStack()).toEqual([2]);

        tree.addOperation(draw(3));
        expect(tree.canRedo()).toBe(false);
        expect(tree.redo()).toBeNull();
    });

    it('rejects an operation that is already recorded', () => {
        const tree = newTree();
        const op = draw(1);
        tree.addOperation(op);

        const result = tree.addOperation(op);
        expect(result.failed?.kind).toBe('DuplicateOperation');
        expect(result.failed?.message).toBe('Operation 1 is already recorded');
        expect(tree.size).toBe(1);
        expect(tree.stats().totalOperations).toBe(1);
    });

    it('starts a new top-level timeline after everything was undone', () => {
        const tree = newTree();
        tree.addOperation(draw(1, 'First'));
        tree.undo();
        tree.addOperation(draw(2, 'Second'));

        expect(tree.rootId).toBe(1);
        expect(tree.currentId).toBe(2);
        expect(tree.findNode(2)?.parent).toBeNull();
        expect(tree.findNode(2)?.depth).toBe(0);
        expect(tree.treeString()).toBe('  1: First\n* 2: Second\n');
    });

    it('compresses before adding once the node limit is reached', () => {
        const tree = newTree(4);
        tree.addOperation(draw(1));                                                   // 1
        tree.addOperation(moveEntities([1], vec2(1, 0), [point2(0, 0)], 'Move', ctx())); // 2
        tree.addOperation(moveEntities([1], vec2(0, 1), [point2(1, 0)], 'Move', ctx())); // 3
        tree.addOperation(draw(2));                                                   // 4
        const fifth = draw(3);                                                        // 5

        expect(tree.addOperation(fifth).failed).toBeUndefined();

        // 2 and 3 fold into 6 before 5 goes in
        expect(tree.size).toBe(4);
        expect(idsOf(tree.currentOperations())).toEqual([1, 6, 4, 5]);
        expect(tree.stats()).toMatchObject({ totalOperations: 5, nodeCount: 4, compressionSavings: 1, currentDepth: 3 });
    });

    it('rejects a non-positive node limit', () => {
        expect(() => new HistoryTree({ maxOperations: 0 })).toThrow(
            'HistoryTree: maxOperations must be a positive integer, got 0',
        );
    });
});

describe('HistoryTree undo/redo', () => {
    it('undoes everything and redoes the same sequence', () => {
        const tree = newTree();
        const recorded = [draw(1), draw(2), draw(3), draw(4)];
        recorded.forEach(op => tree.addOperation(op));

        const undone = recorded.map(() => tree.undo());
        expect(undone.map(op => op?.id)).toEqual([4, 3, 2, 1]);
        expect(tree.currentOperations()).toEqual([]);
        expect(tree.currentId).toBeNull();
        expect(tree.undo()).toBeNull();

        const redone = recorded.map(() => tree.redo());
        expect(redone.map(op => op?.id)).toEqual([1, 2, 3, 4]);
        expect(idsOf(tree.currentOperations())).toEqual([1, 2, 3, 4]);
        expect(tree.redo()).toBeNull();
    });

    it('returns null on an empty tree', () => {
        const tree = newTree();
        expect(tree.canUndo()).toBe(false);
        expect(tree.undo()).toBeNull();
        expect(tree.redo()).toBeNull();
        expect(tree.currentId).toBeNull();
    });

    it('stops at an operation that is not undoable', () => {
        const tree = newTree();
        tree.addOperation(draw(1));
        tree.addOperation(draw(2).withUndo(false));

        expect(tree.canUndo()).toBe(false);
        expect(tree.undo()).toBeNull();
        expect(tree.currentId).toBe(2);
        expect(tree.redoStack()).toEqual([]);
    });

    it('keeps the current depth in step with the cursor', () => {
        const tree = newTree();
        tree.addOperation(draw(1));
        tree.addOperation(draw(2));
        tree.addOperation(draw(3));
        tree.undo();
        expect(tree.stats().currentDepth).toBe(1);
        tree.redo();
        expect(tree.stats().currentDepth).toBe(2);
    });
});

describe('HistoryTree.gotoOperation', () => {
    it('rebuilds the undo stack from the target path and drops redo', () => {
        const tree = newTree();
        tree.addOperation(draw(1)); // 1
        tree.addOperation(draw(2)); // 2
        tree.addOperation(draw(3)); // 3
        tree.undo();
        tree.undo();
        tree.addOperation(draw(4)); // 4, sibling of 2
        tree.addOperation(draw(5)); // 5

        expect(tree.gotoOperation(3).failed).toBeUndefined();
        expect(idsOf(tree.currentOperations())).toEqual([1, 2, 3]);
        expect(tree.undoStack()).toEqual([1, 2, 3]);
        expect(tree.redoStack()).toEqual([]);
        expect(tree.findNode(5)?.isActive).toBe(false);
        expect(tree.findNode(3)?.isActive).toBe(true);

        expect(tree.undo()?.id).toBe(3);
        expect(tree.currentId).toBe(2);
    });

    it('fails for an unknown id and leaves the tree alone', () => {
        const tree = newTree();
        tree.addOperation(draw(1));
        tree.addOperation(draw(2));
        tree.undo();

        const result = tree.gotoOperation(99);
        expect(result.failed?.kind).toBe('NotFound');
        expect(result.failed?.message).toBe('Operation 99 not found');
        expect(tree.currentId).toBe(1);
        expect(tree.redoStack()).toEqual([2]);
    });
});

describe('HistoryTree branches', () => {
    it('switches back to a named point regardless of later edits', () => {
        const tree = newTree();
        tree.addOperation(draw(1));
        tree.addOperation(draw(2));
        expect(tree.createBranch('draft', 2).failed).toBeUndefined();
        tree.addOperation(draw(3));
        tree.addOperation(draw(4));

        expect(tree.switchBranch('draft').failed).toBeUndefined();
        expect(idsOf(tree.currentOperations())).toEqual([1, 2]);
        expect(tree.currentId).toBe(2);
        expect(tree.stats().branchCount).toBe(1);
        expect(tree.branches()).toEqual(new Map([['draft', 2]]));
    });

    it('reports missing nodes, duplicate names and unknown names', () => {
        const tree = newTree();
        tree.addOperation(draw(1));
        tree.createBranch('main', 1);

        expect(tree.createBranch('other', 42).failed?.kind).toBe('NotFound');
        const duplicate = tree.createBranch('main', 1).failed;
        expect(duplicate?.kind).toBe('DuplicateBranch');
        expect(duplicate?.message).toBe("Branch 'main' already exists");
        const unknown = tree.switchBranch('nope').failed;
        expect(unknown?.kind).toBe('UnknownBranch');
        expect(unknown?.message).toBe("Branch 'nope' not found");
        expect(tree.stats().branchCount).toBe(1);
    });

    it('forgets a branch name without touching nodes', () => {
        const tree = newTree();
        tree.addOperation(draw(1));
        tree.createBranch('main', 1);

        expect(tree.deleteBranch('main').failed).toBeUndefined();
        expect(tree.branches().size).toBe(0);
        expect(tree.stats().branchCount).toBe(0);
        expect(tree.size).toBe(1);
        expect(tree.deleteBranch('main').failed?.kind).toBe('UnknownBranch');
    });
});

describe('HistoryTree introspection', () => {
    it('lists explicit dependencies and the tree parent', () => {
        const tree = newTree();
        const base = draw(1);
        tree.addOperation(base);
        tree.addOperation(draw(2).withDependencies([base.id]));
        tree.addOperation(draw(3).withDependencies([base.id]));

        expect(tree.dependencyGraph()).toEqual(new Map([
            [1, []],
            [2, [1]],
            [3, [1, 2]],
        ]));
    });

    it('dumps the tree with the active path marked', () => {
        const tree = newTree();
        tree.addOperation(draw(1, 'Draw line'));
        tree.addOperation(draw(2, 'Draw arc'));
        tree.undo();
        tree.addOperation(draw(3, 'Draw circle'));

        expect(tree.treeString()).toBe('* 1: Draw line\n    2: Draw arc\n  * 3: Draw circle\n');
    });

    it('hands out stats that callers cannot change', () => {
        const tree = newTree();
        tree.addOperation(draw(1));

        const stats = tree.stats();
        stats.lastOperationTime?.setTime(0);
        stats.totalOperations = 99;

        expect(tree.stats().lastOperationTime).toEqual(clock());
        expect(tree.stats().totalOperations).toBe(1);
    });

    it('finds operations by id', () => {
        const tree = newTree();
        const op = draw(1);
        tree.addOperation(op);
        expect(tree.findOperation(op.id)).toBe(op);
        expect(tree.findOperation(77)).toBeNull();
        expect(tree.findNode(77)).toBeNull();
    });

    it('computes what to undo and redo between two nodes', () => {
        const tree = newTree();
        tree.addOperation(draw(1)); // 1
        tree.addOperation(draw(2)); // 2
        tree.addOperation(draw(3)); // 3
        tree.gotoOperation(1);
        tree.addOperation(draw(4)); // 4

        const path = tree.pathBetween(3, 4);
        expect(path && idsOf(path.undo)).toEqual([3, 2]);
        expect(path && idsOf(path.redo)).toEqual([4]);
        expect(tree.pathBetween(null, 2)?.redo.map(op => op.id)).toEqual([1, 2]);
        expect(tree.pathBetween(3, 99)).toBeNull();
    });

    it('emits a change event for every mutation', () => {
        const tree = newTree();
        const changes: HistoryChange[] = [];
        tree.on('history:change', change => changes.push(change));

        tree.addOperation(draw(1));
        tree.addOperation(draw(2));
        tree.undo();
        tree.redo();
        tree.gotoOperation(1);
        tree.createBranch('b', 2);

        expect(changes).toEqual([
            { kind: 'add', currentId: 1 },
            { kind: 'add', currentId: 2 },
            { kind: 'undo', currentId: 1 },
            { kind: 'redo', currentId: 2 },
            { kind: 'goto', currentId: 1 },
            { kind: 'branch', currentId: 1 },
        ]);
    });

    it('leaves mixed-kind neighbours alone when compressing', () => {
        const tree = newTree();
        tree.addOperation(draw(1));
        tree.addOperation(deleteEntity(1, line(1), 'Delete line', ctx()));
        tree.addOperation(modifyVariable('width', 1, 2, 'Widen', ctx()));

        tree.compressHistory();
        expect(tree.size).toBe(3);
        expect(tree.stats().compressionSavings).toBe(0);
    });
});
