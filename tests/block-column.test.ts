import { ColumnBlock, ColumnBlockBuilder } from '../src/block/column.js';
import { BlockClosedError, BuilderError, IteratorStateError } from '../src/errors.js';
import type { BlockMetadata } from '../src/query-types.js';
import { STEP_MS, makeBounds, readBlock } from './helpers/query-fixtures.js';

const meta: BlockMetadata = { bounds: makeBounds(3, 1_000), tags: { dc: 'eu' } };
const seriesMeta = [
    { name: 'a', tags: { host: 'a' } },
    { name: 'b', tags: { host: 'b' } },
];

function buildSample(): ColumnBlock {
    const builder = new ColumnBlockBuilder(meta, seriesMeta);
    builder.addCols(3);
    for (let col = 0; col < 3; col++) {
        builder.appendValue(col, col);
        builder.appendValue(col, col + 10);
    }
    const block = builder.build();
    if (!(block instanceof ColumnBlock)) throw new Error('expected a ColumnBlock');
    return block;
}

describe('ColumnBlockBuilder', () => {
    it('fills series positions in append order for each column', () => {
        const out = readBlock(buildSample());
        expect(out.names).toEqual(['a', 'b']);
        expect(out.values).toEqual([[0, 1, 2], [10, 11, 12]]);
        expect(out.stepCount).toBe(3);
        expect(out.meta).toEqual(meta);
    });

    it('rejects negative and fractional column counts', () => {
        const builder = new ColumnBlockBuilder(meta, seriesMeta);
        expect(() => builder.addCols(-1)).toThrow(BuilderError);
        expect(() => builder.addCols(1.5)).toThrow(BuilderError);
    });

    it('rejects appends outside the allocated columns', () => {
        const builder = new ColumnBlockBuilder(meta, seriesMeta);
        builder.addCols(2);
        expect(() => builder.appendValue(2, 1)).toThrow('column 2 out of range (have 2)');
        expect(() => builder.appendValue(-1, 1)).toThrow(BuilderError);
    });

    it('rejects more values per column than there are series', () => {
        const builder = new ColumnBlockBuilder(meta, seriesMeta);
        builder.addCols(1);
        builder.appendValue(0, 1);
        builder.appendValue(0, 2);
        expect(() => builder.appendValue(0, 3)).toThrow('column 0 already holds 2 values');
    });

    it('cannot change a block after building it', () => {
        const builder = new ColumnBlockBuilder(meta, [seriesMeta[0]]);
        builder.addCols(1);
        builder.appendValue(0, 1);
        const block = builder.build();

        expect(() => builder.appendValue(0, 99)).toThrow('builder already built');
        expect(() => builder.addCols(1)).toThrow(BuilderError);

        const iter = block.stepIter();
        iter.next();
        expect(iter.current().values()).toEqual([1]);
        expect(iter.stepCount()).toBe(1);
    });

    it('builds only once', () => {
        const builder = new ColumnBlockBuilder(meta, seriesMeta);
        builder.build();
        expect(() => builder.build()).toThrow(BuilderError);
    });

    it('builds a block with zero series but allocated steps', () => {
        const builder = new ColumnBlockBuilder(meta, []);
        builder.addCols(4);
        const out = readBlock(builder.build());
        expect(out.names).toEqual([]);
        expect(out.stepCount).toBe(4);
    });
});

describe('ColumnBlock step iterator', () => {
    it('advances stepCount() times then stays exhausted', () => {
        const iter = buildSample().stepIter();
        expect(iter.next()).toBe(true);
        expect(iter.next()).toBe(true);
        expect(iter.next()).toBe(true);
        expect(iter.next()).toBe(false);
        expect(iter.next()).toBe(false);
    });

    it('reports step times from the block bounds', () => {
        const iter = buildSample().stepIter();
        const times: number[] = [];
        while (iter.next()) times.push(iter.current().time());
        expect(times).toEqual([1_000, 1_000 + STEP_MS, 1_000 + 2 * STEP_MS]);
    });

    it('throws when read before the first step or after exhaustion', () => {
        const iter = buildSample().stepIter();
        expect(() => iter.current()).toThrow(IteratorStateError);
        while (iter.next()) { /* drain */ }
        expect(() => iter.current()).toThrow(IteratorStateError);
    });

    it('opens independent iterators', () => {
        const block = buildSample();
        const a = block.stepIter();
        a.next();
        a.next();
        const b = block.stepIter();
        b.next();
        expect(a.current().values()).toEqual([1, 11]);
        expect(b.current().values()).toEqual([0, 10]);
    });

    it('copies the columns and series it is given', () => {
        const columns = [[1, 2]];
        const series = [...seriesMeta];
        const block = new ColumnBlock(columns, meta, series);
        columns[0][0] = 50;
        columns.push([3, 4]);
        series.pop();

        const out = readBlock(block);
        expect(out.names).toEqual(['a', 'b']);
        expect(out.stepCount).toBe(1);
        expect(out.values).toEqual([[1], [2]]);
    });

    it('refuses new iterators after close', () => {
        const block = buildSample();
        block.close();
        block.close();
        expect(() => block.stepIter()).toThrow(BlockClosedError);
    });
});
