import { describe, expect, it } from 'vitest';
import { LayeredGrid } from '../../grid/layeredGrid';
import { PointerTracker } from '../../grid/pointer';
import { flipUnderPointer } from '../useFlipOnDrag';

function setup() {
    const grid = new LayeredGrid({ width: 10, height: 10, cellSize: 50, gridlineWeight: 5 });
    const pointer = new PointerTracker(10, 10, 50, 5);
    return { grid, pointer };
}

describe('flipUnderPointer', () => {
    it('does nothing while the button is up', () => {
        const { grid, pointer } = setup();
        pointer.dispatch({ kind: 'move', px: 10, py: 10 });
        expect(flipUnderPointer(grid, pointer, { x: 0, y: 0 })).toBeNull();
        expect(grid.get(0, 0)).toBe(0);
    });

    it('flips each cell once per visit during a drag', () => {
        const { grid, pointer } = setup();
        pointer.dispatch({ kind: 'buttonDown' });
        pointer.dispatch({ kind: 'move', px: 10, py: 10 });

        let last = flipUnderPointer(grid, pointer, null);
        expect(last).toEqual({ x: 0, y: 0 });
        expect(grid.get(0, 0)).toBe(1);

        last = flipUnderPointer(grid, pointer, last);
        expect(grid.get(0, 0)).toBe(1);

        pointer.dispatch({ kind: 'move', px: 65, py: 10 });
        last = flipUnderPointer(grid, pointer, last);
        expect(last).toEqual({ x: 1, y: 0 });
        expect(grid.get(1, 0)).toBe(1);

        pointer.dispatch({ kind: 'move', px: 10, py: 10 });
        flipUnderPointer(grid, pointer, last);
        expect(grid.get(0, 0)).toBe(0);
    });

    it('keeps the last cell while over a gridline', () => {
        const { grid, pointer } = setup();
        pointer.dispatch({ kind: 'buttonDown' });
        pointer.dispatch({ kind: 'move', px: 55, py: 10 });
        expect(flipUnderPointer(grid, pointer, { x: 0, y: 0 })).toEqual({ x: 0, y: 0 });
    });
});
