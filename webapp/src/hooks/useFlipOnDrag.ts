import { useEffect, useRef } from 'react';
import { LayeredGrid } from '../grid/layeredGrid';
import { PointerTracker } from '../grid/pointer';
import type { CellPosition } from '../grid/types';

/**
 * One poll of the drag editor: while the button is held over a cell other
 * than the last one flipped, set that cell to `1 - value`.
 *
 * @returns The cell to remember as last flipped (null once the button is up).
 */
export function flipUnderPointer(
    grid: LayeredGrid,
    pointer: PointerTracker,
    last: CellPosition | null,
): CellPosition | null {
    if (!pointer.isMouseDown()) {
        return null;
    }
    const cell = pointer.getMouseCell();
    if (cell === null || (last !== null && last.x === cell.x && last.y === cell.y)) {
        return last;
    }
    grid.setAt(cell, 1 - grid.getAt(cell));
    return cell;
}

/**
 * Polls the pointer once per animation frame and flips cells under a drag.
 * Pass `enabled = false` to pause editing.
 */
export function useFlipOnDrag(grid: LayeredGrid, pointer: PointerTracker, enabled: boolean = true) {
    /** Last cell flipped during the current drag. */
    const lastCell = useRef<CellPosition | null>(null);

    useEffect(() => {
        if (!enabled) {
            return;
        }

        let frameId = 0;
        const poll = () => {
            try {
                lastCell.current = flipUnderPointer(grid, pointer, lastCell.current);
            } catch (error) {
                console.error('[useFlipOnDrag] Flip failed:', error);
                lastCell.current = null;
            }
            frameId = window.requestAnimationFrame(poll);
        };
        frameId = window.requestAnimationFrame(poll);

        return () => {
            window.cancelAnimationFrame(frameId);
            lastCell.current = null;
        };
    }, [grid, pointer, enabled]);
}
