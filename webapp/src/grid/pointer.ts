// webapp/src/grid/pointer.ts
import type { CellPosition } from './types';

/** Pixel offset of a cell's top-left corner along one axis. */
export function cellOrigin(index: number, cellSize: number, gridlineWeight: number): number {
    return index * (cellSize + gridlineWeight) + gridlineWeight;
}

/** Total pixel length of `cells` cells, gridlines included on both edges. */
export function gridPixelSize(cells: number, cellSize: number, gridlineWeight: number): number {
    return cells * (cellSize + gridlineWeight) + gridlineWeight;
}

/**
 * Maps a panel-local pixel to the cell under it.
 * Returns null on the gridline band, boundary pixel included.
 */
export function cellAtPixel(
    px: number,
    py: number,
    cellSize: number,
    gridlineWeight: number,
): CellPosition | null {
    if (px < 0 || py < 0) {
        return null;
    }
    const pitch = cellSize + gridlineWeight;
    const localX = Math.floor(px) % pitch;
    const localY = Math.floor(py) % pitch;
    if (localX > gridlineWeight && localY > gridlineWeight) {
        return { x: Math.floor(px / pitch), y: Math.floor(py / pitch) };
    }
    return null;
}

// --- Pointer notices delivered by the host ---
export type PointerNotice =
    | { kind: 'buttonDown' }
    | { kind: 'buttonUp' }
    | { kind: 'move'; px: number; py: number }
    | { kind: 'leave' };

/**
 * Holds the two pieces of pointer state the application polls: whether a
 * button is held, and which cell (if any) is under the pointer.
 */
export class PointerTracker {
    private mouseDown = false;
    private cell: CellPosition | null = null;

    constructor(
        private readonly width: number,
        private readonly height: number,
        private readonly cellSize: number,
        private readonly gridlineWeight: number,
    ) {}

    dispatch(notice: PointerNotice): void {
        switch (notice.kind) {
            case 'buttonDown':
                this.mouseDown = true;
                break;
            case 'buttonUp':
                this.mouseDown = false;
                break;
            case 'move': {
                const cell = cellAtPixel(notice.px, notice.py, this.cellSize, this.gridlineWeight);
                // Pixels past the last cell (right or bottom edge band) map to nothing.
                this.cell = cell && cell.x < this.width && cell.y < this.height ? cell : null;
                break;
            }
            case 'leave':
                this.cell = null;
                break;
            default: {
                const exhaustiveCheck: never = notice;
                console.warn(`PointerTracker: Unknown notice "${JSON.stringify(exhaustiveCheck)}" ignored.`);
            }
        }
    }

    isMouseDown(): boolean {
        return this.mouseDown;
    }

    /** Cell under the pointer, or null when off the panel or on a gridline. */
    getMouseCell(): CellPosition | null {
        return this.cell ? { ...this.cell } : null;
    }
}
