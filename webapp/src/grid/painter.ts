// webapp/src/grid/painter.ts
import { paintOrder } from './compositor';
import { LayeredGrid } from './layeredGrid';
import { cellOrigin, gridPixelSize } from './pointer';
import { InvalidArgumentError } from './errors';

/** The part of a 2D canvas context the painter draws with. */
export type GridSurface = Pick<
    CanvasRenderingContext2D,
    'fillStyle' | 'font' | 'textAlign' | 'textBaseline' | 'fillRect' | 'fillText' | 'drawImage' | 'measureText'
>;

const FONT_FAMILY = 'monospace';

function fontFor(size: number): string {
    return `bold ${size}px ${FONT_FAMILY}`;
}

/**
 * Picks the smallest bold monospace font whose line height reaches the cell
 * size. Stops at four times the cell size if the surface reports no height.
 */
export function fitFontSize(surface: GridSurface, cellSize: number): string {
    const maxSize = cellSize * 4;
    let fontSize = 0;
    let textHeight = 0;
    while (textHeight < cellSize && fontSize < maxSize) {
        fontSize++;
        surface.font = fontFor(fontSize);
        const metrics = surface.measureText('M');
        const ascent = metrics.fontBoundingBoxAscent ?? metrics.actualBoundingBoxAscent;
        const descent = metrics.fontBoundingBoxDescent ?? metrics.actualBoundingBoxDescent;
        textHeight = (ascent ?? 0) + (descent ?? 0);
    }
    return fontFor(fontSize);
}

/** Paints one cell's box: fill color, then images and glyph in stacking order. */
export function paintCell(surface: GridSurface, grid: LayeredGrid, x: number, y: number, font: string): void {
    const { cellSize, gridlineWeight } = grid;
    const left = cellOrigin(x, cellSize, gridlineWeight);
    const top = cellOrigin(y, cellSize, gridlineWeight);
    const cell = grid.cellAt(x, y);

    surface.fillStyle = cell.color;
    surface.fillRect(left, top, cellSize, cellSize);

    for (const step of paintOrder(cell)) {
        if (step.kind === 'image') {
            surface.drawImage(step.image, left, top, cellSize, cellSize);
        } else {
            surface.fillStyle = step.color;
            surface.font = font;
            surface.textAlign = 'center';
            surface.textBaseline = 'middle';
            surface.fillText(step.glyph, left + cellSize / 2, top + cellSize / 2);
        }
    }
}

/** Paints the gridline background and every cell of the grid. */
export function paintGrid(surface: GridSurface, grid: LayeredGrid, font = fitFontSize(surface, grid.cellSize)): void {
    surface.fillStyle = grid.gridlineColor;
    surface.fillRect(
        0,
        0,
        gridPixelSize(grid.width, grid.cellSize, grid.gridlineWeight),
        gridPixelSize(grid.height, grid.cellSize, grid.gridlineWeight),
    );
    for (let y = 0; y < grid.height; y++) {
        for (let x = 0; x < grid.width; x++) {
            paintCell(surface, grid, x, y, font);
        }
    }
}

export type CanvasFactory = (width: number, height: number) => HTMLCanvasElement;

const createDomCanvas: CanvasFactory = (width, height) => {
    const canvas = document.createElement('canvas');
    canvas.width = width;
    canvas.height = height;
    return canvas;
};

/**
 * Renders the whole grid into a new, detached canvas. Callers encode it in
 * whatever raster format they need (`toBlob`, `toDataURL`).
 */
export function renderGridImage(grid: LayeredGrid, createCanvas: CanvasFactory = createDomCanvas): HTMLCanvasElement {
    const canvas = createCanvas(
        gridPixelSize(grid.width, grid.cellSize, grid.gridlineWeight),
        gridPixelSize(grid.height, grid.cellSize, grid.gridlineWeight),
    );
    const context = canvas.getContext('2d');
    if (!context) {
        throw new InvalidArgumentError('Canvas has no 2D context to render the grid into.');
    }
    paintGrid(context, grid);
    return canvas;
}
