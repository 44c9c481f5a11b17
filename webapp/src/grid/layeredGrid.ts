// webapp/src/grid/layeredGrid.ts
import type {
    CellPosition,
    GridImage,
    GridOptions,
    RenderedCell,
    RepaintListener,
    RepaintRequest,
    ValueAppearance,
} from './types';
import { ValueTable } from './valueTable';
import { composite } from './compositor';
import { decodeLayers, encodeLayers, type LayerCells } from './serialization';
import { GridIndexOutOfBoundsError, InvalidArgumentError, NullInputError } from './errors';

export const DEFAULT_GRIDLINE_COLOR = 'black';

function emptyLayer(width: number, height: number): LayerCells {
    return Array.from({ length: height }, () => new Array<number>(width).fill(0));
}

/**
 * A fixed-size grid of integer cells stacked on any number of layers, plus
 * the table that decides how each value is drawn.
 *
 * Writes aimed at a layer that does not exist are ignored, while reads from
 * one throw. Callers rely on this to write to layers that may not have been
 * added yet.
 */
export class LayeredGrid {
    readonly width: number;
    readonly height: number;
    readonly cellSize: number;
    readonly gridlineWeight: number;

    private readonly layers: LayerCells[] = [];
    private readonly values = new ValueTable();
    private readonly listeners = new Set<RepaintListener>();
    private _autoRepaint: boolean;
    private _gridlineColor: string;

    constructor(options: GridOptions) {
        const { width, height, cellSize, gridlineWeight } = options;
        if (!Number.isInteger(width) || !Number.isInteger(height) || !Number.isInteger(cellSize)
            || width <= 0 || height <= 0 || cellSize <= 0) {
            throw new InvalidArgumentError('Grid dimensions and cell sizes must be positive integers.');
        }
        if (!Number.isInteger(gridlineWeight) || gridlineWeight < 0) {
            throw new InvalidArgumentError('Gridline weight must be a non-negative integer.');
        }
        this.width = width;
        this.height = height;
        this.cellSize = cellSize;
        this.gridlineWeight = gridlineWeight;
        this._autoRepaint = options.autoRepaint ?? true;
        this._gridlineColor = options.gridlineColor ?? DEFAULT_GRIDLINE_COLOR;
        this.addLayer(); // default layer
    }

    // --- Dimensions & bounds ---
    get layerCount(): number {
        return this.layers.length;
    }

    isOOB(x: number, y: number): boolean {
        return !Number.isInteger(x) || !Number.isInteger(y)
            || x < 0 || y < 0 || x >= this.width || y >= this.height;
    }

    /** A null position counts as out of bounds. */
    isOOBAt(pos: CellPosition | null): boolean {
        return pos === null || this.isOOB(pos.x, pos.y);
    }

    private hasLayer(layer: number): boolean {
        return Number.isInteger(layer) && layer >= 0 && layer < this.layers.length;
    }

    private assertCellValue(value: number): void {
        if (!Number.isSafeInteger(value)) {
            throw new InvalidArgumentError(`Cell value must be an integer, got ${value}.`);
        }
    }

    private assertInBounds(x: number, y: number): void {
        if (this.isOOB(x, y)) {
            throw new GridIndexOutOfBoundsError(
                `Grid coordinates (${x}, ${y}) must be within ${this.width}x${this.height}.`,
            );
        }
    }

    /** Appends a zero-filled layer and returns its index. */
    addLayer(): number {
        this.layers.push(emptyLayer(this.width, this.height));
        return this.layers.length - 1;
    }

    // --- Repainting ---
    get autoRepaint(): boolean {
        return this._autoRepaint;
    }

    setAutoRepaint(autoRepaint: boolean): void {
        this._autoRepaint = autoRepaint;
    }

    /** Registers a repaint listener; returns its unsubscribe function. */
    subscribe(listener: RepaintListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /** Requests a full repaint regardless of the auto repaint setting. */
    repaint(): void {
        this.notify({ kind: 'full' });
    }

    private tryRepaint(request: RepaintRequest = { kind: 'full' }): void {
        if (this._autoRepaint) {
            this.notify(request);
        }
    }

    private notify(request: RepaintRequest): void {
        this.listeners.forEach(listener => listener(request));
    }

    // --- Cell writes ---
    set(x: number, y: number, value: number, layer = 0): void {
        if (!this.hasLayer(layer)) {
            return;
        }
        this.assertCellValue(value);
        this.assertInBounds(x, y);
        this.layers[layer][y][x] = value;
        this.values.ensure(value);
        this.tryRepaint({ kind: 'cell', x, y });
    }

    setAt(pos: CellPosition | null, value: number, layer = 0): void {
        if (pos === null) {
            return;
        }
        this.set(pos.x, pos.y, value, layer);
    }

    fill(value: number, layer = 0): void {
        if (!this.hasLayer(layer)) {
            return;
        }
        this.assertCellValue(value);
        for (const row of this.layers[layer]) {
            row.fill(value);
        }
        this.values.ensure(value);
        this.tryRepaint();
    }

    fillRow(row: number, value: number, layer = 0): void {
        if (!this.hasLayer(layer)) {
            return;
        }
        this.assertCellValue(value);
        if (!Number.isInteger(row) || row < 0 || row >= this.height) {
            throw new GridIndexOutOfBoundsError(`Row ${row} must be within 0..${this.height - 1}.`);
        }
        this.layers[layer][row].fill(value);
        this.values.ensure(value);
        this.tryRepaint();
    }

    fillColumn(column: number, value: number, layer = 0): void {
        if (!this.hasLayer(layer)) {
            return;
        }
        this.assertCellValue(value);
        if (!Number.isInteger(column) || column < 0 || column >= this.width) {
            throw new GridIndexOutOfBoundsError(`Column ${column} must be within 0..${this.width - 1}.`);
        }
        for (const cells of this.layers[layer]) {
            cells[column] = value;
        }
        this.values.ensure(value);
        this.tryRepaint();
    }

    replace(currentValue: number, newValue: number, layer = 0): void {
        if (!this.hasLayer(layer)) {
            return;
        }
        this.assertCellValue(newValue);
        for (const row of this.layers[layer]) {
            for (let x = 0; x < row.length; x++) {
                if (row[x] === currentValue) {
                    row[x] = newValue;
                }
            }
        }
        this.values.ensure(newValue);
        this.tryRepaint();
    }

    // --- Cell reads ---
    get(x: number, y: number, layer = 0): number {
        if (!this.hasLayer(layer)) {
            throw new InvalidArgumentError(`Layer ${layer} does not exist (layers: ${this.layers.length}).`);
        }
        this.assertInBounds(x, y);
        return this.layers[layer][y][x];
    }

    getAt(pos: CellPosition | null, layer = 0): number {
        if (pos === null) {
            throw new NullInputError('Position must not be null.');
        }
        return this.get(pos.x, pos.y, layer);
    }

    /** Values of every layer at one coordinate, bottom layer first. */
    layerValuesAt(x: number, y: number): number[] {
        this.assertInBounds(x, y);
        return this.layers.map(layer => layer[y][x]);
    }

    // --- Appearance ---
    setColor(value: number, color: string | null): void {
        this.values.setColor(value, color);
        this.tryRepaint();
    }

    setTextColor(value: number, textColor: string | null): void {
        this.values.setTextColor(value, textColor);
        this.tryRepaint();
    }

    setText(value: number, text: string | null): void {
        this.values.setGlyph(value, text);
        this.tryRepaint();
    }

    setImage(value: number, image: GridImage | null): void {
        this.values.setImage(value, image);
        this.tryRepaint();
    }

    appearanceOf(value: number): Readonly<ValueAppearance> {
        return this.values.get(value);
    }

    hasAppearance(value: number): boolean {
        return this.values.has(value);
    }

    get gridlineColor(): string {
        return this._gridlineColor;
    }

    setGridlineColor(color: string): void {
        if (!color) {
            throw new InvalidArgumentError('Gridline color cannot be empty.');
        }
        this._gridlineColor = color;
        this.tryRepaint();
    }

    /** Composited appearance of one cell across all layers. */
    cellAt(x: number, y: number): RenderedCell {
        return composite(this.layerValuesAt(x, y), this.values);
    }

    // --- Save / load ---
    saveGrid(): string {
        return encodeLayers(this.layers);
    }

    /**
     * Writes saved text back into the grid. Layers are appended until the
     * grid has at least as many as the save; layers beyond the save are left
     * as they are. The whole text is parsed before anything is written.
     *
     * @throws GridParseError when a layer's values do not fit this grid.
     */
    loadGrid(gridData: string): void {
        const decoded = decodeLayers(gridData, this.width, this.height);
        while (decoded.length > this.layers.length) {
            this.addLayer();
        }
        decoded.forEach((rows, layer) => {
            rows.forEach((row, y) => {
                row.forEach((value, x) => {
                    this.layers[layer][y][x] = value;
                    this.values.ensure(value);
                });
            });
        });
        console.log(`LayeredGrid: Loaded ${decoded.length} layer(s) into ${this.width}x${this.height} grid.`);
        this.tryRepaint();
    }
}
