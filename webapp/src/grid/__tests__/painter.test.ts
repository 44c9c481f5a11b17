import { describe, expect, it, vi } from 'vitest';
import { LayeredGrid } from '../layeredGrid';
import { fitFontSize, paintCell, paintGrid, renderGridImage, type GridSurface } from '../painter';
import { InvalidArgumentError } from '../errors';

type Call =
    | ['fillRect', string, number, number, number, number]
    | ['fillText', string, number, number, string]
    | ['drawImage', string, number, number, number, number];

/** Records draw calls along with the style in effect when each was made. */
function createRecordingSurface(lineHeightPerPx = 1.2): { surface: GridSurface; calls: Call[] } {
    const calls: Call[] = [];
    let fillStyle: string | CanvasGradient | CanvasPattern = '#000';
    let font = '10px sans-serif';
    let textAlign: CanvasTextAlign = 'start';
    let textBaseline: CanvasTextBaseline = 'alphabetic';

    const surface: GridSurface = {
        get fillStyle() { return fillStyle; },
        set fillStyle(value) { fillStyle = value; },
        get font() { return font; },
        set font(value) { font = value; },
        get textAlign() { return textAlign; },
        set textAlign(value) { textAlign = value; },
        get textBaseline() { return textBaseline; },
        set textBaseline(value) { textBaseline = value; },
        fillRect: (x, y, w, h) => {
            calls.push(['fillRect', String(fillStyle), x, y, w, h]);
        },
        fillText: (text, x, y) => {
            calls.push(['fillText', text, x, y, String(fillStyle)]);
        },
        drawImage: (...args: unknown[]) => {
            const [source, dx, dy, dw, dh] = args;
            const name = source instanceof HTMLImageElement ? source.alt : '?';
            calls.push(['drawImage', name, Number(dx), Number(dy), Number(dw), Number(dh)]);
        },
        measureText: (text: string) => {
            const size = Number(/(\d+)px/.exec(font)?.[1] ?? 0);
            const height = size * lineHeightPerPx;
            return {
                width: text.length * size * 0.6,
                fontBoundingBoxAscent: height * 0.8,
                fontBoundingBoxDescent: height * 0.2,
                actualBoundingBoxAscent: height * 0.7,
                actualBoundingBoxDescent: height * 0.1,
            } as TextMetrics;
        },
    };
    return { surface, calls };
}

function image(name: string): HTMLImageElement {
    const img = document.createElement('img');
    img.alt = name;
    return img;
}

describe('fitFontSize', () => {
    it('picks the smallest size whose line height reaches the cell', () => {
        const { surface } = createRecordingSurface(1.2);
        // 42px * 1.2 = 50.4 >= 50, 41px * 1.2 = 49.2 < 50
        expect(fitFontSize(surface, 50)).toBe('bold 42px monospace');
    });

    it('stops at four times the cell size when nothing is measured', () => {
        const { surface } = createRecordingSurface(0);
        expect(fitFontSize(surface, 10)).toBe('bold 40px monospace');
    });
});

describe('paintCell', () => {
    it('fills the cell box, then draws images and text in stacking order', () => {
        const grid = new LayeredGrid({ width: 3, height: 3, cellSize: 20, gridlineWeight: 2 });
        grid.addLayer();
        grid.setColor(1, 'blue');
        grid.setImage(1, image('tile'));
        grid.setColor(2, null);
        grid.setText(2, '#');
        grid.setTextColor(2, 'yellow');
        grid.set(1, 2, 1);
        grid.set(1, 2, 2, 1);

        const { surface, calls } = createRecordingSurface();
        paintCell(surface, grid, 1, 2, 'bold 16px monospace');

        // origin: x = 1 * 22 + 2 = 24, y = 2 * 22 + 2 = 46
        expect(calls).toEqual([
            ['fillRect', 'blue', 24, 46, 20, 20],
            ['drawImage', 'tile', 24, 46, 20, 20],
            ['fillText', '#', 34, 56, 'yellow'],
        ]);
        expect(surface.font).toBe('bold 16px monospace');
        expect(surface.textAlign).toBe('center');
        expect(surface.textBaseline).toBe('middle');
    });
});

describe('paintGrid', () => {
    it('paints the gridline background and every cell', () => {
        const grid = new LayeredGrid({ width: 2, height: 1, cellSize: 10, gridlineWeight: 1, gridlineColor: 'gray' });
        grid.setColor(1, 'red');
        grid.set(1, 0, 1);

        const { surface, calls } = createRecordingSurface();
        paintGrid(surface, grid, 'bold 8px monospace');

        expect(calls).toEqual([
            ['fillRect', 'gray', 0, 0, 23, 12],
            ['fillRect', 'white', 1, 1, 10, 10],
            ['fillRect', 'red', 12, 1, 10, 10],
        ]);
    });
});

describe('renderGridImage', () => {
    it('renders into a canvas of the full grid size', () => {
        const grid = new LayeredGrid({ width: 2, height: 2, cellSize: 10, gridlineWeight: 1 });
        const { surface, calls } = createRecordingSurface();
        const canvas = document.createElement('canvas');
        vi.spyOn(canvas, 'getContext').mockReturnValue(surface as CanvasRenderingContext2D);
        const createCanvas = vi.fn((width: number, height: number) => {
            canvas.width = width;
            canvas.height = height;
            return canvas;
        });

        expect(renderGridImage(grid, createCanvas)).toBe(canvas);
        expect(createCanvas).toHaveBeenCalledWith(23, 23);
        expect(calls[0]).toEqual(['fillRect', 'black', 0, 0, 23, 23]);
        expect(calls).toHaveLength(5);
    });

    it('throws when the canvas has no 2D context', () => {
        const grid = new LayeredGrid({ width: 1, height: 1, cellSize: 10, gridlineWeight: 1 });
        const canvas = document.createElement('canvas');
        vi.spyOn(canvas, 'getContext').mockReturnValue(null);
        expect(() => renderGridImage(grid, () => canvas)).toThrow(InvalidArgumentError);
    });
});
