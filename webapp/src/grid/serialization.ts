// webapp/src/grid/serialization.ts
import { GridParseError } from './errors';

/** A layer as rows of cell values: `layer[y][x]`. */
export type LayerCells = number[][];

export const LAYER_SEPARATOR = ':';
export const CELL_SEPARATOR = ' ';

const INTEGER_TOKEN = /^[+-]?\d+$/;

/**
 * Writes layers as plain text: layers joined by ":", each layer's values in
 * row-major order joined by a single space. No header, no dimensions.
 */
export function encodeLayers(layers: readonly LayerCells[]): string {
    return layers
        .map(layer => layer.map(row => row.join(CELL_SEPARATOR)).join(CELL_SEPARATOR))
        .join(LAYER_SEPARATOR);
}

/**
 * Parses text written by {@link encodeLayers} back into layers of the given
 * size. Every layer must hold exactly `width * height` integers.
 *
 * @throws GridParseError on a non-integer token or a wrong token count.
 */
export function decodeLayers(data: string, width: number, height: number): LayerCells[] {
    return data.split(LAYER_SEPARATOR).map((layerText, layerIndex) => {
        const tokens = layerText.split(/\s+/).filter(token => token !== '');
        const expected = width * height;
        if (tokens.length !== expected) {
            throw new GridParseError(
                `Layer ${layerIndex} holds ${tokens.length} values, expected ${expected} (${width}x${height}).`,
            );
        }

        const rows: LayerCells = [];
        for (let y = 0; y < height; y++) {
            const row: number[] = [];
            for (let x = 0; x < width; x++) {
                const token = tokens[y * width + x];
                const value = Number(token);
                if (!INTEGER_TOKEN.test(token) || !Number.isSafeInteger(value)) {
                    throw new GridParseError(`Layer ${layerIndex}: "${token}" at (${x}, ${y}) is not an integer.`);
                }
                row.push(value);
            }
            rows.push(row);
        }
        return rows;
    });
}
