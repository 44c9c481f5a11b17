// webapp/src/grid/compositor.ts
import type { LayerImage, PaintStep, RenderedCell } from './types';
import { DEFAULT_COLOR, ValueTable } from './valueTable';
import { InvalidArgumentError } from './errors';

/**
 * Reduces the values stacked on one cell into a single paint instruction.
 *
 * Layer 0 is always opaque: a null color there paints DEFAULT_COLOR. On any
 * higher layer a non-null color replaces the color below and hides any text
 * below it, and a non-empty glyph replaces the text below. Images are only
 * collected from the topmost opaque layer upward, since an opaque color
 * covers everything beneath it.
 *
 * @param layerValues - Cell values at one coordinate, bottom layer first.
 * @param table - Appearance of every value.
 * @throws InvalidArgumentError when no layer values are given.
 */
export function composite(layerValues: readonly number[], table: ValueTable): RenderedCell {
    if (layerValues.length === 0) {
        throw new InvalidArgumentError('A cell must have at least one layer.');
    }

    const base = table.get(layerValues[0]);
    let color = base.color ?? DEFAULT_COLOR;
    let glyph = base.glyph;
    let glyphColor = base.textColor;
    let opaqueLayer = 0;
    let textLayer = 0;

    for (let layer = 1; layer < layerValues.length; layer++) {
        const appearance = table.get(layerValues[layer]);
        if (appearance.color !== null) {
            color = appearance.color;
            glyph = ''; // opaque color hides text below it
            opaqueLayer = layer;
        }
        if (appearance.glyph !== '') {
            glyph = appearance.glyph;
            glyphColor = appearance.textColor;
            textLayer = layer;
        }
    }

    const images: LayerImage[] = [];
    for (let layer = opaqueLayer; layer < layerValues.length; layer++) {
        const image = table.get(layerValues[layer]).image;
        if (image !== null) {
            images.push({ layer, image });
        }
    }

    return { color, glyph, glyphColor, images, opaqueLayer, textLayer };
}

/**
 * Orders the image and text draws of a rendered cell. The glyph sits right
 * above the image of its own layer, so images on higher layers cover it.
 */
export function paintOrder(cell: RenderedCell): PaintStep[] {
    const steps: PaintStep[] = [];
    let glyphPending = cell.glyph !== '';

    for (const { layer, image } of cell.images) {
        if (glyphPending && layer > cell.textLayer) {
            steps.push({ kind: 'glyph', glyph: cell.glyph, color: cell.glyphColor });
            glyphPending = false;
        }
        steps.push({ kind: 'image', layer, image });
    }
    if (glyphPending) {
        steps.push({ kind: 'glyph', glyph: cell.glyph, color: cell.glyphColor });
    }
    return steps;
}
