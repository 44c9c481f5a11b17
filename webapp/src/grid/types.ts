// webapp/src/grid/types.ts

/** Anything the 2D canvas can blit: an <img>, a bitmap, another canvas. */
export type GridImage = CanvasImageSource;

export interface CellPosition {
    x: number;
    y: number;
}

// --- Value appearance ---
export interface ValueAppearance {
    color: string | null; // null: transparent, except on layer 0 where it paints DEFAULT_COLOR
    glyph: string; // "" means no text
    textColor: string;
    image: GridImage | null;
}

// --- Compositor output ---
export interface LayerImage {
    layer: number;
    image: GridImage;
}

export interface RenderedCell {
    color: string;
    glyph: string;
    glyphColor: string;
    images: LayerImage[]; // ascending layer order, starting at opaqueLayer
    opaqueLayer: number;
    textLayer: number;
}

export type PaintStep =
    | { kind: 'image'; layer: number; image: GridImage }
    | { kind: 'glyph'; glyph: string; color: string };

// --- Repaint notifications ---
export type RepaintRequest =
    | { kind: 'full' }
    | { kind: 'cell'; x: number; y: number };

export type RepaintListener = (request: RepaintRequest) => void;

// --- Grid construction ---
export interface GridOptions {
    width: number;
    height: number;
    cellSize: number;
    gridlineWeight: number;
    autoRepaint?: boolean;
    gridlineColor?: string;
}
