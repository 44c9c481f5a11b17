// webapp/src/components/grid/types.ts
import type { ComponentHandle, SentMessage } from '../../types';

// --- Events ---
export interface GridEventPayload {
    event: 'buttonDown' | 'buttonUp';
    x: number | null; // null when the pointer is not over a cell
    y: number | null;
}

export type GridSentMessage = SentMessage<GridEventPayload>;

// --- Imperative handle ---
export interface GridHandle extends ComponentHandle {
    /** Renders the full grid into a detached canvas for export. */
    toImage: () => HTMLCanvasElement;
}
